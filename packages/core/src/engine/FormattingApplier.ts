import type { Run } from '../docx/Run.js';
import type { CanonicalFont } from '../types/index.js';

/**
 * Put a run on the canonical body font and size with the given weight
 */
export function applyCanonicalFont(run: Run, font: CanonicalFont, bold: boolean): void {
  run.setFontFamily(font.family);
  run.setSize(font.sizePt);
  run.setBold(bold);
}

/**
 * Normalize the runs a value splice touched. Substituted text is never bold.
 */
export function normalizeTouchedRuns(runs: readonly Run[], touched: readonly number[], font: CanonicalFont): void {
  for (const index of touched) {
    const run = runs[index];
    if (run !== undefined) {
      applyCanonicalFont(run, font, false);
    }
  }
}
