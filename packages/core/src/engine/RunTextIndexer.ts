import type { CharMap, CharPosition, TextRun } from '../types/index.js';

/**
 * Build a paragraph's logical text and the run/offset of every character
 * in one pass. The map goes stale on the first edit of any run; callers
 * rebuild it rather than patch it.
 */
export function buildCharMap(runs: readonly TextRun[]): CharMap {
  let text = '';
  const positions: CharPosition[] = [];

  runs.forEach((run, runIndex) => {
    const runText = run.text;
    for (let offset = 0; offset < runText.length; offset++) {
      positions.push({ runIndex, offset });
    }
    text += runText;
  });

  return { text, positions };
}

/**
 * Run/offset of the character at `index` in logical text
 */
export function locate(map: CharMap, index: number): CharPosition {
  const position = map.positions[index];
  if (position === undefined) {
    throw new RangeError(`Character index ${index} is outside logical text of length ${map.text.length}`);
  }
  return position;
}
