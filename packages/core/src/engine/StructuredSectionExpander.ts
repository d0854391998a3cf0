/**
 * Structured Section Expander
 *
 * Two tokens carry a small mini-language instead of a plain value:
 *
 * - Sponsor block: newline-separated lines. Blank lines become spacer
 *   paragraphs; short label-like lines become bold headers; everything
 *   else is body text.
 * - Risk/mitigant block: blocks separated by blank lines, each
 *   `RISK NAME<TAB>MITIGANT TEXT`, rendered with a hanging indent.
 *
 * Parsing is pure and returns tagged variants; `expandStructuredSection`
 * materializes the resulting paragraph specs into the document.
 */

import type { Paragraph } from '../docx/Paragraph.js';
import { RISK_HANGING_INDENT_TWIPS } from '../constants.js';
import type { CanonicalFont, ParagraphFormat, StructuredSectionKind } from '../types/index.js';
import { applyCanonicalFont } from './FormattingApplier.js';

// ============================================================================
// Tagged Variants
// ============================================================================

export type SponsorLine =
  | { kind: 'header'; text: string }
  | { kind: 'body'; text: string }
  | { kind: 'blank' };

export type RiskBlock =
  | { kind: 'risk'; name: string; mitigant: string }
  | { kind: 'plain'; text: string };

export interface RunSpec {
  text: string;
  bold: boolean;
}

/**
 * One output paragraph: its runs and the layout attributes to set on it
 */
export interface ParagraphSpec {
  runs: RunSpec[];
  format: ParagraphFormat;
}

// ============================================================================
// Sanitizing
// ============================================================================

/**
 * Normalize generated text before any line or block splitting: every line
 * is trimmed, runs of 2+ spaces become one, runs of 3+ newlines become two.
 * Blank lines at either end are kept; each one is a sponsor spacer.
 */
export function sanitizeStructuredText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(line => line.trim())
    .join('\n')
    .replace(/ {2,}/g, ' ')
    .replace(/\n{3,}/g, '\n\n');
}

// ============================================================================
// Sponsor Block
// ============================================================================

const MAX_HEADER_LENGTH = 80;
const HEADER_FOLLOWER_RATIO = 1.5;

/**
 * Classify one sponsor line given the next non-blank line after it.
 *
 * A header is shorter than 80 characters, has no terminal `.`, `!` or `?`,
 * contains an uppercase letter, and is followed by a line that is at least
 * 1.5 times longer or starts lowercase.
 */
export function classifySponsorLine(line: string, nextNonBlank: string | undefined): SponsorLine {
  const text = line.trim();
  if (text === '') {
    return { kind: 'blank' };
  }

  const isLabel =
    text.length < MAX_HEADER_LENGTH &&
    !/[.!?]$/.test(text) &&
    /[A-Z]/.test(text);

  const next = nextNonBlank?.trim();
  const introducesBody =
    next !== undefined &&
    next !== '' &&
    (next.length >= HEADER_FOLLOWER_RATIO * text.length || /^[a-z]/.test(next));

  return isLabel && introducesBody ? { kind: 'header', text } : { kind: 'body', text };
}

export function classifySponsorLines(text: string): SponsorLine[] {
  const sanitized = sanitizeStructuredText(text);
  if (sanitized.trim() === '') {
    return [];
  }

  const lines = sanitized.split('\n');
  return lines.map((line, i) => {
    const next = lines.slice(i + 1).find(candidate => candidate !== '');
    return classifySponsorLine(line, next);
  });
}

const SPONSOR_FORMAT: ParagraphFormat = { lineSpacing: 1, spaceAfterPt: 0 };

export function buildSponsorParagraphs(text: string): ParagraphSpec[] {
  return classifySponsorLines(text).map(line => ({
    runs: line.kind === 'blank' ? [] : [{ text: line.text, bold: line.kind === 'header' }],
    format: { ...SPONSOR_FORMAT },
  }));
}

// ============================================================================
// Risk/Mitigant Block
// ============================================================================

// A capitalized label of at most 60 characters, two or more spaces, the rest
const SPACED_RISK_PATTERN = /^([A-Z][^\n]{0,59}?) {2,}(\S[\s\S]*)$/;

/**
 * Parse one block as a risk (tab-separated, or a short label followed by
 * two or more spaces) or as plain text
 */
export function parseRiskBlock(block: string): RiskBlock {
  const text = block.trim();

  const tab = text.indexOf('\t');
  if (tab > 0) {
    const name = text.slice(0, tab).trim();
    const mitigant = text.slice(tab + 1).trim();
    if (name !== '') {
      return { kind: 'risk', name, mitigant };
    }
  }

  const spaced = SPACED_RISK_PATTERN.exec(text);
  if (spaced) {
    return { kind: 'risk', name: spaced[1].trim(), mitigant: spaced[2].trim() };
  }

  return { kind: 'plain', text };
}

export function parseRiskBlocks(text: string): RiskBlock[] {
  return sanitizeStructuredText(text)
    .split(/\n{2,}/)
    .filter(block => block.trim() !== '')
    .map(parseRiskBlock);
}

const RISK_FORMAT: ParagraphFormat = {
  leftIndentTwips: RISK_HANGING_INDENT_TWIPS,
  hangingIndentTwips: RISK_HANGING_INDENT_TWIPS,
  justification: 'both',
  lineSpacing: 1,
  spaceAfterPt: 0,
};

export function buildRiskParagraphs(text: string): ParagraphSpec[] {
  const specs: ParagraphSpec[] = [];
  parseRiskBlocks(text).forEach((block, i) => {
    if (i > 0) {
      specs.push({ runs: [], format: { lineSpacing: 1, spaceAfterPt: 0 } });
    }
    if (block.kind === 'risk') {
      specs.push({
        runs: [
          { text: block.name, bold: true },
          { text: '\t', bold: false },
          { text: block.mitigant, bold: false },
        ],
        format: { ...RISK_FORMAT },
      });
    } else {
      specs.push({ runs: [{ text: block.text, bold: false }], format: {} });
    }
  });
  return specs;
}

export function buildStructuredParagraphs(section: StructuredSectionKind, text: string): ParagraphSpec[] {
  return section === 'sponsor' ? buildSponsorParagraphs(text) : buildRiskParagraphs(text);
}

// ============================================================================
// Materializing
// ============================================================================

/**
 * Replace `paragraph` with the paragraphs described by `specs`.
 *
 * The original paragraph becomes the first output paragraph; the others
 * are inserted as siblings right after it and start from a copy of its
 * original paragraph properties. Returns all output paragraphs in order.
 */
export function expandStructuredSection(
  paragraph: Paragraph,
  specs: readonly ParagraphSpec[],
  font: CanonicalFont,
): Paragraph[] {
  // Siblings are all cloned from the untouched original, newest first
  const siblings: Paragraph[] = [];
  for (let i = specs.length - 1; i >= 1; i--) {
    siblings.unshift(paragraph.insertParagraphAfter());
  }

  paragraph.clearContent();
  const output = [paragraph, ...siblings];
  specs.forEach((layout, i) => {
    const target = output[i];
    target.applyFormat(layout.format);
    for (const runSpec of layout.runs) {
      const run = target.addRun(runSpec.text);
      applyCanonicalFont(run, font, runSpec.bold);
    }
  });
  return output;
}
