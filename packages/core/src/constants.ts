/**
 * Template constants shared by every fill
 */

import type { CanonicalFont, ContentBox, StructuredSectionKind } from './types/index.js';

/**
 * Preferred image widths in inches, keyed by image token name
 */
export const IMAGE_WIDTHS: Readonly<Record<string, number>> = {
  IMAGE_SOURCES_USES: 6.5,
  IMAGE_CAPITAL_STACK_CLOSING: 6.5,
  IMAGE_LOAN_TO_COST: 6.0,
  IMAGE_LTV_LTC: 6.0,
  IMAGE_AERIAL_MAP: 5.0,
  IMAGE_LOCATION_MAP: 5.0,
  IMAGE_REGIONAL_MAP: 5.0,
  IMAGE_SITE_PLAN: 5.5,
  IMAGE_PILOT_SCHEDULE: 6.0,
  IMAGE_TAKEOUT_SIZING: 6.0,
};

/** Width used for image tokens missing from IMAGE_WIDTHS */
export const DEFAULT_IMAGE_WIDTH = 6.0;

/** Height used when an image's intrinsic size cannot be read */
export const FALLBACK_IMAGE_HEIGHT = 4.0;

/**
 * Printable area of a letter page with one-inch margins
 */
export const CONTENT_BOX: ContentBox = {
  maxWidth: 6.5,
  maxHeight: 9.0,
};

export const BODY_FONT: CanonicalFont = {
  family: 'Times New Roman',
  sizePt: 11,
};

/**
 * Tokens whose value is a mini-language expanded into several paragraphs
 */
export const STRUCTURED_TOKENS: Readonly<Record<string, StructuredSectionKind>> = {
  SPONSOR_BACKGROUND: 'sponsor',
  RISKS_AND_MITIGANTS: 'risks',
};

export const IMAGE_TOKEN_PREFIX = 'IMAGE_';

/** Left indent and hanging indent of risk paragraphs (1.5") */
export const RISK_HANGING_INDENT_TWIPS = 2160;

export const DOCX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
