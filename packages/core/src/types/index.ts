/**
 * Core type definitions for docfill
 *
 * Shared types used by the document model, the substitution engine,
 * the fill services and the MCP server. Types are organized by domain.
 */

// ============================================================================
// Formatting Models
// ============================================================================

/**
 * Run-level formatting as read from or written to a <w:rPr>
 */
export interface RunFormat {
  fontFamily?: string;           // w:rFonts ascii/hAnsi/cs
  sizePt?: number;               // Point size (stored as half-points in OOXML)
  bold?: boolean;
  italic?: boolean;
}

/**
 * Paragraph justification values understood by Word (w:jc)
 */
export type Justification = 'left' | 'center' | 'right' | 'both';

/**
 * Paragraph-level layout attributes as read from or written to a <w:pPr>
 */
export interface ParagraphFormat {
  lineSpacing?: number;          // Multiple of single spacing (1 = single)
  spaceAfterPt?: number;         // Space after the paragraph in points
  leftIndentTwips?: number;      // Left indent in twentieths of a point
  hangingIndentTwips?: number;   // Hanging indent in twentieths of a point
  justification?: Justification;
}

/**
 * The template's canonical body font
 */
export interface CanonicalFont {
  family: string;
  sizePt: number;
}

// ============================================================================
// Engine Models
// ============================================================================

/**
 * Minimal view of a run the splice engine works on
 */
export interface TextRun {
  text: string;
}

/**
 * Position of one logical character inside the run sequence
 */
export interface CharPosition {
  runIndex: number;
  offset: number;                // Offset inside the run's text
}

/**
 * Logical text of a paragraph and the run/offset of each of its characters.
 * Valid only until the next edit of the run sequence.
 */
export interface CharMap {
  text: string;
  positions: CharPosition[];
}

/**
 * Half-open span [start, end) in logical-text coordinates
 */
export interface TextSpan {
  start: number;
  end: number;
}

/**
 * Structured section kinds with their own mini-language
 */
export type StructuredSectionKind = 'sponsor' | 'risks';

/**
 * A {{NAME}} occurrence in a paragraph's logical text
 */
export interface PlaceholderMatch extends TextSpan {
  name: string;
  token: string;                 // The literal "{{NAME}}"
}

/**
 * A placeholder resolved against the value map, image map and structured set
 */
export type ResolvedPlaceholder =
  | (PlaceholderMatch & { kind: 'value'; value: string })
  | (PlaceholderMatch & { kind: 'image' })
  | (PlaceholderMatch & { kind: 'structured'; section: StructuredSectionKind; value: string });

export type PlaceholderKind = ResolvedPlaceholder['kind'];

/**
 * What the scanner resolves names against
 */
export interface PlaceholderLookup {
  values: ReadonlyMap<string, string>;
  imageTokens: ReadonlySet<string>;
  structuredTokens: Readonly<Record<string, StructuredSectionKind>>;
}

/**
 * Result of scanning one paragraph
 */
export interface ScanResult {
  resolved: ResolvedPlaceholder[];
  unresolved: PlaceholderMatch[];
}

// ============================================================================
// Image Models
// ============================================================================

/**
 * Intrinsic pixel dimensions of an image
 */
export interface ImageDimensions {
  width: number;
  height: number;
}

/**
 * Maximum printable box for inserted images, in inches
 */
export interface ContentBox {
  maxWidth: number;
  maxHeight: number;
}

/**
 * Outcome of the box-fit computation. The fallback variant is returned
 * when the intrinsic size could not be read.
 */
export type BoxFitResult =
  | { kind: 'fitted'; width: number; height: number }
  | { kind: 'fallback'; width: number; height: number; reason: string };

/**
 * Outcome of reading image metadata
 */
export type ImageMeasurement =
  | { ok: true; format: string; dimensions?: ImageDimensions }
  | { ok: false; reason: string };

/**
 * An image decoded from the request and ready to embed
 */
export interface PreparedImage {
  token: string;
  data: Buffer;
  extension: string;             // File extension used for the media part
  contentType: string;           // MIME type registered in [Content_Types].xml
  size: BoxFitResult;            // Final size in inches
}

// ============================================================================
// Fill Models
// ============================================================================

/**
 * Options for one fill pass
 */
export interface FillOptions {
  bodyFont?: CanonicalFont;
  contentBox?: ContentBox;
  imageWidths?: Readonly<Record<string, number>>;
  defaultImageWidth?: number;
}

/**
 * Per-token image failure recorded during a fill
 */
export interface ImageFailure {
  token: string;
  reason: string;
}

/**
 * Summary of what a fill pass did
 */
export interface FillReport {
  paragraphsVisited: number;
  valuesReplaced: number;        // Number of value spans spliced
  imagesInserted: string[];      // Image tokens, in insertion order
  sectionsExpanded: string[];    // Structured tokens, in expansion order
  unresolved: string[];          // Distinct names left verbatim
  imageFailures: ImageFailure[];
}

/**
 * Filled document bytes plus the report
 */
export interface FillResult {
  bytes: Buffer;
  report: FillReport;
}

/**
 * Placeholders found in a template, grouped by the class their name implies
 */
export interface PlaceholderInventory {
  values: string[];
  images: string[];
  structured: string[];
}

// ============================================================================
// Service Models
// ============================================================================

/**
 * A fill request addressed to a stored template
 */
export interface FillRequest {
  templateKey: string;
  values: Record<string, string>;
  images: Record<string, string>;
}

/**
 * Fill request whose output is written back to the store
 */
export interface FillAndStoreRequest extends FillRequest {
  outputKey: string;
}

/**
 * Where a stored result ended up
 */
export interface StoredFillResult {
  outputKey: string;
  outputUrl: string;
  report: FillReport;
}

// ============================================================================
// Error Models
// ============================================================================

/**
 * Error type identifiers
 */
export type ErrorType =
  | 'TEMPLATE_NOT_FOUND'
  | 'INVALID_TEMPLATE'
  | 'IMAGE_DECODE_ERROR'
  | 'STORE_FAILURE'
  | 'VALIDATION_ERROR'
  | 'PROCESSING_ERROR';

/**
 * Error response
 */
export interface ErrorResponse {
  error: string;                 // Error type
  message: string;               // Error message
  context?: Record<string, unknown>;  // Error context
  suggestions?: string[];        // Suggested fixes
}
