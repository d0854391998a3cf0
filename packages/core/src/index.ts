/**
 * @docfill/core
 *
 * DOCX template filling: a run-splicing placeholder substitution engine,
 * image insertion sized to the page content box, and structured section
 * expansion, plus the blob store collaborator the fill service runs on.
 *
 * @packageDocumentation
 */

// ============================================================================
// Type Exports
// ============================================================================

/**
 * Formatting Models
 */
export type {
  RunFormat,
  Justification,
  ParagraphFormat,
  CanonicalFont,
} from './types/index.js';

/**
 * Engine Models
 *
 * Logical text, character maps and placeholder matches.
 */
export type {
  TextRun,
  CharPosition,
  CharMap,
  TextSpan,
  StructuredSectionKind,
  PlaceholderMatch,
  ResolvedPlaceholder,
  PlaceholderKind,
  PlaceholderLookup,
  ScanResult,
} from './types/index.js';

/**
 * Image Models
 */
export type {
  ImageDimensions,
  ContentBox,
  BoxFitResult,
  ImageMeasurement,
  PreparedImage,
} from './types/index.js';

/**
 * Fill and Service Models
 */
export type {
  FillOptions,
  ImageFailure,
  FillReport,
  FillResult,
  PlaceholderInventory,
  FillRequest,
  FillAndStoreRequest,
  StoredFillResult,
} from './types/index.js';

/**
 * Error Models
 */
export type {
  ErrorType,
  ErrorResponse,
} from './types/index.js';

// ============================================================================
// Constants
// ============================================================================

export {
  IMAGE_WIDTHS,
  DEFAULT_IMAGE_WIDTH,
  FALLBACK_IMAGE_HEIGHT,
  CONTENT_BOX,
  BODY_FONT,
  STRUCTURED_TOKENS,
  IMAGE_TOKEN_PREFIX,
  RISK_HANGING_INDENT_TWIPS,
  DOCX_CONTENT_TYPE,
} from './constants.js';

// ============================================================================
// Document Model Exports
// ============================================================================

export { DocxPackage, XmlPart, Relationships } from './docx/DocxPackage.js';
export type { Relationship, MediaFile } from './docx/DocxPackage.js';
export { DocxDocument, Section, HeaderFooter, HEADER_FOOTER_VARIANTS } from './docx/DocxDocument.js';
export type { HeaderFooterVariant } from './docx/DocxDocument.js';
export { Paragraph } from './docx/Paragraph.js';
export { Run } from './docx/Run.js';
export { Table, Row, Cell } from './docx/Table.js';
export type { BlockContainer } from './docx/Table.js';

// ============================================================================
// Engine Exports
// ============================================================================

export { buildCharMap, locate } from './engine/RunTextIndexer.js';
export {
  PLACEHOLDER_PATTERN,
  findPlaceholders,
  classifyPlaceholder,
  scanPlaceholders,
  inApplicationOrder,
} from './engine/PlaceholderScanner.js';
export { spliceRuns, cutSpan } from './engine/SpliceEngine.js';
export type { CuttableRun } from './engine/SpliceEngine.js';
export {
  sanitizeStructuredText,
  classifySponsorLine,
  classifySponsorLines,
  buildSponsorParagraphs,
  parseRiskBlock,
  parseRiskBlocks,
  buildRiskParagraphs,
  buildStructuredParagraphs,
  expandStructuredSection,
} from './engine/StructuredSectionExpander.js';
export type { SponsorLine, RiskBlock, RunSpec, ParagraphSpec } from './engine/StructuredSectionExpander.js';
export { applyCanonicalFont, normalizeTouchedRuns } from './engine/FormattingApplier.js';
export { walkDocument, walkContainer, walkTable } from './engine/TreeWalker.js';
export type { ParagraphVisitor } from './engine/TreeWalker.js';

// ============================================================================
// Service Exports
// ============================================================================

export { fitToBox, fallbackSize, fitMeasured, measureImage, scaleImage } from './services/BoxFitScaler.js';
export { decodeBase64Image, preferredWidthFor, prepareImage, prepareImages } from './services/ImagePreparer.js';
export type { ImagePreparerOptions } from './services/ImagePreparer.js';
export { TemplateFiller, fillDocument, listPlaceholders } from './services/TemplateFiller.js';
export { TemplateFillService } from './services/TemplateFillService.js';
export type { TemplateFillServiceOptions } from './services/TemplateFillService.js';
export {
  MAX_NUMBERED_SUFFIX,
  splitExtension,
  compactTimestamp,
  resolveAvailableKey,
} from './services/OutputKeyResolver.js';

// ============================================================================
// Storage Exports
// ============================================================================

export type { BlobStore } from './storage/BlobStore.js';
export { FileSystemBlobStore } from './storage/FileSystemBlobStore.js';

// ============================================================================
// Utility Exports
// ============================================================================

export {
  TemplateFillError,
  TemplateNotFoundError,
  InvalidTemplateError,
  ImageDecodeError,
  StoreFailureError,
  toErrorResponse,
  isErrorResponse,
  formatErrorResponse,
} from './utils/errors.js';

export {
  LoggingService,
  LogLevel,
  parseLogLevel,
  initializeLogger,
  getLogger,
} from './utils/logger.js';
export type { LogSink } from './utils/logger.js';
