/**
 * Error classes for template filling and their conversion to
 * JSON error responses with remediation suggestions.
 */

import type { ErrorResponse, ErrorType, FillResult } from '../types/index.js';

/**
 * Base class for every classified fill error
 */
export class TemplateFillError extends Error {
  readonly type: ErrorType;
  readonly context: Record<string, unknown>;

  constructor(type: ErrorType, message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.type = type;
    this.context = context;
  }
}

/**
 * The template could not be fetched from the store
 */
export class TemplateNotFoundError extends TemplateFillError {
  readonly templateKey: string;

  constructor(templateKey: string, cause?: unknown) {
    super('TEMPLATE_NOT_FOUND', `Template not found: ${templateKey}`, { templateKey }, cause);
    this.templateKey = templateKey;
  }
}

/**
 * The template bytes are not a readable DOCX package
 */
export class InvalidTemplateError extends TemplateFillError {
  constructor(reason: string, cause?: unknown) {
    super('INVALID_TEMPLATE', `Invalid DOCX template: ${reason}`, { reason }, cause);
  }
}

/**
 * An image value could not be decoded; aborts that token's insertion only.
 * When raised after a fill, `partialResult` holds the document with every
 * other placeholder filled.
 */
export class ImageDecodeError extends TemplateFillError {
  readonly token: string;
  readonly reason: string;
  readonly partialResult?: FillResult;

  constructor(token: string, reason: string, cause?: unknown, partialResult?: FillResult) {
    super('IMAGE_DECODE_ERROR', `Failed to decode image ${token}: ${reason}`, { token, reason }, cause);
    this.token = token;
    this.reason = reason;
    this.partialResult = partialResult;
  }
}

/**
 * The filled document could not be written. The computed bytes travel
 * with the error so the caller can retry the store step alone.
 */
export class StoreFailureError extends TemplateFillError {
  readonly outputKey: string;
  readonly bytes: Buffer;

  constructor(outputKey: string, bytes: Buffer, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
    super('STORE_FAILURE', `Failed to store ${outputKey}: ${reason}`, { outputKey, size: bytes.length }, cause);
    this.outputKey = outputKey;
    this.bytes = bytes;
  }
}

const SUGGESTIONS: Record<ErrorType, string[]> = {
  TEMPLATE_NOT_FOUND: [
    'Check the template key, including folder prefix and .docx extension',
    'Verify the template was uploaded to the configured store root',
  ],
  INVALID_TEMPLATE: [
    'Open the template in Word and save it again as .docx',
    'Make sure the file is not a legacy .doc or a password-protected document',
  ],
  IMAGE_DECODE_ERROR: [
    'Send the image as plain base64 (a data: URL prefix is also accepted)',
    'Use PNG, JPEG, GIF, TIFF, WebP or AVIF image data',
  ],
  STORE_FAILURE: [
    'Retry storing the document; the filled bytes were produced',
    'Check that the store root exists and is writable',
  ],
  VALIDATION_ERROR: [
    'Check the input parameters match the expected types and formats',
    'Refer to the tool documentation for parameter requirements',
  ],
  PROCESSING_ERROR: [
    'Check the error message for specific details',
    'Try the operation again',
  ],
};

/**
 * Convert any thrown value into an ErrorResponse
 */
export function toErrorResponse(error: unknown, context?: Record<string, unknown>): ErrorResponse {
  if (error instanceof TemplateFillError) {
    return {
      error: error.type,
      message: error.message,
      context: { ...error.context, ...context },
      suggestions: SUGGESTIONS[error.type],
    };
  }

  if (isErrorResponse(error)) {
    return error;
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  return {
    error: 'PROCESSING_ERROR',
    message: errorMessage,
    context: {
      errorType: error instanceof Error ? error.constructor.name : typeof error,
      ...context,
    },
    suggestions: SUGGESTIONS.PROCESSING_ERROR,
  };
}

/**
 * Check if a value is an ErrorResponse
 */
export function isErrorResponse(value: unknown): value is ErrorResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    'message' in value
  );
}

/**
 * Format error response as JSON string
 */
export function formatErrorResponse(error: ErrorResponse): string {
  return JSON.stringify(error, null, 2);
}
