/**
 * Unit tests for fill error classes and error response conversion
 */

import {
  ImageDecodeError,
  InvalidTemplateError,
  StoreFailureError,
  TemplateFillError,
  TemplateNotFoundError,
  formatErrorResponse,
  isErrorResponse,
  toErrorResponse,
} from '../../src/utils/errors.js';

describe('Error Utilities', () => {
  describe('error classes', () => {
    it('should carry the template key on TemplateNotFoundError', () => {
      const cause = new Error('ENOENT');
      const error = new TemplateNotFoundError('templates/memo.docx', cause);

      expect(error).toBeInstanceOf(TemplateFillError);
      expect(error.name).toBe('TemplateNotFoundError');
      expect(error.type).toBe('TEMPLATE_NOT_FOUND');
      expect(error.message).toBe('Template not found: templates/memo.docx');
      expect(error.templateKey).toBe('templates/memo.docx');
      expect(error.cause).toBe(cause);
    });

    it('should carry the token on ImageDecodeError', () => {
      const error = new ImageDecodeError('IMAGE_SITE_PLAN', 'malformed base64');

      expect(error.token).toBe('IMAGE_SITE_PLAN');
      expect(error.reason).toBe('malformed base64');
      expect(error.message).toBe('Failed to decode image IMAGE_SITE_PLAN: malformed base64');
    });

    it('should keep the computed bytes on StoreFailureError', () => {
      const bytes = Buffer.from('filled');
      const error = new StoreFailureError('out/memo.docx', bytes, new Error('disk full'));

      expect(error.bytes).toBe(bytes);
      expect(error.message).toBe('Failed to store out/memo.docx: disk full');
      expect(error.context).toEqual({ outputKey: 'out/memo.docx', size: 6 });
    });
  });

  describe('toErrorResponse', () => {
    it('should convert classified errors with their context and suggestions', () => {
      const response = toErrorResponse(new InvalidTemplateError('not a ZIP archive'), { templateKey: 't.docx' });

      expect(response.error).toBe('INVALID_TEMPLATE');
      expect(response.message).toBe('Invalid DOCX template: not a ZIP archive');
      expect(response.context).toEqual({ reason: 'not a ZIP archive', templateKey: 't.docx' });
      expect(response.suggestions?.length).toBeGreaterThan(0);
    });

    it('should pass error responses through', () => {
      const existing = { error: 'VALIDATION_ERROR', message: 'bad input' };
      expect(toErrorResponse(existing)).toBe(existing);
    });

    it('should wrap unknown errors as processing errors', () => {
      const response = toErrorResponse(new TypeError('boom'));

      expect(response.error).toBe('PROCESSING_ERROR');
      expect(response.message).toBe('boom');
      expect(response.context).toEqual({ errorType: 'TypeError' });
    });

    it('should wrap thrown non-errors', () => {
      const response = toErrorResponse('plain string');

      expect(response.message).toBe('plain string');
      expect(response.context).toEqual({ errorType: 'string' });
    });
  });

  describe('isErrorResponse', () => {
    it('should recognize the response shape', () => {
      expect(isErrorResponse({ error: 'X', message: 'y' })).toBe(true);
      expect(isErrorResponse({ message: 'y' })).toBe(false);
      expect(isErrorResponse(null)).toBe(false);
    });
  });

  describe('formatErrorResponse', () => {
    it('should format as indented JSON', () => {
      expect(formatErrorResponse({ error: 'X', message: 'y' })).toBe('{\n  "error": "X",\n  "message": "y"\n}');
    });
  });
});
