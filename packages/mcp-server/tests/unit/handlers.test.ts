/**
 * Unit tests for the MCP tool handlers
 * The fill service is replaced by jest mocks
 */

import {
  DOCX_CONTENT_TYPE,
  LogLevel,
  StoreFailureError,
  TemplateNotFoundError,
  initializeLogger,
} from '@docfill/core';
import type { FillAndStoreRequest, FillReport, FillRequest, PlaceholderInventory } from '@docfill/core';
import { loadConfig } from '../../src/config.js';
import { SERVER_NAME, handleToolCall } from '../../src/handlers.js';
import type { Services, ToolResult } from '../../src/handlers.js';

const report: FillReport = {
  paragraphsVisited: 3,
  valuesReplaced: 1,
  imagesInserted: [],
  sectionsExpanded: [],
  unresolved: ['DATE'],
  imageFailures: [],
};

function createServices(configErrors: string[] = []) {
  const fillService = {
    fill: jest.fn(async (_request: FillRequest) => ({ bytes: Buffer.from('docx-bytes'), report })),
    fillAndStore: jest.fn(async (request: FillAndStoreRequest) => ({
      outputKey: request.outputKey,
      outputUrl: `memory://bucket/${request.outputKey}`,
      report,
    })),
    listPlaceholders: jest.fn(async (_templateKey: string): Promise<PlaceholderInventory> => ({
      values: ['BORROWER'],
      images: ['IMAGE_SITE_PLAN'],
      structured: ['SPONSOR_BACKGROUND'],
    })),
  };
  const services: Services = { fillService, config: loadConfig({}), configErrors };
  return { services, fillService };
}

function payload(result: ToolResult) {
  expect(result.content).toHaveLength(1);
  return JSON.parse(result.content[0].text);
}

describe('Tool Handlers', () => {
  beforeAll(() => {
    initializeLogger('test', LogLevel.ERROR, () => undefined);
  });

  describe('fill_template', () => {
    it('should return the document as base64 with the report', async () => {
      const { services, fillService } = createServices();

      const result = await handleToolCall('fill_template', { placeholders: { BORROWER: 'Acme LLC' } }, services);

      expect(result.isError).toBeUndefined();
      expect(fillService.fill).toHaveBeenCalledWith({
        templateKey: '_Templates/Memo_Template.docx',
        values: { BORROWER: 'Acme LLC' },
        images: {},
      });
      expect(payload(result)).toEqual({
        filename: 'Memo_Generated.docx',
        contentType: DOCX_CONTENT_TYPE,
        size: 10,
        document: Buffer.from('docx-bytes').toString('base64'),
        report,
      });
    });

    it('should pass the template key, images and filename through', async () => {
      const { services, fillService } = createServices();

      const result = await handleToolCall('fill_template', {
        template_key: 'templates/memo.docx',
        images: { IMAGE_SITE_PLAN: 'aGVsbG8=' },
        output_filename: 'Acme.docx',
      }, services);

      expect(fillService.fill).toHaveBeenCalledWith({
        templateKey: 'templates/memo.docx',
        values: {},
        images: { IMAGE_SITE_PLAN: 'aGVsbG8=' },
      });
      expect(payload(result).filename).toBe('Acme.docx');
    });

    it('should reject non-string placeholder values without calling the service', async () => {
      const { services, fillService } = createServices();

      const result = await handleToolCall('fill_template', { placeholders: { LOAN_AMOUNT: 5 } }, services);

      expect(result.isError).toBe(true);
      const body = payload(result);
      expect(body.error).toBe('VALIDATION_ERROR');
      expect(body.message).toBe('placeholders.LOAN_AMOUNT must be a string');
      expect(fillService.fill).not.toHaveBeenCalled();
    });

    it('should report every validation error at once', async () => {
      const { services } = createServices();

      const result = await handleToolCall('fill_template', { template_key: 'memo.pdf', images: 'abc' }, services);

      const body = payload(result);
      expect(body.message).toBe('2 validation errors found');
      expect(body.context.errors.map((e: { field: string }) => e.field)).toEqual(['template_key', 'images']);
    });

    it('should convert a missing template into an error response', async () => {
      const { services, fillService } = createServices();
      fillService.fill.mockRejectedValueOnce(new TemplateNotFoundError('templates/missing.docx'));

      const result = await handleToolCall('fill_template', { template_key: 'templates/missing.docx' }, services);

      expect(result.isError).toBe(true);
      expect(payload(result)).toMatchObject({
        error: 'TEMPLATE_NOT_FOUND',
        message: 'Template not found: templates/missing.docx',
        context: { templateKey: 'templates/missing.docx', tool: 'fill_template' },
      });
    });
  });

  describe('fill_and_upload', () => {
    it('should require an output key', async () => {
      const { services, fillService } = createServices();

      const result = await handleToolCall('fill_and_upload', { placeholders: {} }, services);

      expect(result.isError).toBe(true);
      expect(payload(result).message).toBe('output_key is required');
      expect(fillService.fillAndStore).not.toHaveBeenCalled();
    });

    it('should reject output keys that leave their folder', async () => {
      const { services } = createServices();

      const result = await handleToolCall('fill_and_upload', { output_key: '../outside.docx' }, services);

      expect(payload(result).message).toBe("output_key cannot contain '..' segments");
    });

    it('should return the stored key and URL', async () => {
      const { services, fillService } = createServices();

      const result = await handleToolCall('fill_and_upload', {
        output_key: 'outputs/acme.docx',
        placeholders: { BORROWER: 'Acme LLC' },
      }, services);

      expect(fillService.fillAndStore).toHaveBeenCalledWith({
        templateKey: '_Templates/Memo_Template.docx',
        outputKey: 'outputs/acme.docx',
        values: { BORROWER: 'Acme LLC' },
        images: {},
      });
      expect(payload(result)).toEqual({
        status: 'success',
        outputKey: 'outputs/acme.docx',
        outputUrl: 'memory://bucket/outputs/acme.docx',
        report,
      });
    });

    it('should surface store failures with the output key', async () => {
      const { services, fillService } = createServices();
      fillService.fillAndStore.mockRejectedValueOnce(
        new StoreFailureError('outputs/acme.docx', Buffer.from('docx-bytes'), new Error('disk full'))
      );

      const result = await handleToolCall('fill_and_upload', { output_key: 'outputs/acme.docx' }, services);

      expect(payload(result)).toMatchObject({
        error: 'STORE_FAILURE',
        message: 'Failed to store outputs/acme.docx: disk full',
        context: { outputKey: 'outputs/acme.docx', size: 10 },
      });
    });
  });

  describe('list_template_placeholders', () => {
    it('should list the placeholders of the requested template', async () => {
      const { services, fillService } = createServices();

      const result = await handleToolCall('list_template_placeholders', { template_key: 'templates/memo.docx' }, services);

      expect(fillService.listPlaceholders).toHaveBeenCalledWith('templates/memo.docx');
      expect(payload(result)).toEqual({
        templateKey: 'templates/memo.docx',
        placeholders: {
          values: ['BORROWER'],
          images: ['IMAGE_SITE_PLAN'],
          structured: ['SPONSOR_BACKGROUND'],
        },
      });
    });
  });

  describe('health_check', () => {
    it('should report healthy without configuration errors', async () => {
      const { services } = createServices();

      const body = payload(await handleToolCall('health_check', undefined, services));

      expect(body.status).toBe('healthy');
      expect(body.server).toBe(SERVER_NAME);
      expect(body.configErrors).toEqual([]);
    });

    it('should report degraded when configuration has errors', async () => {
      const { services } = createServices(['DOCFILL_BODY_FONT cannot be empty']);

      const body = payload(await handleToolCall('health_check', {}, services));

      expect(body.status).toBe('degraded');
      expect(body.configErrors).toEqual(['DOCFILL_BODY_FONT cannot be empty']);
    });
  });

  it('should answer unknown tools with an error response', async () => {
    const { services } = createServices();

    const result = await handleToolCall('render_pdf', {}, services);

    expect(result.isError).toBe(true);
    expect(payload(result)).toMatchObject({
      error: 'PROCESSING_ERROR',
      message: 'Unknown tool: render_pdf',
    });
  });
});
