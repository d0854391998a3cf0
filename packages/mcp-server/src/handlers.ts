/**
 * Tool request handlers for the MCP server.
 * Each handler validates its arguments and delegates to the fill service.
 */

import { getLogger, toErrorResponse, DOCX_CONTENT_TYPE } from '@docfill/core';
import type { ErrorResponse, TemplateFillService } from '@docfill/core';
import type { Config } from './config.js';
import {
  collectValidationErrors,
  createValidationErrorResponse,
  toStringMap,
  validateDocxKey,
  validateString,
  validateStringMap,
} from './utils/validation.js';

export const SERVER_NAME = 'docfill-mcp-server';
export const SERVER_VERSION = '1.0.0';

export interface Services {
  fillService: Pick<TemplateFillService, 'fill' | 'fillAndStore' | 'listPlaceholders'>;
  config: Config;
  configErrors: string[];
}

export type ToolArgs = Record<string, unknown>;

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

/**
 * Raised by a handler whose arguments failed validation
 */
class ToolInputError extends Error {
  readonly response: ErrorResponse;

  constructor(response: ErrorResponse) {
    super(response.message);
    this.name = 'ToolInputError';
    this.response = response;
  }
}

function assertValid(validators: Parameters<typeof collectValidationErrors>[0]): void {
  const errors = collectValidationErrors(validators);
  if (errors.length > 0) {
    throw new ToolInputError(createValidationErrorResponse(errors));
  }
}

function templateKeyFrom(args: ToolArgs, config: Config): string {
  return typeof args.template_key === 'string' ? args.template_key : config.defaultTemplateKey;
}

/**
 * Tool handler mapping - maps tool names to service methods
 */
const toolHandlers: Record<string, (args: ToolArgs, services: Services) => Promise<unknown>> = {
  fill_template: async (args, s) => {
    assertValid([
      () => validateDocxKey(args.template_key, 'template_key', false),
      () => validateStringMap(args.placeholders, 'placeholders'),
      () => validateStringMap(args.images, 'images'),
      () => validateString(args.output_filename, 'output_filename', false),
    ]);

    const { bytes, report } = await s.fillService.fill({
      templateKey: templateKeyFrom(args, s.config),
      values: toStringMap(args.placeholders),
      images: toStringMap(args.images),
    });

    return {
      filename: typeof args.output_filename === 'string' ? args.output_filename : s.config.defaultOutputName,
      contentType: DOCX_CONTENT_TYPE,
      size: bytes.length,
      document: bytes.toString('base64'),
      report,
    };
  },

  fill_and_upload: async (args, s) => {
    assertValid([
      () => validateDocxKey(args.template_key, 'template_key', false),
      () => validateDocxKey(args.output_key, 'output_key'),
      () => validateStringMap(args.placeholders, 'placeholders'),
      () => validateStringMap(args.images, 'images'),
    ]);

    const result = await s.fillService.fillAndStore({
      templateKey: templateKeyFrom(args, s.config),
      outputKey: String(args.output_key),
      values: toStringMap(args.placeholders),
      images: toStringMap(args.images),
    });

    return {
      status: 'success',
      outputKey: result.outputKey,
      outputUrl: result.outputUrl,
      report: result.report,
    };
  },

  list_template_placeholders: async (args, s) => {
    assertValid([() => validateDocxKey(args.template_key, 'template_key', false)]);

    const templateKey = templateKeyFrom(args, s.config);
    const placeholders = await s.fillService.listPlaceholders(templateKey);
    return { templateKey, placeholders };
  },

  health_check: async (_args, s) => ({
    status: s.configErrors.length === 0 ? 'healthy' : 'degraded',
    server: SERVER_NAME,
    version: SERVER_VERSION,
    storeRoot: s.config.storeRoot,
    defaultTemplateKey: s.config.defaultTemplateKey,
    configErrors: s.configErrors,
  }),
};

/**
 * Handle tool call requests by delegating to the matching handler.
 * Failures come back as an error response, never as a thrown error.
 */
export async function handleToolCall(
  toolName: string,
  args: ToolArgs | undefined,
  services: Services
): Promise<ToolResult> {
  const handler = toolHandlers[toolName];

  try {
    if (!handler) {
      throw new Error(`Unknown tool: ${toolName}`);
    }
    const result = await handler(args ?? {}, services);
    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    };
  } catch (error) {
    const response = error instanceof ToolInputError
      ? error.response
      : toErrorResponse(error, { tool: toolName });

    getLogger().warn(`Tool ${toolName} failed: ${response.message}`);
    return {
      content: [{ type: 'text', text: JSON.stringify(response, null, 2) }],
      isError: true,
    };
  }
}
