import type { Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Shared schema definitions to reduce duplication
 */
const templateKeySchema = {
  type: 'string',
  description: 'Store key of the .docx template (defaults to the configured template)',
};

const placeholdersSchema = {
  type: 'object',
  additionalProperties: { type: 'string' },
  description: 'Values for {{NAME}} placeholders, keyed by NAME. SPONSOR_BACKGROUND and RISKS_AND_MITIGANTS are expanded into formatted paragraphs.',
};

const imagesSchema = {
  type: 'object',
  additionalProperties: { type: 'string' },
  description: 'Base64 image data for {{IMAGE_*}} placeholders, keyed by token name (e.g. IMAGE_SITE_PLAN)',
};

/**
 * Tool definitions for the MCP server.
 *
 * Each tool defines:
 * - name: Unique tool identifier
 * - description: User-friendly description
 * - inputSchema: JSON Schema for input validation
 */
export const tools: Tool[] = [
  {
    name: 'fill_template',
    description: 'Fill a stored DOCX template with text values and images. Returns the filled document as base64 together with a report of replaced, expanded and unresolved placeholders.',
    inputSchema: {
      type: 'object',
      properties: {
        template_key: templateKeySchema,
        placeholders: placeholdersSchema,
        images: imagesSchema,
        output_filename: {
          type: 'string',
          description: 'File name reported with the document (defaults to the configured output name)',
        },
      },
    },
  },
  {
    name: 'fill_and_upload',
    description: 'Fill a stored DOCX template and write the result back to the store. If the output key is taken, a numbered or timestamped variant is used. Returns the final key and URL.',
    inputSchema: {
      type: 'object',
      properties: {
        template_key: templateKeySchema,
        output_key: { type: 'string', description: 'Store key to write the filled document under' },
        placeholders: placeholdersSchema,
        images: imagesSchema,
      },
      required: ['output_key'],
    },
  },
  {
    name: 'list_template_placeholders',
    description: 'List the {{NAME}} placeholders a stored template contains, grouped into value, image and structured tokens.',
    inputSchema: {
      type: 'object',
      properties: {
        template_key: templateKeySchema,
      },
    },
  },
  {
    name: 'health_check',
    description: 'Report server status and configuration problems.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
];
