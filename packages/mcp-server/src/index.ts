#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import {
  CONTENT_BOX,
  FileSystemBlobStore,
  TemplateFillService,
  initializeLogger,
  parseLogLevel,
} from '@docfill/core';
import { loadConfig, validateConfig } from './config.js';
import { SERVER_NAME, SERVER_VERSION, handleToolCall } from './handlers.js';
import type { Services } from './handlers.js';
import { tools } from './tools.js';

// Initialize services
const config = loadConfig();
const logger = initializeLogger(SERVER_NAME, parseLogLevel(config.logLevel));
const configErrors = validateConfig(config);
if (configErrors.length > 0) {
  logger.error('Configuration errors:', configErrors);
}

const store = new FileSystemBlobStore(config.storeRoot, config.publicBaseUrl);
const fillService = new TemplateFillService(store, {
  bodyFont: { family: config.bodyFont, sizePt: config.bodyFontSize },
  contentBox: {
    maxWidth: config.maxImageWidth > 0 ? config.maxImageWidth : CONTENT_BOX.maxWidth,
    maxHeight: config.maxImageHeight > 0 ? config.maxImageHeight : CONTENT_BOX.maxHeight,
  },
  failOnImageError: config.failOnImageError,
}, logger);

const services: Services = { fillService, config, configErrors };

// Create MCP server
const server = new Server(
  {
    name: SERVER_NAME,
    version: SERVER_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

// Handle tool list requests
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools };
});

// Handle tool execution
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(name, args, services);
});

// Start server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`Docfill MCP Server running on stdio (store: ${config.storeRoot})`);
}

main().catch((error) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
