/**
 * Configuration management for the docfill MCP server
 * Loads settings from environment variables with sensible defaults
 */

import * as fs from 'fs';
import * as path from 'path';

export interface Config {
  storeRoot: string;
  publicBaseUrl?: string;
  defaultTemplateKey: string;
  defaultOutputName: string;
  bodyFont: string;
  bodyFontSize: number;
  maxImageWidth: number;
  maxImageHeight: number;
  failOnImageError: boolean;
  logLevel: string;
}

/**
 * Load .env file into the environment. Variables already set win.
 */
export function loadEnvFile(
  envPath: string = path.join(process.cwd(), '.env'),
  env: NodeJS.ProcessEnv = process.env
): void {
  if (!fs.existsSync(envPath)) {
    return;
  }

  const lines = fs.readFileSync(envPath, 'utf-8').split('\n');
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const [key, ...valueParts] = trimmed.split('=');
    const value = valueParts.join('=').trim();

    if (key && env[key.trim()] === undefined) {
      env[key.trim()] = value;
    }
  }
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (env === process.env) {
    loadEnvFile();
  }

  return {
    storeRoot: env.DOCFILL_STORE_ROOT || path.join(process.cwd(), 'storage'),
    publicBaseUrl: env.DOCFILL_PUBLIC_BASE_URL || undefined,
    defaultTemplateKey: env.DOCFILL_DEFAULT_TEMPLATE_KEY || '_Templates/Memo_Template.docx',
    defaultOutputName: env.DOCFILL_DEFAULT_OUTPUT_NAME || 'Memo_Generated.docx',
    bodyFont: env.DOCFILL_BODY_FONT || 'Times New Roman',
    bodyFontSize: parseFloat(env.DOCFILL_BODY_FONT_SIZE || '11'),
    maxImageWidth: parseFloat(env.DOCFILL_MAX_IMAGE_WIDTH || '6.5'),
    maxImageHeight: parseFloat(env.DOCFILL_MAX_IMAGE_HEIGHT || '9'),
    failOnImageError: parseBoolean(env.DOCFILL_FAIL_ON_IMAGE_ERROR, true),
    logLevel: env.LOG_LEVEL || 'INFO',
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (!config.storeRoot) {
    errors.push('DOCFILL_STORE_ROOT is required');
  }

  if (!config.defaultTemplateKey.toLowerCase().endsWith('.docx')) {
    errors.push('DOCFILL_DEFAULT_TEMPLATE_KEY must name a .docx file');
  }

  if (!config.bodyFont.trim()) {
    errors.push('DOCFILL_BODY_FONT cannot be empty');
  }

  if (!Number.isFinite(config.bodyFontSize) || config.bodyFontSize <= 0) {
    errors.push('DOCFILL_BODY_FONT_SIZE must be a positive number');
  }

  if (!Number.isFinite(config.maxImageWidth) || config.maxImageWidth <= 0) {
    errors.push('DOCFILL_MAX_IMAGE_WIDTH must be a positive number');
  }

  if (!Number.isFinite(config.maxImageHeight) || config.maxImageHeight <= 0) {
    errors.push('DOCFILL_MAX_IMAGE_HEIGHT must be a positive number');
  }

  if (config.publicBaseUrl && !/^https?:\/\//.test(config.publicBaseUrl)) {
    errors.push('DOCFILL_PUBLIC_BASE_URL must start with http:// or https://');
  }

  return errors;
}
