import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { loadConfig, loadEnvFile, validateConfig } from '../../src/config.js';

describe('Configuration', () => {
  describe('loadEnvFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docfill-config-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should load variables without overriding existing ones', () => {
      const envPath = path.join(dir, '.env');
      fs.writeFileSync(envPath, [
        '# storage',
        'DOCFILL_STORE_ROOT=/data/store',
        '',
        'LOG_LEVEL=debug',
        'DOCFILL_PUBLIC_BASE_URL=https://files.example.com/dl?a=b',
      ].join('\n'));
      const env: NodeJS.ProcessEnv = { LOG_LEVEL: 'WARN' };

      loadEnvFile(envPath, env);

      expect(env).toEqual({
        LOG_LEVEL: 'WARN',
        DOCFILL_STORE_ROOT: '/data/store',
        DOCFILL_PUBLIC_BASE_URL: 'https://files.example.com/dl?a=b',
      });
    });

    it('should do nothing when the file is missing', () => {
      const env: NodeJS.ProcessEnv = {};

      loadEnvFile(path.join(dir, 'missing.env'), env);

      expect(env).toEqual({});
    });
  });

  describe('loadConfig', () => {
    it('should apply defaults', () => {
      const config = loadConfig({});

      expect(config).toEqual({
        storeRoot: path.join(process.cwd(), 'storage'),
        publicBaseUrl: undefined,
        defaultTemplateKey: '_Templates/Memo_Template.docx',
        defaultOutputName: 'Memo_Generated.docx',
        bodyFont: 'Times New Roman',
        bodyFontSize: 11,
        maxImageWidth: 6.5,
        maxImageHeight: 9,
        failOnImageError: true,
        logLevel: 'INFO',
      });
    });

    it('should read overrides from the environment', () => {
      const config = loadConfig({
        DOCFILL_STORE_ROOT: '/srv/docfill',
        DOCFILL_BODY_FONT: 'Garamond',
        DOCFILL_BODY_FONT_SIZE: '12',
        DOCFILL_MAX_IMAGE_WIDTH: '7.5',
        DOCFILL_FAIL_ON_IMAGE_ERROR: 'false',
        LOG_LEVEL: 'debug',
      });

      expect(config.storeRoot).toBe('/srv/docfill');
      expect(config.bodyFont).toBe('Garamond');
      expect(config.bodyFontSize).toBe(12);
      expect(config.maxImageWidth).toBe(7.5);
      expect(config.failOnImageError).toBe(false);
      expect(config.logLevel).toBe('debug');
    });
  });

  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      expect(validateConfig(loadConfig({}))).toEqual([]);
    });

    it('should list every problem', () => {
      const config = loadConfig({
        DOCFILL_DEFAULT_TEMPLATE_KEY: 'template.doc',
        DOCFILL_BODY_FONT_SIZE: 'large',
        DOCFILL_MAX_IMAGE_HEIGHT: '-1',
        DOCFILL_PUBLIC_BASE_URL: 'files.example.com',
      });

      expect(validateConfig(config)).toEqual([
        'DOCFILL_DEFAULT_TEMPLATE_KEY must name a .docx file',
        'DOCFILL_BODY_FONT_SIZE must be a positive number',
        'DOCFILL_MAX_IMAGE_HEIGHT must be a positive number',
        'DOCFILL_PUBLIC_BASE_URL must start with http:// or https://',
      ]);
    });
  });
});
