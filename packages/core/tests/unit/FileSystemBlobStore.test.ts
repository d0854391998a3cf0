import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';

import { FileSystemBlobStore } from '../../src/storage/FileSystemBlobStore.js';

describe('FileSystemBlobStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'docfill-store-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should store and fetch bytes under nested keys', async () => {
    const store = new FileSystemBlobStore(root);

    const url = await store.store(Buffer.from('docx bytes'), 'outputs/deal/memo.docx');

    expect(url).toBe(pathToFileURL(path.join(root, 'outputs', 'deal', 'memo.docx')).href);
    expect((await store.fetch('outputs/deal/memo.docx'))?.toString('utf8')).toBe('docx bytes');
    expect(await store.exists('outputs/deal/memo.docx')).toBe(true);
  });

  it('should report missing objects without throwing', async () => {
    const store = new FileSystemBlobStore(root);

    expect(await store.fetch('templates/missing.docx')).toBeNull();
    expect(await store.exists('templates/missing.docx')).toBe(false);
  });

  it('should not count directories as objects', async () => {
    const store = new FileSystemBlobStore(root);
    await fs.mkdir(path.join(root, 'folder'));

    expect(await store.exists('folder')).toBe(false);
  });

  it('should build public URLs from the base URL', async () => {
    const store = new FileSystemBlobStore(root, 'https://files.example.test/docs/');

    expect(await store.store(Buffer.from('x'), 'out/Q1 memo.docx')).toBe('https://files.example.test/docs/out/Q1%20memo.docx');
  });

  it('should refuse keys that escape the root', async () => {
    const store = new FileSystemBlobStore(root);

    await expect(store.fetch('../outside.docx')).rejects.toThrow('Blob key escapes the store root');
    await expect(store.store(Buffer.from('x'), 'a/../../outside.docx')).rejects.toThrow('Blob key escapes the store root');
  });

  it('should treat a leading slash as relative to the root', async () => {
    const store = new FileSystemBlobStore(root);
    await store.store(Buffer.from('x'), '/templates/base.docx');

    expect(await store.exists('templates/base.docx')).toBe(true);
  });
});
