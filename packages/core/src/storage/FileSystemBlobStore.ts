import * as fs from 'fs/promises';
import * as path from 'path';
import { pathToFileURL } from 'url';

import type { BlobStore } from './BlobStore.js';

/**
 * Blob store backed by a directory. Keys are slash-separated paths
 * relative to the root and may not escape it.
 */
export class FileSystemBlobStore implements BlobStore {
  private readonly root: string;
  private readonly publicBaseUrl?: string;

  constructor(root: string, publicBaseUrl?: string) {
    this.root = path.resolve(root);
    this.publicBaseUrl = publicBaseUrl ? publicBaseUrl.replace(/\/+$/, '') : undefined;
  }

  async fetch(key: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.resolve(key));
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      throw error;
    }
  }

  async store(bytes: Buffer, key: string): Promise<string> {
    const target = this.resolve(key);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, bytes);
    return this.urlFor(key);
  }

  async exists(key: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.resolve(key));
      return stats.isFile();
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw error;
    }
  }

  urlFor(key: string): string {
    if (this.publicBaseUrl) {
      return `${this.publicBaseUrl}/${key.split('/').map(encodeURIComponent).join('/')}`;
    }
    return pathToFileURL(this.resolve(key)).href;
  }

  private resolve(key: string): string {
    const normalized = key.replace(/\\/g, '/').replace(/^\/+/, '');
    if (normalized === '') {
      throw new Error('Blob key is empty');
    }
    const resolved = path.resolve(this.root, normalized);
    if (resolved !== this.root && !resolved.startsWith(this.root + path.sep)) {
      throw new Error(`Blob key escapes the store root: ${key}`);
    }
    return resolved;
  }
}

function isMissing(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
