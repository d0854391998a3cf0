/**
 * Key/bytes store holding templates and filled documents
 */
export interface BlobStore {
  /** Bytes under `key`, or null when there is no such object */
  fetch(key: string): Promise<Buffer | null>;

  /** Write `bytes` under `key` and return a URL for the stored object */
  store(bytes: Buffer, key: string): Promise<string>;

  exists(key: string): Promise<boolean>;
}
