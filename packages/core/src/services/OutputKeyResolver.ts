import type { BlobStore } from '../storage/BlobStore.js';

/** Highest numeric suffix tried before falling back to a timestamp */
export const MAX_NUMBERED_SUFFIX = 100;

/**
 * Split a key into its name and its extension (with the dot). The
 * extension is taken from the last path segment only.
 */
export function splitExtension(key: string): { name: string; extension: string } {
  const slash = key.lastIndexOf('/');
  const dot = key.lastIndexOf('.');
  if (dot <= slash + 1) {
    return { name: key, extension: '' };
  }
  return { name: key.slice(0, dot), extension: key.slice(dot) };
}

/**
 * UTC timestamp as yyyymmddThhmmss
 */
export function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d+Z$/, '');
}

/**
 * First free key among `desired`, `name_2.ext` … `name_100.ext`, then
 * `name_<timestamp>.ext`
 */
export async function resolveAvailableKey(
  store: Pick<BlobStore, 'exists'>,
  desired: string,
  now: () => Date = () => new Date(),
): Promise<string> {
  if (!(await store.exists(desired))) {
    return desired;
  }

  const { name, extension } = splitExtension(desired);
  for (let n = 2; n <= MAX_NUMBERED_SUFFIX; n++) {
    const candidate = `${name}_${n}${extension}`;
    if (!(await store.exists(candidate))) {
      return candidate;
    }
  }

  return `${name}_${compactTimestamp(now())}${extension}`;
}
