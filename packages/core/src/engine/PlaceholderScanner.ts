/**
 * Finds {{NAME}} tokens in logical text and resolves each against the
 * structured token set, the image map and the value map, in that order.
 */

import { IMAGE_TOKEN_PREFIX } from '../constants.js';
import type {
  PlaceholderLookup,
  PlaceholderMatch,
  ResolvedPlaceholder,
  ScanResult,
} from '../types/index.js';

export const PLACEHOLDER_PATTERN = /\{\{([A-Z0-9_]+)\}\}/g;

/**
 * All non-overlapping matches, ordered by start offset
 */
export function findPlaceholders(text: string): PlaceholderMatch[] {
  const matches: PlaceholderMatch[] = [];
  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    const start = match.index ?? 0;
    matches.push({
      name: match[1],
      token: match[0],
      start,
      end: start + match[0].length,
    });
  }
  return matches;
}

/**
 * Resolve one match, or null when nothing supplies its name.
 *
 * A structured name never falls through to the image or value class; it
 * stays unresolved when no mini-language text was supplied for it. An
 * IMAGE_ name missing from the image map may still resolve as a value.
 */
export function classifyPlaceholder(match: PlaceholderMatch, lookup: PlaceholderLookup): ResolvedPlaceholder | null {
  const section = lookup.structuredTokens[match.name];
  if (section !== undefined) {
    const value = lookup.values.get(match.name);
    return value === undefined ? null : { ...match, kind: 'structured', section, value };
  }

  if (match.name.startsWith(IMAGE_TOKEN_PREFIX) && lookup.imageTokens.has(match.name)) {
    return { ...match, kind: 'image' };
  }

  const value = lookup.values.get(match.name);
  return value === undefined ? null : { ...match, kind: 'value', value };
}

export function scanPlaceholders(text: string, lookup: PlaceholderLookup): ScanResult {
  const result: ScanResult = { resolved: [], unresolved: [] };
  for (const match of findPlaceholders(text)) {
    const resolved = classifyPlaceholder(match, lookup);
    if (resolved) {
      result.resolved.push(resolved);
    } else {
      result.unresolved.push(match);
    }
  }
  return result;
}

/**
 * Order in which spans of one paragraph are applied: last to first by
 * start offset, so earlier offsets survive later edits
 */
export function inApplicationOrder<T extends PlaceholderMatch>(matches: readonly T[]): T[] {
  return [...matches].sort((a, b) => b.start - a.start);
}
