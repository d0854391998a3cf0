/**
 * In-place replacement of a logical-text span across a paragraph's runs.
 *
 * Runs are never added, removed or reordered. Text outside the span keeps
 * its run and its position inside that run.
 */

import type { CharMap, CharPosition, TextRun, TextSpan } from '../types/index.js';
import { locate } from './RunTextIndexer.js';

/**
 * Replace `span` with `replacement` and return the indices of the runs
 * whose text changed, first to last.
 *
 * Single-run span: the run becomes prefix + replacement + suffix.
 * Multi-run span: the first run keeps its prefix plus the whole
 * replacement, the last run keeps its suffix and every run in between
 * is emptied.
 */
export function spliceRuns(runs: readonly TextRun[], map: CharMap, span: TextSpan, replacement: string): number[] {
  if (span.end <= span.start) {
    throw new RangeError(`Empty span [${span.start}, ${span.end})`);
  }

  const first = locate(map, span.start);
  const last = locate(map, span.end - 1);
  const firstRun = runs[first.runIndex];
  const lastRun = runs[last.runIndex];

  if (first.runIndex === last.runIndex) {
    const text = firstRun.text;
    firstRun.text = text.slice(0, first.offset) + replacement + text.slice(last.offset + 1);
    return [first.runIndex];
  }

  const touched: number[] = [];
  firstRun.text = firstRun.text.slice(0, first.offset) + replacement;
  touched.push(first.runIndex);

  for (let i = first.runIndex + 1; i < last.runIndex; i++) {
    runs[i].text = '';
    touched.push(i);
  }

  lastRun.text = lastRun.text.slice(last.offset + 1);
  touched.push(last.runIndex);
  return touched;
}

/**
 * A run that can drop a character range while leaving its other content
 * (drawings, fields) where it is
 */
export interface CuttableRun extends TextRun {
  deleteText(start: number, end: number): void;
}

/**
 * Remove `span` from the runs and return where it started: the run that
 * held its first character and the offset inside that run, which is
 * where content replacing the span belongs.
 */
export function cutSpan(runs: readonly CuttableRun[], map: CharMap, span: TextSpan): CharPosition {
  if (span.end <= span.start) {
    throw new RangeError(`Empty span [${span.start}, ${span.end})`);
  }

  const first = locate(map, span.start);
  const last = locate(map, span.end - 1);

  for (let i = first.runIndex; i <= last.runIndex; i++) {
    const from = i === first.runIndex ? first.offset : 0;
    const to = i === last.runIndex ? last.offset + 1 : runs[i].text.length;
    runs[i].deleteText(from, to);
  }
  return first;
}
