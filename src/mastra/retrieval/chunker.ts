import { ConfigurationError } from '../lib/errors';
import type { Chunk, TextPage } from '../schemas';

export interface ChunkWindow {
  start: number;
  text: string;
}

export function assertChunkingOptions(maxSize: number, overlap: number): void {
  const issues: string[] = [];
  if (!Number.isInteger(maxSize) || maxSize <= 0) issues.push(`chunk size must be a positive integer, got ${maxSize}`);
  if (!Number.isInteger(overlap) || overlap < 0) issues.push(`overlap must be a non-negative integer, got ${overlap}`);
  if (issues.length === 0 && overlap >= maxSize) issues.push(`overlap (${overlap}) must be smaller than chunk size (${maxSize})`);
  if (issues.length > 0) throw new ConfigurationError(issues);
}

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number) => code >= 0xdc00 && code <= 0xdfff;

/** True when a cut at `index` would separate the two halves of a surrogate pair. */
function splitsPair(text: string, index: number): boolean {
  return index > 0 && index < text.length && isHighSurrogate(text.charCodeAt(index - 1)) && isLowSurrogate(text.charCodeAt(index));
}

/**
 * Fixed-size sliding windows. Every window is at most `maxSize` long and shares `overlap`
 * characters with the one before it; the last window ends at the end of the text.
 * With `maxSize` above 1 a cut never falls inside a surrogate pair: such a window ends one
 * unit early, and the next one starts one unit early.
 */
export function split(text: string, maxSize: number, overlap: number): ChunkWindow[] {
  assertChunkingOptions(maxSize, overlap);

  const windows: ChunkWindow[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + maxSize, text.length);
    if (splitsPair(text, end) && end - 1 > start) end -= 1;
    windows.push({ start, text: text.slice(start, end) });
    if (end === text.length) break;

    let next = end - overlap;
    if (splitsPair(text, next)) next -= 1;
    start = next > start ? next : end;
  }
  return windows;
}

/** Inverse of split: appends the part of every window not covered by the ones before it. */
export function joinWindows(windows: ChunkWindow[]): string {
  let covered = 0;
  let text = '';
  for (const window of windows) {
    text += window.text.slice(covered - window.start);
    covered = window.start + window.text.length;
  }
  return text;
}

/** Chunks each page on its own so every chunk belongs to exactly one page. */
export function chunkPages(artifactId: string, pages: TextPage[], maxSize: number, overlap: number): Chunk[] {
  return pages.flatMap((page) =>
    split(page.text, maxSize, overlap).map(
      (window, index): Chunk =>
        Object.freeze({
          id: `${artifactId}#p${page.pageNumber}c${index}`,
          artifactId,
          pageNumber: page.pageNumber,
          index,
          start: window.start,
          text: window.text,
        }),
    ),
  );
}
