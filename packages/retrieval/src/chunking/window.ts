/**
 * FILE PURPOSE: Fixed-width character window chunker with configurable overlap
 * WHY: Deterministic strategy with no embedding dependency. Also the fallback
 *      whenever semantic chunking can't run.
 */

import { ChunkingConfigError } from './errors.js';

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 50;

/** Length in code points, so a surrogate pair counts as one character. */
export function charLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Windows of `chunkSize` characters, each starting `overlap` characters
 * before the previous one ended. Positions are code points, so characters
 * outside the BMP are never split.
 */
export function chunkByCharacters(
  text: string,
  chunkSize = DEFAULT_CHUNK_SIZE,
  overlap = DEFAULT_CHUNK_OVERLAP,
): string[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ChunkingConfigError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const chars = Array.from(text);
  const chunks: string[] = [];
  let start = 0;
  while (start < chars.length) {
    const end = Math.min(start + chunkSize, chars.length);
    const chunk = chars.slice(start, end).join('').trim();
    if (chunk) chunks.push(chunk);
    if (end >= chars.length) break;

    let next = end - Math.max(0, overlap);
    if (next < 0) next = 0;
    // overlap >= chunkSize would stall or walk backward
    if (next <= start) next = end;
    start = next;
  }
  return chunks;
}
