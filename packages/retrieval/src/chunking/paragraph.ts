/**
 * FILE PURPOSE: Paragraph-packing chunker with word overlap
 * WHY: Recipe files are blank-line separated. Packing whole paragraphs keeps
 *      ingredient lists and steps together, which the character window can't.
 */

import { ChunkingConfigError } from './errors.js';
import { charLength, DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from './window.js';

/** Collapse every whitespace run to one space and trim. */
export function cleanText(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Pack blank-line separated paragraphs into chunks of at most `chunkSize`
 * characters where possible. A new chunk starts with the last `overlapWords`
 * words of the one before it. A single paragraph longer than `chunkSize`
 * is kept whole.
 */
export function chunkParagraphs(
  text: string,
  chunkSize = DEFAULT_CHUNK_SIZE,
  overlapWords = DEFAULT_CHUNK_OVERLAP,
): string[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ChunkingConfigError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const chunks: string[] = [];
  let current = '';

  for (const raw of text.split('\n\n')) {
    const para = raw.trim();
    if (!para) continue;

    if (current && charLength(current) + charLength(para) > chunkSize) {
      chunks.push(current.trim());
      const words = current.split(/\s+/).filter(Boolean);
      const carried = overlapWords > 0 && words.length > overlapWords
        ? words.slice(-overlapWords).join(' ')
        : overlapWords > 0 ? current : '';
      current = carried ? `${carried} ${para}` : para;
    } else {
      current += (current ? '\n\n' : '') + para;
    }
  }

  if (current) chunks.push(current.trim());
  return chunks;
}
