/**
 * FILE PURPOSE: The one tokenizer used for both indexing and querying
 *
 * WHY: Index-time and query-time tokens must match exactly or recall drops
 *      without any error. Everything imports this function; there is no copy.
 */

const WORD_RE = /[\p{L}\p{N}_]+/gu;

/**
 * Lower-case the text and return its word-character runs in order.
 * Duplicates are kept. No stop-words, no stemming.
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD_RE) ?? [];
}
