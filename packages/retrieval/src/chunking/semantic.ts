/**
 * FILE PURPOSE: Semantic chunker — groups consecutive sentences while they stay similar
 * WHY: Fixed windows cut recipes mid-step. Comparing each sentence's embedding
 *      with the sentence before it finds topic shifts (ingredients → method).
 * HOW: The result is a tagged value. Encoder problems come back as
 *      `{ ok: false }` and the caller runs the fallback (see chunkDocument).
 */

import { cleanText } from './paragraph.js';
import { charLength } from './window.js';

// ─── Types ──────────────────────────────────────────────────────────────────

/** One embedding row per input sentence. */
export type EmbeddingMatrix = ReadonlyArray<ArrayLike<number>>;

/**
 * Caller-supplied embedding capability. Awaited without a timeout; wrap it
 * if you need cancellation.
 */
export type SentenceEncoder = (sentences: string[]) => EmbeddingMatrix | Promise<EmbeddingMatrix>;

export type SemanticFailureReason = 'shape-mismatch' | 'encoder-error';

/** Why chunkDocument used the character window instead of semantic chunks. */
export type ChunkingFallbackReason = SemanticFailureReason | 'no-encoder';

export type SemanticChunkResult =
  | { ok: true; chunks: string[] }
  | {
      ok: false;
      reason: SemanticFailureReason;
      message: string;
      /** The cleaned text the fallback must chunk. */
      cleanedText: string;
    };

export interface SemanticChunkOptions {
  similarityThreshold?: number;
  /** Chunks shorter than this merge into the chunk before them. */
  minChunkChars?: number;
}

export const DEFAULT_SIMILARITY_THRESHOLD = 0.65;
export const DEFAULT_MIN_CHUNK_CHARS = 40;
const MIN_NORM = 1e-8;

// ─── Sentence splitting ─────────────────────────────────────────────────────

/** Split at `.`, `!` or `?` followed by whitespace. Empty fragments are dropped. */
export function splitIntoSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

// ─── Embedding validation + normalization ───────────────────────────────────

function isArrayLike(value: unknown): value is ArrayLike<unknown> {
  if (Array.isArray(value) || ArrayBuffer.isView(value)) return true;
  return typeof value === 'object' && value !== null && 'length' in value && typeof value.length === 'number';
}

/**
 * Copy `raw` into a `number[][]` when it is 2-D with `expectedRows` rows of
 * equal width holding finite numbers. Returns null otherwise.
 *
 * NaN and Infinity count as a mismatch too: the caller falls back to the
 * character window rather than grouping on NaN similarities.
 */
export function validateEmbeddings(raw: unknown, expectedRows: number): number[][] | null {
  if (!isArrayLike(raw) || raw.length !== expectedRows) return null;

  const rows: number[][] = [];
  let width: number | undefined;
  for (let i = 0; i < raw.length; i++) {
    const row = raw[i];
    if (!isArrayLike(row)) return null;
    if (width === undefined) width = row.length;
    if (row.length !== width) return null;

    const values: number[] = [];
    for (let j = 0; j < row.length; j++) {
      const v = row[j];
      if (typeof v !== 'number' || !Number.isFinite(v)) return null;
      values.push(v);
    }
    rows.push(values);
  }
  return rows;
}

/** Scale a row to unit length. A zero row is divided by 1e-8 instead. */
export function l2Normalize(row: readonly number[]): number[] {
  let sumSq = 0;
  for (const v of row) sumSq += v * v;
  const norm = Math.sqrt(sumSq) || MIN_NORM;
  return row.map((v) => v / norm);
}

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) sum += (a[i] ?? 0) * (b[i] ?? 0);
  return sum;
}

// ─── Grouping ───────────────────────────────────────────────────────────────

/**
 * Greedy grouping: each sentence joins the current chunk when its similarity
 * with the previous sentence (only that one) reaches `threshold`.
 * `vectors` must already be unit length, one per sentence.
 */
export function groupBySimilarity(
  sentences: readonly string[],
  vectors: readonly (readonly number[])[],
  threshold = DEFAULT_SIMILARITY_THRESHOLD,
): string[] {
  const first = sentences[0];
  if (first === undefined) return [];

  const chunks: string[] = [];
  let current: string[] = [first];
  for (let i = 1; i < sentences.length; i++) {
    const sentence = sentences[i] ?? '';
    const similarity = dot(vectors[i - 1] ?? [], vectors[i] ?? []);
    if (similarity >= threshold) {
      current.push(sentence);
    } else {
      chunks.push(current.join(' '));
      current = [sentence];
    }
  }
  chunks.push(current.join(' '));
  return chunks;
}

/**
 * Fold chunks under `minChars` characters (code points) into their
 * predecessor. The first chunk stays.
 */
export function mergeShortChunks(chunks: readonly string[], minChars = DEFAULT_MIN_CHUNK_CHARS): string[] {
  const merged: string[] = [];
  for (const chunk of chunks) {
    const last = merged.length - 1;
    if (last >= 0 && charLength(chunk) < minChars) {
      merged[last] = `${merged[last]} ${chunk}`;
    } else {
      merged.push(chunk);
    }
  }
  return merged;
}

// ─── Semantic chunking ──────────────────────────────────────────────────────

/**
 * Chunk `text` by sentence similarity.
 *
 * Zero sentences give `[]`. One sentence is returned as is and the encoder is
 * never called. Otherwise all sentences are embedded in one call.
 */
export async function semanticChunking(
  text: string,
  encoder: SentenceEncoder,
  options: SemanticChunkOptions = {},
): Promise<SemanticChunkResult> {
  const {
    similarityThreshold = DEFAULT_SIMILARITY_THRESHOLD,
    minChunkChars = DEFAULT_MIN_CHUNK_CHARS,
  } = options;

  const cleanedText = cleanText(text);
  const sentences = splitIntoSentences(cleanedText);
  if (sentences.length <= 1) {
    return { ok: true, chunks: sentences };
  }

  let raw: EmbeddingMatrix;
  try {
    raw = await encoder(sentences);
  } catch (err) {
    return {
      ok: false,
      reason: 'encoder-error',
      message: err instanceof Error ? err.message : String(err),
      cleanedText,
    };
  }

  const rows = validateEmbeddings(raw, sentences.length);
  if (!rows) {
    return {
      ok: false,
      reason: 'shape-mismatch',
      message: `expected ${sentences.length} equal-width numeric rows, got ${describeShape(raw)}`,
      cleanedText,
    };
  }

  const vectors = rows.map(l2Normalize);
  const grouped = groupBySimilarity(sentences, vectors, similarityThreshold);
  return { ok: true, chunks: mergeShortChunks(grouped, minChunkChars) };
}

function describeShape(raw: unknown): string {
  if (!isArrayLike(raw)) return typeof raw;
  return `${raw.length} rows`;
}
