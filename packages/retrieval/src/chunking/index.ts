/**
 * FILE PURPOSE: Chunking strategy dispatch with an explicit semantic fallback
 * WHY: Semantic chunking must never block the pipeline from producing
 *      passages. Its failure value is turned into a visible fallback here:
 *      a WARN line, a record on the caller's FallbackMonitor, and
 *      character-window chunks.
 */

import type { ChunkStrategy } from '@recipe-qa/shared-types';
import type { FallbackMonitor } from '../fallback-monitor.js';
import { cleanText, chunkParagraphs } from './paragraph.js';
import { semanticChunking, type ChunkingFallbackReason, type SentenceEncoder } from './semantic.js';
import { chunkByCharacters } from './window.js';

export { ChunkingConfigError } from './errors.js';
export { chunkByCharacters, charLength, DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from './window.js';
export { chunkParagraphs, cleanText } from './paragraph.js';
export {
  semanticChunking,
  splitIntoSentences,
  validateEmbeddings,
  l2Normalize,
  groupBySimilarity,
  mergeShortChunks,
  DEFAULT_SIMILARITY_THRESHOLD,
  DEFAULT_MIN_CHUNK_CHARS,
} from './semantic.js';
export type {
  EmbeddingMatrix,
  SentenceEncoder,
  SemanticChunkResult,
  SemanticChunkOptions,
  SemanticFailureReason,
  ChunkingFallbackReason,
} from './semantic.js';
export { toPassages } from './passages.js';
export type { PassageTagOptions } from './passages.js';

export interface ChunkDocumentOptions {
  strategy?: ChunkStrategy;
  chunkSize?: number;
  /** Characters for `fixed`, words for `paragraph`. */
  overlap?: number;
  encoder?: SentenceEncoder;
  similarityThreshold?: number;
  minChunkChars?: number;
  /** Receives one record per `semantic` call: success or fallback reason. */
  monitor?: FallbackMonitor;
}

export interface ChunkDocumentResult {
  chunks: string[];
  /** Strategy that actually produced `chunks`. */
  strategy: ChunkStrategy;
  fallbackReason?: ChunkingFallbackReason;
}

export async function chunkDocument(
  text: string,
  options: ChunkDocumentOptions = {},
): Promise<ChunkDocumentResult> {
  const { strategy = 'fixed', chunkSize, overlap, monitor } = options;

  switch (strategy) {
    case 'fixed':
      return { chunks: chunkByCharacters(text, chunkSize, overlap), strategy };
    case 'paragraph':
      return { chunks: chunkParagraphs(text, chunkSize, overlap), strategy };
    case 'semantic': {
      if (!options.encoder) {
        return fallBack(cleanText(text), 'no-encoder', 'no sentence encoder configured', options, monitor);
      }
      const result = await semanticChunking(text, options.encoder, {
        similarityThreshold: options.similarityThreshold,
        minChunkChars: options.minChunkChars,
      });
      if (!result.ok) {
        return fallBack(result.cleanedText, result.reason, result.message, options, monitor);
      }
      monitor?.recordPrimary();
      return { chunks: result.chunks, strategy };
    }
  }
}

function fallBack(
  cleanedText: string,
  reason: ChunkingFallbackReason,
  message: string,
  options: ChunkDocumentOptions,
  monitor: FallbackMonitor | undefined,
): ChunkDocumentResult {
  process.stderr.write(`WARN: Semantic chunking fell back to fixed window (${reason}): ${message}\n`);
  monitor?.recordFallback(reason, message);
  return {
    chunks: chunkByCharacters(cleanedText, options.chunkSize, options.overlap),
    strategy: 'fixed',
    fallbackReason: reason,
  };
}
