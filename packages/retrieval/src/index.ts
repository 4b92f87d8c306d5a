/**
 * FILE PURPOSE: Barrel export for the retrieval core
 *
 * WHY: Single import point.
 *      Import: `import { Bm25Index, chunkDocument, buildRecipeCorpus } from '@recipe-qa/retrieval'`
 */

export { tokenize } from './tokenizer.js';

export { Bm25Index } from './lexical/bm25-index.js';
export type { Bm25Options } from './lexical/bm25-index.js';

// ─── Chunking ───────────────────────────────────────────────────────────────
export {
  chunkDocument,
  chunkByCharacters,
  charLength,
  chunkParagraphs,
  cleanText,
  semanticChunking,
  splitIntoSentences,
  validateEmbeddings,
  l2Normalize,
  groupBySimilarity,
  mergeShortChunks,
  toPassages,
  ChunkingConfigError,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_SIMILARITY_THRESHOLD,
  DEFAULT_MIN_CHUNK_CHARS,
} from './chunking/index.js';
export type {
  ChunkDocumentOptions,
  ChunkDocumentResult,
  EmbeddingMatrix,
  SentenceEncoder,
  SemanticChunkResult,
  SemanticChunkOptions,
  SemanticFailureReason,
  ChunkingFallbackReason,
  PassageTagOptions,
} from './chunking/index.js';

// ─── Embeddings ─────────────────────────────────────────────────────────────
export { createLLMClient } from './llm-client.js';
export type { LLMClientOptions, OpenAI } from './llm-client.js';
export { createEmbeddingEncoder } from './embeddings/encoder.js';
export type { EmbeddingsClient, EmbeddingEncoderOptions } from './embeddings/encoder.js';

// ─── Ingestion ──────────────────────────────────────────────────────────────
export { rowsToDocuments, parseRecipeCsv, loadRecipeDocuments } from './ingestion/documents.js';
export type { TableColumns } from './ingestion/documents.js';
export { buildRecipeCorpus, buildCorpusFromConfig } from './ingestion/corpus.js';
export type {
  RecipeCorpus,
  CorpusHit,
  BuildCorpusOptions,
  ConfiguredCorpusOptions,
} from './ingestion/corpus.js';

// ─── Config + observability ─────────────────────────────────────────────────
export { loadRetrievalConfig, DEFAULT_CONFIG } from './config.js';
export type {
  RetrievalConfig,
  Bm25Config,
  ChunkingConfig,
  EmbeddingConfig,
  SourceConfig,
} from './config.js';
export { FallbackMonitor } from './fallback-monitor.js';
export type { FallbackStats, FallbackHealth, LastFallback } from './fallback-monitor.js';
