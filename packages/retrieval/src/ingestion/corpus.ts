/**
 * FILE PURPOSE: Build a searchable recipe corpus from documents
 *
 * WHY: Composes the two leaf components: chunk every document, tag the
 *      passages, then index all passage texts in one call.
 * HOW: The index and passages are owned by the returned corpus object.
 *      Nothing here is a module-level singleton.
 */

import type { Passage, RecipeDocument } from '@recipe-qa/shared-types';
import { chunkDocument, toPassages, type ChunkDocumentOptions } from '../chunking/index.js';
import { Bm25Index, type Bm25Options } from '../lexical/bm25-index.js';
import type { RetrievalConfig } from '../config.js';
import { createEmbeddingEncoder, type EmbeddingsClient } from '../embeddings/encoder.js';
import type { FallbackMonitor } from '../fallback-monitor.js';
import { createLLMClient } from '../llm-client.js';
import { loadRecipeDocuments } from './documents.js';

export interface CorpusHit {
  passage: Passage;
  score: number;
}

export interface RecipeCorpus {
  index: Bm25Index;
  passages: readonly Passage[];
  /** Documents whose semantic chunking fell back to the character window. */
  fallbacks: number;
  search(query: string, topK?: number): CorpusHit[];
}

export interface BuildCorpusOptions {
  chunking?: ChunkDocumentOptions;
  bm25?: Bm25Options;
}

function sourceRowOf(doc: RecipeDocument): number | undefined {
  const row = doc.metadata.sourceRow;
  return typeof row === 'number' ? row : undefined;
}

export async function buildRecipeCorpus(
  documents: readonly RecipeDocument[],
  options: BuildCorpusOptions = {},
): Promise<RecipeCorpus> {
  const passages: Passage[] = [];
  let fallbacks = 0;

  for (const [position, doc] of documents.entries()) {
    const result = await chunkDocument(doc.text, options.chunking);
    if (result.fallbackReason) fallbacks++;
    passages.push(
      ...toPassages(result.chunks, {
        startIndex: passages.length,
        sourceRow: sourceRowOf(doc) ?? position,
        metadata: doc.metadata,
      }),
    );
  }

  const index = new Bm25Index(options.bm25);
  index.indexDocuments(passages.map((p) => p.text));

  return {
    index,
    passages,
    fallbacks,
    search(query, topK) {
      const hits: CorpusHit[] = [];
      for (const hit of index.retrieve(query, topK)) {
        const passage = passages[hit.index];
        if (passage) hits.push({ passage, score: hit.score });
      }
      return hits;
    },
  };
}

export interface ConfiguredCorpusOptions {
  monitor?: FallbackMonitor;
  /** Replaces the proxy client built from `config.embedding`. */
  embeddingsClient?: EmbeddingsClient;
}

/**
 * Load `config.source.rawRecipesPath` and build a corpus with the configured
 * chunking and BM25 settings. Returns null when the source file is missing.
 */
export async function buildCorpusFromConfig(
  config: Readonly<RetrievalConfig>,
  options: ConfiguredCorpusOptions = {},
): Promise<RecipeCorpus | null> {
  const documents = await loadRecipeDocuments(config.source.rawRecipesPath, config.source);
  if (!documents) return null;

  const { chunking, embedding } = config;
  const encoder = chunking.strategy === 'semantic'
    ? createEmbeddingEncoder({
        model: embedding.model,
        client: options.embeddingsClient
          ?? createLLMClient({ baseURL: embedding.baseURL, apiKey: embedding.apiKey }),
      })
    : undefined;

  return buildRecipeCorpus(documents, {
    bm25: config.bm25,
    chunking: {
      strategy: chunking.strategy,
      chunkSize: chunking.chunkSize,
      overlap: chunking.overlap,
      similarityThreshold: chunking.similarityThreshold,
      minChunkChars: chunking.minChunkChars,
      encoder,
      monitor: options.monitor,
    },
  });
}
