/**
 * FILE PURPOSE: SentenceEncoder backed by an OpenAI-compatible embeddings API
 * WHY: The chunker only accepts a plain encoder function. Model choice and
 *      network access live here, outside the chunking code.
 */

import type { SentenceEncoder } from '../chunking/semantic.js';
import { createLLMClient } from '../llm-client.js';

/** The slice of the OpenAI client this adapter calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string[] }): Promise<{
      data: { embedding: number[]; index: number }[];
    }>;
  };
}

export interface EmbeddingEncoderOptions {
  model: string;
  /** Defaults to createLLMClient() with the proxy settings from env. */
  client?: EmbeddingsClient;
}

/**
 * One embeddings request per call. Rows come back ordered by the response's
 * `index` so they line up with the input sentences. API errors reject.
 */
export function createEmbeddingEncoder(options: EmbeddingEncoderOptions): SentenceEncoder {
  const client = options.client ?? createLLMClient();

  return async (sentences) => {
    if (sentences.length === 0) return [];
    const response = await client.embeddings.create({ model: options.model, input: sentences });
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((d) => d.embedding);
  };
}
