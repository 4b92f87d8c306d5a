/**
 * FILE PURPOSE: OpenAI-compatible client pointed at the LiteLLM proxy
 *
 * WHY: Embedding calls go through one gateway so the model behind it can
 *      change without touching the chunker.
 *
 * USAGE:
 *   import { createLLMClient } from '@recipe-qa/retrieval';
 *   const llm = createLLMClient({ baseURL: config.embedding.baseURL });
 */
import OpenAI from 'openai';

export interface LLMClientOptions {
  baseURL?: string;
  apiKey?: string;
}

export function createLLMClient(options: LLMClientOptions = {}): OpenAI {
  const baseURL = options.baseURL || process.env.LITELLM_PROXY_URL || 'http://localhost:4000/v1';
  const apiKey = options.apiKey || process.env.LITELLM_API_KEY || '';

  return new OpenAI({ baseURL, apiKey });
}

export type { OpenAI };
