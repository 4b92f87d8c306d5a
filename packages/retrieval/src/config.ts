/**
 * FILE PURPOSE: Environment-driven configuration for retrieval and chunking
 *
 * WHY: Scripts and composing apps read one frozen config object instead of
 *      poking at process.env in every module. Library code takes the values
 *      as explicit arguments.
 * HOW: Every variable has a default. Bad numbers log a WARN and keep the default.
 *
 * USAGE:
 *   import { loadRetrievalConfig } from '@recipe-qa/retrieval';
 *   const config = loadRetrievalConfig();
 *   const index = new Bm25Index(config.bm25);
 */

import type { ChunkStrategy } from '@recipe-qa/shared-types';

export interface Bm25Config {
  k1: number;
  b: number;
  defaultTopK: number;
}

export interface ChunkingConfig {
  strategy: ChunkStrategy;
  chunkSize: number;
  overlap: number;
  similarityThreshold: number;
  minChunkChars: number;
}

export interface EmbeddingConfig {
  model: string;
  baseURL: string;
  apiKey: string;
}

export interface SourceConfig {
  rawRecipesPath: string;
  textColumn: string;
  metaColumns: string[];
}

export interface RetrievalConfig {
  bm25: Bm25Config;
  chunking: ChunkingConfig;
  embedding: EmbeddingConfig;
  source: SourceConfig;
}

export const DEFAULT_CONFIG: RetrievalConfig = {
  bm25: { k1: 1.5, b: 0.75, defaultTopK: 3 },
  chunking: {
    strategy: 'paragraph',
    chunkSize: 500,
    overlap: 50,
    similarityThreshold: 0.65,
    minChunkChars: 40,
  },
  embedding: {
    model: 'text-embedding-3-small',
    baseURL: 'http://localhost:4000/v1',
    apiKey: '',
  },
  source: {
    rawRecipesPath: 'data/raw_recipes/recipes.txt',
    textColumn: 'TranslatedInstructions',
    metaColumns: ['TranslatedIngredients', 'Cuisine', 'TotalTimeInMins', 'URL'],
  },
};

const STRATEGIES: readonly ChunkStrategy[] = ['fixed', 'paragraph', 'semantic'];

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  isValid: (value: number) => boolean,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !isValid(value)) {
    process.stderr.write(`WARN: ${name}="${raw}" is invalid — using default ${fallback}\n`);
    return fallback;
  }
  return value;
}

const positiveInt = (v: number): boolean => Number.isInteger(v) && v > 0;
const nonNegativeInt = (v: number): boolean => Number.isInteger(v) && v >= 0;

function readStrategy(env: Env, fallback: ChunkStrategy): ChunkStrategy {
  const raw = env.CHUNK_STRATEGY?.trim();
  if (!raw) return fallback;
  const match = STRATEGIES.find((s) => s === raw);
  if (!match) {
    process.stderr.write(`WARN: CHUNK_STRATEGY="${raw}" is not one of ${STRATEGIES.join(', ')} — using ${fallback}\n`);
    return fallback;
  }
  return match;
}

function readList(env: Env, name: string, fallback: readonly string[]): string[] {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return [...fallback];
  return raw.split(',').map((s) => s.trim()).filter(Boolean);
}

/** Build the config from environment variables (defaults to `process.env`). */
export function loadRetrievalConfig(env: Env = process.env): Readonly<RetrievalConfig> {
  const d = DEFAULT_CONFIG;
  const config: RetrievalConfig = {
    bm25: {
      k1: readNumber(env, 'BM25_K1', d.bm25.k1, (v) => v >= 0),
      b: readNumber(env, 'BM25_B', d.bm25.b, (v) => v >= 0 && v <= 1),
      defaultTopK: readNumber(env, 'TOP_K_RETRIEVAL', d.bm25.defaultTopK, positiveInt),
    },
    chunking: {
      strategy: readStrategy(env, d.chunking.strategy),
      chunkSize: readNumber(env, 'CHUNK_SIZE', d.chunking.chunkSize, positiveInt),
      overlap: readNumber(env, 'CHUNK_OVERLAP', d.chunking.overlap, nonNegativeInt),
      similarityThreshold: readNumber(
        env,
        'SEMANTIC_SIMILARITY_THRESHOLD',
        d.chunking.similarityThreshold,
        (v) => v >= -1 && v <= 1,
      ),
      minChunkChars: readNumber(env, 'SEMANTIC_MIN_CHUNK_CHARS', d.chunking.minChunkChars, nonNegativeInt),
    },
    embedding: {
      model: env.EMBEDDING_MODEL || d.embedding.model,
      baseURL: env.LITELLM_PROXY_URL || d.embedding.baseURL,
      apiKey: env.LITELLM_API_KEY || d.embedding.apiKey,
    },
    source: {
      rawRecipesPath: env.RAW_RECIPES_PATH || d.source.rawRecipesPath,
      textColumn: env.RECIPE_TEXT_COLUMN || d.source.textColumn,
      metaColumns: readList(env, 'RECIPE_META_COLUMNS', d.source.metaColumns),
    },
  };

  return Object.freeze(config);
}
