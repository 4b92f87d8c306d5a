/**
 * Tests for the corpus builder — chunk → tag → index composition.
 */

import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { RecipeDocument } from '@recipe-qa/shared-types';
import { buildRecipeCorpus, buildCorpusFromConfig } from '../src/ingestion/corpus.js';
import { loadRetrievalConfig } from '../src/config.js';
import { FallbackMonitor } from '../src/fallback-monitor.js';

const DOCS: RecipeDocument[] = [
  { text: 'Pasta carbonara is made with eggs and cheese', metadata: { Cuisine: 'Italian' } },
  { text: 'Biryani requires rice and aromatic spices', metadata: { Cuisine: 'Indian' } },
  { text: 'Chocolate cake needs cocoa powder and sugar', metadata: { Cuisine: 'French' } },
];

afterEach(() => {
  vi.restoreAllMocks();
});

describe('buildRecipeCorpus', () => {
  it('indexes one passage per short document and maps hits back to passages', async () => {
    const corpus = await buildRecipeCorpus(DOCS);
    expect(corpus.passages).toHaveLength(3);
    expect(corpus.index.stats().passageCount).toBe(3);

    const [top] = corpus.search('pasta eggs', 2);
    expect(top?.passage).toEqual({
      index: 0,
      text: DOCS[0]?.text,
      metadata: { Cuisine: 'Italian', passageIndex: 0, sourceRow: 0 },
    });
    expect(top?.score).toBeGreaterThan(0);
  });

  it('numbers passages across documents and keeps per-document positions', async () => {
    const corpus = await buildRecipeCorpus(
      [
        { text: 'boil rice then steam', metadata: { sourceRow: 4 } },
        { text: 'fry tofu', metadata: {} },
      ],
      { chunking: { strategy: 'fixed', chunkSize: 10, overlap: 0 } },
    );

    expect(corpus.passages).toEqual([
      { index: 0, text: 'boil rice', metadata: { sourceRow: 4, passageIndex: 0 } },
      { index: 1, text: 'then steam', metadata: { sourceRow: 4, passageIndex: 1 } },
      { index: 2, text: 'fry tofu', metadata: { passageIndex: 0, sourceRow: 1 } },
    ]);
    expect(corpus.search('tofu', 1).map((h) => h.passage.index)).toEqual([2]);
  });

  it('passes BM25 settings to the index', async () => {
    const corpus = await buildRecipeCorpus(DOCS, { bm25: { k1: 1.2, b: 0, defaultTopK: 1 } });
    expect(corpus.index.k1).toBe(1.2);
    expect(corpus.search('rice')).toHaveLength(1);
  });

  it('counts documents whose semantic chunking fell back', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const monitor = new FallbackMonitor();
    const encoder = vi.fn().mockRejectedValue(new Error('model offline'));

    const corpus = await buildRecipeCorpus(
      [
        { text: 'Whisk the eggs. Add the cheese.', metadata: {} },
        { text: 'One sentence only.', metadata: {} },
      ],
      { chunking: { strategy: 'semantic', encoder, monitor } },
    );

    // the single-sentence document never reaches the encoder
    expect(encoder).toHaveBeenCalledOnce();
    expect(corpus.fallbacks).toBe(1);
    expect(corpus.passages.map((p) => p.text)).toEqual(['Whisk the eggs. Add the cheese.', 'One sentence only.']);
    expect(monitor.getStats()).toMatchObject({ semanticCount: 1, fallbackCount: 1 });
  });

  it('returns no hits for an empty document list', async () => {
    const corpus = await buildRecipeCorpus([]);
    expect(corpus.search('pasta')).toEqual([]);
  });
});

describe('buildCorpusFromConfig', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'recipe-corpus-'));
    await writeFile(
      join(dir, 'recipes.csv'),
      'Instructions,Cuisine\n"Whisk the eggs with grated cheese. Toss with hot spaghetti.",Italian\n',
    );
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads the configured file and embeds through the given client', async () => {
    const create = vi.fn(async (params: { model: string; input: string[] }) => ({
      data: params.input.map((_, index) => ({ embedding: [1, 0], index })),
    }));
    const monitor = new FallbackMonitor();
    const config = loadRetrievalConfig({
      RAW_RECIPES_PATH: join(dir, 'recipes.csv'),
      RECIPE_TEXT_COLUMN: 'Instructions',
      RECIPE_META_COLUMNS: 'Cuisine',
      CHUNK_STRATEGY: 'semantic',
      EMBEDDING_MODEL: 'test-embed',
    });

    const corpus = await buildCorpusFromConfig(config, { monitor, embeddingsClient: { embeddings: { create } } });

    expect(create).toHaveBeenCalledWith({
      model: 'test-embed',
      input: ['Whisk the eggs with grated cheese.', 'Toss with hot spaghetti.'],
    });
    expect(corpus?.passages).toEqual([
      {
        index: 0,
        text: 'Whisk the eggs with grated cheese. Toss with hot spaghetti.',
        metadata: { sourceRow: 0, Cuisine: 'Italian', passageIndex: 0 },
      },
    ]);
    expect(monitor.getStats().semanticCount).toBe(1);
  });

  it('returns null when the recipe file is missing', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const config = loadRetrievalConfig({ RAW_RECIPES_PATH: join(dir, 'nope.txt') });
    expect(await buildCorpusFromConfig(config)).toBeNull();
  });
});
