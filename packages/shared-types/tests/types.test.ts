import { describe, it, expect } from 'vitest';
import type {
  ChunkStrategy,
  IndexStats,
  Passage,
  RankedPassage,
  RecipeDocument,
} from '../src/index.js';

describe('shared-types', () => {
  it('RecipeDocument interface is importable and usable', () => {
    const doc: RecipeDocument = {
      text: 'Whisk the eggs with grated cheese.',
      metadata: { Cuisine: 'Italian', TotalTimeInMins: 25, vegetarian: true, URL: null },
    };
    expect(doc.metadata.Cuisine).toBe('Italian');
    expect(doc.metadata.TotalTimeInMins).toBe(25);
  });

  it('Passage carries its passage index and optional source row', () => {
    const passage: Passage = {
      index: 4,
      text: 'Simmer the rice for twelve minutes.',
      metadata: { passageIndex: 1, sourceRow: 7, Cuisine: 'Indian' },
    };
    expect(passage.metadata.passageIndex).toBe(1);
    expect(passage.metadata.sourceRow).toBe(7);
  });

  it('RankedPassage and IndexStats are plain value shapes', () => {
    const hit: RankedPassage = { index: 0, text: 'Bake for 30 minutes.', score: 1.25 };
    const stats: IndexStats = { passageCount: 1, vocabularySize: 4, averageLength: 4 };
    expect(hit.score).toBeGreaterThan(0);
    expect(stats.vocabularySize).toBe(4);
  });

  it('ChunkStrategy type constrains to valid values', () => {
    const strategy: ChunkStrategy = 'semantic';
    expect(['fixed', 'paragraph', 'semantic']).toContain(strategy);
  });
});
