/**
 * FILE PURPOSE: BM25 lexical index over an in-memory passage collection
 *
 * WHY: Keyword relevance is the retrieval path that needs no embeddings.
 *      The idf form keeps the `+1` inside the log so it stays positive even
 *      for terms present in every passage; scores depend on that exact form.
 * HOW: indexDocuments() builds one frozen state bundle and swaps it in with a
 *      single assignment. retrieve() is a read-only linear scan over it.
 *
 * USAGE:
 *   const index = new Bm25Index({ k1: 1.5, b: 0.75, defaultTopK: 3 });
 *   index.indexDocuments(passages);
 *   const hits = index.retrieve('pasta eggs', 2);
 */

import type { IndexStats, RankedPassage } from '@recipe-qa/shared-types';
import { tokenize } from '../tokenizer.js';

export interface Bm25Options {
  /** Term-frequency saturation. */
  k1?: number;
  /** Length-normalization strength, 0..1. */
  b?: number;
  /** Result count when retrieve() is called without one. */
  defaultTopK?: number;
}

interface IndexState {
  readonly documents: readonly string[];
  readonly tokenizedDocs: readonly (readonly string[])[];
  readonly docLengths: readonly number[];
  readonly termFreqs: readonly ReadonlyMap<string, number>[];
  readonly docFreqs: ReadonlyMap<string, number>;
  readonly idf: ReadonlyMap<string, number>;
  readonly avgDocLength: number;
}

const EMPTY_STATE: IndexState = Object.freeze({
  documents: [],
  tokenizedDocs: [],
  docLengths: [],
  termFreqs: [],
  docFreqs: new Map<string, number>(),
  idf: new Map<string, number>(),
  avgDocLength: 0,
});

function countTerms(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

function buildState(passages: readonly string[]): IndexState {
  const documents = [...passages];
  const tokenizedDocs = documents.map((doc) => tokenize(doc));
  const docLengths = tokenizedDocs.map((tokens) => tokens.length);
  const totalLength = docLengths.reduce((sum, len) => sum + len, 0);
  const avgDocLength = docLengths.length > 0 ? totalLength / docLengths.length : 0;
  const termFreqs = tokenizedDocs.map(countTerms);

  // Presence per passage, not occurrence count
  const docFreqs = new Map<string, number>();
  for (const counts of termFreqs) {
    for (const token of counts.keys()) {
      docFreqs.set(token, (docFreqs.get(token) ?? 0) + 1);
    }
  }

  const n = documents.length;
  const idf = new Map<string, number>();
  for (const [token, df] of docFreqs) {
    idf.set(token, Math.log((n - df + 0.5) / (df + 0.5) + 1));
  }

  return Object.freeze({ documents, tokenizedDocs, docLengths, termFreqs, docFreqs, idf, avgDocLength });
}

export class Bm25Index {
  readonly k1: number;
  readonly b: number;
  readonly defaultTopK: number;
  private state: IndexState = EMPTY_STATE;

  constructor(options: Bm25Options = {}) {
    this.k1 = options.k1 ?? 1.5;
    this.b = options.b ?? 0.75;
    this.defaultTopK = options.defaultTopK ?? 3;
  }

  /** Replace the whole index with `passages`. Never fails, including on `[]`. */
  indexDocuments(passages: readonly string[]): void {
    this.state = buildState(passages);
  }

  get size(): number {
    return this.state.documents.length;
  }

  /** Number of indexed passages containing `term` at least once. */
  documentFrequency(term: string): number {
    return this.state.docFreqs.get(term) ?? 0;
  }

  /** Inverse document frequency of `term`, or undefined when it is not indexed. */
  inverseDocumentFrequency(term: string): number | undefined {
    return this.state.idf.get(term);
  }

  stats(): IndexStats {
    return {
      passageCount: this.state.documents.length,
      vocabularySize: this.state.idf.size,
      averageLength: this.state.avgDocLength,
    };
  }

  /**
   * BM25 score of one passage against already-tokenized query terms.
   * Terms absent from the index add nothing.
   *
   * @throws RangeError when `passageIndex` is outside the indexed collection
   */
  score(queryTokens: readonly string[], passageIndex: number): number {
    return this.scoreIn(this.state, queryTokens, passageIndex);
  }

  /**
   * Top `topK` passages for `query`, best first. Equal scores keep
   * collection order. An empty index yields `[]`.
   */
  retrieve(query: string, topK: number = this.defaultTopK): RankedPassage[] {
    // One read of the bundle so a concurrent re-index can't mix states
    const state = this.state;
    if (state.documents.length === 0 || topK <= 0) return [];

    const queryTokens = tokenize(query);
    const scored: RankedPassage[] = state.documents.map((text, index) => ({
      index,
      text,
      score: this.scoreIn(state, queryTokens, index),
    }));

    scored.sort((a, c) => c.score - a.score || a.index - c.index);
    return scored.slice(0, Math.floor(topK));
  }

  private scoreIn(state: IndexState, queryTokens: readonly string[], passageIndex: number): number {
    const termCounts = state.termFreqs[passageIndex];
    const docLength = state.docLengths[passageIndex];
    if (termCounts === undefined || docLength === undefined) {
      throw new RangeError(`Passage index ${passageIndex} is outside the index (size ${state.documents.length})`);
    }
    if (state.avgDocLength === 0) return 0;

    const lengthNorm = 1 - this.b + this.b * (docLength / state.avgDocLength);
    let score = 0;
    for (const token of queryTokens) {
      const idf = state.idf.get(token);
      if (idf === undefined) continue;
      const tf = termCounts.get(token) ?? 0;
      // tf = 0 adds nothing, and is 0/0 when k1 = 0
      if (tf === 0) continue;
      score += idf * ((tf * (this.k1 + 1)) / (tf + this.k1 * lengthNorm));
    }
    return score;
  }
}
