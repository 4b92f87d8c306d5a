/**
 * FILE PURPOSE: Data types shared by the recipe QA packages
 *
 * WHY: Single source of truth for documents, passages and retrieval hits.
 *      The chunker and the lexical index only share these shapes.
 */

/** Scalar values allowed in document and passage metadata. */
export type MetadataValue = string | number | boolean | null;

/** Raw input text plus caller-owned metadata (e.g. CSV columns). */
export interface RecipeDocument {
  readonly text: string;
  readonly metadata: Readonly<Record<string, MetadataValue>>;
}

/** Metadata attached to a passage before persistence or retrieval. */
export interface PassageMetadata {
  readonly [key: string]: MetadataValue | undefined;
  /** Position of the passage within its source document. */
  readonly passageIndex: number;
  /** Row identifier of the source document, when it came from a table. */
  readonly sourceRow?: number;
}

/** A contiguous piece of document text; `index` is its emission order. */
export interface Passage {
  readonly index: number;
  readonly text: string;
  readonly metadata: PassageMetadata;
}

/** One lexical retrieval hit. `index` points into the indexed collection. */
export interface RankedPassage {
  readonly index: number;
  readonly text: string;
  readonly score: number;
}

/** Chunking strategies — determines how text is split before indexing. */
export type ChunkStrategy = 'fixed' | 'paragraph' | 'semantic';

/** Summary of a populated lexical index. */
export interface IndexStats {
  passageCount: number;
  vocabularySize: number;
  averageLength: number;
}
