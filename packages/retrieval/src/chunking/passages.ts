import type { MetadataValue, Passage } from '@recipe-qa/shared-types';

export interface PassageTagOptions {
  /** `index` of the first passage; lets several documents share one numbering. */
  startIndex?: number;
  sourceRow?: number;
  metadata?: Readonly<Record<string, MetadataValue>>;
}

/** Wrap chunk strings as passages tagged with their position and source. */
export function toPassages(chunks: readonly string[], options: PassageTagOptions = {}): Passage[] {
  const { startIndex = 0, sourceRow, metadata = {} } = options;
  return chunks.map((text, passageIndex) => ({
    index: startIndex + passageIndex,
    text,
    metadata: {
      ...metadata,
      passageIndex,
      ...(sourceRow !== undefined ? { sourceRow } : {}),
    },
  }));
}
