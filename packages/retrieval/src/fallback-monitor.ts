/**
 * FILE PURPOSE: Count semantic chunking outcomes across a corpus build
 *
 * WHY: A document whose semantic chunking fails still yields character-window
 *      passages, so a broken encoder only shows up in these counts.
 * HOW: One counter per fallback reason plus the last failure message.
 *      chunkDocument records into the monitor it is given; there is no
 *      process-wide instance.
 */

import type { ChunkingFallbackReason } from './chunking/semantic.js';

/**
 * - ok:       every semantic attempt succeeded (or none was made)
 * - degraded: some documents fell back to the character window
 * - broken:   documents fell back and none was chunked semantically
 */
export type FallbackHealth = 'ok' | 'degraded' | 'broken';

export interface LastFallback {
  reason: ChunkingFallbackReason;
  message: string;
}

export interface FallbackStats {
  semanticCount: number;
  fallbackCount: number;
  /** fallbackCount / (semanticCount + fallbackCount), 0 before any record. */
  fallbackRate: number;
  byReason: Record<ChunkingFallbackReason, number>;
  lastFallback?: LastFallback;
}

export class FallbackMonitor {
  private semantic = 0;
  private readonly byReason: Record<ChunkingFallbackReason, number> = {
    'no-encoder': 0,
    'shape-mismatch': 0,
    'encoder-error': 0,
  };
  private last: LastFallback | undefined;

  recordPrimary(): void {
    this.semantic++;
  }

  recordFallback(reason: ChunkingFallbackReason, message: string): void {
    this.byReason[reason]++;
    this.last = { reason, message };
  }

  getStats(): FallbackStats {
    const fallbackCount = Object.values(this.byReason).reduce((sum, n) => sum + n, 0);
    const total = this.semantic + fallbackCount;
    const stats: FallbackStats = {
      semanticCount: this.semantic,
      fallbackCount,
      fallbackRate: total > 0 ? fallbackCount / total : 0,
      byReason: { ...this.byReason },
    };
    if (this.last) stats.lastFallback = { ...this.last };
    return stats;
  }

  getHealth(): FallbackHealth {
    const { semanticCount, fallbackCount } = this.getStats();
    if (fallbackCount === 0) return 'ok';
    return semanticCount === 0 ? 'broken' : 'degraded';
  }
}
