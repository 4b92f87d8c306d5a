#!/usr/bin/env npx tsx
/**
 * FILE PURPOSE: Build the BM25 recipe index from RAW_RECIPES_PATH and report its shape
 *
 * WHY: Quick check that the recipe source chunks and indexes the way the
 *      configured strategy expects before anything queries it.
 *
 * USAGE: CHUNK_STRATEGY=paragraph npx tsx scripts/build-index.ts
 */

import {
  buildCorpusFromConfig,
  FallbackMonitor,
  loadRetrievalConfig,
} from '../packages/retrieval/src/index.js';

async function main() {
  const config = loadRetrievalConfig();
  const monitor = new FallbackMonitor();

  process.stdout.write(`Loading recipes from ${config.source.rawRecipesPath}\n`);
  process.stdout.write(`Chunking with strategy=${config.chunking.strategy} size=${config.chunking.chunkSize} overlap=${config.chunking.overlap}\n`);

  const corpus = await buildCorpusFromConfig(config, { monitor });
  if (!corpus) {
    process.exitCode = 1;
    return;
  }

  const stats = corpus.index.stats();
  process.stdout.write(`Total passages: ${stats.passageCount}\n`);
  process.stdout.write(`Unique tokens: ${stats.vocabularySize}\n`);
  process.stdout.write(`Average passage length: ${stats.averageLength.toFixed(1)} tokens\n`);

  if (config.chunking.strategy === 'semantic') {
    const fallback = monitor.getStats();
    process.stdout.write(
      `Semantic fallbacks: ${fallback.fallbackCount}/${fallback.semanticCount + fallback.fallbackCount} (${monitor.getHealth()})\n`,
    );
    if (fallback.lastFallback) {
      process.stdout.write(`Last fallback: ${fallback.lastFallback.reason}: ${fallback.lastFallback.message}\n`);
    }
  }
}

main().catch((err) => {
  process.stderr.write(`Fatal: ${err}\n`);
  process.exit(1);
});
