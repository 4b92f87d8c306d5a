#!/usr/bin/env npx tsx
/**
 * FILE PURPOSE: Run keyword queries against the recipe index and print ranked passages
 *
 * WHY: End-to-end check of chunking + BM25 without the answer-generation step.
 *
 * USAGE: npx tsx scripts/query-recipes.ts "How to make pasta?" "biryani spices"
 */

import { buildCorpusFromConfig, loadRetrievalConfig } from '../packages/retrieval/src/index.js';

const DEFAULT_QUERIES = [
  'How to make pasta?',
  'What are the ingredients for biryani?',
  'Give me a chocolate cake recipe',
  'How to make stir fry vegetables?',
];

function preview(text: string, max = 160): string {
  const flat = text.replace(/\s+/g, ' ');
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

async function main() {
  const config = loadRetrievalConfig();
  const corpus = await buildCorpusFromConfig(config);
  if (!corpus) {
    process.exitCode = 1;
    return;
  }
  process.stdout.write(`Indexed ${corpus.passages.length} passages\n`);

  const queries = process.argv.slice(2);
  for (const query of queries.length > 0 ? queries : DEFAULT_QUERIES) {
    process.stdout.write(`\nQ: ${query}\n`);
    const hits = corpus.search(query);
    if (hits.length === 0) {
      process.stdout.write('No relevant passages found\n');
      continue;
    }
    for (const { passage, score } of hits) {
      process.stdout.write(`  [${score.toFixed(2)}] #${passage.index} ${preview(passage.text)}\n`);
    }
  }
}

main().catch((err) => {
  process.stderr.write(`Fatal: ${err}\n`);
  process.exit(1);
});
