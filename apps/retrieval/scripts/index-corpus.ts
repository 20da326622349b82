#!/usr/bin/env node

/**
 * Index a JSONL corpus into the configured vector store
 *
 * Usage: tsx scripts/index-corpus.ts [corpus.jsonl] [--reset] [--batch-size=N]
 */

import * as path from 'path';
import { loadConfig, logger } from '../src/config/index.js';
import { createVectorStore } from '../src/store/vector-store.js';
import { loadCorpus } from '../src/ingestion/corpus.js';

async function main() {
  const args = process.argv.slice(2);
  const corpusPath = args.find(arg => !arg.startsWith('--'))
    || path.join(process.cwd(), 'fixtures', 'sample-corpus.jsonl');
  const reset = args.includes('--reset');
  const batchSizeArg = args.find(arg => arg.startsWith('--batch-size='));
  const batchSize = batchSizeArg ? parseInt(batchSizeArg.split('=')[1], 10) : undefined;

  const store = createVectorStore(loadConfig().vectorStore);

  try {
    if (reset) {
      store.reset();
    }

    const documents = await loadCorpus(corpusPath);
    const report = await store.add(documents, batchSize);
    const stats = store.getStats();

    logger.info({ report, stats }, 'Indexing finished');

    if (report.failedBatches.length > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error({ error, corpusPath }, 'Indexing failed');
    process.exitCode = 1;
  } finally {
    store.close();
  }
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch(error => {
    logger.error({ error }, 'Indexing crashed');
    process.exitCode = 1;
  });
}
