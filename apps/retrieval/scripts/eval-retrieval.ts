#!/usr/bin/env node

/**
 * Legal Retrieval Evaluation
 *
 * Reads labelled queries from fixtures/eval.jsonl (or the path given as
 * the first argument), runs them against the configured vector store and
 * prints the mean metrics. Detailed per-query results are written as JSON
 * to the second argument, or eval-results.json.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { loadConfig, logger } from '../src/config/index.js';
import { createVectorStore } from '../src/store/vector-store.js';
import { RetrievalEvaluationHarness, type EvaluationSummary } from '../src/evaluation/harness.js';

function printResults(summary: EvaluationSummary): void {
  console.log('\nRetrieval Evaluation Results');
  console.log('============================');
  console.log(`Queries:        ${summary.totalQueries}`);
  console.log(`Degraded rate:  ${(summary.degradedRate * 100).toFixed(1)}%`);
  console.log(`Empty rate:     ${(summary.emptyRate * 100).toFixed(1)}%`);

  console.log('\nMean metrics:');
  for (const [name, value] of Object.entries(summary.meanMetrics)) {
    console.log(`  ${name.padEnd(20)} ${value.toFixed(4)}`);
  }

  if (summary.analytics) {
    console.log('\nResponse time:');
    console.log(`  avg    ${summary.analytics.avgResponseTimeMs.toFixed(1)}ms`);
    console.log(`  median ${summary.analytics.medianResponseTimeMs.toFixed(1)}ms`);
    console.log(`  p95    ${summary.analytics.p95ResponseTimeMs.toFixed(1)}ms`);
  }
}

async function main() {
  const fixturePath = process.argv[2] || path.join(process.cwd(), 'fixtures', 'eval.jsonl');
  const outputPath = process.argv[3] || path.join(process.cwd(), 'eval-results.json');

  const store = createVectorStore(loadConfig().vectorStore);
  const harness = new RetrievalEvaluationHarness(store);

  try {
    const stats = store.getStats();
    if (stats.totalDocuments === 0) {
      logger.warn({ collection: stats.collectionName }, 'Collection is empty, every query will return no results');
    }

    const fixtures = await harness.loadFixtures(fixturePath);
    const report = await harness.evaluate(fixtures);

    printResults(report.summary);

    await fs.writeFile(outputPath, JSON.stringify(report, null, 2));
    console.log(`\nDetailed results saved to: ${outputPath}`);
  } catch (error) {
    logger.error({ error }, 'Evaluation failed');
    process.exitCode = 1;
  } finally {
    store.close();
  }
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch(error => {
    logger.error({ error }, 'Evaluation crashed');
    process.exitCode = 1;
  });
}
