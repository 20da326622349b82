/**
 * Jurisdiction-aware retrieval core for legal research assistants
 */

export { loadConfig, resetConfig, type Config } from './config/index.js';
export { loadServerEnv, resetServerEnv, type ServerEnv } from './config/env.js';
export { logger, createLogger } from './utils/logger.js';
export { Ok, Err, type Result } from './utils/result.js';

export * from './embeddings/index.js';

export * from './store/types.js';
export { DocumentIndex } from './store/document-index.js';
export { normalizeDocument, normalizeJurisdiction, normalizeMetadata } from './store/metadata.js';
export {
  LegalVectorStore,
  createVectorStore,
  toEmbeddingServiceConfig,
  DEFAULT_BATCH_SIZE,
  DEFAULT_SEARCH_LIMIT,
  type VectorStoreDeps,
} from './store/vector-store.js';

export {
  recallAtK,
  precisionAtK,
  meanReciprocalRank,
  averagePrecision,
  ndcgAtK,
  calculateAllMetrics,
  DEFAULT_K_VALUES,
  type MetricsReport,
} from './metrics/retrieval-metrics.js';
export {
  QueryAnalytics,
  percentile,
  type QueryLogEntry,
  type QuerySummaryStatistics,
} from './metrics/query-analytics.js';

export {
  RetrievalEvaluationHarness,
  fixtureSchema,
  type EvalFixture,
  type EvaluationReport,
  type EvaluationSummary,
  type FixtureResult,
  type SearchableStore,
} from './evaluation/harness.js';
export { loadCorpus, inferJurisdiction } from './ingestion/corpus.js';
