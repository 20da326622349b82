/**
 * Document, query-result and configuration types for the legal vector store
 */

import type { EmbeddingErrorKind } from '../embeddings/types.js';

export const JURISDICTIONS = ['federal', 'state', 'unknown'] as const;

export type Jurisdiction = typeof JURISDICTIONS[number];

/** Filter accepted by search; 'all' and null/undefined disable filtering */
export type JurisdictionFilter = Jurisdiction | 'all' | null | undefined;

/**
 * Metadata stored with every document. Every key is always present so
 * citation formatting downstream never meets a missing field.
 */
export interface LegalMetadata {
  case_name: string;
  citation: string;
  court: string;
  jurisdiction: Jurisdiction;
  date_filed: string;
  document_type: string;
  url: string;
}

/**
 * Document as handed over by ingestion. Loose on purpose: missing fields
 * receive sentinel defaults during normalization.
 */
export interface DocumentInput {
  id?: string | number;
  text?: string;
  snippet?: string;
  case_name?: string;
  citation?: string;
  court?: string;
  jurisdiction?: string;
  date_filed?: string;
  document_type?: string;
  url?: string;
}

export interface DocumentRecord {
  id: string;
  text: string;
  metadata: LegalMetadata;
}

export interface QueryResult {
  id: string;
  text: string;
  metadata: LegalMetadata;
  /** Non-negative dissimilarity, 0 = identical */
  distance: number;
}

/**
 * vector    - primary embedder, similarity search
 * fallback  - local embedder, similarity search
 * keyword   - query embedding unusable, text overlap ranking
 * unavailable - storage failed, empty result
 */
export type RetrievalMode = 'vector' | 'fallback' | 'keyword' | 'unavailable';

export interface SearchResponse {
  results: QueryResult[];
  mode: RetrievalMode;
  degraded: boolean;
  error?: {
    kind: EmbeddingErrorKind | StoreErrorCode;
    message: string;
  };
}

export interface FailedBatch {
  batchIndex: number;
  ids: string[];
  reason: EmbeddingErrorKind | StoreErrorCode;
  message: string;
}

export interface AddReport {
  requested: number;
  persisted: number;
  skipped: number;
  batches: number;
  failedBatches: FailedBatch[];
  degradedBatches: number;
}

export interface CollectionStats {
  collectionName: string;
  totalDocuments: number;
  byJurisdiction: Record<string, number>;
  embeddingModel: string | null;
  dimensions: number | null;
}

export interface CollectionInfo {
  name: string;
  embeddingModel: string | null;
  dimensions: number | null;
}

export type StoreErrorCode =
  | 'OPEN_FAILED'
  | 'EMBEDDING_MODEL_MISMATCH'
  | 'INVALID_VECTOR_DIMENSIONS'
  | 'STORE_FAILED'
  | 'SEARCH_FAILED'
  | 'STATS_FAILED'
  | 'RESET_FAILED';

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly code: StoreErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

/**
 * Everything the store needs, passed explicitly instead of read from the
 * environment.
 */
export interface VectorStoreConfig {
  embeddingApiKey?: string;
  embeddingModel: string;
  embeddingDimensions?: number;
  embeddingBaseUrl?: string;
  fallbackEnabled: boolean;
  localModelName: string;
  localBaseUrl: string;
  /** SQLite file path, or ':memory:' for a process-local index */
  persistPath: string;
  collectionName: string;
  retryAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  requestTimeoutMs?: number;
}
