/**
 * Legal Vector Store
 *
 * Embeds legal documents into a persistent collection and answers
 * jurisdiction-filtered similarity queries. Search degrades instead of
 * failing:
 *
 *   vector      primary embedder answered, similarity ranking
 *   fallback    local embedder answered, similarity ranking
 *   keyword     query could not be embedded (or embedded by a model the
 *               collection does not hold), text overlap ranking
 *   unavailable storage failed, empty result
 */

import { createLogger } from '../utils/logger.js';
import { EmbeddingService } from '../embeddings/service.js';
import type { EmbeddingServiceConfig, EmbeddingServiceStatus } from '../embeddings/types.js';
import { Err, Ok, type Result } from '../utils/result.js';
import { DocumentIndex } from './document-index.js';
import { normalizeDocument } from './metadata.js';
import {
  StoreError,
  type AddReport,
  type CollectionStats,
  type DocumentInput,
  type DocumentRecord,
  type FailedBatch,
  type Jurisdiction,
  type JurisdictionFilter,
  type SearchResponse,
  type VectorStoreConfig,
} from './types.js';

const log = createLogger('store.vector-store');

export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_SEARCH_LIMIT = 5;

export interface VectorStoreDeps {
  embeddings?: EmbeddingService;
  index?: DocumentIndex;
}

export function toEmbeddingServiceConfig(config: VectorStoreConfig): EmbeddingServiceConfig {
  return {
    openai: config.embeddingApiKey
      ? {
          apiKey: config.embeddingApiKey,
          model: config.embeddingModel,
          dimensions: config.embeddingDimensions,
          baseUrl: config.embeddingBaseUrl,
          timeoutMs: config.requestTimeoutMs,
          retry: {
            attempts: config.retryAttempts,
            baseDelayMs: config.retryBaseDelayMs,
            maxDelayMs: config.retryMaxDelayMs,
          },
        }
      : undefined,
    local: {
      model: config.localModelName,
      baseUrl: config.localBaseUrl,
      timeoutMs: config.requestTimeoutMs,
    },
    fallbackEnabled: config.fallbackEnabled,
  };
}

export class LegalVectorStore {
  private readonly embeddings: EmbeddingService;
  private readonly index: DocumentIndex;

  constructor(config: VectorStoreConfig, deps: VectorStoreDeps = {}) {
    this.embeddings = deps.embeddings ?? new EmbeddingService(toEmbeddingServiceConfig(config));
    this.index = deps.index ?? new DocumentIndex(config.persistPath, config.collectionName);
  }

  /**
   * Embed and store documents in batches. A failing batch is recorded in
   * the report and the remaining batches still run.
   */
  async add(documents: DocumentInput[], batchSize: number = DEFAULT_BATCH_SIZE): Promise<AddReport> {
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
    }

    const report: AddReport = {
      requested: documents.length,
      persisted: 0,
      skipped: 0,
      batches: 0,
      failedBatches: [],
      degradedBatches: 0,
    };

    if (documents.length === 0) {
      return report;
    }

    // Ids are reserved before the first await so concurrent calls never share one
    const records: DocumentRecord[] = [];

    documents.forEach(document => {
      const record = normalizeDocument(document, () => this.index.nextDocumentId());
      if (record) {
        records.push(record);
      } else {
        report.skipped++;
      }
    });

    if (report.skipped > 0) {
      log.warn({ skipped: report.skipped }, 'Skipped documents without text');
    }

    for (let start = 0; start < records.length; start += batchSize) {
      const batch = records.slice(start, start + batchSize);
      const batchIndex = report.batches++;

      const stored = await this.storeBatch(batch, batchIndex);
      if (!stored.ok) {
        report.failedBatches.push(stored.error);
        continue;
      }

      report.persisted += batch.length;
      if (stored.value.degraded) {
        report.degradedBatches++;
      }
    }

    log.info({
      collection: this.index.collectionName,
      requested: report.requested,
      persisted: report.persisted,
      skipped: report.skipped,
      failedBatches: report.failedBatches.length,
      degradedBatches: report.degradedBatches,
    }, 'Added documents to collection');

    return report;
  }

  /**
   * Similarity search with optional jurisdiction filter. Never throws.
   */
  async search(
    query: string,
    jurisdiction?: JurisdictionFilter,
    limit: number = DEFAULT_SEARCH_LIMIT
  ): Promise<SearchResponse> {
    if (limit <= 0) {
      return { results: [], mode: 'vector', degraded: false };
    }

    const filter: Jurisdiction | undefined =
      jurisdiction && jurisdiction !== 'all' ? jurisdiction : undefined;

    try {
      const embedded = await this.embeddings.embed([query]);

      if (!embedded.ok) {
        log.warn({
          kind: embedded.error.kind,
          jurisdiction: filter ?? 'all',
        }, 'Query embedding failed, using keyword search');
        return this.keywordSearch(query, filter, limit, {
          kind: embedded.error.kind,
          message: embedded.error.message,
        });
      }

      const { vectors, model, degraded } = embedded.value;
      const vector = vectors[0];
      const info = this.index.getCollectionInfo();

      if (info.embeddingModel !== null
        && (info.embeddingModel !== model || info.dimensions !== vector.length)) {
        log.warn({
          collectionModel: info.embeddingModel,
          queryModel: model,
          collectionDimensions: info.dimensions,
          queryDimensions: vector.length,
        }, 'Query embedded by a different model than the collection, using keyword search');
        return this.keywordSearch(query, filter, limit, {
          kind: 'EMBEDDING_MODEL_MISMATCH',
          message: `Collection holds ${info.embeddingModel} vectors, query was embedded with ${model}`,
        });
      }

      const results = this.index.queryByVector(vector, filter, limit);
      return {
        results,
        mode: degraded ? 'fallback' : 'vector',
        degraded,
      };
    } catch (error) {
      return this.unavailable(error);
    }
  }

  getStats(): CollectionStats {
    const info = this.index.getCollectionInfo();
    return {
      collectionName: info.name,
      totalDocuments: this.index.count(),
      byJurisdiction: this.index.countByJurisdiction(),
      embeddingModel: info.embeddingModel,
      dimensions: info.dimensions,
    };
  }

  /**
   * Stored records in insertion order, for inspection
   */
  peek(limit: number = 10): DocumentRecord[] {
    return this.index.list(limit);
  }

  getEmbeddingStatus(): EmbeddingServiceStatus {
    return this.embeddings.getStatus();
  }

  reset(): void {
    this.index.resetCollection();
  }

  close(): void {
    this.index.close();
  }

  private async storeBatch(
    batch: DocumentRecord[],
    batchIndex: number
  ): Promise<Result<{ degraded: boolean }, FailedBatch>> {
    const ids = batch.map(record => record.id);

    const embedded = await this.embeddings.embed(batch.map(record => record.text));
    if (!embedded.ok) {
      log.error({
        batchIndex,
        ids,
        kind: embedded.error.kind,
        error: embedded.error.message,
      }, 'Failed to embed batch');
      return Err({ batchIndex, ids, reason: embedded.error.kind, message: embedded.error.message });
    }

    try {
      this.index.upsert(batch, embedded.value.vectors, embedded.value.model);
    } catch (error) {
      const code = error instanceof StoreError ? error.code : 'STORE_FAILED';
      const message = error instanceof Error ? error.message : String(error);
      log.error({ batchIndex, ids, code, error: message }, 'Failed to store batch');
      return Err({ batchIndex, ids, reason: code, message });
    }

    return Ok({ degraded: embedded.value.degraded });
  }

  private keywordSearch(
    query: string,
    filter: Jurisdiction | undefined,
    limit: number,
    error: NonNullable<SearchResponse['error']>
  ): SearchResponse {
    try {
      return {
        results: this.index.queryByText(query, filter, limit),
        mode: 'keyword',
        degraded: true,
        error,
      };
    } catch (storeError) {
      return this.unavailable(storeError);
    }
  }

  private unavailable(error: unknown): SearchResponse {
    const kind = error instanceof StoreError ? error.code : 'SEARCH_FAILED';
    const message = error instanceof Error ? error.message : String(error);
    log.error({ kind, error: message }, 'Search failed, returning no results');
    return { results: [], mode: 'unavailable', degraded: true, error: { kind, message } };
  }
}

export function createVectorStore(config: VectorStoreConfig): LegalVectorStore {
  return new LegalVectorStore(config);
}
