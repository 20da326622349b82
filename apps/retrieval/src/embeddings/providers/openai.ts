import OpenAI from 'openai';
import { logger } from '../../config/index.js';
import {
  Embedder,
  EmbeddingsApi,
  EmbedOptions,
  OpenAIEmbedderConfig,
} from '../types.js';
import { isRetryableFailure, toEmbeddingError, withRetry } from '../retry.js';

/**
 * Remote embedder. Owns the retry/backoff policy for transient failures;
 * permanent failures surface on the first attempt.
 */
export class OpenAIEmbedder implements Embedder {
  readonly provider = 'openai' as const;
  private api: EmbeddingsApi;
  private config: OpenAIEmbedderConfig;

  constructor(config: OpenAIEmbedderConfig, api?: EmbeddingsApi) {
    this.config = {
      ...config,
      batchSize: config.batchSize ?? 100,
      timeoutMs: config.timeoutMs ?? 30000,
    };

    this.api = api ?? new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
      timeout: this.config.timeoutMs,
      // Retries are governed by our own policy below
      maxRetries: 0,
    }).embeddings;
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (!texts.length) {
      return [];
    }

    const batches = this.batchTexts(texts, this.config.batchSize || 100);
    const allEmbeddings: number[][] = [];

    for (const batch of batches) {
      allEmbeddings.push(...await this.embedBatch(batch, options));
    }

    return allEmbeddings;
  }

  getModel(): string {
    return this.config.model;
  }

  private async embedBatch(batch: string[], options: EmbedOptions): Promise<number[][]> {
    let attempts = 0;

    try {
      return await withRetry(async () => {
        attempts++;
        const response = await this.api.create({
          model: this.config.model,
          input: batch,
          ...(this.config.dimensions ? { dimensions: this.config.dimensions } : {}),
        });

        if (response.usage) {
          logger.debug({
            provider: this.provider,
            model: this.config.model,
            tokens: response.usage.total_tokens,
            texts: batch.length
          }, 'Generated embeddings');
        }

        return [...response.data]
          .sort((a, b) => a.index - b.index)
          .map(item => item.embedding);
      }, {
        ...this.config.retry,
        signal: options.signal,
        shouldRetry: isRetryableFailure,
        onRetry: ({ attempt, delayMs, error }) => {
          logger.warn({
            provider: this.provider,
            model: this.config.model,
            attempt,
            maxAttempts: this.config.retry.attempts,
            delayMs,
            error: error instanceof Error ? error.message : String(error)
          }, 'Embedding request failed, retrying with backoff');
        },
      });
    } catch (error) {
      const embeddingError = toEmbeddingError(error, this.provider, attempts);
      logger.error({
        provider: this.provider,
        kind: embeddingError.kind,
        attempts,
        textsCount: batch.length
      }, 'OpenAI embedding failed');
      throw embeddingError;
    }
  }

  private batchTexts(texts: string[], batchSize: number): string[][] {
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += batchSize) {
      batches.push(texts.slice(i, i + batchSize));
    }
    return batches;
  }
}
