import OpenAI from 'openai';
import { logger } from '../../config/index.js';
import {
  Embedder,
  EmbeddingsApi,
  LocalEmbedderConfig,
} from '../types.js';
import { toEmbeddingError } from '../retry.js';

/**
 * Fallback embedder backed by a locally served model (Ollama or any other
 * OpenAI-compatible local endpoint). The model is loaded by a warm-up call
 * on first use; that cost is paid once per process.
 */
export class LocalEmbedder implements Embedder {
  readonly provider = 'local' as const;
  private config: LocalEmbedderConfig;
  private api: EmbeddingsApi;
  private isInitialized = false;
  private initializationPromise: Promise<void> | null = null;
  private dimensions: number | null = null;

  constructor(config: LocalEmbedderConfig, api?: EmbeddingsApi) {
    this.config = {
      ...config,
      batchSize: config.batchSize ?? 32,
      timeoutMs: config.timeoutMs ?? 60000,
    };

    this.api = api ?? new OpenAI({
      // Local servers ignore the key but the client requires one
      apiKey: 'local',
      baseURL: this.config.baseUrl,
      timeout: this.config.timeoutMs,
      maxRetries: 0,
    }).embeddings;
  }

  private async initialize(): Promise<void> {
    if (this.isInitialized) {
      return;
    }

    if (!this.initializationPromise) {
      this.initializationPromise = this._initialize().catch((error: unknown) => {
        // Let the next caller try again instead of caching the failure
        this.initializationPromise = null;
        throw error;
      });
    }

    return this.initializationPromise;
  }

  private async _initialize(): Promise<void> {
    try {
      logger.info({ model: this.config.model, baseUrl: this.config.baseUrl }, 'Initializing local embedder');

      const warmup = await this.api.create({ model: this.config.model, input: ['warmup'] });
      this.dimensions = warmup.data[0]?.embedding.length ?? null;

      this.isInitialized = true;
      logger.info({ model: this.config.model, dimensions: this.dimensions }, 'Local embedder initialized');
    } catch (error) {
      logger.error({
        error: error instanceof Error ? error.message : String(error),
        model: this.config.model
      }, 'Failed to initialize local embedder');
      throw toEmbeddingError(error, this.provider, 1);
    }
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (!texts.length) {
      return [];
    }

    await this.initialize();

    try {
      // Process in batches to manage memory usage on the local server
      const batches = this.batchTexts(texts, this.config.batchSize || 32);
      const allEmbeddings: number[][] = [];

      for (const batch of batches) {
        logger.debug({
          model: this.config.model,
          batchSize: batch.length,
          totalBatches: batches.length
        }, 'Processing local embedding batch');

        const response = await this.api.create({ model: this.config.model, input: batch });
        allEmbeddings.push(...[...response.data]
          .sort((a, b) => a.index - b.index)
          .map(item => item.embedding));
      }

      return allEmbeddings;
    } catch (error) {
      logger.error({
        error: error instanceof Error ? error.message : String(error),
        textsCount: texts.length
      }, 'Local embedding failed');
      throw toEmbeddingError(error, this.provider, 1);
    }
  }

  getModel(): string {
    return this.config.model;
  }

  /**
   * Vector width reported by the warm-up call, null before initialization
   */
  getDimensions(): number | null {
    return this.dimensions;
  }

  isReady(): boolean {
    return this.isInitialized;
  }

  private batchTexts(texts: string[], batchSize: number): string[][] {
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += batchSize) {
      batches.push(texts.slice(i, i + batchSize));
    }
    return batches;
  }
}
