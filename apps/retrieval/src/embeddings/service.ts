import { logger } from '../config/index.js';
import { Err, Ok, Result } from '../utils/result.js';
import {
  Embedder,
  EmbeddingBatch,
  EmbeddingError,
  EmbeddingErrorKind,
  EmbeddingServiceConfig,
  EmbeddingServiceStatus,
  EmbedOptions,
  RECOVERY_POLICY,
} from './types.js';
import { OpenAIEmbedder } from './providers/openai.js';
import { LocalEmbedder } from './providers/local.js';
import { toEmbeddingError } from './retry.js';

export interface EmbeddingServiceDeps {
  primary?: Embedder;
  fallback?: LocalEmbedder;
}

/**
 * Chooses between the remote primary and the local fallback by
 * configuration and failure, never per call.
 *
 * | primary outcome                  | fallback enabled | fallback disabled |
 * |----------------------------------|------------------|-------------------|
 * | not configured                   | local            | constructor throws|
 * | transient, retries exhausted     | local            | Err(primary)      |
 * | permanent (auth, bad request...) | Err(primary)     | Err(primary)      |
 */
export class EmbeddingService {
  private primaryEmbedder: Embedder | null;
  private fallbackEmbedder: LocalEmbedder;
  private config: EmbeddingServiceConfig;

  constructor(config: EmbeddingServiceConfig, deps: EmbeddingServiceDeps = {}) {
    this.config = config;

    this.primaryEmbedder = deps.primary
      ?? (config.openai ? new OpenAIEmbedder(config.openai) : null);
    this.fallbackEmbedder = deps.fallback ?? new LocalEmbedder(config.local);

    if (!this.primaryEmbedder && !config.fallbackEnabled) {
      throw new EmbeddingError(
        'No embedding API key configured and the local fallback is disabled',
        'not_configured',
        'openai',
        0
      );
    }

    logger.info({
      primary: this.primaryEmbedder?.getModel() ?? null,
      fallback: this.fallbackEmbedder.getModel(),
      fallbackEnabled: config.fallbackEnabled
    }, 'Embedding service configured');
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<Result<EmbeddingBatch, EmbeddingError>> {
    if (!texts.length) {
      const embedder = this.primaryEmbedder ?? this.fallbackEmbedder;
      return Ok({
        vectors: [],
        provider: embedder.provider,
        model: embedder.getModel(),
        dimensions: 0,
        degraded: embedder !== this.primaryEmbedder,
      });
    }

    if (!this.primaryEmbedder) {
      return this.embedWithFallback(texts, 'not_configured');
    }

    try {
      const vectors = await this.primaryEmbedder.embed(texts, options);
      return Ok(this.toBatch(vectors, this.primaryEmbedder, false));
    } catch (error) {
      const primaryError = toEmbeddingError(error, this.primaryEmbedder.provider, 1);

      if (!RECOVERY_POLICY[primaryError.kind].fallback) {
        logger.error({
          provider: primaryError.provider,
          kind: primaryError.kind,
          textsCount: texts.length
        }, 'Primary embedder failed permanently, not falling back');
        return Err(primaryError);
      }

      if (!this.config.fallbackEnabled) {
        logger.error({
          provider: primaryError.provider,
          kind: primaryError.kind,
          attempts: primaryError.attempts,
          textsCount: texts.length
        }, 'Primary embedder unavailable and fallback is disabled');
        return Err(primaryError);
      }

      return this.embedWithFallback(texts, primaryError.kind, primaryError);
    }
  }

  getStatus(): EmbeddingServiceStatus {
    return {
      primary: {
        provider: 'openai',
        model: this.primaryEmbedder?.getModel() ?? this.config.openai?.model ?? 'unconfigured',
        configured: this.primaryEmbedder !== null,
      },
      fallback: {
        provider: this.fallbackEmbedder.provider,
        model: this.fallbackEmbedder.getModel(),
        enabled: this.config.fallbackEnabled,
        initialized: this.fallbackEmbedder.isReady(),
        dimensions: this.fallbackEmbedder.getDimensions(),
      },
    };
  }

  private async embedWithFallback(
    texts: string[],
    reason: EmbeddingErrorKind,
    primaryError?: EmbeddingError
  ): Promise<Result<EmbeddingBatch, EmbeddingError>> {
    logger.warn({
      provider: this.fallbackEmbedder.provider,
      model: this.fallbackEmbedder.getModel(),
      reason,
      textsCount: texts.length
    }, 'Using fallback embedder');

    try {
      const vectors = await this.fallbackEmbedder.embed(texts);
      return Ok({ ...this.toBatch(vectors, this.fallbackEmbedder, true), fallbackReason: reason });
    } catch (error) {
      const fallbackError = toEmbeddingError(error, this.fallbackEmbedder.provider, 1);
      logger.error({
        provider: fallbackError.provider,
        kind: fallbackError.kind,
        reason,
        primaryAttempts: primaryError?.attempts,
        textsCount: texts.length
      }, 'Fallback embedder failed');
      return Err(fallbackError);
    }
  }

  private toBatch(vectors: number[][], embedder: Embedder, degraded: boolean): EmbeddingBatch {
    return {
      vectors,
      provider: embedder.provider,
      model: embedder.getModel(),
      dimensions: vectors[0]?.length ?? 0,
      degraded,
    };
  }
}
