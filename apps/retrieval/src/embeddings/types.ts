/**
 * Core embedding system interfaces and types
 */

export type EmbedderProvider = 'openai' | 'local';

export interface EmbedOptions {
  /** Aborting stops the retry loop before its next attempt */
  signal?: AbortSignal;
}

export interface Embedder {
  readonly provider: EmbedderProvider;

  /**
   * Generate embeddings for multiple texts, one vector per text in input order
   */
  embed(texts: string[], options?: EmbedOptions): Promise<number[][]>;

  /**
   * Get the model name
   */
  getModel(): string;
}

/**
 * Subset of the OpenAI embeddings resource the embedders depend on.
 * `new OpenAI(...).embeddings` satisfies it, so do in-process fakes.
 */
export interface EmbeddingsApi {
  create(params: {
    model: string;
    input: string[];
    dimensions?: number;
  }): Promise<{
    data: Array<{ embedding: number[]; index: number }>;
    usage?: { total_tokens: number };
  }>;
}

export interface EmbedderConfig {
  model: string;
  dimensions?: number;
  batchSize?: number;
}

export interface OpenAIEmbedderConfig extends EmbedderConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  retry: RetryPolicy;
}

export interface LocalEmbedderConfig extends EmbedderConfig {
  baseUrl: string;
  timeoutMs?: number;
}

export interface RetryPolicy {
  /** Total attempts including the first one */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface EmbeddingServiceConfig {
  openai?: OpenAIEmbedderConfig;
  local: LocalEmbedderConfig;
  fallbackEnabled: boolean;
}

/**
 * Successful embedding call, tagged with the backend that produced it.
 * `degraded` is true whenever the fallback model answered.
 */
export interface EmbeddingBatch {
  vectors: number[][];
  provider: EmbedderProvider;
  model: string;
  dimensions: number;
  degraded: boolean;
  fallbackReason?: EmbeddingErrorKind;
}

export type EmbeddingErrorKind =
  | 'rate_limited'
  | 'unavailable'
  | 'not_configured'
  | 'auth'
  | 'invalid_request'
  | 'aborted'
  | 'unknown';

export interface RecoveryAction {
  retry: boolean;
  fallback: boolean;
}

export const RECOVERY_POLICY: Record<EmbeddingErrorKind, RecoveryAction> = {
  rate_limited: { retry: true, fallback: true },
  unavailable: { retry: true, fallback: true },
  not_configured: { retry: false, fallback: true },
  auth: { retry: false, fallback: false },
  invalid_request: { retry: false, fallback: false },
  aborted: { retry: false, fallback: false },
  unknown: { retry: false, fallback: false },
};

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly kind: EmbeddingErrorKind,
    public readonly provider: EmbedderProvider,
    public readonly attempts: number = 1,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'EmbeddingError';
  }
}

export interface EmbeddingServiceStatus {
  primary: { provider: EmbedderProvider; model: string; configured: boolean };
  fallback: {
    provider: EmbedderProvider;
    model: string;
    enabled: boolean;
    initialized: boolean;
    dimensions: number | null;
  };
}
