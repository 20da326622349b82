/**
 * Exponential backoff and provider failure classification.
 *
 * Retry state lives in the call frame only, so independent requests can
 * run the loop concurrently.
 */

import {
  APIConnectionError,
  APIError,
  APIUserAbortError,
} from 'openai';
import {
  EmbedderProvider,
  EmbeddingError,
  EmbeddingErrorKind,
  RECOVERY_POLICY,
  RetryPolicy,
} from './types.js';

export interface RetryAttemptInfo {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions extends RetryPolicy {
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
  signal?: AbortSignal;
}

/**
 * Map any provider failure onto the embedding error taxonomy
 */
export function classifyEmbeddingFailure(error: unknown): EmbeddingErrorKind {
  if (error instanceof EmbeddingError) {
    return error.kind;
  }

  // Abort and connection errors extend APIError without a status
  if (error instanceof APIUserAbortError) {
    return 'aborted';
  }
  if (error instanceof APIConnectionError) {
    return 'unavailable';
  }

  if (error instanceof APIError) {
    const status = error.status;
    if (status === 429) return 'rate_limited';
    if (status === 401 || status === 403) return 'auth';
    if (status === 400 || status === 404 || status === 422) return 'invalid_request';
    if (status === 408 || status === 409 || (status !== undefined && status >= 500)) {
      return 'unavailable';
    }
    return 'unknown';
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return 'aborted';
  }

  return 'unknown';
}

export function isRetryableFailure(error: unknown): boolean {
  return RECOVERY_POLICY[classifyEmbeddingFailure(error)].retry;
}

/**
 * Delay before retry number `attempt` (1-based): base, 2x base, 4x base...
 */
export function backoffDelay(attempt: number, policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const maxAttempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      throw abortError(options.signal);
    }

    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts || !options.shouldRetry(error)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, options);
      options.onRetry?.({ attempt, delayMs, error });
      await delay(delayMs);
    }
  }

  throw lastError;
}

/**
 * Wrap a raw failure as an EmbeddingError, keeping an existing one intact
 */
export function toEmbeddingError(
  error: unknown,
  provider: EmbedderProvider,
  attempts: number
): EmbeddingError {
  if (error instanceof EmbeddingError) {
    return error;
  }

  const kind = classifyEmbeddingFailure(error);
  const detail = error instanceof Error ? error.message : 'Unknown error';
  return new EmbeddingError(
    `${provider} embedding failed (${kind}) after ${attempts} attempt(s): ${detail}`,
    kind,
    provider,
    attempts,
    error
  );
}

function abortError(signal: AbortSignal): Error {
  const error = new Error('Embedding request aborted', { cause: signal.reason });
  error.name = 'AbortError';
  return error;
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
