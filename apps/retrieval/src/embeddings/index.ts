/**
 * Embedding subsystem - remote primary provider with a local fallback
 *
 * The service decides which backend answers; callers read `degraded` and
 * `provider` on each batch to know which one did.
 */

// Core interfaces and types
export * from './types.js';

// Embedding providers
export { OpenAIEmbedder } from './providers/openai.js';
export { LocalEmbedder } from './providers/local.js';

// Main service with fallback logic
export { EmbeddingService, type EmbeddingServiceDeps } from './service.js';

// Retry policy and failure classification
export { withRetry, backoffDelay, classifyEmbeddingFailure, isRetryableFailure } from './retry.js';
