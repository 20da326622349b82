import { loadServerEnv } from './env.js';
import { logger } from '../utils/logger.js';
import type { VectorStoreConfig } from '../store/types.js';

export interface Config {
  vectorStore: VectorStoreConfig;
  nodeEnv: 'development' | 'production' | 'test';
}

export const DEFAULT_RETRY_MAX_DELAY_MS = 30_000;

// Lazy-loaded configuration - doesn't evaluate env at import time
let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = loadServerEnv();

  cachedConfig = {
    vectorStore: {
      embeddingApiKey: env.OPENAI_API_KEY,
      embeddingModel: env.EMBEDDING_MODEL,
      embeddingDimensions: env.EMBEDDING_DIMENSIONS,
      embeddingBaseUrl: env.EMBEDDING_BASE_URL,
      fallbackEnabled: env.EMBEDDING_FALLBACK_ENABLED,
      localModelName: env.LOCAL_EMBEDDING_MODEL,
      localBaseUrl: env.LOCAL_EMBEDDING_BASE_URL,
      persistPath: env.VECTOR_STORE_PATH,
      collectionName: env.VECTOR_STORE_COLLECTION,
      retryAttempts: env.EMBEDDING_RETRY_ATTEMPTS,
      retryBaseDelayMs: env.EMBEDDING_RETRY_BASE_DELAY_MS,
      retryMaxDelayMs: DEFAULT_RETRY_MAX_DELAY_MS,
      requestTimeoutMs: env.EMBEDDING_REQUEST_TIMEOUT_MS,
    },
    nodeEnv: env.NODE_ENV,
  };

  // Log configuration on startup
  logger.info({
    embeddingModel: cachedConfig.vectorStore.embeddingModel,
    fallbackEnabled: cachedConfig.vectorStore.fallbackEnabled,
    localModelName: cachedConfig.vectorStore.localModelName,
    persistPath: cachedConfig.vectorStore.persistPath,
    collectionName: cachedConfig.vectorStore.collectionName,
    retryAttempts: cachedConfig.vectorStore.retryAttempts,
    nodeEnv: cachedConfig.nodeEnv,
    hasEmbeddingKey: !!cachedConfig.vectorStore.embeddingApiKey,
  }, 'Configuration loaded');

  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}

export { logger } from '../utils/logger.js';
