import { describe, it, expect } from 'vitest';
import { AuthenticationError, InternalServerError, RateLimitError } from 'openai';
import { EmbeddingService } from '../service.js';
import { OpenAIEmbedder } from '../providers/openai.js';
import { LocalEmbedder } from '../providers/local.js';
import { EmbeddingError, type EmbeddingServiceConfig } from '../types.js';
import { FakeEmbeddingsApi } from '../../test/fake-embeddings.js';

const local = { model: 'nomic-embed-text', baseUrl: 'http://localhost:11434/v1' };
const openai = {
  apiKey: 'test-secret',
  model: 'text-embedding-3-small',
  retry: { attempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
};

function createService(options: {
  primaryFailure?: () => unknown;
  fallbackFailure?: () => unknown;
  fallbackEnabled?: boolean;
  withPrimary?: boolean;
} = {}) {
  const primaryApi = new FakeEmbeddingsApi({ dimensions: 8, fail: options.primaryFailure });
  const fallbackApi = new FakeEmbeddingsApi({ dimensions: 4, fail: options.fallbackFailure });
  const config: EmbeddingServiceConfig = {
    openai: options.withPrimary === false ? undefined : openai,
    local,
    fallbackEnabled: options.fallbackEnabled ?? true,
  };

  const service = new EmbeddingService(config, {
    primary: config.openai ? new OpenAIEmbedder(config.openai, primaryApi) : undefined,
    fallback: new LocalEmbedder(local, fallbackApi),
  });

  return { service, primaryApi, fallbackApi };
}

describe('EmbeddingService', () => {
  it('should use the primary embedder when it answers', async () => {
    const { service, fallbackApi } = createService();

    const result = await service.embed(['negligence per se']);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toMatchObject({ provider: 'openai', model: 'text-embedding-3-small', dimensions: 8, degraded: false });
      expect(result.value.fallbackReason).toBeUndefined();
    }
    expect(fallbackApi.calls).toHaveLength(0);
  });

  it('should return an empty batch without calling any provider', async () => {
    const { service, primaryApi, fallbackApi } = createService();

    const result = await service.embed([]);

    expect(result).toEqual({
      ok: true,
      value: { vectors: [], provider: 'openai', model: 'text-embedding-3-small', dimensions: 0, degraded: false },
    });
    expect(primaryApi.calls).toHaveLength(0);
    expect(fallbackApi.calls).toHaveLength(0);
  });

  it('should fall back after the primary exhausts its retries', async () => {
    const { service, primaryApi } = createService({
      primaryFailure: () => new RateLimitError(429, undefined, 'Slow down', undefined),
    });

    const result = await service.embed(['negligence per se']);

    expect(primaryApi.calls).toHaveLength(2);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toMatchObject({
        provider: 'local',
        model: 'nomic-embed-text',
        dimensions: 4,
        degraded: true,
        fallbackReason: 'rate_limited',
      });
    }
  });

  it('should fall back when no API key is configured', async () => {
    const { service } = createService({ withPrimary: false });

    const result = await service.embed(['negligence per se']);

    expect(result.ok && result.value.fallbackReason).toBe('not_configured');
  });

  it('should not fall back on a credential error', async () => {
    const { service, fallbackApi } = createService({
      primaryFailure: () => new AuthenticationError(401, undefined, 'Invalid key', undefined),
    });

    const result = await service.embed(['negligence per se']);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ kind: 'auth', provider: 'openai', attempts: 1 });
    }
    expect(fallbackApi.calls).toHaveLength(0);
  });

  it('should return the primary error when the fallback is disabled', async () => {
    const { service, fallbackApi } = createService({
      fallbackEnabled: false,
      primaryFailure: () => new InternalServerError(503, undefined, 'Overloaded', undefined),
    });

    const result = await service.embed(['negligence per se']);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ kind: 'unavailable', provider: 'openai', attempts: 2 });
    }
    expect(fallbackApi.calls).toHaveLength(0);
  });

  it('should return the fallback error when both backends fail', async () => {
    const { service } = createService({
      primaryFailure: () => new RateLimitError(429, undefined, 'Slow down', undefined),
      fallbackFailure: () => new Error('connection refused'),
    });

    const result = await service.embed(['negligence per se']);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.provider).toBe('local');
    }
  });

  it('should refuse to start without a key or a fallback', () => {
    expect(() => new EmbeddingService({ local, fallbackEnabled: false })).toThrow(EmbeddingError);
  });

  it('should report status without calling any provider', async () => {
    const { service, primaryApi, fallbackApi } = createService();

    expect(service.getStatus()).toEqual({
      primary: { provider: 'openai', model: 'text-embedding-3-small', configured: true },
      fallback: {
        provider: 'local',
        model: 'nomic-embed-text',
        enabled: true,
        initialized: false,
        dimensions: null,
      },
    });
    expect(primaryApi.calls).toHaveLength(0);
    expect(fallbackApi.calls).toHaveLength(0);
  });
});
