import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  OPENAI_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().optional(),
  EMBEDDING_BASE_URL: z.string().url().optional(),
  EMBEDDING_FALLBACK_ENABLED: booleanFlag.default('true'),
  LOCAL_EMBEDDING_MODEL: z.string().min(1).default('nomic-embed-text'),
  LOCAL_EMBEDDING_BASE_URL: z.string().url().default('http://localhost:11434/v1'),
  EMBEDDING_RETRY_ATTEMPTS: z.coerce.number().int().min(1).default(6),
  EMBEDDING_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  EMBEDDING_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  VECTOR_STORE_PATH: z.string().min(1).default('./data/legal-index.db'),
  VECTOR_STORE_COLLECTION: z.string().min(1).default('legal_documents'),
});

export type ServerEnv = z.infer<typeof envSchema>;

// Lazy-loaded environment configuration - doesn't throw at import time
let cachedEnv: ServerEnv | null = null;

export function loadServerEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  // Treat empty strings as unset so `OPENAI_API_KEY=` means "no key"
  const rawEnv = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(rawEnv);
  if (!parsed.success) {
    throw new Error('Missing/invalid retrieval env: ' + JSON.stringify(parsed.error.format()));
  }

  cachedEnv = parsed.data;
  return cachedEnv;
}

export function resetServerEnv(): void {
  cachedEnv = null;
}
