import { z } from 'zod';
import { ConfigurationError } from '../lib/errors';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const settingsSchema = z
  .object({
    MODEL: z.string().min(1).default('openai/gpt-4o-mini'),
    EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
    CHUNK_SIZE: positiveInt(1000),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
    TOP_K: positiveInt(4),
    MAX_ITERATIONS: positiveInt(6),
    MAX_PARSE_RETRIES: z.coerce.number().int().nonnegative().default(2),
    CALL_TIMEOUT_MS: positiveInt(60_000),
    INGEST_CONCURRENCY: positiveInt(4),
    MAX_TABLE_ROWS: positiveInt(20),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .refine((s) => s.CHUNK_OVERLAP < s.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  })
  .transform((s) => ({
    model: s.MODEL,
    embeddingModel: s.EMBEDDING_MODEL,
    chunkSize: s.CHUNK_SIZE,
    chunkOverlap: s.CHUNK_OVERLAP,
    topK: s.TOP_K,
    maxIterations: s.MAX_ITERATIONS,
    maxParseRetries: s.MAX_PARSE_RETRIES,
    callTimeoutMs: s.CALL_TIMEOUT_MS,
    ingestConcurrency: s.INGEST_CONCURRENCY,
    maxTableRows: s.MAX_TABLE_ROWS,
    logLevel: s.LOG_LEVEL,
  }));

export type Settings = z.output<typeof settingsSchema>;

/**
 * Reads settings from environment variables. Empty strings count as unset.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = settingsSchema.safeParse(defined);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`),
    );
  }
  return parsed.data;
}
