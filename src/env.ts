import { config } from 'dotenv';
import { z } from 'zod';

// Load .env file before validation
config();

/**
 * Schema for all environment variables consumed by the CLI.
 * Optional variables fall back to sensible defaults; malformed values
 * cause a hard failure at startup.
 */
const envSchema = z.object({
  // ---------- General ----------
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // ---------- Configuration ----------
  /** Directory holding `<event-type>.yaml` profiles */
  CONFIG_DIR: z.string().min(1).default('./configs'),

  // ---------- Database ----------
  DATABASE_PATH: z.string().min(1).default('./data/events.db'),

  // ---------- Search (Tavily) ----------
  /** Keyword search is skipped when unset */
  TAVILY_API_KEY: z.string().min(1).optional(),

  // ---------- HTTP ----------
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  EXPANSION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // ---------- Enrichment ----------
  ENRICHMENT_CONCURRENCY: z.coerce.number().int().min(1).max(10).default(3),
  ENRICHMENT_BATCH_SIZE: z.coerce.number().int().positive().default(10),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses an environment-like record. Exposed separately from `env` so
 * that tests can validate arbitrary inputs without touching process.env.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    throw new Error(`Invalid environment variables:\n${formatted}`);
  }

  return result.data;
}

/**
 * Typed, validated environment variables.
 * Importing this module will eagerly parse process.env and throw
 * at startup if any variable is malformed.
 */
export const env: Env = parseEnv(process.env);
