import { z } from 'zod';
import pino from 'pino';
import 'dotenv/config';

const booleanFromEnv = z.preprocess((value) => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
  }
  return value;
}, z.boolean());

const emptyAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

// ─── Environment Schema ───────────────────────────────────────────────
const envSchema = z.object({
  // Elasticsearch (omit to run against the in-memory transport)
  ELASTICSEARCH_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  SEARCH_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SEARCH_MAX_RETRIES: z.coerce.number().int().min(0).default(3),

  // Index layout
  SEARCH_INDEX: z.string().min(1).default('searchable'),
  SEARCH_PER_TYPE_INDEX: booleanFromEnv.default(true),

  // Relevance floor applied to every search
  SEARCH_MIN_SCORE: z.coerce.number().min(0).default(50),

  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

export type Config = z.infer<typeof envSchema>;

// ─── Parse & Validate ─────────────────────────────────────────────────
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error('Invalid environment configuration');
  }
  return parsed.data;
}

export const config = loadConfig();

// ─── Structured Logger Factory ───────────────────────────────────────
export function createLogger(name: string) {
  const isProduction = config.NODE_ENV === 'production';
  return pino({
    name,
    level: config.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
    ...(!isProduction && {
      transport: { target: 'pino/file', options: { destination: 1 } },
      formatters: { level: (label: string) => ({ level: label }) },
    }),
  });
}
