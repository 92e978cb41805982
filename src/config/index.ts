import { z } from 'zod';
import { normalizeKeywords } from '../highlights/keywords';

export const DEFAULT_PRIORITY_KEYWORDS = [
  'breaking news',
  'breaking',
  'urgent',
  'exclusive',
  'alert',
  'update',
  'developing',
];

const optionalString = z.preprocess(
  value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional()
);

const booleanFlag = (defaultValue: boolean) =>
  z.preprocess(
    value => (typeof value === 'string' && value.trim() !== '' ? value.trim().toLowerCase() === 'true' : undefined),
    z.boolean().default(defaultValue)
  );

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DEBUG: booleanFlag(false),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HOST: z.string().min(1).default('0.0.0.0'),
  API_KEY: optionalString,
  FRONTEND_URL: optionalString,

  DATABASE_URL: optionalString,
  SOURCES_FILE: optionalString,

  OPENROUTER_API_KEY: optionalString,
  USE_LLM: booleanFlag(true),
  EMBEDDING_BACKEND: z.enum(['local', 'openrouter']).default('local'),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(384),

  SIMILARITY_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.85),
  CATEGORY_LIMIT: z.coerce.number().int().min(0).default(20),
  FREQUENCY_WEIGHT: z.coerce.number().min(0).default(1),
  PRIORITY_WEIGHT: z.coerce.number().min(0).default(2),
  PRIORITY_KEYWORDS: optionalString,
  LOOKBACK_HOURS: z.coerce.number().positive().default(48),
  SUMMARY_MAX_LENGTH: z.coerce.number().int().min(20).default(300),
  CHAT_TOP_K: z.coerce.number().int().positive().default(3),
  EMBEDDING_CONCURRENCY: z.coerce.number().int().positive().default(10),
  EXTRACTION_CRON: z.string().min(1).default('*/30 * * * *'),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  debug: boolean;
  port: number;
  host: string;
  apiKey?: string;
  frontendUrl?: string;
  databaseUrl?: string;
  sourcesFile?: string;
  useGeneration: boolean;
  embeddingBackend: 'local' | 'openrouter';
  embeddingDimensions: number;
  similarityThreshold: number;
  categoryLimit: number;
  frequencyWeight: number;
  priorityWeight: number;
  priorityKeywords: string[];
  lookbackHours: number;
  summaryMaxLength: number;
  chatTopK: number;
  embeddingConcurrency: number;
  /** null when scheduled extraction is switched off */
  extractionCron: string | null;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the application config from environment variables. Throws ConfigError
 * listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;

  const priorityKeywords = e.PRIORITY_KEYWORDS
    ? normalizeKeywords(e.PRIORITY_KEYWORDS.split(','))
    : normalizeKeywords(DEFAULT_PRIORITY_KEYWORDS);

  if (e.EMBEDDING_BACKEND === 'openrouter' && !e.OPENROUTER_API_KEY) {
    throw new ConfigError(['EMBEDDING_BACKEND: openrouter embeddings require OPENROUTER_API_KEY']);
  }

  const cron = e.EXTRACTION_CRON.trim();

  return {
    nodeEnv: e.NODE_ENV,
    debug: e.DEBUG,
    port: e.PORT,
    host: e.HOST,
    apiKey: e.API_KEY,
    frontendUrl: e.FRONTEND_URL,
    databaseUrl: e.DATABASE_URL,
    sourcesFile: e.SOURCES_FILE,
    useGeneration: e.USE_LLM && Boolean(e.OPENROUTER_API_KEY),
    embeddingBackend: e.EMBEDDING_BACKEND,
    embeddingDimensions: e.EMBEDDING_DIMENSIONS,
    similarityThreshold: e.SIMILARITY_THRESHOLD,
    categoryLimit: e.CATEGORY_LIMIT,
    frequencyWeight: e.FREQUENCY_WEIGHT,
    priorityWeight: e.PRIORITY_WEIGHT,
    priorityKeywords,
    lookbackHours: e.LOOKBACK_HOURS,
    summaryMaxLength: e.SUMMARY_MAX_LENGTH,
    chatTopK: e.CHAT_TOP_K,
    embeddingConcurrency: e.EMBEDDING_CONCURRENCY,
    extractionCron: cron.toLowerCase() === 'off' ? null : cron,
  };
}
