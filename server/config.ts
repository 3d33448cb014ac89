import { z } from 'zod';
import { SUPPORTED_LANGUAGES, type Language } from '@shared/schema';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_URL: optionalString,
  JINA_API_KEY: optionalString,
  EMBEDDING_MODEL: z.string().min(1).default('jina-clip-v1'),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SUBJECT_CROP_URL: optionalString.pipe(z.string().url().optional()),
  GEOCODER_BASE_URL: z.string().url().default('https://nominatim.openstreetmap.org'),
  GEOCODER_USER_AGENT: z.string().min(1).default('pebble-trail/1.0'),
  GEOCODER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  IMAGE_MATCH_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.82),
  TEXT_MATCH_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.25),
  TEXT_SEARCH_LIMIT: z.coerce.number().int().positive().default(5),
  MATCH_CANDIDATE_POOL: z.coerce.number().int().positive().default(5),
  SESSION_TTL_MINUTES: z.coerce.number().positive().default(30),
  SESSION_SWEEP_SECONDS: z.coerce.number().positive().default(60),
  DEFAULT_LANGUAGE: z.enum(SUPPORTED_LANGUAGES).default('pl'),
});

export interface AppConfig {
  port: number;
  env: 'development' | 'production' | 'test';
  databaseUrl?: string;
  embedding: {
    apiKey?: string;
    model: string;
    timeoutMs: number;
  };
  subjectCropUrl?: string;
  geocoder: {
    baseUrl: string;
    userAgent: string;
    timeoutMs: number;
  };
  matching: {
    imageMatchThreshold: number;
    textMatchThreshold: number;
    textResultLimit: number;
    candidatePoolSize: number;
  };
  sessions: {
    ttlMs: number;
    sweepIntervalMs: number;
  };
  defaultLanguage: Language;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    env: vars.NODE_ENV,
    databaseUrl: vars.DATABASE_URL,
    embedding: {
      apiKey: vars.JINA_API_KEY,
      model: vars.EMBEDDING_MODEL,
      timeoutMs: vars.EMBEDDING_TIMEOUT_MS,
    },
    subjectCropUrl: vars.SUBJECT_CROP_URL,
    geocoder: {
      baseUrl: vars.GEOCODER_BASE_URL.replace(/\/+$/, ''),
      userAgent: vars.GEOCODER_USER_AGENT,
      timeoutMs: vars.GEOCODER_TIMEOUT_MS,
    },
    matching: {
      imageMatchThreshold: vars.IMAGE_MATCH_THRESHOLD,
      textMatchThreshold: vars.TEXT_MATCH_THRESHOLD,
      textResultLimit: vars.TEXT_SEARCH_LIMIT,
      candidatePoolSize: vars.MATCH_CANDIDATE_POOL,
    },
    sessions: {
      ttlMs: vars.SESSION_TTL_MINUTES * 60 * 1000,
      sweepIntervalMs: vars.SESSION_SWEEP_SECONDS * 1000,
    },
    defaultLanguage: vars.DEFAULT_LANGUAGE,
  };
}
