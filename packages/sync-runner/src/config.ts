/**
 * Environment configuration
 *
 * Read once at startup and turned into a SyncConfig that is handed to
 * each component. Nothing below the runner reads process.env.
 */

import { z } from 'zod';
import { ConfigError } from '@geosync/core';
import type { ExtractorConfig } from '@geosync/connector-api';
import type { PostgresLoaderConfig } from '@geosync/connector-db';
import { DATASET_NAMES, type DatasetName } from '@geosync/pipeline-core';
import type { LogFormat, LogLevel } from './logger.js';

export interface SyncConfig {
  dataset: DatasetName;
  source: ExtractorConfig;
  database: PostgresLoaderConfig;
  logging: { level: LogLevel; format: LogFormat };
}

const REQUIRED = 'is required';

function requiredString() {
  return z.string({ required_error: REQUIRED });
}

function requiredInt(min: number, max: number) {
  return requiredString().pipe(z.coerce.number().int().min(min).max(max));
}

function optionalInt(min: number, max: number, fallback: number) {
  return z.coerce.number().int().min(min).max(max).default(fallback);
}

export const envSchema = z.object({
  SOURCE_URL: requiredString()
    .url('must be an http(s) URL')
    .refine((value) => /^https?:\/\//i.test(value), 'must be an http(s) URL'),
  REQUEST_TIMEOUT_MS: requiredInt(1, 300_000),
  DB_HOST: requiredString(),
  DB_PORT: requiredInt(1, 65_535),
  DB_NAME: requiredString(),
  DB_USER: requiredString(),
  DB_PASSWORD: requiredString(),

  DATASET: z.enum(DATASET_NAMES).default('points'),
  CITY_NAME: z.string().optional(),
  FETCH_MAX_ATTEMPTS: optionalInt(1, 10, 3),
  FETCH_RETRY_DELAY_MS: optionalInt(0, 300_000, 1000),
  FETCH_BACKOFF: z.enum(['fixed', 'linear']).default('linear'),
  LOAD_BATCH_SIZE: optionalInt(1, 10_000, 500),
  DB_SSL: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT: z.enum(['text', 'json']).default('text'),
});

export type SyncEnv = z.infer<typeof envSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid environment configuration:\n${issues}`;
}

/**
 * Blank values count as unset, so `DB_SSL=` in a .env file takes the default
 */
function presentValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]?.trim();
    if (value) out[key] = value;
  }
  return out;
}

export function toSyncConfig(env: SyncEnv): SyncConfig {
  return {
    dataset: env.DATASET,
    source: {
      url: env.SOURCE_URL,
      timeoutMs: env.REQUEST_TIMEOUT_MS,
      maxAttempts: env.FETCH_MAX_ATTEMPTS,
      retryDelayMs: env.FETCH_RETRY_DELAY_MS,
      backoff: env.FETCH_BACKOFF,
      overpassArea: env.CITY_NAME,
    },
    database: {
      host: env.DB_HOST,
      port: env.DB_PORT,
      database: env.DB_NAME,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      ssl: env.DB_SSL,
      batchSize: env.LOAD_BATCH_SIZE,
    },
    logging: { level: env.LOG_LEVEL, format: env.LOG_FORMAT },
  };
}

/**
 * Validate the environment and build the run configuration
 * @throws ConfigError listing every missing or invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const parsed = envSchema.safeParse(presentValues(env));
  if (!parsed.success) {
    throw new ConfigError({
      message: formatZodError(parsed.error),
      suggestion: 'Set the listed variables in the environment or the .env file (see .env.example).',
      context: { variables: [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))] },
    });
  }
  return toSyncConfig(parsed.data);
}
