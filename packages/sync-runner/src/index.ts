/**
 * @geosync/sync-runner
 *
 * Environment configuration, logging and the one-shot sync runner
 */

export { loadConfig, toSyncConfig, formatZodError, envSchema } from './config.js';
export type { SyncConfig, SyncEnv } from './config.js';
export { Logger, redactSecrets } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
export { runSync, createPipeline } from './run.js';
export type { RunIO } from './run.js';
