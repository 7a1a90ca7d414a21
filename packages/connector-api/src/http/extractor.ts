/**
 * Extractor
 *
 * Retrieves the raw record collection from the configured source,
 * retrying transient failures with a bounded number of attempts.
 */

import {
  FetchError,
  silentLogger,
  withRetries,
  type IExtractor,
  type RawRecord,
  type StageLogger,
} from '@geosync/core';
import { HttpSourceClient } from './client.js';
import { decodeRecords } from './payload.js';
import { withOverpassQuery } from '../overpass/index.js';

export type ExtractorBackoff = 'fixed' | 'linear';

export interface ExtractorConfig {
  /** Data source URL */
  url: string;
  /** Per-attempt timeout in milliseconds */
  timeoutMs: number;
  /** Total attempts including the first (default: 3) */
  maxAttempts?: number;
  /** Delay before the first retry (default: 1000ms) */
  retryDelayMs?: number;
  /** Upper bound for any single delay (default: 30000ms) */
  maxRetryDelayMs?: number;
  /** Delay growth between retries (default: linear) */
  backoff?: ExtractorBackoff;
  /** Overpass area name; when set the road query is added to the URL */
  overpassArea?: string;
}

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 1000;
export const DEFAULT_MAX_RETRY_DELAY_MS = 30_000;

export function isRetryableFetchError(err: unknown): boolean {
  return err instanceof FetchError && err.retryable;
}

export class Extractor implements IExtractor {
  readonly config: ExtractorConfig;
  private readonly client: HttpSourceClient;
  private readonly logger: StageLogger;

  constructor(config: ExtractorConfig, logger: StageLogger = silentLogger, client?: HttpSourceClient) {
    this.config = config;
    this.logger = logger;
    this.client = client ?? new HttpSourceClient({ timeoutMs: config.timeoutMs });
  }

  /** URL actually requested, including any Overpass query */
  get url(): string {
    return this.config.overpassArea
      ? withOverpassQuery(this.config.url, this.config.overpassArea)
      : this.config.url;
  }

  async extract(): Promise<RawRecord[]> {
    const url = this.url;
    const attempts = Math.max(1, this.config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);

    try {
      const payload = await withRetries(
        async ({ attempt }) => {
          this.logger.debug('Requesting data source', { url, attempt, attempts });
          return await this.client.get(url);
        },
        {
          attempts,
          baseDelayMs: this.config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
          maxDelayMs: this.config.maxRetryDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS,
          backoff: this.config.backoff ?? 'linear',
          jitter: 0,
        },
        isRetryableFetchError,
        {
          onRetry: (err, next) => {
            this.logger.warn('Data source request failed, retrying', {
              attempt: next.attempt,
              attempts,
              delayMs: next.delayMs ?? 0,
              error: err,
            });
          },
        }
      );

      const records = decodeRecords(payload);
      this.logger.info('Fetched records from data source', { count: records.length });
      return records;
    } catch (err) {
      // withRetries only gives up on a retryable error once every attempt is spent
      if (isRetryableFetchError(err)) {
        throw new FetchError({
          code: 'RETRIES_EXHAUSTED',
          message: `Data source request failed after ${attempts} attempt${attempts === 1 ? '' : 's'}`,
          retryable: false,
          status: err instanceof FetchError ? err.status : undefined,
          cause: err,
          suggestion: 'Check that the source is reachable, or raise FETCH_MAX_ATTEMPTS.',
          context: { attempts },
        });
      }
      throw err;
    }
  }
}

/**
 * Factory function to create an extractor
 */
export function createExtractor(config: ExtractorConfig, logger?: StageLogger): Extractor {
  return new Extractor(config, logger);
}
