/**
 * HTTP Source Client
 *
 * Performs a single GET against the data source and classifies every
 * failure as a FetchError, marking which ones are worth retrying.
 */

import { FetchError } from '@geosync/core';

export interface HttpSourceClientConfig {
  /** Request timeout in milliseconds, covering headers and body */
  timeoutMs: number;
}

/** Longest response snippet kept in an error message */
const MAX_ERROR_BODY_CHARS = 200;

function errorName(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'name' in err && typeof err.name === 'string') {
    return err.name;
  }
  return undefined;
}

/** Node's fetch reports socket errors as TypeError('fetch failed') with the system error as cause */
function systemErrorCode(err: unknown): string | undefined {
  const cause = err instanceof Error ? err.cause : undefined;
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

export class HttpSourceClient {
  private config: HttpSourceClientConfig;

  constructor(config: HttpSourceClientConfig) {
    this.config = config;
  }

  /**
   * Fetch a URL and decode its JSON body
   */
  async get(url: string): Promise<unknown> {
    const timeoutMs = this.config.timeoutMs;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method: 'GET',
          headers: { Accept: 'application/json' },
          signal: controller.signal,
        });
      } catch (err) {
        throw this.networkError(err, timeoutMs);
      }

      if (!response.ok) {
        throw await this.statusError(response);
      }

      let body: string;
      try {
        body = await response.text();
      } catch (err) {
        throw this.networkError(err, timeoutMs);
      }

      return this.parseBody(body);
    } finally {
      clearTimeout(timeout);
    }
  }

  private networkError(err: unknown, timeoutMs: number): FetchError {
    const name = errorName(err);
    if (name === 'AbortError' || name === 'TimeoutError') {
      return new FetchError({
        code: 'TIMEOUT',
        message: `Request timed out after ${timeoutMs}ms`,
        retryable: true,
        suggestion: 'Increase REQUEST_TIMEOUT_MS or check the source availability.',
        cause: err,
      });
    }

    const code = systemErrorCode(err);
    const detail = err instanceof Error ? err.message : String(err);
    return new FetchError({
      code: 'CONNECTION_FAILED',
      message: `Failed to reach data source: ${code ? `${detail} (${code})` : detail}`,
      retryable: true,
      suggestion: 'Check SOURCE_URL and network connectivity.',
      cause: err,
      context: code ? { systemCode: code } : undefined,
    });
  }

  private async statusError(response: Response): Promise<FetchError> {
    const status = response.status;
    const text = await response.text().catch(() => '');
    const snippet = text.trim().slice(0, MAX_ERROR_BODY_CHARS);
    const message = `HTTP ${status}${snippet ? `: ${snippet}` : ''}`;

    if (status === 429) {
      return new FetchError({
        code: 'RATE_LIMITED',
        message: `Data source rate limit exceeded (${message})`,
        status,
        retryable: true,
        suggestion: 'Wait and retry, or lower the sync frequency.',
      });
    }

    if (status >= 500) {
      return new FetchError({
        code: 'HTTP_ERROR',
        message: `Data source server error (${message})`,
        status,
        retryable: true,
      });
    }

    return new FetchError({
      code: 'HTTP_ERROR',
      message: `Data source rejected the request (${message})`,
      status,
      retryable: false,
      suggestion: 'Check SOURCE_URL and the query it carries.',
    });
  }

  private parseBody(body: string): unknown {
    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch (err) {
      throw new FetchError({
        code: 'MALFORMED_RESPONSE',
        message: `Response body is not valid JSON: ${body.trim().slice(0, MAX_ERROR_BODY_CHARS) || '(empty)'}`,
        retryable: false,
        cause: err,
      });
    }
  }
}
