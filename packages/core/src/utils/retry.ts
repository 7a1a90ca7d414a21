export type BackoffStrategy = 'fixed' | 'linear';

export type RetryConfig = {
  /** Total attempts including the first (default: 1, i.e. no retries). */
  attempts?: number;
  /** Delay before the first retry (default: 200ms). */
  baseDelayMs?: number;
  /** Max backoff delay (default: 5000ms). */
  maxDelayMs?: number;
  /** How the delay grows between retries (default: linear). */
  backoff?: BackoffStrategy;
  /** Random jitter factor between 0 and 1 (default: 0.2). */
  jitter?: number;
};

export type RetryContext = {
  attempt: number;
  attempts: number;
  delayMs?: number;
};

export type RetryHooks = {
  /** Called before each retry with the error that triggered it */
  onRetry?: (err: unknown, next: RetryContext) => void;
};

function clampNumber(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function rawDelayMs(cfg: Required<RetryConfig>, retry: number): number {
  switch (cfg.backoff) {
    case 'fixed':
      return cfg.baseDelayMs;
    case 'linear':
      return cfg.baseDelayMs * retry;
    default: {
      const exhaustive: never = cfg.backoff;
      throw new Error(`Unsupported backoff strategy: ${String(exhaustive)}`);
    }
  }
}

export function computeBackoffDelayMs(cfg: Required<RetryConfig>, attempt: number): number {
  if (attempt <= 1) return 0;
  const capped = Math.min(cfg.maxDelayMs, rawDelayMs(cfg, attempt - 1));
  const jitterFactor = 1 + (Math.random() * 2 - 1) * cfg.jitter; // +/- jitter
  return Math.max(0, Math.round(capped * jitterFactor));
}

export async function sleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export function resolveRetryConfig(cfg: RetryConfig | undefined): Required<RetryConfig> {
  return {
    attempts: Math.max(1, cfg?.attempts ?? 1),
    baseDelayMs: Math.max(0, cfg?.baseDelayMs ?? 200),
    maxDelayMs: Math.max(0, cfg?.maxDelayMs ?? 5000),
    backoff: cfg?.backoff ?? 'linear',
    jitter: clampNumber(cfg?.jitter ?? 0.2, 0, 1),
  };
}

export async function withRetries<T>(
  fn: (ctx: RetryContext) => Promise<T>,
  cfg: RetryConfig | undefined,
  isRetryable: (err: unknown) => boolean,
  hooks?: RetryHooks
): Promise<T> {
  const config = resolveRetryConfig(cfg);
  const attempts = config.attempts;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    const delayMs = computeBackoffDelayMs(config, attempt);
    const ctx: RetryContext = { attempt, attempts, delayMs: delayMs > 0 ? delayMs : undefined };

    if (attempt > 1) {
      hooks?.onRetry?.(lastError, ctx);
    }
    if (delayMs > 0) {
      await sleep(delayMs);
    }

    try {
      return await fn(ctx);
    } catch (err) {
      lastError = err;
      if (attempt >= attempts || !isRetryable(err)) {
        throw err;
      }
    }
  }

  // Should be unreachable.
  throw lastError;
}
