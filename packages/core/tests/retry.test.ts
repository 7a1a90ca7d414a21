import { describe, expect, it, vi } from 'vitest';
import {
  computeBackoffDelayMs,
  resolveRetryConfig,
  withRetries,
  type RetryContext,
} from '../src/utils/retry.js';

describe('computeBackoffDelayMs', () => {
  const base = { attempts: 5, baseDelayMs: 100, maxDelayMs: 250, jitter: 0 } as const;

  it('never waits before the first attempt', () => {
    expect(computeBackoffDelayMs({ ...base, backoff: 'linear' }, 1)).toBe(0);
  });

  it('keeps a fixed delay between attempts', () => {
    const cfg = { ...base, backoff: 'fixed' as const };
    expect([2, 3, 4].map((a) => computeBackoffDelayMs(cfg, a))).toEqual([100, 100, 100]);
  });

  it('grows linearly and caps at maxDelayMs', () => {
    const cfg = { ...base, backoff: 'linear' as const };
    expect([2, 3, 4].map((a) => computeBackoffDelayMs(cfg, a))).toEqual([100, 200, 250]);
  });
});

describe('resolveRetryConfig', () => {
  it('defaults to a single attempt', () => {
    expect(resolveRetryConfig(undefined)).toEqual({
      attempts: 1,
      baseDelayMs: 200,
      maxDelayMs: 5000,
      backoff: 'linear',
      jitter: 0.2,
    });
  });

  it('clamps attempts and jitter', () => {
    const cfg = resolveRetryConfig({ attempts: 0, jitter: 3 });
    expect(cfg.attempts).toBe(1);
    expect(cfg.jitter).toBe(1);
  });
});

describe('withRetries', () => {
  it('stops after the configured number of attempts', async () => {
    const fn = vi.fn(async () => {
      throw new Error('flaky');
    });

    await expect(
      withRetries(fn, { attempts: 3, baseDelayMs: 0 }, () => true)
    ).rejects.toThrow('flaky');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry errors the predicate rejects', async () => {
    const fn = vi.fn(async () => {
      throw new Error('fatal');
    });

    await expect(
      withRetries(fn, { attempts: 3, baseDelayMs: 0 }, () => false)
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('returns the first successful result and reports retries', async () => {
    let calls = 0;
    const seen: RetryContext[] = [];
    const result = await withRetries(
      async ({ attempt }) => {
        calls++;
        if (attempt < 3) throw new Error(`attempt ${attempt}`);
        return 'ok';
      },
      { attempts: 5, baseDelayMs: 0 },
      () => true,
      { onRetry: (_err, next) => seen.push(next) }
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(seen.map((c) => c.attempt)).toEqual([2, 3]);
    expect(seen.every((c) => c.attempts === 5)).toBe(true);
  });
});
