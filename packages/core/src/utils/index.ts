export { readPath, isAbsent } from './records.js';
export {
  withRetries,
  computeBackoffDelayMs,
  resolveRetryConfig,
  sleep,
} from './retry.js';
export type { BackoffStrategy, RetryConfig, RetryContext, RetryHooks } from './retry.js';
