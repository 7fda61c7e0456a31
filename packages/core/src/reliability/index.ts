/**
 * Reliability
 *
 * Error taxonomy, retry with backoff and bounded concurrency.
 *
 * @module @nowcast/core/reliability
 */

export {
  type NowcastErrorCode,
  type NowcastErrorOptions,
  NowcastError,
  isRetryable,
  toExitCode,
} from './errors.js';

export {
  type RetryClock,
  type RetryConfig,
  DEFAULT_RETRY_CONFIG,
  systemClock,
  calculateBackoff,
  retry,
} from './retry.js';

export {
  type SettledResult,
  resolveWorkerCount,
  mapSettledWithConcurrency,
} from './concurrency.js';
