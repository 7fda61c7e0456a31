/**
 * Retry and Backoff Utilities
 *
 * Provides:
 * - Fixed-interval or exponential backoff with optional jitter
 * - A cumulative wait ceiling (`maxWaitTimeMs`) on top of the attempt limit
 * - Server retry hints (e.g. `Retry-After`) taking precedence over the schedule
 * - An injectable clock so schedules are testable without real sleeps
 *
 * Each call to `retry()` owns its own attempt counter and elapsed-time clock,
 * so concurrent callers never share a retry budget.
 *
 * @module @nowcast/core/reliability/retry
 */

import { isRetryable } from './errors.js';
import { createLogger } from '../telemetry/index.js';

const logger = createLogger('retry');

// =============================================================================
// Retry Configuration
// =============================================================================

/**
 * Time source used by the retry loop
 */
export interface RetryClock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export interface RetryConfig {
  /** Maximum number of attempts, the first call included (default: 3) */
  maxAttempts: number;

  /** Delay before the first retry in ms (default: 1000) */
  initialDelayMs: number;

  /** Maximum delay between retries in ms (default: 30000) */
  maxDelayMs: number;

  /** Backoff multiplier, 1 for a fixed interval (default: 2.0) */
  backoffMultiplier: number;

  /** Jitter factor 0-1 to randomize delays (default: 0) */
  jitterFactor: number;

  /**
   * Ceiling on the time spent retrying, measured from the first attempt.
   * A retry whose wait would end past this ceiling is not scheduled and
   * the last error is rethrown.
   */
  maxWaitTimeMs?: number;

  /** Custom function to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean;

  /** Server-provided delay hint for an error, in ms */
  retryAfterMs?: (error: unknown) => number | undefined;

  /** Callback before each retry attempt */
  onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;

  /** Abort signal to cancel retries */
  signal?: AbortSignal;

  clock?: RetryClock;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2.0,
  jitterFactor: 0,
};

/**
 * Sleep for a given duration
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timeout = setTimeout(resolve, ms);

    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timeout);
        reject(new Error('Retry aborted'));
      },
      { once: true }
    );
  });
}

export const systemClock: RetryClock = {
  now: () => Date.now(),
  sleep,
};

// =============================================================================
// Backoff Calculation
// =============================================================================

/**
 * Calculate delay for a given retry attempt
 *
 * @param attempt - Current attempt number (0-indexed)
 * @returns Delay in milliseconds
 */
export function calculateBackoff(attempt: number, config: RetryConfig): number {
  const exponentialDelay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  if (config.jitterFactor === 0) {
    return Math.round(cappedDelay);
  }

  // Range of [delay * (1 - jitter), delay * (1 + jitter)]
  const jitter = config.jitterFactor * (2 * Math.random() - 1);
  return Math.round(cappedDelay * (1 + jitter));
}

// =============================================================================
// Retry Function
// =============================================================================

/**
 * Execute an async function with retry logic
 *
 * @example
 * ```typescript
 * const body = await retry(
 *   () => postJson('/v2/forecast', payload),
 *   { maxAttempts: 6, initialDelayMs: 10_000, backoffMultiplier: 1, maxWaitTimeMs: 360_000 }
 * );
 * ```
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  config?: Partial<RetryConfig>
): Promise<T> {
  const fullConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const clock = fullConfig.clock ?? systemClock;
  const shouldRetry = fullConfig.isRetryable ?? isRetryable;
  const startTime = clock.now();

  for (let attempt = 0; ; attempt++) {
    if (fullConfig.signal?.aborted) {
      throw new Error('Retry aborted');
    }

    try {
      return await fn(attempt + 1);
    } catch (error) {
      const isLastAttempt = attempt >= fullConfig.maxAttempts - 1;
      if (!shouldRetry(error) || isLastAttempt) {
        throw error;
      }

      const scheduled = calculateBackoff(attempt, fullConfig);
      const hint = fullConfig.retryAfterMs?.(error);
      const delayMs = hint !== undefined ? Math.max(scheduled, hint) : scheduled;

      if (fullConfig.maxWaitTimeMs !== undefined) {
        const elapsedMs = clock.now() - startTime;
        if (elapsedMs + delayMs > fullConfig.maxWaitTimeMs) {
          logger.warn('Retry budget exhausted', {
            attempt: attempt + 1,
            elapsedMs,
            nextDelayMs: delayMs,
            maxWaitTimeMs: fullConfig.maxWaitTimeMs,
          });
          throw error;
        }
      }

      fullConfig.onRetry?.(attempt + 1, error, delayMs);
      await clock.sleep(delayMs, fullConfig.signal);
    }
  }
}
