/**
 * Reliability Module Tests
 *
 * Error taxonomy, retry scheduling and bounded concurrency.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { NowcastError, isRetryable, toExitCode, type NowcastErrorCode } from '../errors.js';

import { calculateBackoff, retry, DEFAULT_RETRY_CONFIG, type RetryClock } from '../retry.js';

import { mapSettledWithConcurrency, resolveWorkerCount } from '../concurrency.js';

/**
 * Clock where time only moves when the code under test sleeps or a call
 * advances it
 */
function fakeClock(): RetryClock & { advance(ms: number): void; sleeps: number[] } {
  let now = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    advance(ms: number) {
      now += ms;
    },
    async sleep(ms: number) {
      sleeps.push(ms);
      now += ms;
    },
  };
}

function transient(message: string, code: NowcastErrorCode = 'SERVICE_UNAVAILABLE', retryAfterMs?: number): NowcastError {
  return new NowcastError(message, { code, retryable: true, retryAfterMs });
}

function permanent(message: string, code: NowcastErrorCode): NowcastError {
  return new NowcastError(message, { code });
}

describe('Errors', () => {
  it('exposes code and retryability', () => {
    const error = transient('busy', 'RATE_LIMITED', 2000);

    expect(error.code).toBe('RATE_LIMITED');
    expect(error.retryable).toBe(true);
    expect(error.retryAfterMs).toBe(2000);
  });

  it('serializes to JSON with the cause message', () => {
    const error = new NowcastError('bad input', { code: 'VALIDATION_ERROR', cause: new Error('root') });
    const json = error.toJSON();

    expect(json.code).toBe('VALIDATION_ERROR');
    expect(json.retryable).toBe(false);
    expect(json.cause).toBe('root');
  });

  it('treats plain timeout and connection errors as retryable', () => {
    expect(isRetryable(new Error('socket hang up'))).toBe(true);
    expect(isRetryable(new Error('read ECONNRESET'))).toBe(true);
    expect(isRetryable(new Error('invalid json'))).toBe(false);
    expect(isRetryable('timeout')).toBe(false);
  });

  it('maps codes to CLI exit codes', () => {
    expect(toExitCode(permanent('x', 'VALIDATION_ERROR'))).toBe(20);
    expect(toExitCode(permanent('x', 'UNAUTHORIZED'))).toBe(31);
    expect(toExitCode(permanent('x', 'ASSEMBLY_ERROR'))).toBe(40);
    expect(toExitCode(new Error('plain'))).toBe(1);
  });
});

describe('Retry', () => {
  let clock: ReturnType<typeof fakeClock>;

  beforeEach(() => {
    clock = fakeClock();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('calculateBackoff', () => {
    it('keeps a fixed interval with multiplier 1', () => {
      const config = { ...DEFAULT_RETRY_CONFIG, initialDelayMs: 10000, backoffMultiplier: 1, maxDelayMs: 60000 };

      expect(calculateBackoff(0, config)).toBe(10000);
      expect(calculateBackoff(4, config)).toBe(10000);
    });

    it('grows exponentially up to the cap', () => {
      const config = { ...DEFAULT_RETRY_CONFIG, initialDelayMs: 1000, backoffMultiplier: 2, maxDelayMs: 5000 };

      expect(calculateBackoff(0, config)).toBe(1000);
      expect(calculateBackoff(2, config)).toBe(4000);
      expect(calculateBackoff(3, config)).toBe(5000);
    });
  });

  it('returns the first successful result', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transient('503'))
      .mockResolvedValueOnce('ok');

    const result = await retry(fn, { maxAttempts: 3, initialDelayMs: 100, clock });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn.mock.calls.map((c) => c[0])).toEqual([1, 2]);
    expect(clock.sleeps).toEqual([100]);
  });

  it('does not retry non-retryable errors', async () => {
    const fn = vi.fn(async () => {
      throw permanent('400', 'BAD_REQUEST');
    });

    await expect(retry(fn, { maxAttempts: 5, clock })).rejects.toThrow('400');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('counts maxAttempts as total calls', async () => {
    const fn = vi.fn(async () => {
      throw transient('still down');
    });

    await expect(
      retry(fn, { maxAttempts: 3, initialDelayMs: 10, backoffMultiplier: 1, clock })
    ).rejects.toThrow('still down');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([10, 10]);
  });

  it('stops when the next wait would pass the wait ceiling', async () => {
    // each call takes 500ms: fails at 500, waits to 1500, fails at 2000;
    // a second wait would end at 3000, past the 2000ms ceiling
    const fn = vi.fn(async () => {
      clock.advance(500);
      throw transient('503');
    });

    await expect(
      retry(fn, {
        maxAttempts: 3,
        initialDelayMs: 1000,
        backoffMultiplier: 1,
        maxWaitTimeMs: 2000,
        clock,
      })
    ).rejects.toThrow('503');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('waits at least the server retry hint', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<number>>()
      .mockRejectedValueOnce(transient('429', 'RATE_LIMITED', 3000))
      .mockResolvedValueOnce(1);

    await retry(fn, {
      maxAttempts: 2,
      initialDelayMs: 1000,
      retryAfterMs: (e) => (e instanceof NowcastError ? e.retryAfterMs : undefined),
      clock,
    });

    expect(clock.sleeps).toEqual([3000]);
  });

  it('reports each scheduled retry', async () => {
    const onRetry = vi.fn();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transient('a'))
      .mockRejectedValueOnce(transient('b'))
      .mockResolvedValueOnce('done');

    await retry(fn, { maxAttempts: 3, initialDelayMs: 50, backoffMultiplier: 1, onRetry, clock });

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0]?.[0]).toBe(1);
    expect(onRetry.mock.calls[1]?.[0]).toBe(2);
    expect(onRetry.mock.calls[1]?.[2]).toBe(50);
  });

  it('keeps separate budgets for concurrent calls', async () => {
    let a = 0;
    let b = 0;
    const failTwice = (counter: () => number) => async () => {
      if (counter() <= 2) throw transient('flaky');
      return counter();
    };

    const [ra, rb] = await Promise.all([
      retry(failTwice(() => ++a), { maxAttempts: 3, initialDelayMs: 1, clock }),
      retry(failTwice(() => ++b), { maxAttempts: 3, initialDelayMs: 1, clock }),
    ]);

    expect(ra).toBe(3);
    expect(rb).toBe(3);
  });
});

describe('Concurrency', () => {
  it('bounds the worker count by tasks and ceiling', () => {
    expect(resolveWorkerCount(3)).toBe(3);
    expect(resolveWorkerCount(50)).toBe(10);
    expect(resolveWorkerCount(50, 4)).toBe(4);
    expect(resolveWorkerCount(0)).toBe(1);
  });

  it('keeps results in input order whatever the completion order', async () => {
    const delays = [30, 5, 15];

    const results = await mapSettledWithConcurrency(delays, 3, async (ms, i) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return i * 10;
    });

    expect(results.map((r) => (r.status === 'fulfilled' ? r.value : undefined))).toEqual([0, 10, 20]);
  });

  it('never runs more than the limit at once', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapSettledWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 2));
      inFlight--;
    });

    expect(peak).toBe(2);
  });

  it('settles every task when some fail', async () => {
    const results = await mapSettledWithConcurrency([1, 2, 3], 2, async (n) => {
      if (n === 2) throw new Error('batch 2 failed');
      return n;
    });

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
    const failed = results[1];
    expect(failed?.status === 'rejected' && failed.reason instanceof Error ? failed.reason.message : '').toBe(
      'batch 2 failed'
    );
  });
});
