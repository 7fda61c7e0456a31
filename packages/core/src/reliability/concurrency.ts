/**
 * Bounded Concurrency
 *
 * Runs async tasks over a list with at most `limit` in flight. Results are
 * stored by input position, never by completion order, and a failing task
 * does not stop its siblings.
 *
 * @module @nowcast/core/reliability/concurrency
 */

export type SettledResult<R> =
  | { status: 'fulfilled'; index: number; value: R }
  | { status: 'rejected'; index: number; reason: unknown };

/**
 * Default worker count: bounded by `ceiling` and never more than the number
 * of tasks.
 */
export function resolveWorkerCount(taskCount: number, requested?: number, ceiling = 10): number {
  const wanted = requested ?? ceiling;
  return Math.max(1, Math.min(wanted, taskCount));
}

/**
 * Map `items` through `fn` with bounded concurrency and settle every task.
 */
export async function mapSettledWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<Array<SettledResult<R>>> {
  const results = new Array<SettledResult<R>>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      try {
        const value = await fn(items[index], index);
        results[index] = { status: 'fulfilled', index, value };
      } catch (reason) {
        results[index] = { status: 'rejected', index, reason };
      }
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}
