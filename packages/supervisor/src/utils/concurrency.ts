/**
 * Bounded concurrency
 *
 * Runs async work items through a fixed number of lanes. Every item is
 * attempted; a rejected item is reported in its slot and never stops the
 * other lanes.
 *
 * @module
 */

/**
 * Settled outcome for one item, in input order
 */
export type Settled<R> =
  | { readonly status: 'fulfilled'; readonly value: R }
  | { readonly status: 'rejected'; readonly reason: unknown };

/**
 * Maps `items` through `fn` with at most `limit` calls in flight.
 * A limit of 0 (or anything >= items.length) runs everything at once.
 */
export async function mapSettledWithLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<Settled<R>[]> {
  const results: Settled<R>[] = new Array(items.length);
  const lanes = limit <= 0 ? items.length : Math.min(limit, items.length);
  let next = 0;

  const runLane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await fn(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < lanes; i++) {
    workers.push(runLane());
  }
  await Promise.all(workers);

  return results;
}

/**
 * Races a promise against a timer. Resolves to `onTimeout()` when the timer
 * wins; the timer is always cleared.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => T
): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }
  let handle: NodeJS.Timeout | undefined;
  const timer = new Promise<T>(resolve => {
    handle = setTimeout(() => resolve(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timer]);
  } finally {
    if (handle) {
      clearTimeout(handle);
    }
  }
}
