/**
 * Bounded worker pool
 */

/**
 * Run `worker` over `items` with at most `limit` in flight.
 *
 * Workers pull the next item as soon as they finish, so one slow item does
 * not hold back a whole batch. Results keep the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  // Shared by all workers: each pull hands out the next unclaimed item
  const pending = items.entries();

  const runWorker = async (): Promise<void> => {
    for (const [index, item] of pending) {
      try {
        results[index] = { status: 'fulfilled', value: await worker(item, index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const workerCount = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => runWorker()));
  return results;
}
