/**
 * Map items with at most `limit` calls in flight.
 *
 * Workers pull the next index from a shared counter, so results land at
 * their item's index whatever order the calls finish in. Once the signal
 * aborts no further item is started; those slots stay undefined.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  let nextIndex = 0;

  async function runNext(): Promise<void> {
    while (nextIndex < items.length && !signal?.aborted) {
      const index = nextIndex++;
      results[index] = await fn(items[index], index);
    }
  }

  const workerCount = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => runNext()));

  return results;
}
