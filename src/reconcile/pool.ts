/**
 * Bounded worker pool
 */

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Results are returned in input order. The first rejection is rethrown
 * after in-flight work settles; no new items are started once one fails.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const limit = Math.max(1, Math.min(concurrency, items.length));
  const state: { next: number; failure?: { error: unknown } } = { next: 0 };

  async function drain(): Promise<void> {
    while (state.failure === undefined && state.next < items.length) {
      const index = state.next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        state.failure = state.failure ?? { error };
      }
    }
  }

  await Promise.all(Array.from({ length: limit }, () => drain()));

  if (state.failure !== undefined) {
    throw state.failure.error;
  }
  return results;
}
