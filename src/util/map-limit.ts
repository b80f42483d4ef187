/**
 * Run `fn` over `items` with at most `limit` calls in flight. Results keep input order.
 * When `signal` aborts, workers stop taking new items; items never started stay unset
 * and are reported through `started`.
 */
export async function mapLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<{ results: Array<R | undefined>; started: number }> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length && !signal?.aborted) {
      const current = nextIndex++;
      results[current] = await fn(items[current], current);
    }
  }

  const n = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: n }, () => worker()));
  return { results, started: nextIndex };
}
