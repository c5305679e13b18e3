/**
 * Runs `worker` over `items` with at most `limit` calls in flight. Results
 * keep the position of their input. Once `signal` aborts no new item is
 * started; running calls finish and unstarted slots stay undefined.
 */
export async function mapWithLimit<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<(R | undefined)[]> {
  const results = new Array<R | undefined>(items.length).fill(undefined);
  let next = 0;

  async function drain(): Promise<void> {
    while (next < items.length && !signal?.aborted) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  }

  const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => drain());
  await Promise.all(lanes);
  return results;
}
