/**
 * Bounded worker pool.
 *
 * Up to `concurrency` workers claim items in index order. Once `signal`
 * aborts no further items are claimed; items already claimed run to the end
 * of their `work` call.
 */

export interface PoolResult {
  completed: number;
  cancelled: boolean;
}

export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  work: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<PoolResult> {
  let next = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const index = next++;
      await work(items[index], index);
      completed++;
    }
  };

  const size = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: size }, () => worker()));

  return { completed, cancelled: signal?.aborted === true };
}
