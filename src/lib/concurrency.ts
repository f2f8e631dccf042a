/**
 * Runs `worker` over `items` with at most `limit` in flight. Items are handed out
 * in order; once `signal` aborts no further item is started.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  const actualLimit = Math.max(1, Math.min(Math.floor(limit) || 1, items.length || 1));
  let cursor = 0;

  async function consume(): Promise<void> {
    while (!signal?.aborted) {
      const index = cursor;
      cursor += 1;
      if (index >= items.length) return;
      await worker(items[index], index);
    }
  }

  await Promise.all(Array.from({ length: actualLimit }, () => consume()));
}
