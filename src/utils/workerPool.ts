/**
 * Runs `work` over `items` with at most `concurrency` calls in flight.
 * Workers stop picking up new items once `signal` is aborted; items never
 * started are returned so the caller can report them.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  work: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<{ started: number; skipped: T[] }> {
  let index = 0;

  async function worker(): Promise<void> {
    while (true) {
      if (signal?.aborted) return;
      const i = index++;
      if (i >= items.length) return;
      await work(items[i], i);
    }
  }

  const size = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: size }, worker));

  const started = Math.min(index, items.length);
  return { started, skipped: items.slice(started) };
}
