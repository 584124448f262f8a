/**
 * Sliding window of at most `limit` in-flight calls. Workers stop taking
 * new items once `signal` is aborted; calls already started run to the end.
 * `fn` is expected to handle its own errors.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  let nextIndex = 0;
  const worker = async () => {
    while (nextIndex < items.length) {
      if (signal?.aborted) return;
      const i = nextIndex++;
      await fn(items[i], i);
    }
  };

  const requested = Number.isNaN(limit) ? 1 : Math.floor(limit);
  const width = Math.max(1, Math.min(requested, items.length));
  await Promise.all(Array.from({ length: width }, () => worker()));
}
