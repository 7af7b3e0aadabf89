import { cancelledError } from "./retry.js";

/**
 * Run fn over items with at most `limit` calls in flight.
 * Once the signal aborts, workers stop picking up new items and the call
 * rejects with CANCELLED after in-flight work settles.
 */
export async function mapLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;

  const worker = async () => {
    while (next < items.length) {
      if (signal?.aborted) return;
      const current = next++;
      results[current] = await fn(items[current], current);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
  await Promise.all(workers);

  if (signal?.aborted) throw cancelledError();
  return results;
}
