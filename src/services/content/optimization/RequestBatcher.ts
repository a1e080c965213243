// RequestBatcher.ts
// Concurrency-limited runner for batch fetches. Results keep input order.

/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 * Rejects with the first worker error; workers that never reject always complete the batch.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const max = Math.max(1, Math.trunc(limit));
  const results = new Array<R>(items.length);
  if (items.length === 0) return results;

  let inFlight = 0;
  let idx = 0;

  await new Promise<void>((resolve, reject) => {
    const launchNext = () => {
      if (idx >= items.length && inFlight === 0) {
        resolve();
        return;
      }
      while (inFlight < max && idx < items.length) {
        const currentIndex = idx++;
        inFlight++;
        void worker(items[currentIndex], currentIndex).then(
          (result) => {
            results[currentIndex] = result;
            inFlight--;
            launchNext();
          },
          (err: unknown) => {
            inFlight--;
            reject(err);
          }
        );
      }
    };
    launchNext();
  });

  return results;
}
