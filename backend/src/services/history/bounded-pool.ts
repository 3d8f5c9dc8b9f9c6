/**
 * Maps `items` through `worker` with at most `limit` calls in flight.
 * Results keep the input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const queue = items.entries();
  const workerCount = Math.min(Math.max(1, Math.floor(limit)), items.length);

  const runWorker = async () => {
    for (const [index, item] of queue) {
      results[index] = await worker(item, index);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, runWorker));

  return results;
}
