/**
 * Bounded worker pool
 * Items are taken in order; a worker checks the abort signal before taking the next one.
 */

export interface PoolResult<T> {
  started: T[];
  notStarted: T[];
}

export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
  signal?: AbortSignal,
): Promise<PoolResult<T>> {
  const queue = items.slice();
  const started: T[] = [];
  const workerCount = Math.max(1, Math.min(concurrency, queue.length));

  const workers = Array.from({ length: workerCount }, async () => {
    while (queue.length > 0) {
      if (signal?.aborted) return;
      const item = queue.shift();
      if (item === undefined) continue;
      started.push(item);
      await worker(item);
    }
  });

  await Promise.all(workers);

  return { started, notStarted: queue };
}
