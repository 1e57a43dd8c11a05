/**
 * Bounded worker pool over a fixed list of items.
 *
 * At most `concurrency` workers run at once; each pulls the next unstarted
 * item. Once the signal aborts, or a worker throws, no new item is started.
 * Results keep item order, with `undefined` for items that never ran. A
 * rejection is reported only after every started item has settled.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  let next = 0;
  let failed = false;

  const runWorker = async (): Promise<void> => {
    while (next < items.length && !failed && !signal?.aborted) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      try {
        results[index] = await worker(item, index);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  const settled = await Promise.allSettled(Array.from({ length: workerCount }, () => runWorker()));
  for (const outcome of settled) {
    if (outcome.status === 'rejected') throw outcome.reason;
  }
  return results;
}
