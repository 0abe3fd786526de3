/**
 * Concurrency utilities for bounded parallelism.
 *
 * A fixed number of workers pull item indexes from a shared cursor, so
 * provider APIs see at most `concurrency` requests at a time.
 */

/**
 * Run `work` for indexes 0..length-1 on up to `concurrency` workers. Workers
 * stop pulling new indexes once `signal` aborts; in-flight work finishes.
 */
async function runWorkers(
  length: number,
  concurrency: number,
  work: (index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < length && !signal?.aborted) {
      await work(cursor++);
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
}

/**
 * Map over items with bounded concurrency.
 *
 * @returns Results in the same order as inputs
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  await runWorkers(items.length, concurrency, async (index) => {
    const item = items[index];
    if (item !== undefined) results[index] = await fn(item, index);
  });
  return results;
}

/**
 * Outcome slot for an item the pool never started because of cancellation.
 */
export interface NotStarted {
  started: false;
}

/**
 * Like mapWithConcurrency, but stops handing out new items once `signal`
 * aborts. Items already in flight finish; the rest come back as NotStarted.
 * Resolves only after every started item has settled.
 */
export async function mapWithConcurrencyUntilAborted<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<Array<R | NotStarted>> {
  const results: Array<R | NotStarted> = items.map(() => ({ started: false }));
  await runWorkers(
    items.length,
    concurrency,
    async (index) => {
      const item = items[index];
      if (item !== undefined) results[index] = await fn(item, index);
    },
    signal
  );
  return results;
}
