/*
Purpose: run independent units with a fixed number of workers and one join point.
Assumptions: a unit settles on its own; abort only stops new units from starting.
Usage: await runBoundedPool(items, { concurrency: 8, signal }, async (item) => { ... }).
*/

export type BoundedPoolOptions = {
  concurrency: number;
  signal?: AbortSignal;
};

export type BoundedPoolResult = {
  started: number;
  abandoned: number;
};

/**
 * Workers pull items in order until the list is drained or the signal aborts.
 * A rejected unit does not stop its siblings; the first rejection is rethrown
 * after every started unit has settled.
 */
export async function runBoundedPool<T>(
  items: readonly T[],
  options: BoundedPoolOptions,
  unit: (item: T) => Promise<void>,
): Promise<BoundedPoolResult> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(`Pool concurrency must be a positive integer, got ${options.concurrency}`);
  }

  let next = 0;
  let started = 0;
  const failures: unknown[] = [];

  const worker = async (): Promise<void> => {
    while (next < items.length && !options.signal?.aborted) {
      const item = items[next];
      next += 1;
      started += 1;
      try {
        await unit(item);
      } catch (err) {
        failures.push(err);
      }
    }
  };

  const workerCount = Math.min(options.concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (failures.length > 0) {
    throw failures[0];
  }

  return { started, abandoned: items.length - started };
}
