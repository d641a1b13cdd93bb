export interface PoolOptions {
  concurrency: number;
  /** Checked before each item is taken; once it returns false no further items start. */
  shouldContinue?: () => boolean;
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight.
 * Resolves with the number of items that were started.
 */
export async function processWithConcurrency<T>(
  items: readonly T[],
  options: PoolOptions,
  worker: (item: T, index: number) => Promise<void>,
): Promise<number> {
  let index = 0;
  const slots = new Array(Math.max(1, Math.min(options.concurrency, items.length))).fill(null).map(async () => {
    while (true) {
      if (options.shouldContinue && !options.shouldContinue()) {
        break;
      }
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current], current);
    }
  });
  await Promise.all(slots);
  return Math.min(index, items.length);
}
