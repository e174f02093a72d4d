export interface BatchOptions {
  maxConcurrent?: number;
  delay?: number;
}

/**
 * Runs `worker` over `items` in batches of `maxConcurrent`, waiting `delay`
 * ms between batches. Results come back settled and in input order.
 */
export async function processInBatches<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: BatchOptions = {}
): Promise<PromiseSettledResult<R>[]> {
  let { maxConcurrent = 3, delay = 1000 } = options;

  // Normalize inputs to prevent infinite loops and negative delays
  maxConcurrent = Math.max(1, Math.floor(Number(maxConcurrent) || 1));
  delay = Math.max(0, Math.floor(Number(delay) || 0));

  const results: PromiseSettledResult<R>[] = [];

  for (let i = 0; i < items.length; i += maxConcurrent) {
    const batch = items.slice(i, i + maxConcurrent);
    const settled = await Promise.allSettled(
      batch.map((item, offset) => worker(item, i + offset))
    );
    results.push(...settled);

    if (i + maxConcurrent < items.length && delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  return results;
}
