/**
 * Map over items with at most `concurrency` calls in flight. Results keep
 * input order.
 *
 * `shouldStart` is checked before each item is picked up; once it returns
 * false no further items start, and the skipped slots are left undefined.
 * Items already running are awaited either way.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
  shouldStart: () => boolean = () => true
): Promise<Array<R | undefined>> {
  if (!Number.isSafeInteger(concurrency) || concurrency <= 0) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  let currentIndex = 0;

  async function worker(): Promise<void> {
    while (currentIndex < items.length && shouldStart()) {
      const index = currentIndex++;
      results[index] = await fn(items[index], index);
    }
  }

  const workers = Array.from(
    { length: Math.min(concurrency, items.length) },
    () => worker()
  );

  await Promise.all(workers);
  return results;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isSafeInteger(size) || size <= 0) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Runs tasks one at a time in submission order. A failed task does not
 * block the ones queued after it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
