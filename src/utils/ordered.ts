/**
 * Run an async function over a list while keeping results in input order.
 * Calls run one at a time unless `concurrency` allows more.
 */
export async function mapInOrder<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: { concurrency?: number } = {},
): Promise<R[]> {
  const concurrency = Math.max(1, options.concurrency ?? 1);
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}
