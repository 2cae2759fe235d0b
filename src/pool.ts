import pLimit from 'p-limit';

/**
 * Run `fn` over `items` with at most `concurrency` in flight.
 * Results come back in input order regardless of completion order.
 */
export async function mapInOrder<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const limit = pLimit(Math.max(1, concurrency));
  return Promise.all(items.map((item, i) => limit(() => fn(item, i))));
}
