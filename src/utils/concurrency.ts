/**
 * Run `task` over `items` with at most `limit` tasks in flight. Results keep
 * the input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const pending = items.entries();

  const worker = async (): Promise<void> => {
    for (const [index, item] of pending) {
      results[index] = await task(item, index);
    }
  };

  const size = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: size }, () => worker()));
  return results;
}
