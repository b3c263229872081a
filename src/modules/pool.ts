/**
 * Fixed-size worker pool
 *
 * `size` slots pull items off a shared cursor, one outstanding item per
 * slot. The pool size is the only backpressure: there is no queue beyond
 * the input list. Results are returned in completion order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  size: number,
  task: (item: T, index: number) => Promise<R>,
  onSettled?: (result: R, item: T) => void,
): Promise<R[]> {
  const results: R[] = [];
  let cursor = 0;

  async function slot(): Promise<void> {
    while (cursor < items.length) {
      const index = cursor++;
      const item = items[index];
      const result = await task(item, index);
      results.push(result);
      onSettled?.(result, item);
    }
  }

  const slots = Math.max(1, Math.min(size, items.length));
  await Promise.all(Array.from({ length: slots }, () => slot()));

  return results;
}
