/**
 * Bounded-concurrency helpers
 */

/**
 * Run `fn` over every item with at most `limit` calls in flight.
 *
 * Results land in a fixed-size array at the item's index, so the output
 * order matches the input order whatever the completion order was. The
 * returned promise settles only once every started call has settled.
 *
 * If a call throws, no further items are started and the first error is
 * rethrown after in-flight calls finish.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const errors: unknown[] = [];
  const width = Math.max(1, Math.min(Math.floor(limit), items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (errors.length === 0 && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        errors.push(error);
      }
    }
  };

  await Promise.all(Array.from({ length: width }, () => worker()));

  if (errors.length > 0) {
    throw errors[0];
  }
  return results;
}
