/**
 * Run `fn` over `items` with at most `limit` calls in flight.
 *
 * Results come back in input order. A rejection stops new calls from
 * starting and is rethrown once the in-flight calls settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const width = Math.max(1, Math.floor(limit));
  const state: { failed: boolean; error: unknown } = { failed: false, error: undefined };
  let next = 0;

  const worker = async (): Promise<void> => {
    while (!state.failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index]);
      } catch (err) {
        if (!state.failed) {
          state.failed = true;
          state.error = err;
        }
      }
    }
  };

  const workers = Array.from({ length: Math.min(width, items.length) }, () => worker());
  await Promise.all(workers);

  if (state.failed) throw state.error;
  return results;
}
