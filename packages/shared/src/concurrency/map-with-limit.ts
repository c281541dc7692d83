/**
 * Runs `fn` over `items` with at most `limit` calls in flight and resolves with
 * results in input order. The first rejection rejects the whole call and stops
 * the remaining workers from picking up new items; calls already started are
 * left to settle on their own.
 */
export async function mapWithLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const boundedLimit = Number.isFinite(limit) ? Math.max(1, Math.trunc(limit)) : 1;
  const workerCount = Math.min(boundedLimit, items.length);
  let nextIndex = 0;
  let failed = false;

  async function worker(): Promise<void> {
    while (!failed && nextIndex < items.length) {
      const index = nextIndex++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  }

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
