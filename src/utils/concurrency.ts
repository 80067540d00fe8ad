/**
 * concurrency.ts - Bounded fan-out over independent async tasks
 */

/**
 * Maps items through an async mapper with at most `limit` mappers in flight.
 *
 * Workers pull the next index from a shared cursor, so a slow item never
 * holds back the others. Results keep the input order. A rejection from the
 * mapper rejects the whole call; mappers that must not abort their siblings
 * report failures in their return value instead.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  mapper: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const capped = Math.max(1, Math.floor(limit));
  const results: R[] = new Array(items.length);
  let cursor = 0;
  const workers = Array.from(
    { length: Math.min(capped, items.length) },
    async () => {
      while (true) {
        const idx = cursor;
        cursor += 1;
        if (idx >= items.length) {
          break;
        }
        results[idx] = await mapper(items[idx], idx);
      }
    }
  );
  await Promise.all(workers);
  return results;
}
