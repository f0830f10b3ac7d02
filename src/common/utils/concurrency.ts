/**
 * Runs an async mapper over items, at most `limit` at a time.
 * Results keep the input order.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  mapper: (item: T, index: number) => Promise<R>
): Promise<R[]> => {
  const size = Math.max(1, limit);
  const results: R[] = [];

  for (let offset = 0; offset < items.length; offset += size) {
    const batch = items.slice(offset, offset + size);
    const batchResults = await Promise.all(
      batch.map((item, index) => mapper(item, offset + index))
    );
    results.push(...batchResults);
  }

  return results;
};
