/**
 * Runs `fn` over `items` in consecutive chunks of `batchSize`; items within a
 * chunk run concurrently, chunks run one after another. Results keep input order.
 */
export const mapInBatches = async <T, R>(
  items: readonly T[],
  batchSize: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> => {
  const size = Math.max(1, Math.floor(batchSize));
  const results: R[] = [];

  for (let start = 0; start < items.length; start += size) {
    const chunk = items.slice(start, start + size);
    const chunkResults = await Promise.all(chunk.map((item, offset) => fn(item, start + offset)));
    results.push(...chunkResults);
  }

  return results;
};

/**
 * Splits an array into chunks of at most `size` items.
 */
export const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const step = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += step) {
    chunks.push(items.slice(start, start + step));
  }
  return chunks;
};
