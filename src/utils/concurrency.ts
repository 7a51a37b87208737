/**
 * Bounded fan-out over independent, read-only work items.
 */
import * as os from 'node:os';

/**
 * Default concurrency for file I/O. Scales with available cores,
 * with a floor of 4 and a ceiling of 32.
 */
export const DEFAULT_CONCURRENCY = Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 4), 32);

/**
 * Map items in batches with a concurrency limit.
 * Results are returned in input order regardless of completion order.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const width = Math.max(1, Math.floor(concurrency));
  const results: R[] = [];
  for (let i = 0; i < items.length; i += width) {
    const batch = items.slice(i, i + width);
    const batchResults = await Promise.all(batch.map((item, offset) => processor(item, i + offset)));
    results.push(...batchResults);
  }
  return results;
}
