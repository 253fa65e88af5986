/**
 * Splitting of batch entries into requests within the store's limits.
 */

/**
 * Splits entries into chunks bounded by entry count and by total estimated
 * size. An entry larger than `maxBytes` on its own still forms a chunk, which
 * the store rejects with its own error.
 *
 * @example
 * ```typescript
 * chunkBySize(['aaaa', 'bb', 'cccc'], 10, 6, (s) => s.length);
 * // [['aaaa', 'bb'], ['cccc']]
 * ```
 */
export function chunkBySize<T>(
  entries: readonly T[],
  maxCount: number,
  maxBytes: number,
  sizeOf: (entry: T) => number
): T[][] {
  if (maxCount <= 0 || maxBytes <= 0) {
    throw new RangeError('Chunk limits must be greater than 0');
  }

  const chunks: T[][] = [];
  let current: T[] = [];
  let currentBytes = 0;

  for (const entry of entries) {
    const bytes = sizeOf(entry);
    if (current.length > 0 && (current.length >= maxCount || currentBytes + bytes > maxBytes)) {
      chunks.push(current);
      current = [];
      currentBytes = 0;
    }
    current.push(entry);
    currentBytes += bytes;
  }

  if (current.length > 0) {
    chunks.push(current);
  }

  return chunks;
}

/**
 * Chunks bounded by entry count only, as for BatchGetItem keys
 */
export function chunk<T>(entries: readonly T[], maxCount: number): T[][] {
  return chunkBySize(entries, maxCount, Number.POSITIVE_INFINITY, () => 0);
}
