/**
 * Batch chunking utilities for splitting items into consecutive chunks.
 */

import { InvalidArgumentError } from '../errors/index.js';

/**
 * A consecutive slice of the input, tagged with where it came from
 */
export interface Chunk<T> {
  /**
   * Position of the chunk in dispatch order
   */
  index: number;

  /**
   * Offset of the first item in the input
   */
  start: number;

  /**
   * Offset one past the last item
   */
  end: number;

  items: T[];
}

/**
 * Throws unless `value` is a positive integer.
 */
export function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got ${value}`, {
      [name]: value,
    });
  }
}

/**
 * Split an array of items into consecutive chunks of `maxSize`; only the last
 * chunk may be shorter. Every item lands in exactly one chunk.
 *
 * @throws {InvalidArgumentError} If `maxSize` is not a positive integer
 *
 * @example
 * ```typescript
 * const chunks = chunkByCount([1, 2, 3, 4, 5], 2);
 * // chunks.map((c) => c.items) is [[1, 2], [3, 4], [5]]
 * // chunks[2] is { index: 2, start: 4, end: 5, items: [5] }
 * ```
 */
export function chunkByCount<T>(items: readonly T[], maxSize: number): Chunk<T>[] {
  assertPositiveInteger(maxSize, 'batchSize');

  const chunks: Chunk<T>[] = [];

  for (let start = 0; start < items.length; start += maxSize) {
    const end = Math.min(start + maxSize, items.length);
    chunks.push({ index: chunks.length, start, end, items: items.slice(start, end) });
  }

  return chunks;
}

/**
 * Number of chunks `chunkByCount` produces for `itemCount` items
 *
 * @example
 * ```typescript
 * estimateChunks(450, 200); // 3
 * ```
 */
export function estimateChunks(itemCount: number, maxSize: number): number {
  assertPositiveInteger(maxSize, 'batchSize');

  if (itemCount <= 0) {
    return 0;
  }

  return Math.ceil(itemCount / maxSize);
}
