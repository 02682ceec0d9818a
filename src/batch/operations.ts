/**
 * Batched upsert: the one operation that fans out over many requests.
 */

import { BatchUpsertError, type ChunkFailure } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { upsert, type UpsertOperationConfig } from '../operations/upsert.js';
import type { VectorRecord } from '../types/vector.js';
import { ParallelExecutor } from './executor.js';
import type { BatchProgress } from './progress.js';

/** Vectors per upsert request when the caller names no batch size. */
export const DEFAULT_BATCH_SIZE = 200;

/** Chunk upserts in flight when the caller names no limit. */
export const DEFAULT_MAX_CONCURRENCY = 10;

/**
 * Options for a batched upsert
 */
export interface BatchUpsertOptions {
  /**
   * Vectors per request (default 200)
   */
  batchSize?: number;

  /**
   * Requests in flight at once (default 10)
   */
  maxConcurrency?: number;

  onProgress?: (progress: Readonly<BatchProgress>) => void;
}

/**
 * Request to batch upsert vectors
 */
export interface BatchUpsertRequest {
  vectors: readonly VectorRecord[];

  namespace: string;

  options?: BatchUpsertOptions;
}

/**
 * Response from batch upsert operation
 */
export interface BatchUpsertResponse {
  /**
   * Sum of the counts reported for every chunk
   */
  upsertedCount: number;

  /**
   * Number of upsert requests sent
   */
  chunkCount: number;
}

export interface BatchUpsertConfig extends UpsertOperationConfig {
  logger: Logger;
}

/**
 * Batch upsert vectors
 *
 * Splits vectors into consecutive chunks of `batchSize` and upserts them with
 * at most `maxConcurrency` requests in flight. Every chunk is sent exactly
 * once whatever happens to the others; once all have settled, any failures
 * are raised together.
 *
 * @throws {InvalidArgumentError} If `batchSize` or `maxConcurrency` is not a positive integer
 * @throws {BatchUpsertError} If one or more chunks failed
 *
 * @example
 * ```typescript
 * const { upsertedCount, chunkCount } = await batchUpsert(config, {
 *   namespace: 'docs',
 *   vectors: largeVectorArray,
 *   options: {
 *     batchSize: 100,
 *     maxConcurrency: 4,
 *     onProgress: (p) => console.log(`${p.completedChunks}/${p.totalChunks}`)
 *   }
 * });
 * ```
 */
export async function batchUpsert(
  config: BatchUpsertConfig,
  request: BatchUpsertRequest
): Promise<BatchUpsertResponse> {
  const { vectors, namespace, options = {} } = request;

  const executor = new ParallelExecutor({
    chunkSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
    maxConcurrency: options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY,
    onProgress: options.onProgress,
    logger: config.logger,
  });

  const { outcomes } = await executor.executeAll(vectors, (chunk) =>
    upsert(config, { vectors: chunk.items, namespace })
  );

  let upsertedCount = 0;
  const failures: ChunkFailure[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === 'fulfilled') {
      upsertedCount += outcome.value.upsertedCount;
      continue;
    }

    const { index, start, end } = outcome.chunk;
    config.logger.warn('batch upsert chunk failed', {
      chunkIndex: index,
      start,
      end,
      error: outcome.error.message,
    });
    failures.push({ chunkIndex: index, start, end, error: outcome.error });
  }

  if (failures.length > 0) {
    throw new BatchUpsertError(failures, outcomes.length);
  }

  return { upsertedCount, chunkCount: outcomes.length };
}
