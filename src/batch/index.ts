/**
 * Batch operations module.
 *
 * - Chunking: split items into consecutive, range-tagged chunks
 * - Progress tracking: immutable snapshots of a running batch
 * - Parallel execution: semaphore-bounded, failure-isolated chunk processing
 * - Batched upsert built on the above
 *
 * @example
 * ```typescript
 * import { batchUpsert } from './batch/index.js';
 *
 * const response = await batchUpsert(config, {
 *   vectors: largeVectorArray,
 *   namespace: 'docs',
 *   options: { batchSize: 200, maxConcurrency: 10 }
 * });
 * ```
 *
 * @module batch
 */

// Chunking utilities
export { chunkByCount, estimateChunks, assertPositiveInteger, type Chunk } from './chunker.js';

// Progress tracking
export {
  createProgress,
  markStarted,
  markSettled,
  getPercentage,
  type BatchProgress,
} from './progress.js';

// Parallel executor
export {
  ParallelExecutor,
  Semaphore,
  type BatchOptions,
  type BatchResult,
  type ChunkOutcome,
} from './executor.js';

// Batch operations
export {
  batchUpsert,
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_CONCURRENCY,
  type BatchUpsertOptions,
  type BatchUpsertRequest,
  type BatchUpsertResponse,
  type BatchUpsertConfig,
} from './operations.js';
