/**
 * Parallel batch executor for processing items in chunks with concurrency control.
 */

import { toError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { assertPositiveInteger, chunkByCount, type Chunk } from './chunker.js';
import { createProgress, markSettled, markStarted, type BatchProgress } from './progress.js';

/**
 * Options for batch execution
 */
export interface BatchOptions {
  /**
   * Maximum number of items per chunk
   */
  chunkSize: number;

  /**
   * Maximum number of chunks in flight at once
   */
  maxConcurrency: number;

  /**
   * Receives a snapshot whenever a chunk starts or settles
   */
  onProgress?: (progress: Readonly<BatchProgress>) => void;

  /**
   * Receives progress callback failures
   */
  logger?: Logger;
}

/**
 * How one chunk ended
 */
export type ChunkOutcome<T, R> =
  | { status: 'fulfilled'; chunk: Chunk<T>; value: R }
  | { status: 'rejected'; chunk: Chunk<T>; error: Error };

/**
 * Result of a batch operation
 */
export interface BatchResult<T, R> {
  /**
   * One outcome per chunk, in chunk order
   */
  outcomes: ChunkOutcome<T, R>[];

  /**
   * Final progress state
   */
  progress: Readonly<BatchProgress>;
}

/**
 * Counting semaphore for controlling concurrent execution
 */
export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    assertPositiveInteger(permits, 'maxConcurrency');
    this.permits = permits;
  }

  /**
   * Acquire a permit, waiting if necessary
   */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  /**
   * Release a permit, handing it straight to the next waiter if there is one
   */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }

  /**
   * Runs `task` while holding a permit.
   */
  async run<R>(task: () => Promise<R>): Promise<R> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

/**
 * Parallel executor for batch operations
 *
 * Splits items into chunks and runs the operation on each, with at most
 * `maxConcurrency` running at once. Every chunk is attempted exactly once;
 * a failing chunk never cancels or skips the others. The returned promise
 * settles only after all chunks have.
 */
export class ParallelExecutor {
  private readonly options: BatchOptions;

  /**
   * @throws {InvalidArgumentError} If `chunkSize` or `maxConcurrency` is not a positive integer
   */
  constructor(options: BatchOptions) {
    assertPositiveInteger(options.chunkSize, 'batchSize');
    assertPositiveInteger(options.maxConcurrency, 'maxConcurrency');
    this.options = options;
  }

  /**
   * Execute an operation on every chunk of `items`
   *
   * Never rejects because of an operation failure; failures are reported as
   * `rejected` outcomes.
   *
   * @example
   * ```typescript
   * const executor = new ParallelExecutor({ chunkSize: 200, maxConcurrency: 10 });
   * const { outcomes } = await executor.executeAll(vectors, (chunk) =>
   *   upsert(config, { vectors: chunk.items, namespace })
   * );
   * ```
   */
  async executeAll<T, R>(
    items: readonly T[],
    operation: (chunk: Chunk<T>) => Promise<R>
  ): Promise<BatchResult<T, R>> {
    const chunks = chunkByCount(items, this.options.chunkSize);
    let progress = createProgress(items.length, chunks.length);

    if (chunks.length === 0) {
      return { outcomes: [], progress };
    }

    const semaphore = new Semaphore(this.options.maxConcurrency);

    const processChunk = (chunk: Chunk<T>): Promise<ChunkOutcome<T, R>> =>
      semaphore.run(async () => {
        progress = markStarted(progress);
        this.notify(progress);

        let outcome: ChunkOutcome<T, R>;
        try {
          outcome = { status: 'fulfilled', chunk, value: await operation(chunk) };
        } catch (error) {
          outcome = { status: 'rejected', chunk, error: toError(error) };
        }

        progress = markSettled(progress, chunk.items.length, outcome.status === 'fulfilled');
        this.notify(progress);
        return outcome;
      });

    const outcomes = await Promise.all(chunks.map(processChunk));

    return { outcomes, progress };
  }

  private notify(progress: Readonly<BatchProgress>): void {
    if (!this.options.onProgress) {
      return;
    }

    try {
      this.options.onProgress(progress);
    } catch (error) {
      this.options.logger?.warn('batch progress callback failed', {
        error: toError(error).message,
      });
    }
  }
}
