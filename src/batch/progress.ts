/**
 * Progress tracking for batch operations. Every update returns a new
 * snapshot; snapshots handed to callbacks are never mutated afterwards.
 */

/**
 * Snapshot of a batch operation's progress
 */
export interface BatchProgress {
  totalItems: number;

  totalChunks: number;

  /**
   * Items in chunks that succeeded
   */
  completedItems: number;

  /**
   * Items in chunks that failed
   */
  failedItems: number;

  completedChunks: number;

  failedChunks: number;

  /**
   * Chunks currently being sent
   */
  inFlight: number;
}

/**
 * @example
 * ```typescript
 * const progress = createProgress(450, 3);
 * // { totalItems: 450, totalChunks: 3, completedItems: 0, failedItems: 0,
 * //   completedChunks: 0, failedChunks: 0, inFlight: 0 }
 * ```
 */
export function createProgress(totalItems: number, totalChunks: number): Readonly<BatchProgress> {
  return Object.freeze({
    totalItems,
    totalChunks,
    completedItems: 0,
    failedItems: 0,
    completedChunks: 0,
    failedChunks: 0,
    inFlight: 0,
  });
}

/**
 * A chunk was dispatched.
 */
export function markStarted(progress: BatchProgress): Readonly<BatchProgress> {
  return Object.freeze({ ...progress, inFlight: progress.inFlight + 1 });
}

/**
 * A dispatched chunk settled.
 */
export function markSettled(
  progress: BatchProgress,
  itemCount: number,
  succeeded: boolean
): Readonly<BatchProgress> {
  const settled = { ...progress, inFlight: progress.inFlight - 1 };

  if (succeeded) {
    settled.completedItems += itemCount;
    settled.completedChunks += 1;
  } else {
    settled.failedItems += itemCount;
    settled.failedChunks += 1;
  }

  return Object.freeze(settled);
}

/**
 * Share of items that have settled either way, 0-100
 *
 * @example
 * ```typescript
 * getPercentage({ ...createProgress(200, 2), completedItems: 100, failedItems: 50 });
 * // 75
 * ```
 */
export function getPercentage(progress: BatchProgress): number {
  if (progress.totalItems === 0) {
    return 100;
  }

  const done = progress.completedItems + progress.failedItems;
  return Math.floor((done / progress.totalItems) * 100);
}
