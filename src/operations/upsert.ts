/**
 * Upsert Operation Module
 *
 * Writes one batch of vectors to an index namespace in a single request.
 * Chunked, concurrent upserts live in the batch module.
 *
 * @module operations/upsert
 */

import type { HttpTransport } from '../transport/http.js';
import type { VectorRecord } from '../types/vector.js';
import { toWireVector } from '../types/vector.js';
import {
  UpsertResponseSchema,
  type UpsertResponse,
  type WireUpsertRequest,
} from '../types/upsert.js';

/**
 * Configuration for upsert operation
 */
export interface UpsertOperationConfig {
  /** Data-plane transport of the target index */
  transport: HttpTransport;
}

export interface UpsertRequest {
  vectors: VectorRecord[];
  namespace: string;
}

/**
 * Upserts (inserts or overwrites by id) vectors in the index
 *
 * @returns The number of vectors the service reports as written
 * @throws {InvalidArgumentError} If a vector has an empty id or unequal sparse arrays
 * @throws {ServiceError} If the service returns a non-2xx status
 *
 * @example
 * ```typescript
 * const { upsertedCount } = await upsert(config, {
 *   namespace: 'docs',
 *   vectors: [
 *     { id: '1', values: [0.1, 0.2, 0.3] },
 *     { id: '2', values: [0.4, 0.5, 0.6], metadata: { genre: 'drama' } }
 *   ]
 * });
 * ```
 */
export async function upsert(
  config: UpsertOperationConfig,
  request: UpsertRequest
): Promise<UpsertResponse> {
  const body: WireUpsertRequest = {
    vectors: request.vectors.map(toWireVector),
    namespace: request.namespace,
  };

  const response = await config.transport.request({
    method: 'POST',
    path: '/vectors/upsert',
    body,
    schema: UpsertResponseSchema,
  });

  return response.data;
}
