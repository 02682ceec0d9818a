/**
 * Query Operation Module
 *
 * Similarity search against one index namespace. Supports dense, sparse and
 * hybrid anchors as well as querying by the id of a stored vector.
 *
 * @module operations/query
 */

import type { HttpTransport } from '../transport/http.js';
import { assertSparseValues } from '../types/vector.js';
import {
  DEFAULT_TOP_K,
  QueryResponseSchema,
  type QueryResponse,
  type QuerySpec,
  type WireQueryRequest,
} from '../types/query.js';

/**
 * Configuration for query operation
 */
export interface QueryOperationConfig {
  /** Data-plane transport of the target index */
  transport: HttpTransport;
}

export interface QueryRequest {
  spec: QuerySpec;
  namespace: string;
}

/**
 * Builds the wire body of a query. Which anchor is present is not checked
 * here; the service rejects invalid combinations.
 */
export function buildQueryBody(spec: QuerySpec, namespace: string): WireQueryRequest {
  const body: WireQueryRequest = {
    namespace,
    top_k: spec.topK ?? DEFAULT_TOP_K,
    include_values: spec.includeValues ?? false,
    include_metadata: spec.includeMetadata ?? false,
  };

  if (spec.vector !== undefined) {
    body.vector = spec.vector;
  }

  if (spec.id !== undefined) {
    body.id = spec.id;
  }

  if (spec.sparseVector !== undefined) {
    assertSparseValues(spec.sparseVector, 'Query sparse vector');
    body.sparse_vector = {
      indices: spec.sparseVector.indices,
      values: spec.sparseVector.values,
    };
  }

  if (spec.filter !== undefined) {
    body.filter = spec.filter;
  }

  return body;
}

/**
 * Queries vectors by similarity
 *
 * Matches come back in the order the service returned them, highest score
 * first; they are never re-sorted.
 *
 * @throws {InvalidArgumentError} If the sparse component has unequal arrays
 * @throws {ServiceError} If the service returns a non-2xx status
 * @throws {DecodeError} If the response is not a query result
 *
 * @example
 * ```typescript
 * const response = await query(config, {
 *   namespace: 'docs',
 *   spec: {
 *     vector: [0.1, 0.2, 0.3],
 *     topK: 10,
 *     filter: { genre: { $eq: 'drama' } },
 *     includeMetadata: true
 *   }
 * });
 * console.log(`Found ${response.matches.length} matches`);
 * ```
 */
export async function query(
  config: QueryOperationConfig,
  request: QueryRequest
): Promise<QueryResponse> {
  const response = await config.transport.request({
    method: 'POST',
    path: '/query',
    body: buildQueryBody(request.spec, request.namespace),
    schema: QueryResponseSchema,
  });

  return response.data;
}
