/**
 * Delete Operation Module
 *
 * @module operations/delete
 */

import type { HttpTransport } from '../transport/http.js';
import {
  DeleteResponseSchema,
  type DeleteResponse,
  type WireDeleteRequest,
} from '../types/delete.js';

/**
 * Configuration for delete operation
 */
export interface DeleteOperationConfig {
  /** Data-plane transport of the target index */
  transport: HttpTransport;
}

export interface DeleteRequest {
  ids?: string[];
  deleteAll: boolean;
  namespace: string;
}

/**
 * Deletes vectors by id, or every vector in the namespace.
 *
 * Filter-based deletes are resolved into ids by the index handle before
 * this is called.
 *
 * @returns The decoded response body, `{}` on success
 * @throws {ServiceError} If the service returns a non-2xx status
 *
 * @example
 * ```typescript
 * // Delete by IDs
 * await deleteVectors(config, { ids: ['vec1', 'vec2'], deleteAll: false, namespace: 'docs' });
 *
 * // Delete all in namespace
 * await deleteVectors(config, { deleteAll: true, namespace: 'docs' });
 * ```
 */
export async function deleteVectors(
  config: DeleteOperationConfig,
  request: DeleteRequest
): Promise<DeleteResponse> {
  const body: WireDeleteRequest = {
    delete_all: request.deleteAll,
    namespace: request.namespace,
  };
  if (request.ids !== undefined) {
    body.ids = request.ids;
  }

  const response = await config.transport.request({
    method: 'POST',
    path: '/vectors/delete',
    body,
    schema: DeleteResponseSchema,
  });

  return response.data;
}
