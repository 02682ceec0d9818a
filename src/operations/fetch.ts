/**
 * Fetch Operation Module
 *
 * @module operations/fetch
 */

import type { HttpTransport } from '../transport/http.js';
import { FetchResponseSchema, type FetchResponse } from '../types/fetch.js';

/**
 * Configuration for fetch operation
 */
export interface FetchOperationConfig {
  /** Data-plane transport of the target index */
  transport: HttpTransport;
}

export interface FetchRequest {
  ids: string[];
  namespace: string;
}

/**
 * Fetches vectors by id. Ids that do not exist are absent from
 * `response.vectors`; that is not an error.
 *
 * The ids travel as repeated `ids` query parameters. The `namespace`
 * parameter is sent only for a non-default namespace.
 *
 * @throws {ServiceError} If the service returns a non-2xx status
 *
 * @example
 * ```typescript
 * const response = await fetchVectors(config, { ids: ['a', 'b'], namespace: '' });
 * const a = response.vectors['a'];
 * ```
 */
export async function fetchVectors(
  config: FetchOperationConfig,
  request: FetchRequest
): Promise<FetchResponse> {
  const queryParams: Record<string, string | string[]> = { ids: request.ids };
  if (request.namespace !== '') {
    queryParams['namespace'] = request.namespace;
  }

  const response = await config.transport.request({
    method: 'GET',
    path: '/vectors/fetch',
    queryParams,
    schema: FetchResponseSchema,
  });

  return response.data;
}
