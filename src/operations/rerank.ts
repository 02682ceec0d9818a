/**
 * Rerank Operation Module
 *
 * Scores candidate documents against a query with a hosted reranking model.
 * Independent of any index.
 *
 * @module operations/rerank
 */

import { InvalidArgumentError } from '../errors/index.js';
import type { HttpTransport } from '../transport/http.js';
import {
  RerankResponseSchema,
  type RerankDocument,
  type RerankOptions,
  type RerankResponse,
  type WireRerankRequest,
} from '../types/rerank.js';

/**
 * Configuration for rerank operation
 */
export interface RerankOperationConfig {
  /** Transport bound to the controller host and the rerank API version */
  transport: HttpTransport;
  /** Model used when the call names none */
  defaultModel: string;
}

/**
 * Builds the wire body of a rerank call.
 * @throws {InvalidArgumentError} If `documents` is empty.
 */
export function buildRerankBody(
  query: string,
  documents: RerankDocument[],
  options: RerankOptions,
  defaultModel: string
): WireRerankRequest {
  if (documents.length === 0) {
    throw new InvalidArgumentError('Documents list cannot be empty');
  }

  const body: WireRerankRequest = {
    model: options.model ?? defaultModel,
    query,
    documents,
    return_documents: options.returnDocuments ?? true,
  };

  if (options.topN !== undefined) {
    body.top_n = options.topN;
  }

  if (options.parameters !== undefined) {
    body.parameters = options.parameters;
  }

  if (options.rankFields !== undefined) {
    body.rank_fields = options.rankFields;
  }

  return body;
}

/**
 * Reranks documents by relevance to `query`.
 *
 * The model name is forwarded as given; the service decides whether it
 * exists.
 *
 * @throws {InvalidArgumentError} If `documents` is empty (no request is made)
 * @throws {ServiceError} If the service returns a non-2xx status
 *
 * @example
 * ```typescript
 * const response = await rerank(config, 'tallest mountain', [
 *   { id: 'a', text: 'Everest is 8849 m high' },
 *   { id: 'b', text: 'The Nile is a river' }
 * ], { topN: 1 });
 * console.log(response.data[0]?.index);
 * ```
 */
export async function rerank(
  config: RerankOperationConfig,
  query: string,
  documents: RerankDocument[],
  options: RerankOptions = {}
): Promise<RerankResponse> {
  const body = buildRerankBody(query, documents, options, config.defaultModel);

  const response = await config.transport.request({
    method: 'POST',
    path: '/rerank',
    body,
    schema: RerankResponseSchema,
  });

  return response.data;
}
