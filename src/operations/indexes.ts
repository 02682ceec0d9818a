/**
 * Index Lifecycle Operations
 *
 * Control-plane calls against the controller host: list, describe and
 * create indexes.
 *
 * @module operations/indexes
 */

import type { HttpTransport } from '../transport/http.js';
import {
  IndexDescriptorSchema,
  IndexListSchema,
  serializeIndexSpec,
  type DeletionProtection,
  type IndexDescriptor,
  type IndexSpec,
  type IndexSummary,
  type Metric,
  type WireCreateIndexRequest,
} from '../types/control.js';

/**
 * Configuration for index lifecycle operations
 */
export interface IndexOperationConfig {
  /** Control-plane transport */
  transport: HttpTransport;
}

export interface CreateIndexRequest {
  name: string;
  dimension: number;
  metric: Metric;
  spec: IndexSpec;
  deletionProtection: DeletionProtection;
}

/**
 * Lists the indexes of the project as raw summaries.
 *
 * @throws {ServiceError} If the service returns a non-2xx status
 */
export async function listIndexes(config: IndexOperationConfig): Promise<IndexSummary[]> {
  const response = await config.transport.request({
    method: 'GET',
    path: '/indexes',
    schema: IndexListSchema,
  });

  return response.data;
}

/**
 * Describes one index.
 *
 * @throws {IndexNotFoundError} If no index with that name exists
 * @throws {ServiceError} If the service returns any other non-2xx status
 *
 * @example
 * ```typescript
 * const descriptor = await describeIndex(config, 'articles');
 * console.log(descriptor.host, descriptor.status.ready);
 * ```
 */
export async function describeIndex(
  config: IndexOperationConfig,
  name: string
): Promise<IndexDescriptor> {
  const response = await config.transport.request({
    method: 'GET',
    path: `/indexes/${encodeURIComponent(name)}`,
    schema: IndexDescriptorSchema,
    notFound: { indexName: name },
  });

  return response.data;
}

/**
 * Creates an index. The spec is serialized before anything is sent, so an
 * invalid spec never reaches the network.
 *
 * @throws {InvalidArgumentError} If the spec is neither serverless nor pod
 * @throws {ServiceError} If the service returns a non-2xx status
 *
 * @example
 * ```typescript
 * const descriptor = await createIndex(config, {
 *   name: 'articles',
 *   dimension: 1536,
 *   metric: 'cosine',
 *   spec: IndexSpec.serverless({ cloud: 'aws', region: 'us-east-1' }),
 *   deletionProtection: 'disabled'
 * });
 * ```
 */
export async function createIndex(
  config: IndexOperationConfig,
  request: CreateIndexRequest
): Promise<IndexDescriptor> {
  const body: WireCreateIndexRequest = {
    name: request.name,
    dimension: request.dimension,
    metric: request.metric,
    spec: serializeIndexSpec(request.spec),
    deletion_protection: request.deletionProtection,
  };

  const response = await config.transport.request({
    method: 'POST',
    path: '/indexes',
    body,
    schema: IndexDescriptorSchema,
  });

  return response.data;
}
