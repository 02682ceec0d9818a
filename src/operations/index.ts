/**
 * Operations Module
 *
 * One function per remote call. Each builds its wire body, issues exactly one
 * request through the transport it is given, and returns the decoded result.
 *
 * @module operations
 */

// Index lifecycle
export {
  listIndexes,
  describeIndex,
  createIndex,
  type IndexOperationConfig,
  type CreateIndexRequest,
} from './indexes.js';

// Upsert operation
export { upsert, type UpsertOperationConfig, type UpsertRequest } from './upsert.js';

// Query operation
export {
  query,
  buildQueryBody,
  type QueryOperationConfig,
  type QueryRequest,
} from './query.js';

// Fetch operation
export { fetchVectors, type FetchOperationConfig, type FetchRequest } from './fetch.js';

// Delete operation
export { deleteVectors, type DeleteOperationConfig, type DeleteRequest } from './delete.js';

// Rerank operation
export { rerank, buildRerankBody, type RerankOperationConfig } from './rerank.js';
