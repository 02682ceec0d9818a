/**
 * pinecone-async
 *
 * Asynchronous TypeScript client for the Pinecone vector database:
 * index lifecycle, vector operations on one index, and reranking.
 *
 * @example
 * ```typescript
 * import { PineconeIndex, createClient } from 'pinecone-async';
 *
 * const index = await PineconeIndex.create(
 *   { apiKey: process.env.PINECONE_API_KEY ?? '' },
 *   { name: 'articles', dimension: 3, metric: 'cosine', region: 'us-east-1', namespace: 'docs' }
 * );
 *
 * await index.upsertBatch(
 *   [{ id: 'vec1', values: [0.1, 0.2, 0.3], metadata: { category: 'docs' } }],
 *   { batchSize: 200, maxConcurrency: 10 }
 * );
 *
 * const matches = await index.query({
 *   vector: [0.1, 0.2, 0.3],
 *   topK: 10,
 *   filter: { category: { $eq: 'docs' } },
 *   includeMetadata: true,
 * });
 * await index.close();
 *
 * const client = createClient({ apiKey: process.env.PINECONE_API_KEY ?? '' });
 * const ranked = await client.rerank('what is a vector?', [
 *   { id: 'a', text: 'A vector is a list of numbers' },
 *   { id: 'b', text: 'Bananas are yellow' },
 * ]);
 * await client.close();
 * ```
 */

// Client exports
export {
  createClient,
  withClient,
  PineconeClientImpl,
  PineconeIndex,
  withIndex,
  DELETE_BY_FILTER_LIMIT,
  type PineconeClient,
  type IndexHandleOptions,
} from './client/index.js';

// Configuration exports
export {
  validateConfig,
  listSupportedModels,
  PineconeConfigBuilder,
  PineconeConfig,
  API_VERSION,
  RERANK_API_VERSION,
  DEFAULT_CONTROLLER_HOST,
  DEFAULT_TIMEOUT,
  DEFAULT_MAX_CONNECTIONS,
  DEFAULT_RERANK_MODEL,
  SUPPORTED_RERANK_MODELS,
  USER_AGENT,
  type ValidatedPineconeConfig,
} from './config.js';

// Error exports
export {
  PineconeError,
  InvalidArgumentError,
  IndexNotFoundError,
  ServiceError,
  DecodeError,
  BatchUpsertError,
  TimeoutError,
  NetworkError,
  createErrorFromResponse,
  isPineconeError,
  type ChunkFailure,
  type NotFoundContext,
} from './errors/index.js';

// Observability exports
export {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  type Logger,
  type LogLevel,
  type LogConfig,
  type LogContext,
} from './observability/index.js';

// Transport exports
export { HttpTransport, hostToBaseUrl, type FetchFunction } from './transport/index.js';

// Batch exports
export {
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_CONCURRENCY,
  getPercentage,
  type BatchProgress,
  type BatchUpsertOptions,
  type BatchUpsertResponse,
} from './batch/index.js';

// Type exports
export {
  IndexSpec,
  METRICS,
  DEFAULT_TOP_K,
  type Metric,
  type DeletionProtection,
  type ServerlessSpec,
  type PodSpec,
  type IndexDescriptor,
  type IndexStatus,
  type IndexSummary,
  type Metadata,
  type MetadataValue,
  type MetadataFilter,
  type SparseValues,
  type VectorRecord,
  type MatchResult,
  type QuerySpec,
  type Usage,
  type DeleteOptions,
  type DeleteResponse,
  type RerankDocument,
  type RerankParameters,
  type RerankOptions,
  type RerankResult,
  type RerankUsage,
  type RerankResponse,
} from './types/index.js';

/** Library version */
export const VERSION = '0.1.0';
