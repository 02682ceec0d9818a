export type { Metadata, MetadataValue, MetadataFilter } from './metadata.js';
export { MetadataSchema } from './metadata.js';

export type { SparseValues, VectorRecord, MatchResult, WireVector } from './vector.js';
export {
  SparseValuesSchema,
  VectorRecordSchema,
  MatchResultSchema,
  assertSparseValues,
  toWireVector,
} from './vector.js';

export type { QuerySpec, WireQueryRequest, Usage, QueryResponse } from './query.js';
export { DEFAULT_TOP_K, UsageSchema, QueryResponseSchema } from './query.js';

export type { WireUpsertRequest, UpsertResponse } from './upsert.js';
export { UpsertResponseSchema } from './upsert.js';

export type { FetchResponse } from './fetch.js';
export { FetchResponseSchema } from './fetch.js';

export type { DeleteOptions, WireDeleteRequest, DeleteResponse } from './delete.js';
export { DeleteResponseSchema } from './delete.js';

export type {
  Metric,
  DeletionProtection,
  ServerlessSpec,
  PodSpec,
  WireIndexSpec,
  WireCreateIndexRequest,
  IndexStatus,
  IndexDescriptor,
  IndexSummary,
} from './control.js';
export {
  METRICS,
  DELETION_PROTECTION_MODES,
  IndexSpec,
  serializeIndexSpec,
  IndexDescriptorSchema,
  IndexListSchema,
} from './control.js';

export type {
  RerankDocument,
  RerankParameters,
  RerankOptions,
  WireRerankRequest,
  RerankResult,
  RerankUsage,
  RerankResponse,
} from './rerank.js';
export { RerankResponseSchema } from './rerank.js';
