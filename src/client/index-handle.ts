/**
 * Data-plane handle bound to one index and namespace.
 *
 * @module client/index-handle
 */

import { Agent } from 'undici';
import { z } from 'zod';
import type { PineconeConfig, ValidatedPineconeConfig } from '../config.js';
import { API_VERSION, USER_AGENT, validateConfig } from '../config.js';
import { IndexNotFoundError, InvalidArgumentError } from '../errors/index.js';
import { HttpTransport, hostToBaseUrl } from '../transport/http.js';
import { deleteVectors, fetchVectors, query, upsert } from '../operations/index.js';
import { batchUpsert, type BatchUpsertOptions, type BatchUpsertResponse } from '../batch/index.js';
import {
  DELETION_PROTECTION_MODES,
  IndexSpec,
  METRICS,
  type DeletionProtection,
  type IndexDescriptor,
  type Metric,
} from '../types/control.js';
import type { DeleteOptions, DeleteResponse } from '../types/delete.js';
import type { QuerySpec } from '../types/query.js';
import type { MatchResult, VectorRecord } from '../types/vector.js';
import { PineconeClientImpl } from './client.js';

/**
 * Upper bound on the ids a filtered delete resolves in one query. Matches
 * beyond it are not deleted.
 */
export const DELETE_BY_FILTER_LIMIT = 10000;

/**
 * Options for `PineconeIndex.create`
 */
export interface IndexHandleOptions {
  name: string;
  dimension: number;
  metric: Metric;
  /** Region used when the index has to be created */
  region: string;
  /** Cloud used when the index has to be created (default "aws") */
  cloud?: string;
  /** Namespace every data-plane call is scoped to (default "") */
  namespace?: string;
  deletionProtection?: DeletionProtection;
  /** Overrides the serverless spec built from `cloud` and `region` */
  spec?: IndexSpec;
}

const handleOptionsSchema = z.object({
  name: z.string().min(1, 'index name cannot be empty'),
  dimension: z.number().int().positive(),
  metric: z.enum(METRICS),
  region: z.string(),
  cloud: z.string().min(1).default('aws'),
  namespace: z.string().default(''),
  deletionProtection: z.enum(DELETION_PROTECTION_MODES).default('disabled'),
});

type ResolvedHandleOptions = z.infer<typeof handleOptionsSchema> & { spec?: IndexSpec };

function resolveOptions(options: IndexHandleOptions): ResolvedHandleOptions {
  const result = handleOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new InvalidArgumentError(`Invalid index options: ${issues.join(', ')}`, { issues });
  }
  return { ...result.data, spec: options.spec };
}

/**
 * Describes the index, creating it when it does not exist. Runs once per
 * handle.
 */
async function resolveOrCreate(
  config: ValidatedPineconeConfig,
  options: ResolvedHandleOptions
): Promise<IndexDescriptor> {
  const control = new PineconeClientImpl(config);
  try {
    return await control.describeIndex(options.name);
  } catch (error) {
    if (!(error instanceof IndexNotFoundError)) {
      throw error;
    }

    config.logger.info('index not found, creating it', {
      indexName: options.name,
      dimension: options.dimension,
      metric: options.metric,
    });

    return await control.createIndex(
      options.name,
      options.dimension,
      options.metric,
      options.spec ?? IndexSpec.serverless({ cloud: options.cloud, region: options.region }),
      options.deletionProtection
    );
  } finally {
    await control.close();
  }
}

/**
 * Handle for vector operations on one index namespace
 *
 * Only obtainable through `PineconeIndex.create`, which returns a handle
 * whose host is already resolved.
 *
 * @example
 * ```typescript
 * const index = await PineconeIndex.create(
 *   { apiKey },
 *   { name: 'articles', dimension: 8, metric: 'cosine', region: 'us-east-1' }
 * );
 * try {
 *   await index.upsert([{ id: 'a', values: [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8] }]);
 *   const matches = await index.query({ id: 'a', topK: 3, includeMetadata: true });
 * } finally {
 *   await index.close();
 * }
 * ```
 */
export class PineconeIndex {
  readonly name: string;
  readonly namespace: string;
  readonly descriptor: Readonly<IndexDescriptor>;

  private readonly config: ValidatedPineconeConfig;
  private readonly agent: Agent;
  private readonly transport: HttpTransport;
  private closing: Promise<void> | undefined;

  private constructor(
    config: ValidatedPineconeConfig,
    descriptor: IndexDescriptor,
    namespace: string
  ) {
    this.config = config;
    this.name = descriptor.name;
    this.namespace = namespace;
    this.descriptor = Object.freeze({
      ...descriptor,
      status: Object.freeze({ ...descriptor.status }),
      ...(descriptor.spec ? { spec: Object.freeze({ ...descriptor.spec }) } : {}),
    });
    this.agent = new Agent({ connections: config.maxConnections });
    this.transport = new HttpTransport({
      baseUrl: hostToBaseUrl(descriptor.host),
      apiKey: config.apiKey,
      apiVersion: API_VERSION,
      timeout: config.timeout,
      userAgent: USER_AGENT,
      dispatcher: this.agent,
      logger: config.logger,
      fetch: config.fetch,
    });
  }

  /**
   * Resolves the index (describing it, or creating it when it does not
   * exist) and returns a handle bound to its host.
   *
   * @throws {InvalidArgumentError} If the configuration or options are invalid
   * @throws {ServiceError} If describing or creating the index fails
   */
  static async create(config: PineconeConfig, options: IndexHandleOptions): Promise<PineconeIndex> {
    const validated = validateConfig(config);
    const resolved = resolveOptions(options);
    const descriptor = await resolveOrCreate(validated, resolved);

    if (descriptor.dimension !== resolved.dimension) {
      validated.logger.warn('index dimension differs from requested dimension', {
        indexName: descriptor.name,
        requested: resolved.dimension,
        actual: descriptor.dimension,
      });
    }

    return new PineconeIndex(validated, descriptor, resolved.namespace);
  }

  /**
   * Data-plane host of the index
   */
  get host(): string {
    return this.descriptor.host;
  }

  get dimension(): number {
    return this.descriptor.dimension;
  }

  /**
   * Writes vectors in one request.
   * @returns The number of vectors written
   */
  async upsert(vectors: VectorRecord[]): Promise<number> {
    this.assertOpen();
    const response = await upsert(
      { transport: this.transport },
      { vectors, namespace: this.namespace }
    );
    return response.upsertedCount;
  }

  /**
   * Writes vectors in chunks with bounded concurrency.
   * @throws {BatchUpsertError} If any chunk failed; raised after all chunks settled
   */
  async upsertBatch(
    vectors: readonly VectorRecord[],
    options: BatchUpsertOptions = {}
  ): Promise<BatchUpsertResponse> {
    this.assertOpen();
    return batchUpsert(
      { transport: this.transport, logger: this.config.logger },
      { vectors, namespace: this.namespace, options }
    );
  }

  /**
   * Similarity search; matches are in the order the service returned them.
   */
  async query(spec: QuerySpec): Promise<MatchResult[]> {
    this.assertOpen();
    const response = await query(
      { transport: this.transport },
      { spec, namespace: this.namespace }
    );
    return response.matches;
  }

  /**
   * Fetches vectors by id. Ids that do not exist are absent from the result.
   */
  async fetch(ids: string[]): Promise<Record<string, VectorRecord>> {
    this.assertOpen();
    const response = await fetchVectors(
      { transport: this.transport },
      { ids, namespace: this.namespace }
    );
    return response.vectors;
  }

  /**
   * Deletes by ids, by every vector in the namespace, or by filter.
   *
   * A filter without ids is resolved into ids first, with a zero-vector
   * query capped at DELETE_BY_FILTER_LIMIT matches. When nothing matches,
   * no delete request is sent and `{}` is returned.
   *
   * @throws {InvalidArgumentError} If none of ids, filter and deleteAll is given
   */
  async delete(options: DeleteOptions = {}): Promise<DeleteResponse> {
    this.assertOpen();
    const deleteAll = options.deleteAll ?? false;
    let ids = options.ids;
    const hasIds = ids !== undefined && ids.length > 0;
    // An empty filter matches everything; it counts as no filter.
    const filter =
      options.filter !== undefined && Object.keys(options.filter).length > 0
        ? options.filter
        : undefined;

    if (!hasIds && filter === undefined && !deleteAll) {
      throw new InvalidArgumentError('delete requires ids, a filter or deleteAll');
    }

    if (filter !== undefined && !hasIds) {
      const matches = await this.query({
        vector: new Array<number>(this.dimension).fill(0),
        filter,
        topK: DELETE_BY_FILTER_LIMIT,
      });

      if (matches.length === DELETE_BY_FILTER_LIMIT) {
        this.config.logger.warn('delete by filter may be truncated', {
          indexName: this.name,
          limit: DELETE_BY_FILTER_LIMIT,
        });
      }

      ids = matches.map((m) => m.id);
      if (ids.length === 0) {
        return {};
      }
    }

    return deleteVectors(
      { transport: this.transport },
      { ids, deleteAll, namespace: this.namespace }
    );
  }

  /**
   * Releases the handle's connection pool. Safe to call more than once.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.transport.markClosed();
      this.closing = this.agent.close().then(() => undefined);
    }
    return this.closing;
  }

  private assertOpen(): void {
    if (this.closing) {
      throw new InvalidArgumentError('Index handle has been closed');
    }
  }
}

/**
 * Runs `fn` with a fresh index handle and closes it on every exit path.
 */
export async function withIndex<R>(
  config: PineconeConfig,
  options: IndexHandleOptions,
  fn: (index: PineconeIndex) => Promise<R>
): Promise<R> {
  const index = await PineconeIndex.create(config, options);
  try {
    return await fn(index);
  } finally {
    await index.close();
  }
}
