/**
 * Pinecone Client Module
 *
 * Control-plane client: index lifecycle (list, describe, create) against
 * the controller host, plus the stateless rerank endpoint.
 *
 * @module client
 */

import { Agent } from 'undici';
import type { PineconeConfig, ValidatedPineconeConfig } from '../config.js';
import { API_VERSION, RERANK_API_VERSION, USER_AGENT, validateConfig } from '../config.js';
import { InvalidArgumentError } from '../errors/index.js';
import { HttpTransport } from '../transport/http.js';
import type { DeletionProtection, IndexDescriptor, IndexSpec, IndexSummary, Metric } from '../types/control.js';
import type { RerankDocument, RerankOptions, RerankResponse } from '../types/rerank.js';
import { createIndex, describeIndex, listIndexes, rerank } from '../operations/index.js';

/**
 * Main Pinecone client interface
 */
export interface PineconeClient {
  /**
   * List the project's indexes as raw summaries
   */
  listIndexes(): Promise<IndexSummary[]>;

  /**
   * Describe one index; fails with IndexNotFoundError if it does not exist
   */
  describeIndex(name: string): Promise<IndexDescriptor>;

  /**
   * Create an index
   */
  createIndex(
    name: string,
    dimension: number,
    metric: Metric,
    spec: IndexSpec,
    deletionProtection?: DeletionProtection
  ): Promise<IndexDescriptor>;

  /**
   * Rerank documents by relevance to a query
   */
  rerank(query: string, documents: RerankDocument[], options?: RerankOptions): Promise<RerankResponse>;

  /**
   * Release the connection pool. Safe to call more than once.
   */
  close(): Promise<void>;

  /**
   * Get the current configuration
   */
  getConfig(): Readonly<ValidatedPineconeConfig>;
}

/**
 * Implementation of the Pinecone client
 */
export class PineconeClientImpl implements PineconeClient {
  private readonly config: ValidatedPineconeConfig;
  private readonly agent: Agent;
  private readonly transport: HttpTransport;
  private readonly rerankTransport: HttpTransport;
  private closing: Promise<void> | undefined;

  /**
   * @throws {InvalidArgumentError} If the configuration is invalid
   */
  constructor(config: PineconeConfig) {
    this.config = validateConfig(config);
    this.agent = new Agent({ connections: this.config.maxConnections });

    const shared = {
      baseUrl: this.config.controllerHost,
      apiKey: this.config.apiKey,
      timeout: this.config.timeout,
      userAgent: USER_AGENT,
      dispatcher: this.agent,
      logger: this.config.logger,
      fetch: this.config.fetch,
    };

    this.transport = new HttpTransport({ ...shared, apiVersion: API_VERSION });
    this.rerankTransport = new HttpTransport({ ...shared, apiVersion: RERANK_API_VERSION });
  }

  async listIndexes(): Promise<IndexSummary[]> {
    this.assertOpen();
    return listIndexes({ transport: this.transport });
  }

  async describeIndex(name: string): Promise<IndexDescriptor> {
    this.assertOpen();
    return describeIndex({ transport: this.transport }, name);
  }

  async createIndex(
    name: string,
    dimension: number,
    metric: Metric,
    spec: IndexSpec,
    deletionProtection: DeletionProtection = 'disabled'
  ): Promise<IndexDescriptor> {
    this.assertOpen();
    return createIndex(
      { transport: this.transport },
      { name, dimension, metric, spec, deletionProtection }
    );
  }

  async rerank(
    query: string,
    documents: RerankDocument[],
    options: RerankOptions = {}
  ): Promise<RerankResponse> {
    this.assertOpen();
    return rerank(
      { transport: this.rerankTransport, defaultModel: this.config.rerankModel },
      query,
      documents,
      options
    );
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.transport.markClosed();
      this.rerankTransport.markClosed();
      this.closing = this.agent.close().then(() => undefined);
    }
    return this.closing;
  }

  getConfig(): Readonly<ValidatedPineconeConfig> {
    return Object.freeze({ ...this.config });
  }

  private assertOpen(): void {
    if (this.closing) {
      throw new InvalidArgumentError('Client has been closed');
    }
  }
}

/**
 * Creates a new Pinecone client with the provided configuration
 *
 * The client owns a connection pool; call `close()` when done, or use
 * `withClient`.
 *
 * @example
 * ```typescript
 * import { createClient, IndexSpec } from 'pinecone-async';
 *
 * const client = createClient({ apiKey: process.env.PINECONE_API_KEY ?? '' });
 *
 * const index = await client.createIndex(
 *   'articles',
 *   1536,
 *   'cosine',
 *   IndexSpec.serverless({ cloud: 'aws', region: 'us-east-1' })
 * );
 * console.log(index.host);
 *
 * await client.close();
 * ```
 */
export function createClient(config: PineconeConfig): PineconeClient {
  return new PineconeClientImpl(config);
}

/**
 * Runs `fn` with a fresh client and closes it on every exit path.
 *
 * @example
 * ```typescript
 * const names = await withClient({ apiKey }, async (client) => {
 *   const indexes = await client.listIndexes();
 *   return indexes.map((i) => i['name']);
 * });
 * ```
 */
export async function withClient<R>(
  config: PineconeConfig,
  fn: (client: PineconeClient) => Promise<R>
): Promise<R> {
  const client = createClient(config);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
