/**
 * Index lifecycle types for the control plane.
 * @module types/control
 */

import { z } from 'zod';
import { InvalidArgumentError } from '../errors/index.js';

/**
 * Similarity functions an index can score with.
 */
export const METRICS = ['cosine', 'euclidean', 'dotproduct'] as const;

export type Metric = (typeof METRICS)[number];

export const DELETION_PROTECTION_MODES = ['enabled', 'disabled'] as const;

export type DeletionProtection = (typeof DELETION_PROTECTION_MODES)[number];

/**
 * Serverless deployment.
 */
export interface ServerlessSpec {
  /** Cloud provider, e.g. "aws" */
  readonly cloud?: string;
  /** Cloud region, e.g. "us-east-1" */
  readonly region?: string;
}

/**
 * Pod-based deployment.
 */
export interface PodSpec {
  /** Pod environment, e.g. "us-east1-gcp" */
  readonly environment: string;
  readonly replicas?: number;
  readonly shards?: number;
  readonly pods?: number;
  /** Pod type and size, e.g. "p1.x1" */
  readonly podType?: string;
}

/**
 * Deployment topology requested for a new index.
 */
export type IndexSpec =
  | ({ readonly kind: 'serverless' } & ServerlessSpec)
  | ({ readonly kind: 'pod' } & PodSpec);

/**
 * IndexSpec factory functions.
 */
export const IndexSpec = {
  serverless(spec: ServerlessSpec = {}): IndexSpec {
    return { kind: 'serverless', ...spec };
  },
  pod(spec: PodSpec): IndexSpec {
    return { kind: 'pod', ...spec };
  },
};

/**
 * Index spec as sent in a create request.
 */
export type WireIndexSpec =
  | { serverless: { cloud?: string; region?: string } }
  | {
      pod: {
        environment: string;
        replicas?: number;
        shards?: number;
        pods?: number;
        pod_type?: string;
      };
    };

/**
 * Maps a spec variant to its wire key, leaving out absent fields.
 * @throws {InvalidArgumentError} If `spec` is neither a serverless nor a pod spec.
 */
export function serializeIndexSpec(spec: IndexSpec): WireIndexSpec {
  const kind: unknown = typeof spec === 'object' && spec !== null ? spec.kind : undefined;

  if (kind === 'serverless' && spec.kind === 'serverless') {
    const serverless: { cloud?: string; region?: string } = {};
    if (spec.cloud !== undefined) serverless.cloud = spec.cloud;
    if (spec.region !== undefined) serverless.region = spec.region;
    return { serverless };
  }

  if (kind === 'pod' && spec.kind === 'pod') {
    if (!spec.environment) {
      throw new InvalidArgumentError('Pod spec requires an environment');
    }
    const pod: {
      environment: string;
      replicas?: number;
      shards?: number;
      pods?: number;
      pod_type?: string;
    } = { environment: spec.environment };
    if (spec.replicas !== undefined) pod.replicas = spec.replicas;
    if (spec.shards !== undefined) pod.shards = spec.shards;
    if (spec.pods !== undefined) pod.pods = spec.pods;
    if (spec.podType !== undefined) pod.pod_type = spec.podType;
    return { pod };
  }

  throw new InvalidArgumentError('spec must be either a serverless or a pod spec', {
    kind: String(kind),
  });
}

/**
 * Body of `POST /indexes`.
 */
export interface WireCreateIndexRequest {
  name: string;
  dimension: number;
  metric: Metric;
  spec: WireIndexSpec;
  deletion_protection: DeletionProtection;
}

/**
 * Index readiness as reported by the control plane.
 */
export interface IndexStatus {
  ready: boolean;
  state: string;
}

/**
 * Metadata about an existing index.
 */
export interface IndexDescriptor {
  name: string;
  metric: Metric;
  /** Fixed for the lifetime of the index */
  dimension: number;
  /** Data-plane host the index is served from */
  host: string;
  status: IndexStatus;
  deletionProtection: DeletionProtection;
  /** Deployment spec as echoed by the service */
  spec?: Record<string, unknown>;
}

export const IndexDescriptorSchema = z
  .object({
    name: z.string().min(1),
    metric: z.enum(METRICS),
    dimension: z.number().int().positive(),
    host: z.string().min(1),
    status: z.object({
      ready: z.boolean(),
      state: z.string(),
    }),
    deletion_protection: z.enum(DELETION_PROTECTION_MODES).default('disabled'),
    spec: z.record(z.unknown()).optional(),
  })
  .transform((raw): IndexDescriptor => {
    const descriptor: IndexDescriptor = {
      name: raw.name,
      metric: raw.metric,
      dimension: raw.dimension,
      host: raw.host,
      status: { ready: raw.status.ready, state: raw.status.state },
      deletionProtection: raw.deletion_protection,
    };
    if (raw.spec) descriptor.spec = raw.spec;
    return descriptor;
  });

/**
 * Raw index entry from `GET /indexes`.
 */
export type IndexSummary = Record<string, unknown>;

export const IndexListSchema = z
  .union([
    z.array(z.record(z.unknown())),
    z.object({ indexes: z.array(z.record(z.unknown())) }),
  ])
  .transform((body): IndexSummary[] => (Array.isArray(body) ? body : body.indexes));
