import { z } from 'zod';
import type { MetadataFilter } from './metadata.js';
import { MatchResultSchema, type MatchResult, type SparseValues } from './vector.js';

/** Number of matches returned when a query names no `topK`. */
export const DEFAULT_TOP_K = 5;

/**
 * A similarity search request. Exactly one of `vector` or `id` is the
 * anchor; the combination is forwarded as given and judged by the service.
 */
export interface QuerySpec {
  /**
   * Dense query vector
   */
  vector?: number[];

  /**
   * ID of a stored vector to use as the query
   */
  id?: string;

  /**
   * Sparse component for hybrid search
   */
  sparseVector?: SparseValues;

  filter?: MetadataFilter;

  /**
   * Number of results to return (default 5)
   */
  topK?: number;

  includeValues?: boolean;

  includeMetadata?: boolean;
}

/**
 * Query body as sent to `POST /query`
 */
export interface WireQueryRequest {
  vector?: number[];
  id?: string;
  sparse_vector?: SparseValues;
  filter?: MetadataFilter;
  namespace: string;
  top_k: number;
  include_values: boolean;
  include_metadata: boolean;
}

/**
 * Read units consumed by a data-plane call
 */
export interface Usage {
  readUnits?: number;
}

export const UsageSchema = z
  .object({
    read_units: z.number().optional(),
    readUnits: z.number().optional(),
  })
  .transform((raw): Usage => {
    const readUnits = raw.read_units ?? raw.readUnits;
    return readUnits === undefined ? {} : { readUnits };
  });

/**
 * Response from a vector similarity query
 */
export interface QueryResponse {
  /**
   * Matches in the order the service returned them, highest score first
   */
  matches: MatchResult[];

  namespace: string;

  usage?: Usage;
}

export const QueryResponseSchema = z.object({
  matches: z.array(MatchResultSchema).default([]),
  namespace: z.string().default(''),
  usage: UsageSchema.optional(),
});
