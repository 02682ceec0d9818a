import { z } from 'zod';
import { InvalidArgumentError } from '../errors/index.js';
import { MetadataSchema, type Metadata } from './metadata.js';

/**
 * Sparse vector values for hybrid search
 *
 * Sparse vectors are represented by their non-zero indices and corresponding
 * values; both arrays always have the same length.
 */
export interface SparseValues {
  indices: number[];
  values: number[];
}

/**
 * A vector with its associated metadata
 */
export interface VectorRecord {
  /**
   * Identifier, unique within a namespace
   */
  id: string;

  /**
   * Dense vector values; length must equal the index dimension
   */
  values: number[];

  sparseValues?: SparseValues;

  metadata?: Metadata;
}

/**
 * One query hit
 */
export interface MatchResult {
  id: string;

  /**
   * Similarity under the index metric
   */
  score: number;

  values?: number[];

  sparseValues?: SparseValues;

  metadata?: Metadata;
}

/**
 * Vector as it travels in request bodies
 */
export interface WireVector {
  id: string;
  values: number[];
  sparse_values?: SparseValues;
  metadata?: Metadata;
}

export const SparseValuesSchema = z
  .object({
    indices: z.array(z.number().int().nonnegative()),
    values: z.array(z.number()),
  })
  .refine((sparse) => sparse.indices.length === sparse.values.length, {
    message: 'sparse indices and values must have the same length',
  });

export const VectorRecordSchema = z
  .object({
    id: z.string().min(1),
    values: z.array(z.number()).default([]),
    sparse_values: SparseValuesSchema.optional(),
    sparseValues: SparseValuesSchema.optional(),
    metadata: MetadataSchema.optional(),
  })
  .transform((raw): VectorRecord => {
    const record: VectorRecord = { id: raw.id, values: raw.values };
    const sparse = raw.sparse_values ?? raw.sparseValues;
    if (sparse) record.sparseValues = sparse;
    if (raw.metadata) record.metadata = raw.metadata;
    return record;
  });

export const MatchResultSchema = z
  .object({
    id: z.string(),
    score: z.number(),
    values: z.array(z.number()).optional(),
    sparse_values: SparseValuesSchema.optional(),
    sparseValues: SparseValuesSchema.optional(),
    metadata: MetadataSchema.optional(),
  })
  .transform((raw): MatchResult => {
    const match: MatchResult = { id: raw.id, score: raw.score };
    if (raw.values) match.values = raw.values;
    const sparse = raw.sparse_values ?? raw.sparseValues;
    if (sparse) match.sparseValues = sparse;
    if (raw.metadata) match.metadata = raw.metadata;
    return match;
  });

/**
 * Checks that a sparse component has parallel arrays of equal length.
 * @throws {InvalidArgumentError} If the lengths differ.
 */
export function assertSparseValues(sparse: SparseValues, owner: string): void {
  if (sparse.indices.length !== sparse.values.length) {
    throw new InvalidArgumentError(
      `${owner}: sparse indices (${sparse.indices.length}) and values (${sparse.values.length}) must have the same length`
    );
  }
}

/**
 * Serializes a vector record into its wire shape.
 * @throws {InvalidArgumentError} If the id is empty or the sparse component is malformed.
 */
export function toWireVector(vector: VectorRecord): WireVector {
  if (!vector.id) {
    throw new InvalidArgumentError('Vector id cannot be empty');
  }

  const wire: WireVector = { id: vector.id, values: vector.values };

  if (vector.sparseValues) {
    assertSparseValues(vector.sparseValues, `Vector ${vector.id}`);
    wire.sparse_values = {
      indices: vector.sparseValues.indices,
      values: vector.sparseValues.values,
    };
  }

  if (vector.metadata) {
    wire.metadata = vector.metadata;
  }

  return wire;
}
