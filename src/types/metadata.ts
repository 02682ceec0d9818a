import { z } from 'zod';

/**
 * Valid metadata value types in Pinecone
 */
export type MetadataValue = string | number | boolean | string[];

/**
 * Metadata associated with a vector
 *
 * Metadata is a set of key-value pairs that can be attached to vectors and
 * used for filtering during queries.
 */
export type Metadata = Record<string, MetadataValue>;

export const MetadataSchema = z.record(
  z.union([z.string(), z.number(), z.boolean(), z.array(z.string())])
);

/**
 * Metadata predicate forwarded verbatim to the service, e.g.
 * `{ genre: { $eq: 'drama' } }`
 */
export type MetadataFilter = Record<string, unknown>;
