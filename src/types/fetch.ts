import { z } from 'zod';
import { VectorRecordSchema, type VectorRecord } from './vector.js';
import { UsageSchema, type Usage } from './query.js';

/**
 * Response from a fetch operation
 */
export interface FetchResponse {
  /**
   * Vectors that were found, keyed by id. Ids that do not exist are absent.
   */
  vectors: Record<string, VectorRecord>;

  namespace: string;

  usage?: Usage;
}

export const FetchResponseSchema = z.object({
  vectors: z.record(VectorRecordSchema).default({}),
  namespace: z.string().default(''),
  usage: UsageSchema.optional(),
});
