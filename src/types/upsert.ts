import { z } from 'zod';
import type { WireVector } from './vector.js';

/**
 * Upsert body as sent to `POST /vectors/upsert`
 */
export interface WireUpsertRequest {
  vectors: WireVector[];
  namespace: string;
}

/**
 * Response from an upsert operation
 */
export interface UpsertResponse {
  /**
   * Number of vectors written
   */
  upsertedCount: number;
}

export const UpsertResponseSchema = z.object({
  upsertedCount: z.number().int().nonnegative(),
});
