import { z } from 'zod';
import type { MetadataFilter } from './metadata.js';

/**
 * What to delete from the handle's namespace
 */
export interface DeleteOptions {
  /**
   * IDs of specific vectors to delete
   */
  ids?: string[];

  /**
   * Delete every vector in the namespace
   */
  deleteAll?: boolean;

  /**
   * Resolve the ids to delete with a filtered query (used only when `ids`
   * is absent or empty)
   */
  filter?: MetadataFilter;
}

/**
 * Delete body as sent to `POST /vectors/delete`
 */
export interface WireDeleteRequest {
  ids?: string[];
  delete_all: boolean;
  namespace: string;
}

/**
 * Body returned by the delete endpoint; `{}` on success
 */
export type DeleteResponse = Record<string, unknown>;

export const DeleteResponseSchema = z
  .record(z.unknown())
  .optional()
  .transform((body): DeleteResponse => body ?? {});
