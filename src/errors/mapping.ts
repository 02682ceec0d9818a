/**
 * Status-code to error mapping shared by every client.
 * @module errors/mapping
 */

import { PineconeError } from './error.js';
import { IndexNotFoundError, ServiceError } from './categories.js';

/**
 * Marks a request as addressing one named index, so that a 404 means the
 * index itself does not exist.
 */
export interface NotFoundContext {
  indexName: string;
}

/**
 * Creates the error for a non-2xx response.
 * @param status - HTTP status code.
 * @param body - Raw response body text.
 * @param notFound - Set on index-addressed endpoints.
 */
export function createErrorFromResponse(
  status: number,
  body: string,
  notFound?: NotFoundContext
): PineconeError {
  if (status === 404 && notFound) {
    return new IndexNotFoundError(notFound.indexName, { body });
  }
  return new ServiceError(status, body);
}

/**
 * Type guard to check if an error is a PineconeError.
 */
export function isPineconeError(error: unknown): error is PineconeError {
  return error instanceof PineconeError;
}

/**
 * Normalizes anything thrown into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
