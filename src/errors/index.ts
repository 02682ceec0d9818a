export { PineconeError, type PineconeErrorOptions } from './error.js';
export {
  InvalidArgumentError,
  IndexNotFoundError,
  ServiceError,
  DecodeError,
  BatchUpsertError,
  TimeoutError,
  NetworkError,
  type ChunkFailure,
} from './categories.js';
export {
  createErrorFromResponse,
  isPineconeError,
  toError,
  type NotFoundContext,
} from './mapping.js';
