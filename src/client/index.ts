/**
 * Client module exports
 * @module client
 */

export {
  PineconeClientImpl,
  createClient,
  withClient,
  type PineconeClient,
} from './client.js';

export {
  PineconeIndex,
  withIndex,
  DELETE_BY_FILTER_LIMIT,
  type IndexHandleOptions,
} from './index-handle.js';

