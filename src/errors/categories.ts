import { PineconeError } from './error.js';

/** Longest slice of a response body quoted in an error message. */
const MAX_BODY_IN_MESSAGE = 500;

function excerpt(body: string): string {
  return body.length > MAX_BODY_IN_MESSAGE ? `${body.slice(0, MAX_BODY_IN_MESSAGE)}...` : body;
}

/**
 * Error thrown when the caller breaks the client's contract (missing API key,
 * empty rerank documents, unknown index spec variant, ...). Raised before any
 * request is sent.
 */
export class InvalidArgumentError extends PineconeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'invalid_argument',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Error thrown when the control plane answers 404 for a named index
 */
export class IndexNotFoundError extends PineconeError {
  public readonly indexName: string;

  constructor(indexName: string, details?: Record<string, unknown>) {
    super({
      type: 'index_not_found',
      message: `Index \`${indexName}\` not found`,
      status: 404,
      isRetryable: false,
      details,
    });
    this.name = 'IndexNotFoundError';
    this.indexName = indexName;
  }
}

/**
 * Error thrown for any non-2xx response that has no more specific mapping.
 * Keeps the raw response body for diagnostics.
 */
export class ServiceError extends PineconeError {
  public readonly body: string;

  constructor(status: number, body: string, details?: Record<string, unknown>) {
    super({
      type: 'service_error',
      message: body
        ? `Request failed with status ${status}: ${excerpt(body)}`
        : `Request failed with status ${status}`,
      status,
      isRetryable: status === 429 || status >= 500,
      details,
    });
    this.name = 'ServiceError';
    this.body = body;
  }
}

/**
 * Error thrown when a 2xx response body is not JSON or does not match the
 * expected response shape
 */
export class DecodeError extends PineconeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'decode_error',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'DecodeError';
  }
}

/**
 * One failed chunk of a batched upsert
 */
export interface ChunkFailure {
  /** Position of the chunk in dispatch order */
  chunkIndex: number;
  /** Offset of the chunk's first vector in the input list */
  start: number;
  /** Offset one past the chunk's last vector */
  end: number;
  /** What the chunk's upsert failed with */
  error: Error;
}

/**
 * Aggregate error raised by a batched upsert after every chunk has settled
 */
export class BatchUpsertError extends PineconeError {
  public readonly failures: readonly ChunkFailure[];
  public readonly totalChunks: number;

  constructor(failures: ChunkFailure[], totalChunks: number) {
    const summary = failures
      .map((f) => `chunk ${f.chunkIndex} [${f.start}, ${f.end}): ${f.error.message}`)
      .join('; ');
    super({
      type: 'batch_upsert_error',
      message: `Batch upsert failed for ${failures.length} of ${totalChunks} chunks: ${summary}`,
      isRetryable: false,
      details: {
        failedChunks: failures.map((f) => f.chunkIndex),
      },
    });
    this.name = 'BatchUpsertError';
    this.failures = failures;
    this.totalChunks = totalChunks;
  }
}

/**
 * Error thrown when a request exceeds the configured per-call timeout
 */
export class TimeoutError extends PineconeError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super({
      type: 'timeout_error',
      message,
      isRetryable: true,
      details: { timeoutMs },
    });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error thrown when network-level failures occur (e.g., connection refused, DNS resolution failure)
 */
export class NetworkError extends PineconeError {
  constructor(message: string, cause?: unknown) {
    super({
      type: 'network_error',
      message,
      isRetryable: true,
      details: { cause: cause instanceof Error ? cause.message : String(cause) },
      cause,
    });
    this.name = 'NetworkError';
  }
}
