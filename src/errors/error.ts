/**
 * Options every client error is built from.
 */
export interface PineconeErrorOptions {
  /** Machine-readable category, e.g. 'invalid_argument' or 'service_error' */
  type: string;
  message: string;
  /** HTTP status of the response that caused the error */
  status?: number;
  /** Defaults to false */
  isRetryable?: boolean;
  details?: Record<string, unknown>;
  /** Underlying failure, kept as the standard `cause` */
  cause?: unknown;
}

/**
 * Base class of every error the client raises. Callers can branch on
 * `type`, or on the subclass with `instanceof`.
 */
export class PineconeError extends Error {
  public readonly type: string;

  public readonly status?: number;

  /**
   * Whether a caller-side retry may succeed. The client itself never retries.
   */
  public readonly isRetryable: boolean;

  public readonly details?: Record<string, unknown>;

  constructor(options: PineconeErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PineconeError';
    this.type = options.type;
    this.status = options.status;
    this.isRetryable = options.isRetryable ?? false;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Plain-object form for structured logs
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      isRetryable: this.isRetryable,
      details: this.details,
    };
  }
}
