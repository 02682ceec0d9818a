import { fetch as undiciFetch } from 'undici';
import type { Dispatcher, Headers, RequestInit, Response } from 'undici';
import type { z } from 'zod';
import {
  DecodeError,
  InvalidArgumentError,
  NetworkError,
  TimeoutError,
  createErrorFromResponse,
  isPineconeError,
  type NotFoundContext,
} from '../errors/index.js';
import type { Logger } from '../observability/index.js';

/**
 * Fetch implementation used by the transport. Defaults to undici's fetch;
 * tests inject an in-process stand-in.
 */
export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Configuration for HTTP transport
 */
export interface HttpTransportConfig {
  /** Base URL requests are resolved against */
  baseUrl: string;
  /** API key for authentication */
  apiKey: string;
  /** Value of the X-Pinecone-API-Version header */
  apiVersion: string;
  /** Request timeout in milliseconds */
  timeout: number;
  /** User-Agent header value */
  userAgent: string;
  /** Connection pool the requests go through; owned by the caller */
  dispatcher: Dispatcher;
  /** Logger for request diagnostics */
  logger: Logger;
  /** Optional custom fetch implementation */
  fetch?: FetchFunction;
}

/**
 * Options for HTTP requests
 */
export interface RequestOptions<T> {
  /** HTTP method */
  method: 'GET' | 'POST' | 'DELETE' | 'PATCH';
  /** URL path (relative to base URL) */
  path: string;
  /** Request body (will be JSON stringified) */
  body?: unknown;
  /** Query parameters */
  queryParams?: Record<string, string | string[]>;
  /** Schema the 2xx body is decoded with */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Set on endpoints that address one named index */
  notFound?: NotFoundContext;
}

/**
 * HTTP response wrapper
 */
export interface HttpResponse<T> {
  /** HTTP status code */
  status: number;
  /** Decoded response data */
  data: T;
  /** Response headers */
  headers: Headers;
}

interface RawResponse {
  status: number;
  ok: boolean;
  headers: Headers;
  text: string;
}

/**
 * JSON-over-HTTPS transport. One `request` call is exactly one round trip;
 * nothing is retried.
 */
export class HttpTransport {
  private readonly config: HttpTransportConfig;
  private readonly fetchImpl: FetchFunction;
  private closed = false;

  constructor(config: HttpTransportConfig) {
    this.config = config;
    this.fetchImpl = config.fetch ?? undiciFetch;
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  /**
   * Makes an HTTP request and decodes the 2xx body with `options.schema`.
   * @throws {InvalidArgumentError} If the transport has been closed.
   * @throws {TimeoutError} If the timeout elapses before the body is read.
   * @throws {NetworkError} If the request cannot be completed.
   * @throws {IndexNotFoundError} On 404 when `options.notFound` is set.
   * @throws {ServiceError} On any other non-2xx status.
   * @throws {DecodeError} If the 2xx body does not match the schema.
   */
  async request<T>(options: RequestOptions<T>): Promise<HttpResponse<T>> {
    if (this.closed) {
      throw new InvalidArgumentError('Client has been closed');
    }

    const url = this.buildUrl(options.path, options.queryParams);
    const startedAt = Date.now();
    const raw = await this.send(url, options);

    this.config.logger.debug('pinecone request completed', {
      method: options.method,
      url,
      status: raw.status,
      durationMs: Date.now() - startedAt,
    });

    if (!raw.ok) {
      throw createErrorFromResponse(raw.status, raw.text, options.notFound);
    }

    return {
      status: raw.status,
      data: this.decode(raw.text, options.schema, url),
      headers: raw.headers,
    };
  }

  /**
   * Stops accepting requests. The dispatcher itself is released by its owner.
   */
  markClosed(): void {
    this.closed = true;
  }

  private async send<T>(url: string, options: RequestOptions<T>): Promise<RawResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      const response = await this.fetchImpl(url, {
        method: options.method,
        headers: this.buildHeaders(),
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
        dispatcher: this.config.dispatcher,
      });
      const text = await response.text();
      return { status: response.status, ok: response.ok, headers: response.headers, text };
    } catch (error) {
      if (isPineconeError(error)) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new TimeoutError(
          `Request timeout after ${this.config.timeout}ms: ${options.method} ${url}`,
          this.config.timeout
        );
      }
      throw new NetworkError(`Network request failed: ${options.method} ${url}`, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private decode<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, url: string): T {
    let json: unknown;

    if (text.trim() !== '') {
      try {
        json = JSON.parse(text);
      } catch (error) {
        throw new DecodeError(`Response from ${url} is not valid JSON`, {
          body: text,
          cause: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new DecodeError(`Unexpected response shape from ${url}: ${issues.join(', ')}`, {
        issues,
      });
    }

    return result.data;
  }

  /**
   * Builds the full URL with query parameters
   */
  private buildUrl(path: string, queryParams?: Record<string, string | string[]>): string {
    const url = new URL(this.config.baseUrl + path);

    if (queryParams) {
      for (const [key, value] of Object.entries(queryParams)) {
        const values = Array.isArray(value) ? value : [value];
        values.forEach((v) => url.searchParams.append(key, v));
      }
    }

    return url.toString();
  }

  /**
   * Builds request headers with authentication
   */
  private buildHeaders(): Record<string, string> {
    return {
      'Api-Key': this.config.apiKey,
      'Content-Type': 'application/json',
      'X-Pinecone-API-Version': this.config.apiVersion,
      'User-Agent': this.config.userAgent,
    };
  }
}

/**
 * Normalizes an index host into a base URL. Hosts returned by the control
 * plane carry no scheme; a host that already has one is kept as-is.
 */
export function hostToBaseUrl(host: string): string {
  const withScheme = /^https?:\/\//.test(host) ? host : `https://${host}`;
  return withScheme.replace(/\/+$/, '');
}
