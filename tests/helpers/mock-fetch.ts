/**
 * In-process stand-in for the hosted service. Injected through
 * `config.fetch`; records every request and answers from registered routes.
 */

import { Headers, Response } from 'undici';
import type { RequestInit } from 'undici';
import type { FetchFunction, LogContext, LogLevel, Logger } from '../../src/index.js';

export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  /** Parsed JSON body, undefined for GET */
  body: unknown;
}

export interface MockReply {
  status?: number;
  /** Serialized as JSON */
  json?: unknown;
  /** Sent verbatim; wins over `json` */
  text?: string;
  /** Milliseconds to wait before answering */
  delayMs?: number;
  /** Never answer; reject once the request is aborted */
  hang?: boolean;
}

export type Responder = (request: RecordedRequest) => MockReply | Promise<MockReply>;

interface Route {
  method: string;
  path: string;
  responder: Responder;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function waitForAbort(signal: RequestInit['signal']): Promise<never> {
  return new Promise((_, reject) => {
    if (!signal) return;
    signal.addEventListener('abort', () => reject(new Error('The operation was aborted')));
  });
}

export class MockFetch {
  readonly requests: RecordedRequest[] = [];
  inFlight = 0;
  maxInFlight = 0;

  private readonly routes: Route[] = [];

  /**
   * Registers a route; later registrations for the same method and path win.
   */
  on(method: string, path: string, reply: MockReply | Responder): this {
    const responder: Responder = typeof reply === 'function' ? reply : () => reply;
    this.routes.unshift({ method, path, responder });
    return this;
  }

  /**
   * Requests sent to `path`, in order
   */
  calls(path: string): RecordedRequest[] {
    return this.requests.filter((r) => r.url.pathname === path);
  }

  readonly fetch: FetchFunction = async (input: string, init: RequestInit): Promise<Response> => {
    const request: RecordedRequest = {
      method: init.method ?? 'GET',
      url: new URL(input),
      headers: new Headers(init.headers),
      body: typeof init.body === 'string' ? JSON.parse(init.body) : undefined,
    };
    this.requests.push(request);

    const route = this.routes.find(
      (r) => r.method === request.method && r.path === request.url.pathname
    );
    if (!route) {
      return new Response(`no route for ${request.method} ${request.url.pathname}`, {
        status: 599,
      });
    }

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const reply = await route.responder(request);
      if (reply.hang) {
        await waitForAbort(init.signal);
      }
      if (reply.delayMs !== undefined) {
        await sleep(reply.delayMs);
      }
      const text = reply.text ?? (reply.json === undefined ? '' : JSON.stringify(reply.json));
      return new Response(text, {
        status: reply.status ?? 200,
        headers: { 'content-type': 'application/json' },
      });
    } finally {
      this.inFlight--;
    }
  };
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/**
 * Logger that keeps every record in memory
 */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  log(level: LogLevel, message: string, context?: LogContext): void {
    this.entries.push({ level, message, context });
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  at(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }
}

export const TEST_API_KEY = 'test-secret';

export const INDEX_HOST = 'articles-abc123.svc.test.pinecone.io';

/**
 * Describe body for an index named `articles`
 */
export function describeBody(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: 'articles',
    metric: 'cosine',
    dimension: 3,
    host: INDEX_HOST,
    status: { ready: true, state: 'Ready' },
    deletion_protection: 'disabled',
    spec: { serverless: { cloud: 'aws', region: 'us-east-1' } },
    ...overrides,
  };
}
