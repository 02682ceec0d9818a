/**
 * Configuration types for the Pinecone client.
 * @module config
 */

import { z } from 'zod';
import { InvalidArgumentError } from './errors/index.js';
import { createLogger, type Logger } from './observability/index.js';
import type { FetchFunction } from './transport/http.js';

/** Control-plane root used when no controller host is configured. */
export const DEFAULT_CONTROLLER_HOST = 'https://api.pinecone.io';

/** API version sent on control-plane and data-plane requests. */
export const API_VERSION = '2024-07';

/** API version sent on rerank requests. */
export const RERANK_API_VERSION = '2024-10';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 30000;

/** Default number of pooled connections per origin. */
export const DEFAULT_MAX_CONNECTIONS = 10;

/** Rerank model used when neither the config nor the call names one. */
export const DEFAULT_RERANK_MODEL = 'cohere-rerank-3.5';

/**
 * Rerank models the hosted service is known to offer. Informational only:
 * model names are forwarded without checking them against this list.
 */
export const SUPPORTED_RERANK_MODELS = [
  'cohere-rerank-3.5',
  'bge-reranker-v2-m3',
  'pinecone-rerank-v0',
] as const;

/** User-Agent header value. */
export const USER_AGENT = 'pinecone-async-ts/0.1.0';

/**
 * Pinecone client configuration.
 */
export interface PineconeConfig {
  /** Pinecone API key (required). */
  apiKey: string;
  /** Control-plane and rerank root URL. */
  controllerHost?: string;
  /** Per-request timeout in milliseconds. */
  timeout?: number;
  /** Default rerank model. */
  rerankModel?: string;
  /** Connections kept per origin by the owned connection pool. */
  maxConnections?: number;
  /** Logger for request and batch diagnostics. */
  logger?: Logger;
  /** Fetch implementation; defaults to undici's fetch. */
  fetch?: FetchFunction;
}

/**
 * Validated Pinecone configuration with all defaults applied.
 */
export interface ValidatedPineconeConfig {
  apiKey: string;
  controllerHost: string;
  timeout: number;
  rerankModel: string;
  maxConnections: number;
  logger: Logger;
  fetch?: FetchFunction;
}

/**
 * Zod schema for the data fields of a configuration.
 */
const configSchema = z.object({
  apiKey: z
    .string({ required_error: 'API key is required' })
    .trim()
    .min(1, 'API key is required and cannot be empty'),
  controllerHost: z.string().url().default(DEFAULT_CONTROLLER_HOST),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT),
  rerankModel: z.string().min(1).default(DEFAULT_RERANK_MODEL),
  maxConnections: z.number().int().positive().default(DEFAULT_MAX_CONNECTIONS),
});

/**
 * Validates and returns a complete Pinecone configuration with defaults applied.
 * @throws {InvalidArgumentError} If required fields are missing or invalid.
 */
export function validateConfig(config: PineconeConfig): ValidatedPineconeConfig {
  const result = configSchema.safeParse({
    apiKey: config.apiKey,
    controllerHost: config.controllerHost,
    timeout: config.timeout,
    rerankModel: config.rerankModel,
    maxConnections: config.maxConnections,
  });

  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new InvalidArgumentError(`Invalid configuration: ${issues.join(', ')}`, { issues });
  }

  return {
    ...result.data,
    controllerHost: result.data.controllerHost.replace(/\/+$/, ''),
    logger: config.logger ?? createLogger(),
    fetch: config.fetch,
  };
}

/**
 * Fluent builder for PineconeConfig.
 */
export class PineconeConfigBuilder {
  private config: Partial<PineconeConfig> = {};

  apiKey(apiKey: string): this {
    this.config = { ...this.config, apiKey };
    return this;
  }

  controllerHost(controllerHost: string): this {
    this.config = { ...this.config, controllerHost };
    return this;
  }

  timeout(timeout: number): this {
    this.config = { ...this.config, timeout };
    return this;
  }

  rerankModel(rerankModel: string): this {
    this.config = { ...this.config, rerankModel };
    return this;
  }

  maxConnections(maxConnections: number): this {
    this.config = { ...this.config, maxConnections };
    return this;
  }

  logger(logger: Logger): this {
    this.config = { ...this.config, logger };
    return this;
  }

  fetch(fetch: FetchFunction): this {
    this.config = { ...this.config, fetch };
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {InvalidArgumentError} If the configuration is invalid.
   */
  build(): ValidatedPineconeConfig {
    return validateConfig({ ...this.config, apiKey: this.config.apiKey ?? '' });
  }
}

/**
 * Namespace for PineconeConfig-related utilities.
 */
export const PineconeConfig = {
  builder(): PineconeConfigBuilder {
    return new PineconeConfigBuilder();
  },

  validate(config: PineconeConfig): ValidatedPineconeConfig {
    return validateConfig(config);
  },
};

/**
 * Lists the rerank models the service is known to offer.
 */
export function listSupportedModels(): string[] {
  return [...SUPPORTED_RERANK_MODELS];
}
