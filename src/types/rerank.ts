/**
 * Rerank request and response types.
 * @module types/rerank
 */

import { z } from 'zod';

/**
 * A candidate document. `text` is the default field the model reads;
 * `rankFields` can point it at other string fields.
 */
export interface RerankDocument {
  id?: string;
  text?: string;
  [field: string]: unknown;
}

/**
 * Model-specific parameters, forwarded verbatim.
 */
export interface RerankParameters {
  /** What to do with documents longer than the model's context */
  truncate?: string;
  [parameter: string]: unknown;
}

export interface RerankOptions {
  /** Model to score with; defaults to the client's configured model */
  model?: string;
  /** Number of results to return; the service returns all when absent */
  topN?: number;
  /** Echo each scored document in the results (default true) */
  returnDocuments?: boolean;
  parameters?: RerankParameters;
  /** Document fields the model ranks on */
  rankFields?: string[];
}

/**
 * Rerank body as sent to `POST /rerank`
 */
export interface WireRerankRequest {
  model: string;
  query: string;
  documents: RerankDocument[];
  top_n?: number;
  return_documents: boolean;
  parameters?: RerankParameters;
  rank_fields?: string[];
}

export interface RerankResult {
  /** Position of the document in the submitted list */
  index: number;
  score: number;
  document?: RerankDocument;
}

export interface RerankUsage {
  rerankUnits: number;
}

export interface RerankResponse {
  model?: string;
  /** Results by descending relevance */
  data: RerankResult[];
  usage: RerankUsage;
}

const RerankDocumentSchema = z
  .object({
    id: z.string().optional(),
    text: z.string().optional(),
  })
  .passthrough();

export const RerankResponseSchema = z
  .object({
    model: z.string().optional(),
    data: z.array(
      z.object({
        index: z.number().int().nonnegative(),
        score: z.number(),
        document: RerankDocumentSchema.optional(),
      })
    ),
    usage: z.object({ rerank_units: z.number().nonnegative() }),
  })
  .transform((raw): RerankResponse => {
    const response: RerankResponse = {
      data: raw.data.map((item): RerankResult => {
        const result: RerankResult = { index: item.index, score: item.score };
        if (item.document) result.document = { ...item.document };
        return result;
      }),
      usage: { rerankUnits: raw.usage.rerank_units },
    };
    if (raw.model !== undefined) response.model = raw.model;
    return response;
  });
