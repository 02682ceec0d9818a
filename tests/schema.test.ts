/**
 * Unit tests for the wire schemas and serializers
 */

import { describe, it, expect } from "vitest";
import { IndexSpec, InvalidArgumentError, type VectorRecord } from "../src/index.js";
import {
  IndexDescriptorSchema,
  IndexListSchema,
  MatchResultSchema,
  QueryResponseSchema,
  RerankResponseSchema,
  VectorRecordSchema,
  serializeIndexSpec,
  toWireVector,
} from "../src/types/index.js";
import { describeBody } from "./helpers/mock-fetch.js";

describe("serializeIndexSpec", () => {
  it("should serialize a serverless spec under its wire key", () => {
    expect(serializeIndexSpec(IndexSpec.serverless({ cloud: "aws", region: "us-east-1" }))).toEqual({
      serverless: { cloud: "aws", region: "us-east-1" },
    });
  });

  it("should omit absent serverless fields", () => {
    const wire = serializeIndexSpec(IndexSpec.serverless({ region: "eu-west-1" }));

    expect(wire).toEqual({ serverless: { region: "eu-west-1" } });
    expect(Object.keys(wire)).toEqual(["serverless"]);
    if ("serverless" in wire) {
      expect(Object.keys(wire.serverless)).toEqual(["region"]);
    }
  });

  it("should serialize a pod spec with snake_case fields", () => {
    const spec = IndexSpec.pod({
      environment: "us-east1-gcp",
      replicas: 2,
      shards: 1,
      podType: "p1.x1",
    });

    expect(serializeIndexSpec(spec)).toEqual({
      pod: { environment: "us-east1-gcp", replicas: 2, shards: 1, pod_type: "p1.x1" },
    });
  });

  it("should reject a value that is neither variant", () => {
    const bogus: IndexSpec = JSON.parse('{"kind":"dedicated","region":"us-east-1"}');

    expect(() => serializeIndexSpec(bogus)).toThrow(InvalidArgumentError);
    expect(() => serializeIndexSpec(bogus)).toThrow("spec must be either a serverless or a pod spec");
  });

  it("should reject a pod spec without an environment", () => {
    expect(() => serializeIndexSpec(IndexSpec.pod({ environment: "" }))).toThrow(
      "Pod spec requires an environment"
    );
  });
});

describe("IndexDescriptorSchema", () => {
  it("should decode a describe body into camelCase fields", () => {
    expect(IndexDescriptorSchema.parse(describeBody())).toEqual({
      name: "articles",
      metric: "cosine",
      dimension: 3,
      host: "articles-abc123.svc.test.pinecone.io",
      status: { ready: true, state: "Ready" },
      deletionProtection: "disabled",
      spec: { serverless: { cloud: "aws", region: "us-east-1" } },
    });
  });

  it("should default deletion protection to disabled", () => {
    const body = describeBody();
    delete body["deletion_protection"];

    expect(IndexDescriptorSchema.parse(body).deletionProtection).toBe("disabled");
  });

  it("should reject an unknown metric, a zero dimension or an empty host", () => {
    expect(IndexDescriptorSchema.safeParse(describeBody({ metric: "hamming" })).success).toBe(false);
    expect(IndexDescriptorSchema.safeParse(describeBody({ dimension: 0 })).success).toBe(false);
    expect(IndexDescriptorSchema.safeParse(describeBody({ host: "" })).success).toBe(false);
  });
});

describe("IndexListSchema", () => {
  it("should accept a bare array", () => {
    expect(IndexListSchema.parse([{ name: "a" }, { name: "b" }])).toEqual([
      { name: "a" },
      { name: "b" },
    ]);
  });

  it("should unwrap an indexes envelope", () => {
    expect(IndexListSchema.parse({ indexes: [{ name: "a" }] })).toEqual([{ name: "a" }]);
  });
});

describe("vector records", () => {
  it("should survive a trip through the wire shape", () => {
    const record: VectorRecord = {
      id: "doc-1",
      values: [0.1, 0.2, 0.3],
      sparseValues: { indices: [4, 9], values: [0.5, 0.25] },
      metadata: { genre: "drama", year: 2020, draft: false, tags: ["a", "b"] },
    };

    const wire = toWireVector(record);
    expect(wire).toEqual({
      id: "doc-1",
      values: [0.1, 0.2, 0.3],
      sparse_values: { indices: [4, 9], values: [0.5, 0.25] },
      metadata: { genre: "drama", year: 2020, draft: false, tags: ["a", "b"] },
    });

    const decoded = VectorRecordSchema.parse(JSON.parse(JSON.stringify(wire)));
    expect(decoded).toEqual(record);
  });

  it("should accept camelCase sparse values and a missing values array", () => {
    expect(
      VectorRecordSchema.parse({ id: "s", sparseValues: { indices: [1], values: [2] } })
    ).toEqual({ id: "s", values: [], sparseValues: { indices: [1], values: [2] } });
  });

  it("should reject sparse arrays of different lengths when decoding", () => {
    expect(
      VectorRecordSchema.safeParse({
        id: "s",
        values: [],
        sparse_values: { indices: [1, 2], values: [2] },
      }).success
    ).toBe(false);
  });

  it("should reject an empty id before sending", () => {
    expect(() => toWireVector({ id: "", values: [1] })).toThrow("Vector id cannot be empty");
  });

  it("should reject sparse arrays of different lengths before sending", () => {
    expect(() =>
      toWireVector({ id: "v", values: [1], sparseValues: { indices: [1, 2], values: [1] } })
    ).toThrow("Vector v: sparse indices (2) and values (1) must have the same length");
  });
});

describe("query responses", () => {
  it("should decode matches in the order given", () => {
    const response = QueryResponseSchema.parse({
      matches: [
        { id: "b", score: 0.9, metadata: { genre: "drama" } },
        { id: "a", score: 0.95 },
      ],
      namespace: "docs",
      usage: { read_units: 5 },
    });

    expect(response).toEqual({
      matches: [
        { id: "b", score: 0.9, metadata: { genre: "drama" } },
        { id: "a", score: 0.95 },
      ],
      namespace: "docs",
      usage: { readUnits: 5 },
    });
  });

  it("should default matches and namespace", () => {
    expect(QueryResponseSchema.parse({})).toEqual({ matches: [], namespace: "" });
  });

  it("should map sparse values on a match", () => {
    expect(
      MatchResultSchema.parse({
        id: "a",
        score: 1,
        values: [1, 0],
        sparse_values: { indices: [0], values: [1] },
      })
    ).toEqual({ id: "a", score: 1, values: [1, 0], sparseValues: { indices: [0], values: [1] } });
  });
});

describe("RerankResponseSchema", () => {
  it("should decode results and usage", () => {
    expect(
      RerankResponseSchema.parse({
        model: "cohere-rerank-3.5",
        data: [
          { index: 1, score: 0.8, document: { id: "b", text: "two", lang: "en" } },
          { index: 0, score: 0.1 },
        ],
        usage: { rerank_units: 1 },
      })
    ).toEqual({
      model: "cohere-rerank-3.5",
      data: [
        { index: 1, score: 0.8, document: { id: "b", text: "two", lang: "en" } },
        { index: 0, score: 0.1 },
      ],
      usage: { rerankUnits: 1 },
    });
  });

  it("should reject a response without usage", () => {
    expect(RerankResponseSchema.safeParse({ data: [] }).success).toBe(false);
  });
});
