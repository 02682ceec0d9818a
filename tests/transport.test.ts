/**
 * Unit tests for the HTTP transport
 */

import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { Agent } from "undici";
import { z } from "zod";
import {
  DecodeError,
  HttpTransport,
  IndexNotFoundError,
  InvalidArgumentError,
  NetworkError,
  ServiceError,
  TimeoutError,
  USER_AGENT,
  hostToBaseUrl,
} from "../src/index.js";
import { MemoryLogger, MockFetch, TEST_API_KEY } from "./helpers/mock-fetch.js";

const EchoSchema = z.object({ value: z.number() });

describe("HttpTransport", () => {
  let mock: MockFetch;
  let logger: MemoryLogger;
  let agent: Agent;
  let transport: HttpTransport;

  beforeEach(() => {
    mock = new MockFetch();
    logger = new MemoryLogger();
    agent = new Agent();
    transport = new HttpTransport({
      baseUrl: "https://service.test",
      apiKey: TEST_API_KEY,
      apiVersion: "2024-07",
      timeout: 50,
      userAgent: USER_AGENT,
      dispatcher: agent,
      logger,
      fetch: mock.fetch,
    });
  });

  afterEach(async () => {
    await agent.close();
  });

  it("should send the authentication and version headers", async () => {
    mock.on("POST", "/echo", { json: { value: 1 } });

    await transport.request({ method: "POST", path: "/echo", body: { a: 1 }, schema: EchoSchema });

    const headers = mock.requests[0]?.headers;
    expect(headers?.get("api-key")).toBe("test-secret");
    expect(headers?.get("content-type")).toBe("application/json");
    expect(headers?.get("x-pinecone-api-version")).toBe("2024-07");
    expect(headers?.get("user-agent")).toBe("pinecone-async-ts/0.1.0");
  });

  it("should send the body as JSON and decode the response", async () => {
    mock.on("POST", "/echo", { json: { value: 7, extra: true } });

    const response = await transport.request({
      method: "POST",
      path: "/echo",
      body: { top_k: 5 },
      schema: EchoSchema,
    });

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ value: 7 });
    expect(mock.requests[0]?.body).toEqual({ top_k: 5 });
  });

  it("should append array query parameters as repeated keys", async () => {
    mock.on("GET", "/items", { json: { value: 0 } });

    await transport.request({
      method: "GET",
      path: "/items",
      queryParams: { ids: ["a", "b"], namespace: "docs" },
      schema: EchoSchema,
    });

    const url = mock.requests[0]?.url;
    expect(url?.searchParams.getAll("ids")).toEqual(["a", "b"]);
    expect(url?.searchParams.get("namespace")).toBe("docs");
    expect(mock.requests[0]?.body).toBeUndefined();
  });

  it("should map a non-2xx status to ServiceError", async () => {
    mock.on("GET", "/fail", { status: 500, text: "internal" });

    const promise = transport.request({ method: "GET", path: "/fail", schema: EchoSchema });

    await expect(promise).rejects.toBeInstanceOf(ServiceError);
    await expect(promise).rejects.toMatchObject({ status: 500, body: "internal" });
  });

  it("should map 404 to IndexNotFoundError when the endpoint names an index", async () => {
    mock.on("GET", "/indexes/missing", { status: 404, text: "" });

    const promise = transport.request({
      method: "GET",
      path: "/indexes/missing",
      schema: EchoSchema,
      notFound: { indexName: "missing" },
    });

    await expect(promise).rejects.toBeInstanceOf(IndexNotFoundError);
    await expect(promise).rejects.toMatchObject({ indexName: "missing" });
  });

  it("should raise DecodeError for a body that is not JSON", async () => {
    mock.on("GET", "/echo", { text: "<html>" });

    await expect(
      transport.request({ method: "GET", path: "/echo", schema: EchoSchema })
    ).rejects.toBeInstanceOf(DecodeError);
  });

  it("should raise DecodeError for a body of the wrong shape", async () => {
    mock.on("GET", "/echo", { json: { value: "seven" } });

    await expect(
      transport.request({ method: "GET", path: "/echo", schema: EchoSchema })
    ).rejects.toThrow("Unexpected response shape from https://service.test/echo: value:");
  });

  it("should decode an empty body as undefined", async () => {
    mock.on("POST", "/empty", { text: "" });

    const response = await transport.request({
      method: "POST",
      path: "/empty",
      schema: z.record(z.unknown()).optional(),
    });

    expect(response.data).toBeUndefined();
  });

  it("should raise TimeoutError when the service does not answer in time", async () => {
    mock.on("GET", "/slow", { hang: true });

    const promise = transport.request({ method: "GET", path: "/slow", schema: EchoSchema });

    await expect(promise).rejects.toBeInstanceOf(TimeoutError);
    await expect(promise).rejects.toMatchObject({ timeoutMs: 50 });
  });

  it("should raise NetworkError when the request cannot be sent", async () => {
    mock.on("GET", "/down", () => {
      throw new TypeError("fetch failed");
    });

    const promise = transport.request({ method: "GET", path: "/down", schema: EchoSchema });

    await expect(promise).rejects.toBeInstanceOf(NetworkError);
    await expect(promise).rejects.toThrow("Network request failed: GET https://service.test/down");
  });

  it("should refuse requests once closed without sending anything", async () => {
    transport.markClosed();

    await expect(
      transport.request({ method: "GET", path: "/echo", schema: EchoSchema })
    ).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(mock.requests).toHaveLength(0);
  });

  it("should log each completed request at debug level", async () => {
    mock.on("GET", "/echo", { json: { value: 1 } });

    await transport.request({ method: "GET", path: "/echo", schema: EchoSchema });

    const entry = logger.at("debug")[0];
    expect(entry?.message).toBe("pinecone request completed");
    expect(entry?.context).toMatchObject({
      method: "GET",
      url: "https://service.test/echo",
      status: 200,
    });
    expect(entry?.context?.["durationMs"]).toEqual(expect.any(Number));
  });
});

describe("hostToBaseUrl", () => {
  it("should add https to a bare host", () => {
    expect(hostToBaseUrl("articles-abc.svc.pinecone.io")).toBe(
      "https://articles-abc.svc.pinecone.io"
    );
  });

  it("should keep an existing scheme and drop trailing slashes", () => {
    expect(hostToBaseUrl("http://localhost:5081/")).toBe("http://localhost:5081");
  });
});
