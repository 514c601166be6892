import { describe, expect, it, vi } from "vitest";
import { Headers, Response } from "node-fetch";
import { z } from "zod";
import { buildUrl, createHttpClient, DEFAULT_USER_AGENT, type FetchFn } from "./http-client.js";

const SEARCH_URL = "https://www.songsterr.com/api/songs";

function respondWith(body: string, init?: { status?: number; statusText?: string }) {
  return vi.fn<FetchFn>(async () => new Response(body, init));
}

describe("buildUrl", () => {
  it("returns the url untouched without params", () => {
    expect(buildUrl(SEARCH_URL)).toBe(SEARCH_URL);
  });

  it("encodes params and skips undefined values", () => {
    expect(buildUrl(SEARCH_URL, { size: 5, pattern: "viagra boys", skip: undefined })).toBe(
      "https://www.songsterr.com/api/songs?size=5&pattern=viagra+boys"
    );
  });
});

describe("createHttpClient", () => {
  it("sends browser-like headers", async () => {
    const fetchImpl = respondWith("[]");
    const client = createHttpClient({ fetchImpl });

    await client.request(SEARCH_URL);

    const init = fetchImpl.mock.calls[0]?.[1];
    const headers = new Headers(init?.headers);
    expect(init?.method).toBe("GET");
    expect(headers.get("User-Agent")).toBe(DEFAULT_USER_AGENT);
    expect(headers.get("Accept-Language")).toBe("en-US,en;q=0.9");
  });

  it("JSON-encodes a POST body", async () => {
    const fetchImpl = respondWith("{}");
    const client = createHttpClient({ fetchImpl });

    await client.request(SEARCH_URL, { method: "POST", body: { pattern: "x" } });

    const init = fetchImpl.mock.calls[0]?.[1];
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"pattern":"x"}');
    expect(new Headers(init?.headers).get("Content-Type")).toBe("application/json");
  });

  it("returns the raw body bytes", async () => {
    const client = createHttpClient({ fetchImpl: respondWith("gp-bytes") });
    const body = await client.request(SEARCH_URL);
    expect(body.toString("utf-8")).toBe("gp-bytes");
  });

  it("parses and validates JSON with the given schema", async () => {
    const fetchImpl = respondWith('[{"songId":1},{"songId":2}]');
    const client = createHttpClient({ fetchImpl });
    const schema = z.array(z.object({ songId: z.number() }));

    await expect(client.getJson(SEARCH_URL, schema, { size: 2, pattern: "a b" })).resolves.toEqual([
      { songId: 1 },
      { songId: 2 },
    ]);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe("https://www.songsterr.com/api/songs?size=2&pattern=a+b");
  });

  it("raises a resolution error when the payload doesn't match the schema", async () => {
    const client = createHttpClient({ fetchImpl: respondWith('[{"songId":"one"}]') });
    const schema = z.array(z.object({ songId: z.number() }));

    await expect(client.getJson(SEARCH_URL, schema)).rejects.toMatchObject({
      kind: "resolution",
      code: "RESOLUTION_BAD_RESPONSE",
      details: "0.songId: Expected number, received string",
    });
  });

  it("raises a resolution error when the body isn't JSON", async () => {
    const client = createHttpClient({ fetchImpl: respondWith("<html></html>") });

    await expect(client.getJson(SEARCH_URL, z.unknown())).rejects.toMatchObject({
      kind: "resolution",
      details: "response body is not JSON",
    });
  });

  it("maps 404 to a not-found fetch error", async () => {
    const client = createHttpClient({
      fetchImpl: respondWith("missing", { status: 404, statusText: "Not Found" }),
    });

    await expect(client.request(SEARCH_URL)).rejects.toMatchObject({
      kind: "fetch",
      code: "FETCH_NOT_FOUND",
      message: "Request failed (404 Not Found)",
      target: SEARCH_URL,
    });
  });

  it("maps other non-2xx statuses to an HTTP status error", async () => {
    const client = createHttpClient({
      fetchImpl: respondWith("oops", { status: 503, statusText: "Service Unavailable" }),
    });

    await expect(client.request(SEARCH_URL)).rejects.toMatchObject({
      kind: "fetch",
      code: "FETCH_HTTP_STATUS",
    });
  });

  it("maps connection failures to a network error carrying the cause", async () => {
    const cause = new Error("connect ECONNREFUSED 127.0.0.1:443");
    const fetchImpl = vi.fn<FetchFn>(async () => {
      throw cause;
    });
    const client = createHttpClient({ fetchImpl });

    await expect(client.request(SEARCH_URL)).rejects.toMatchObject({
      kind: "fetch",
      code: "FETCH_NETWORK",
      message: "Couldn't reach www.songsterr.com",
      details: "connect ECONNREFUSED 127.0.0.1:443",
      cause,
    });
  });

  it("aborts and reports a timeout when the service doesn't answer", async () => {
    const fetchImpl = vi.fn<FetchFn>(
      (_url, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("The operation was aborted.")));
        })
    );
    const client = createHttpClient({ fetchImpl, timeoutMs: 20 });

    await expect(client.request(SEARCH_URL)).rejects.toMatchObject({
      kind: "fetch",
      code: "FETCH_TIMEOUT",
      message: "No response after 20ms",
    });
  });

  it("opens a body stream for downloads", async () => {
    const client = createHttpClient({ fetchImpl: respondWith("tab-data") });

    const stream = await client.stream("https://dl.example.com/1.gp5");
    const chunks: Buffer[] = [];
    for await (const chunk of stream.body) {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    }
    stream.close();

    expect(Buffer.concat(chunks).toString("utf-8")).toBe("tab-data");
    expect(stream.timedOut()).toBe(false);
  });
});
