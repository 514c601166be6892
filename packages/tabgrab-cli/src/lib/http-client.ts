import fetch, { Headers, type RequestInit, type Response } from "node-fetch";
import type { z } from "zod";
import { httpStatus, networkFailure, requestTimeout, unexpectedResponse } from "./errors/catalog.js";
import { createNoopLogger, type Logger } from "./logger.js";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number | undefined>;

export type HttpMethod = "GET" | "POST";

export interface RequestOptions {
  method?: HttpMethod;
  params?: QueryParams;
  /** JSON-encoded when present */
  body?: unknown;
  timeoutMs?: number;
}

export interface HttpStream {
  body: NonNullable<Response["body"]>;
  /** True once the request timer has fired and aborted the body */
  timedOut(): boolean;
  /** Stop the request timer. Call once the body is consumed. */
  close(): void;
}

export interface HttpClient {
  request(url: string, options?: RequestOptions): Promise<Buffer>;
  getJson<S extends z.ZodTypeAny>(url: string, schema: S, params?: QueryParams): Promise<z.infer<S>>;
  stream(url: string, timeoutMs?: number): Promise<HttpStream>;
}

export interface HttpClientOptions {
  timeoutMs?: number;
  downloadTimeoutMs?: number;
  userAgent?: string;
  fetchImpl?: FetchFn;
  logger?: Logger;
}

/** Songsterr rejects requests that don't look like a browser. */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36";

export const DEFAULT_TIMEOUT_MS = 15_000;
export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 30_000;

export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) return url;
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) target.searchParams.set(key, String(value));
  }
  return target.toString();
}

interface OpenResponse {
  response: Response;
  timedOut(): boolean;
  close(): void;
}

export function createHttpClient({
  timeoutMs = DEFAULT_TIMEOUT_MS,
  downloadTimeoutMs = DEFAULT_DOWNLOAD_TIMEOUT_MS,
  userAgent = DEFAULT_USER_AGENT,
  fetchImpl = fetch,
  logger = createNoopLogger()
}: HttpClientOptions = {}): HttpClient {
  const log = logger.child({ component: "http" });

  async function open(url: string, options: RequestOptions, limitMs: number): Promise<OpenResponse> {
    const method = options.method ?? "GET";
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, limitMs);

    const headers = new Headers();
    headers.set("User-Agent", userAgent);
    headers.set("Accept", "application/json, */*;q=0.8");
    headers.set("Accept-Language", "en-US,en;q=0.9");

    const init: RequestInit = { method, headers, signal: controller.signal };
    if (options.body !== undefined) {
      headers.set("Content-Type", "application/json");
      init.body = JSON.stringify(options.body);
    }

    const startedAt = Date.now();
    let response: Response;
    try {
      response = await fetchImpl(url, init);
    } catch (error) {
      clearTimeout(timer);
      log.debug("Request failed", { method, url, error: String(error) });
      if (timedOut) throw requestTimeout(url, limitMs);
      throw networkFailure(url, error);
    }

    log.debug("Request completed", {
      method,
      url,
      status: response.status,
      durationMs: Date.now() - startedAt,
    });

    if (!response.ok) {
      clearTimeout(timer);
      throw httpStatus(url, response.status, response.statusText);
    }

    return {
      response,
      timedOut: () => timedOut,
      close: () => clearTimeout(timer),
    };
  }

  async function request(url: string, options: RequestOptions = {}): Promise<Buffer> {
    const target = buildUrl(url, options.params);
    const limitMs = options.timeoutMs ?? timeoutMs;
    const opened = await open(target, options, limitMs);
    try {
      return Buffer.from(await opened.response.arrayBuffer());
    } catch (error) {
      if (opened.timedOut()) throw requestTimeout(target, limitMs);
      throw networkFailure(target, error);
    } finally {
      opened.close();
    }
  }

  async function getJson<S extends z.ZodTypeAny>(
    url: string,
    schema: S,
    params?: QueryParams
  ): Promise<z.infer<S>> {
    const target = buildUrl(url, params);
    const body = await request(target);

    let payload: unknown;
    try {
      payload = JSON.parse(body.toString("utf-8"));
    } catch {
      throw unexpectedResponse(target, ["response body is not JSON"]);
    }

    const result = schema.safeParse(payload);
    if (!result.success) {
      const issues = result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      );
      throw unexpectedResponse(target, issues);
    }
    return result.data;
  }

  async function stream(url: string, limitMs: number = downloadTimeoutMs): Promise<HttpStream> {
    const opened = await open(url, {}, limitMs);
    const body = opened.response.body;
    if (!body) {
      opened.close();
      throw unexpectedResponse(url, ["response has no body"]);
    }
    return {
      body,
      timedOut: opened.timedOut,
      close: opened.close,
    };
  }

  return { request, getJson, stream };
}
