/**
 * Thin fetch wrapper shared by the resolver, registrar and executors.
 *
 * Every JSON call gets its own AbortController-driven timeout; an external
 * signal, when given, aborts the request as well. Network failures and
 * caller aborts surface as TRANSPORT_ERROR, timeouts as TIMEOUT. HTTP
 * statuses are returned, never thrown: each caller owns its own status
 * policy.
 */

import { SeqflowError } from "../errors.js";
import type { Logger } from "../logger.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "POST" | "DELETE";

export type TransportOptions = {
  baseUrl: string;
  apiPrefix: string;
  timeoutMs: number;
  logger: Logger;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
};

export type RequestOptions = {
  body?: unknown;
  accept?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type JsonResponse = {
  status: number;
  ok: boolean;
  headers: Headers;
  /** Parsed JSON, the raw text when it is not JSON, or null for an empty body */
  body: unknown;
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Unwrap one level of the server's `{ success, data }` envelope.
 */
export function unwrapEnvelope(body: unknown): unknown {
  if (isRecord(body) && "data" in body && (isRecord(body.data) || Array.isArray(body.data))) {
    return body.data;
  }
  return body;
}

/**
 * Pull a human readable message out of an error envelope.
 */
export function describeErrorBody(body: unknown): string | undefined {
  if (typeof body === "string" && body.length > 0) return body;
  if (!isRecord(body)) return undefined;
  if (typeof body.error === "string") return body.error;
  if (isRecord(body.error) && typeof body.error.message === "string") return body.error.message;
  if (typeof body.message === "string") return body.message;
  return undefined;
}

function parseBody(text: string): unknown {
  if (text.length === 0) return null;
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

function linkSignal(external: AbortSignal | undefined, controller: AbortController): () => void {
  if (!external) return () => undefined;
  if (external.aborted) {
    controller.abort();
    return () => undefined;
  }
  const onAbort = (): void => controller.abort();
  external.addEventListener("abort", onAbort, { once: true });
  return () => external.removeEventListener("abort", onAbort);
}

export class HttpTransport {
  private readonly baseUrl: string;
  private readonly apiPrefix: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: TransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiPrefix = options.apiPrefix === "" ? "" : `/${options.apiPrefix.replace(/^\/+|\/+$/g, "")}`;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger;
  }

  /** URL of an API route (under the prefix). */
  apiUrl(path: string): string {
    return `${this.baseUrl}${this.apiPrefix}${path}`;
  }

  /** URL of a route at the server root (e.g. /health). */
  rootUrl(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  async requestJson(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<JsonResponse> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const unlink = linkSignal(options.signal, controller);
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.fetchImpl(url, this.buildInit(method, options, controller.signal));
      const text = await response.text();
      this.logger.debug(`${method} ${url} -> ${response.status}`);
      return {
        status: response.status,
        ok: response.ok,
        headers: response.headers,
        body: parseBody(text)
      };
    } catch (err) {
      throw this.toTransportError(err, method, url, options.signal?.aborted === true ? undefined : timeoutMs);
    } finally {
      clearTimeout(timeoutId);
      unlink();
    }
  }

  /**
   * Open a request and hand back the live Response so the caller can read
   * the body incrementally. The caller's signal is the only cancellation.
   */
  async open(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<Response> {
    try {
      const response = await this.fetchImpl(url, this.buildInit(method, options, options.signal));
      this.logger.debug(`${method} ${url} -> ${response.status} (streaming)`);
      return response;
    } catch (err) {
      throw this.toTransportError(err, method, url, undefined);
    }
  }

  private buildInit(method: HttpMethod, options: RequestOptions, signal: AbortSignal | undefined): RequestInit {
    const headers: Record<string, string> = {
      "Accept": options.accept ?? "application/json"
    };
    const init: RequestInit = { method, headers };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(options.body);
    }
    if (signal) {
      init.signal = signal;
    }
    return init;
  }

  /** `timeoutMs` is undefined when the abort came from the caller, not the timer. */
  private toTransportError(err: unknown, method: HttpMethod, url: string, timeoutMs: number | undefined): SeqflowError {
    if (err instanceof SeqflowError) return err;
    if (err instanceof Error && err.name === "AbortError") {
      if (timeoutMs === undefined) {
        return new SeqflowError("TRANSPORT_ERROR", `${method} ${url} was aborted`, { method, url, aborted: true });
      }
      return new SeqflowError("TIMEOUT", `${method} ${url} timed out after ${timeoutMs}ms`, { method, url });
    }
    const message = err instanceof Error ? err.message : String(err);
    return new SeqflowError("TRANSPORT_ERROR", `${method} ${url} failed: ${message}`, { method, url });
  }
}
