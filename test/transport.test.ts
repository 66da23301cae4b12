import { describe, expect, it } from "vitest";
import { parseAgentList } from "../src/seqflow/agents/directory.js";
import {
  HttpTransport,
  describeErrorBody,
  unwrapEnvelope,
  type FetchLike
} from "../src/seqflow/http/transport.js";
import { silentLogger } from "../src/seqflow/logger.js";

function transportWith(fetch: FetchLike, overrides: { baseUrl?: string; apiPrefix?: string; timeoutMs?: number } = {}) {
  return new HttpTransport({
    baseUrl: overrides.baseUrl ?? "http://agents.test",
    apiPrefix: overrides.apiPrefix ?? "/api/v1",
    timeoutMs: overrides.timeoutMs ?? 1_000,
    logger: silentLogger,
    fetch
  });
}

const unused: FetchLike = async () => new Response(null, { status: 204 });

describe("HttpTransport URLs", () => {
  it("normalizes slashes around base URL and prefix", () => {
    const transport = transportWith(unused, { baseUrl: "http://agents.test:9000/", apiPrefix: "api/v1/" });
    expect(transport.apiUrl("/agents")).toBe("http://agents.test:9000/api/v1/agents");
    expect(transport.rootUrl("/health")).toBe("http://agents.test:9000/health");
  });

  it("supports an empty prefix", () => {
    expect(transportWith(unused, { apiPrefix: "" }).apiUrl("/agents")).toBe("http://agents.test/agents");
  });
});

describe("HttpTransport.requestJson", () => {
  it("sends JSON bodies with the expected headers", async () => {
    const seen: Array<{ url: string; init: RequestInit | undefined }> = [];
    const transport = transportWith(async (url, init) => {
      seen.push({ url, init });
      return new Response(JSON.stringify({ ok: true }), { status: 201 });
    });

    const response = await transport.requestJson("POST", transport.apiUrl("/sequential-workflows"), {
      body: { workflow_id: "w1" }
    });

    expect(response.status).toBe(201);
    expect(response.body).toEqual({ ok: true });
    expect(seen).toHaveLength(1);
    expect(seen[0]?.url).toBe("http://agents.test/api/v1/sequential-workflows");
    expect(seen[0]?.init?.method).toBe("POST");
    expect(seen[0]?.init?.headers).toEqual({ "Accept": "application/json", "Content-Type": "application/json" });
    expect(seen[0]?.init?.body).toBe('{"workflow_id":"w1"}');
  });

  it("returns non-JSON bodies as text and empty bodies as null", async () => {
    const text = await transportWith(async () => new Response("Bad Gateway", { status: 502 })).requestJson(
      "GET",
      "http://agents.test/x"
    );
    expect(text).toMatchObject({ status: 502, ok: false, body: "Bad Gateway" });

    const empty = await transportWith(unused).requestJson("DELETE", "http://agents.test/x");
    expect(empty).toMatchObject({ status: 204, ok: true, body: null });
  });

  it("maps a timeout to TIMEOUT", async () => {
    const hanging: FetchLike = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          const err = new Error("This operation was aborted");
          err.name = "AbortError";
          reject(err);
        });
      });

    await expect(
      transportWith(hanging, { timeoutMs: 20 }).requestJson("GET", "http://agents.test/api/v1/agents")
    ).rejects.toMatchObject({
      code: "TIMEOUT",
      message: "GET http://agents.test/api/v1/agents timed out after 20ms"
    });
  });

  it("reports a caller abort as an abort, not a timeout", async () => {
    const hanging: FetchLike = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          const err = new Error("This operation was aborted");
          err.name = "AbortError";
          reject(err);
        });
      });
    const controller = new AbortController();

    const pending = transportWith(hanging, { timeoutMs: 60_000 }).requestJson(
      "POST",
      "http://agents.test/api/v1/sequential-workflows/w1/execute",
      { signal: controller.signal }
    );
    controller.abort();

    await expect(pending).rejects.toMatchObject({
      code: "TRANSPORT_ERROR",
      message: "POST http://agents.test/api/v1/sequential-workflows/w1/execute was aborted",
      details: { aborted: true }
    });
  });

  it("maps network failures to TRANSPORT_ERROR", async () => {
    const refused: FetchLike = async () => {
      throw new TypeError("connect ECONNREFUSED");
    };

    await expect(transportWith(refused).requestJson("GET", "http://agents.test/health")).rejects.toMatchObject({
      code: "TRANSPORT_ERROR",
      message: "GET http://agents.test/health failed: connect ECONNREFUSED",
      details: { method: "GET", url: "http://agents.test/health" }
    });
  });
});

describe("envelope helpers", () => {
  it("unwraps object and array data", () => {
    expect(unwrapEnvelope({ success: true, data: { id: 1 } })).toEqual({ id: 1 });
    expect(unwrapEnvelope({ success: true, data: [1, 2] })).toEqual([1, 2]);
    expect(unwrapEnvelope({ success: true, data: "text" })).toEqual({ success: true, data: "text" });
    expect(unwrapEnvelope([1])).toEqual([1]);
  });

  it("describes error bodies", () => {
    expect(describeErrorBody({ success: false, error: "Workflow 'w1' not found" })).toBe("Workflow 'w1' not found");
    expect(describeErrorBody({ error: { message: "nested" } })).toBe("nested");
    expect(describeErrorBody({ message: "plain" })).toBe("plain");
    expect(describeErrorBody("Bad Gateway")).toBe("Bad Gateway");
    expect(describeErrorBody(null)).toBeUndefined();
  });

  it("parses agent lists with or without an envelope", () => {
    const agents = [
      { name: "writer", id: "abc-123", type: "llm" },
      { name: "", id: "skip-me" },
      { id: "no-name" }
    ];
    expect(parseAgentList({ success: true, data: agents })).toEqual([{ name: "writer", id: "abc-123" }]);
    expect(parseAgentList(agents)).toEqual([{ name: "writer", id: "abc-123" }]);
    expect(parseAgentList({ success: true })).toEqual([]);
  });
});
