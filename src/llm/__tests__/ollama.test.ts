import { describe, it, expect, vi, afterEach } from "vitest";
import { OllamaClient, hasModel, resolveBaseUrl } from "../ollama.js";
import { SmartPathConfig } from "../../schemas/config.js";

const config = SmartPathConfig.parse({});

function stubFetch(impl: (url: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("resolveBaseUrl", () => {
  it("pins localhost to IPv4 and drops trailing slashes", () => {
    expect(resolveBaseUrl("http://localhost:11434/")).toBe("http://127.0.0.1:11434");
    expect(resolveBaseUrl("http://models.internal:8080")).toBe("http://models.internal:8080");
  });
});

describe("hasModel", () => {
  it("matches an implicit latest tag", () => {
    expect(hasModel(["llama3.2:latest"], "llama3.2")).toBe(true);
    expect(hasModel(["qwen2:0.5b"], "llama3.2")).toBe(false);
  });
});

describe("OllamaClient.chat", () => {
  it("posts a non-streaming chat request and returns the reply", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ message: { role: "assistant", content: "short" }, done: true }));
    const client = new OllamaClient(config);

    const result = await client.chat([{ role: "user", content: "condense" }], 1000);

    expect(result).toEqual({ success: true, value: "short" });
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("http://127.0.0.1:11434/api/chat");
    expect(call?.[1]?.method).toBe("POST");
    expect(JSON.parse(String(call?.[1]?.body))).toEqual({
      model: "llama3.2:1b",
      messages: [{ role: "user", content: "condense" }],
      stream: false,
      options: { temperature: 0, num_predict: 1024, num_ctx: 8192 },
    });
  });

  it("reports HTTP errors", async () => {
    stubFetch(async () => new Response("boom", { status: 500 }));
    const result = await new OllamaClient(config).chat([], 1000);
    expect(result).toEqual({ success: false, error: { kind: "llm", message: "Chat request failed: HTTP 500" } });
  });

  it("maps aborts to a timeout message", async () => {
    stubFetch(async () => {
      throw Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    });
    const result = await new OllamaClient(config).chat([], 1000);
    expect(result).toEqual({ success: false, error: { kind: "llm", message: "Request timed out" } });
  });

  it("rejects malformed and empty replies", async () => {
    stubFetch(async () => new Response("not json", { status: 200 }));
    const malformed = await new OllamaClient(config).chat([], 1000);
    expect(malformed.success).toBe(false);
    if (!malformed.success) expect(malformed.error.message.startsWith("Malformed chat response")).toBe(true);

    stubFetch(async () => jsonResponse({ message: { content: "  " } }));
    const empty = await new OllamaClient(config).chat([], 1000);
    expect(empty).toEqual({ success: false, error: { kind: "llm", message: "Model returned an empty response" } });
  });
});

describe("OllamaClient.health", () => {
  it("is healthy when the configured model is installed", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ models: [{ name: "llama3.2:1b" }] }));
    const report = await new OllamaClient(config).health();
    expect(report).toEqual({ healthy: true, models: ["llama3.2:1b"] });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://127.0.0.1:11434/api/tags");
  });

  it("is unhealthy without models", async () => {
    stubFetch(async () => jsonResponse({ models: [] }));
    expect(await new OllamaClient(config).health()).toEqual({
      healthy: false,
      models: [],
      reason: "No models installed",
    });
  });

  it("is unhealthy when the configured model is missing", async () => {
    stubFetch(async () => jsonResponse({ models: [{ name: "qwen2:0.5b" }] }));
    expect(await new OllamaClient(config).health()).toEqual({
      healthy: false,
      models: ["qwen2:0.5b"],
      reason: "Model llama3.2:1b is not installed",
    });
  });

  it("is unhealthy when the server cannot be reached", async () => {
    stubFetch(async () => {
      throw new Error("connect ECONNREFUSED 127.0.0.1:11434");
    });
    expect(await new OllamaClient(config).health()).toEqual({
      healthy: false,
      models: [],
      reason: "connect ECONNREFUSED 127.0.0.1:11434",
    });
  });
});
