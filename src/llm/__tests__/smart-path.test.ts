import { describe, it, expect } from "vitest";
import { chooseTimeout, condenseWithLlm } from "../smart-path.js";
import { buildMessages, truncateForPrompt } from "../prompts.js";
import type { ChatMessage, HealthReport, LlmClient } from "../ollama.js";
import { SmartPathConfig } from "../../schemas/config.js";
import { fail, ok, type Outcome } from "../../shared/outcome.js";

const config = SmartPathConfig.parse({});
const INPUT = "error: disk full\n" + "noise line\n".repeat(20);

class FakeClient implements LlmClient {
  readonly model = "test-model";
  readonly timeouts: number[] = [];
  readonly requests: ChatMessage[][] = [];

  constructor(private readonly reply: Outcome<string>) {}

  async chat(messages: readonly ChatMessage[], timeoutMs: number): Promise<Outcome<string>> {
    this.requests.push([...messages]);
    this.timeouts.push(timeoutMs);
    return this.reply;
  }

  async health(): Promise<HealthReport> {
    return { healthy: true, models: [this.model] };
  }
}

function steppingClock(...times: number[]): () => number {
  let i = 0;
  return () => times[Math.min(i++, times.length - 1)] ?? 0;
}

describe("prompts", () => {
  it("caps long input with a truncation note", () => {
    expect(truncateForPrompt("abcdef", 4)).toBe("abcd\n[... 2 more characters truncated]");
    expect(truncateForPrompt("abc", 4)).toBe("abc");
  });

  it("builds a system and a user message", () => {
    const [system, user] = buildMessages("npm test", "build_test", "x".repeat(7000));
    expect(system?.role).toBe("system");
    expect(system?.content.split("\n")[0]).toBe("You condense build or test output for an AI coding assistant.");
    expect(user?.role).toBe("user");
    expect(user?.content).toContain("Command: npm test");
    expect(user?.content).toContain("[... 1000 more characters truncated]");
  });
});

describe("chooseTimeout", () => {
  it("uses the warm timeout within the keep-alive window", () => {
    expect(chooseTimeout(config, null, 1_000)).toBe(60_000);
    expect(chooseTimeout(config, 0, 100_000)).toBe(10_000);
    expect(chooseTimeout(config, 0, 400_000)).toBe(60_000);
  });
});

describe("condenseWithLlm", () => {
  const request = { command: "make", category: "build_test" as const, input: INPUT, lastSuccessAt: null };

  it("accepts a valid reply and measures latency", async () => {
    const client = new FakeClient(ok("error: disk full"));
    const attempt = await condenseWithLlm(client, config, request, steppingClock(1_000, 1_250));
    expect(attempt).toEqual({ status: "accepted", output: "error: disk full", latencyMs: 250 });
    expect(client.timeouts).toEqual([60_000]);
    expect(client.requests[0]).toHaveLength(2);
  });

  it("passes client failures through", async () => {
    const client = new FakeClient(fail("llm", "Request timed out"));
    const attempt = await condenseWithLlm(client, config, request, steppingClock(0, 5));
    expect(attempt).toEqual({ status: "failed", error: { kind: "llm", message: "Request timed out" }, latencyMs: 5 });
  });

  it("reports gate rejections", async () => {
    const client = new FakeClient(ok("   "));
    const attempt = await condenseWithLlm(client, config, request, steppingClock(0, 5));
    expect(attempt).toEqual({ status: "rejected", reason: "empty candidate", latencyMs: 5 });
  });
});
