/**
 * Ollama HTTP client: `POST /api/chat` for condensation and
 * `GET /api/tags` for the health probe.
 */

import { z } from "zod";
import type { SmartPathConfig } from "../schemas/config.js";
import { describeError, fail, ok, safeParseJson, type Outcome } from "../shared/outcome.js";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface HealthReport {
  healthy: boolean;
  /** Installed model names, when the server answered. */
  models: string[];
  reason?: string;
}

/** What the router needs from a model server; tests substitute their own. */
export interface LlmClient {
  readonly model: string;
  chat(messages: readonly ChatMessage[], timeoutMs: number): Promise<Outcome<string>>;
  health(): Promise<HealthReport>;
}

const ChatResponse = z.object({
  message: z.object({ content: z.string() }),
});

const TagsResponse = z.object({
  models: z.array(z.object({ name: z.string() })),
});

/** Strips trailing slashes and pins `localhost` to IPv4. */
export function resolveBaseUrl(url: string): string {
  return url.replace(/\/+$/, "").replace("://localhost", "://127.0.0.1");
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

function requestError(err: unknown): string {
  return isTimeout(err) ? "Request timed out" : describeError(err);
}

export class OllamaClient implements LlmClient {
  readonly model: string;
  private readonly baseUrl: string;

  constructor(private readonly config: SmartPathConfig) {
    this.model = config.model;
    this.baseUrl = resolveBaseUrl(config.url);
  }

  async chat(messages: readonly ChatMessage[], timeoutMs: number): Promise<Outcome<string>> {
    const body = {
      model: this.model,
      messages,
      stream: false,
      options: {
        temperature: this.config.temperature,
        num_predict: this.config.numPredict,
        num_ctx: this.config.numCtx,
      },
    };

    let text: string;
    try {
      const res = await fetch(`${this.baseUrl}/api/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
      text = await res.text();
      if (!res.ok) return fail("llm", `Chat request failed: HTTP ${res.status}`);
    } catch (err) {
      return fail("llm", requestError(err));
    }

    const json = safeParseJson(text);
    if (!json.success) return fail("llm", `Malformed chat response: ${json.error}`);
    const parsed = ChatResponse.safeParse(json.value);
    if (!parsed.success) return fail("llm", "Chat response has no message content");
    if (parsed.data.message.content.trim().length === 0) return fail("llm", "Model returned an empty response");
    return ok(parsed.data.message.content);
  }

  async health(): Promise<HealthReport> {
    try {
      const res = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(this.config.healthTimeoutMs),
      });
      if (!res.ok) return { healthy: false, models: [], reason: `HTTP ${res.status}` };

      const parsed = TagsResponse.safeParse(await res.json());
      if (!parsed.success) return { healthy: false, models: [], reason: "Unexpected /api/tags response" };

      const models = parsed.data.models.map((m) => m.name);
      if (models.length === 0) return { healthy: false, models, reason: "No models installed" };
      if (!hasModel(models, this.model)) {
        return { healthy: false, models, reason: `Model ${this.model} is not installed` };
      }
      return { healthy: true, models };
    } catch (err) {
      return { healthy: false, models: [], reason: requestError(err) };
    }
  }
}

/** `llama3.2` matches an installed `llama3.2:latest`. */
export function hasModel(installed: readonly string[], model: string): boolean {
  return installed.some((name) => name === model || name === `${model}:latest`);
}
