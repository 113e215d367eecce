import type { SmartPathConfig } from "../schemas/config.js";
import type { OutputCategory } from "../shared/category.js";
import type { Failure } from "../shared/outcome.js";
import type { LlmClient } from "./ollama.js";
import { buildMessages } from "./prompts.js";
import { validateCandidate } from "./validation.js";

export type SmartAttempt =
  | { status: "accepted"; output: string; latencyMs: number }
  | { status: "rejected"; reason: string; latencyMs: number }
  | { status: "failed"; error: Failure; latencyMs: number };

export interface SmartRequest {
  command: string;
  category: OutputCategory;
  /** Preprocessed output. */
  input: string;
  /** Epoch ms of the last Smart success, if any. */
  lastSuccessAt: number | null;
}

/**
 * The cold timeout allows for model load; the warm one applies while the
 * model is still resident from a recent success.
 */
export function chooseTimeout(config: SmartPathConfig, lastSuccessAt: number | null, now: number): number {
  const warm = lastSuccessAt !== null && now - lastSuccessAt <= config.keepAliveMs;
  return warm ? config.warmTimeoutMs : config.coldTimeoutMs;
}

export async function condenseWithLlm(
  client: LlmClient,
  config: SmartPathConfig,
  request: SmartRequest,
  clock: () => number = Date.now,
): Promise<SmartAttempt> {
  const started = clock();
  const timeoutMs = chooseTimeout(config, request.lastSuccessAt, started);
  const reply = await client.chat(buildMessages(request.command, request.category, request.input), timeoutMs);
  const latencyMs = clock() - started;

  if (!reply.success) return { status: "failed", error: reply.error, latencyMs };

  const verdict = validateCandidate({
    input: request.input,
    candidate: reply.value,
    category: request.category,
    maxOutputRatio: config.maxOutputRatio,
  });
  return verdict.accepted
    ? { status: "accepted", output: verdict.output, latencyMs }
    : { status: "rejected", reason: verdict.reason, latencyMs };
}
