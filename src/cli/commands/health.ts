/**
 * `squish health`: LLM reachability, breaker state and recent savings.
 */

import type { Command } from "commander";
import type { EventLogger } from "../../events/logger.js";
import type { HealthReport } from "../../llm/ollama.js";
import type { PathStatus } from "../../safety/circuit-breaker.js";
import { RunCompletedPayload } from "../../schemas/event.js";
import { createRuntime, type RuntimeOptions } from "../runtime.js";

export interface SavingsSummary {
  runs: number;
  originalTokens: number;
  optimizedTokens: number;
  byPath: Record<string, number>;
}

export interface HealthSummary {
  mode: string;
  smartEnabled: boolean;
  model: string;
  llm: HealthReport | null;
  breakers: PathStatus[];
  savings: SavingsSummary;
}

/** Totals over run.completed events since `since` (ISO-8601). */
export async function summarizeSavings(events: EventLogger, since: string): Promise<SavingsSummary> {
  const summary: SavingsSummary = { runs: 0, originalTokens: 0, optimizedTokens: 0, byPath: {} };
  for (const event of await events.query({ type: "run.completed", since })) {
    const payload = RunCompletedPayload.safeParse(event.payload);
    if (!payload.success) continue;
    summary.runs += 1;
    summary.originalTokens += payload.data.originalTokens;
    summary.optimizedTokens += payload.data.optimizedTokens;
    summary.byPath[payload.data.path] = (summary.byPath[payload.data.path] ?? 0) + 1;
  }
  return summary;
}

export async function checkHealth(opts: RuntimeOptions = {}, now: Date = new Date()): Promise<HealthSummary> {
  const runtime = await createRuntime({ ...opts, recordEvents: false });
  const { config } = runtime;
  const dayStart = now.toISOString().slice(0, 10) + "T00:00:00.000Z";

  return {
    mode: config.general.mode,
    smartEnabled: config.smartPath.enabled,
    model: config.smartPath.model,
    llm: config.smartPath.enabled ? await runtime.llm.health() : null,
    breakers: [runtime.breaker.status("fast"), runtime.breaker.status("smart")],
    savings: await summarizeSavings(runtime.events, dayStart),
  };
}

export function formatHealth(summary: HealthSummary): string[] {
  const lines = [`Mode: ${summary.mode}`];

  if (summary.llm === null) {
    lines.push("Smart path: disabled");
  } else if (summary.llm.healthy) {
    lines.push(`Smart path: ${summary.model} ready (${summary.llm.models.length} models installed)`);
  } else {
    lines.push(`Smart path: unavailable (${summary.llm.reason ?? "unknown"})`);
  }

  for (const b of summary.breakers) {
    const state = b.open ? `open until ${b.openUntil ?? "?"}` : "closed";
    lines.push(`Breaker ${b.path}: ${state}, ${b.failures}/${b.attempts} failed, ${b.bypassed} bypassed`);
  }

  const { runs, originalTokens, optimizedTokens } = summary.savings;
  const saved = originalTokens - optimizedTokens;
  lines.push(`Today: ${runs} runs, ~${saved} tokens saved (${originalTokens} -> ${optimizedTokens})`);
  return lines;
}

export function registerHealthCommand(program: Command): void {
  program
    .command("health")
    .description("Check the LLM service, circuit breakers and today's savings")
    .action(async () => {
      const summary = await checkHealth();
      for (const line of formatHealth(summary)) console.log(line);
      if (summary.llm !== null && !summary.llm.healthy) process.exitCode = 1;
    });
}
