/**
 * `squish test <command...>`: shows how a command is routed and, when the
 * hook would rewrite it, runs it through the router to show the compacted
 * output and the tokens saved. Commands the hook leaves alone are never run.
 */

import type { Command } from "commander";
import { combinedOutput } from "../../executor/process.js";
import { rewriteCommand } from "../../hook/protocol.js";
import type { RunResult } from "../../router/engine.js";
import { savingsPercent } from "../../shared/tokens.js";
import { createRuntime, type RuntimeOptions } from "../runtime.js";

export interface PreviewOptions extends RuntimeOptions {
  /** Execute rewritable commands; defaults to true. */
  run?: boolean;
}

export interface PreviewExecution {
  path: RunResult["path"];
  optimizer: string | null;
  exitCode: number;
  originalTokens: number;
  optimizedTokens: number;
  savingsPercent: number;
  fallbackReason?: string;
  output: string;
}

export interface Preview {
  core: string;
  category: string;
  classification: string;
  optimizer: string;
  decision: string;
  rewrite: string | null;
  execution: PreviewExecution | null;
}

export async function previewCommand(command: string, opts: PreviewOptions = {}): Promise<Preview> {
  // Previews leave no trace: no events, and the breaker is never saved.
  const runtime = await createRuntime({ ...opts, recordEvents: false });
  const insight = runtime.router.inspect(command);
  const decision = await runtime.router.decidePreExecution(command);
  const { classification } = insight;
  const rewrites = decision.action === "rewrite";

  let execution: PreviewExecution | null = null;
  if (rewrites && (opts.run ?? true)) {
    const result = await runtime.router.execute(command);
    execution = {
      path: result.path,
      optimizer: result.optimizerName,
      exitCode: result.exitCode,
      originalTokens: result.originalTokens,
      optimizedTokens: result.optimizedTokens,
      savingsPercent: savingsPercent(result.originalTokens, result.optimizedTokens),
      fallbackReason: result.fallbackReason,
      output: combinedOutput(result),
    };
  }

  return {
    core: insight.ctx.core,
    category: insight.category,
    classification:
      classification.kind === "optimizable" ? "optimizable" : `never-optimize (${classification.reason}: ${classification.detail})`,
    optimizer: insight.specialized?.name ?? "generic (fallback)",
    decision: rewrites ? `rewrite, expected path ${decision.expectedPath}` : `unmodified (${decision.reason})`,
    rewrite: rewrites ? rewriteCommand(runtime.config.general.executable, command) : null,
    execution,
  };
}

export function formatPreview(preview: Preview): string[] {
  const rows: Array<[string, string]> = [
    ["Core", preview.core],
    ["Category", preview.category],
    ["Classification", preview.classification],
    ["Optimizer", preview.optimizer],
    ["Decision", preview.decision],
  ];
  if (preview.rewrite !== null) rows.push(["Rewrite", preview.rewrite]);

  const run = preview.execution;
  if (run) {
    rows.push(["Path", run.optimizer ? `${run.path} (${run.optimizer})` : run.path]);
    rows.push(["Exit code", String(run.exitCode)]);
    rows.push(["Tokens", `${run.originalTokens} -> ${run.optimizedTokens} (${run.savingsPercent}% saved)`]);
    if (run.fallbackReason) rows.push(["Fallback", run.fallbackReason]);
  }

  const lines = rows.map(([label, value]) => `${(label + ":").padEnd(16)}${value}`);
  if (run && run.output.length > 0) {
    lines.push("", ...run.output.replace(/\n$/, "").split("\n"));
  }
  return lines;
}

export function registerPreviewCommand(program: Command): void {
  program
    .command("test")
    .description("Show how a command is routed and what compaction does to its output")
    .argument("<command...>", "command to analyze")
    .option("--no-run", "only analyze; do not execute the command")
    .passThroughOptions()
    .allowUnknownOption()
    .action(async (words: string[], options: { run: boolean }) => {
      const preview = await previewCommand(words.join(" "), { run: options.run });
      for (const line of formatPreview(preview)) console.log(line);
    });
}
