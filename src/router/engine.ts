/**
 * Router: the decision engine behind `squish hook` and `squish run`.
 *
 * All state flows through the deps object. The breaker is mutated in
 * memory; the caller loads it before and saves it after one invocation.
 * Every internal failure degrades to the command's raw output, and the
 * command's own exit code is always what the caller reports.
 */

import type { CommandRunner, CommandOutput } from "../executor/process.js";
import { combinedOutput, isFailedRun } from "../executor/process.js";
import type { EventSink } from "../events/logger.js";
import type { LlmClient } from "../llm/ollama.js";
import { condenseWithLlm } from "../llm/smart-path.js";
import { normalizeCommand } from "../matching/normalizer.js";
import type { OptimizerRegistry } from "../optimizers/registry.js";
import type { Optimizer } from "../optimizers/types.js";
import { preprocess } from "../preprocessing/pipeline.js";
import { buildDenyList, classifyCommand } from "../safety/classifier.js";
import type { CircuitBreaker } from "../safety/circuit-breaker.js";
import type { PathId } from "../schemas/breaker.js";
import type { SquishConfig } from "../schemas/config.js";
import type { EventType } from "../schemas/event.js";
import { categorize } from "../shared/category.js";
import { describeError } from "../shared/outcome.js";
import { byteLength } from "../shared/signals.js";
import { estimateTokens, savingsPercent } from "../shared/tokens.js";
import { DecisionCache, type CommandInsight } from "./decision-cache.js";
import {
  decidePostExecution,
  decidePreExecution,
  modeAllowsFast,
  routingBlocked,
  type HookDecision,
  type OptimizationPath,
  type PathAvailability,
} from "./decision.js";

export interface RouterDeps {
  config: SquishConfig;
  registry: OptimizerRegistry;
  breaker: CircuitBreaker;
  llm: LlmClient;
  runner: CommandRunner;
  events: EventSink;
  cache?: DecisionCache;
  clock?: () => number;
  /** Diagnostics sink; stdout is reserved for command output. */
  warn?: (message: string) => void;
  cwd?: string;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  path: OptimizationPath;
  optimizerName: string | null;
  originalTokens: number;
  optimizedTokens: number;
  latencyMs: number;
  /** Why the attempted path was abandoned, when it was. */
  fallbackReason?: string;
}

type Rendition = Omit<RunResult, "exitCode" | "latencyMs">;

function withNewline(text: string): string {
  return text.length === 0 || text.endsWith("\n") ? text : text + "\n";
}

function passthrough(output: CommandOutput, fallbackReason?: string): Rendition {
  const tokens = estimateTokens(combinedOutput(output));
  return {
    stdout: output.stdout,
    stderr: output.stderr,
    path: "passthrough",
    optimizerName: null,
    originalTokens: tokens,
    optimizedTokens: tokens,
    fallbackReason,
  };
}

export class Router {
  private readonly config: SquishConfig;
  private readonly cache: DecisionCache;
  private readonly clock: () => number;
  private readonly warn: (message: string) => void;
  private readonly denyList: ReadonlySet<string>;
  private smartHealth?: Promise<boolean>;

  constructor(private readonly deps: RouterDeps) {
    this.config = deps.config;
    this.clock = deps.clock ?? Date.now;
    this.cache = deps.cache ?? new DecisionCache(deps.config.router.decisionCacheTtlMs, this.clock);
    this.warn = deps.warn ?? (() => undefined);
    this.denyList = buildDenyList(deps.config.passthrough.commands);
  }

  /** Normalization, classification, category and optimizer match for a command. */
  inspect(command: string): CommandInsight {
    return this.cache.resolve(command, () => {
      const ctx = normalizeCommand(command, this.config.general.executable);
      return {
        ctx,
        classification: classifyCommand(ctx, this.denyList),
        category: categorize(ctx.core),
        specialized: this.deps.registry.selectSpecialized(ctx),
      };
    });
  }

  async decidePreExecution(command: string): Promise<HookDecision> {
    const insight = this.inspect(command);
    const decision = await decidePreExecution({
      general: this.config.general,
      classification: insight.classification,
      specializedMatch: insight.specialized !== undefined,
      ...this.availability(),
    });
    await this.noteBypasses(decision.bypassed, command);
    return decision;
  }

  /** Runs the command and returns its output in the rendition routing picked. */
  async execute(command: string): Promise<RunResult> {
    const started = this.clock();
    const insight = this.inspect(command);
    const blocked = routingBlocked(this.config.general, insight.classification);

    if (blocked) {
      const output = await this.run(command);
      return this.complete(command, started, output.exitCode, passthrough(output));
    }

    const optimizer = this.fastOptimizer(insight);
    if (optimizer && this.fastUsable()) {
      const plan = optimizer.plan(insight.ctx);
      if (plan.strategy === "substitute") {
        return this.executeSubstituted(command, plan.command, insight, optimizer, started);
      }
    }

    const output = await this.run(command);
    let rendition: Rendition;
    try {
      rendition = await this.route(command, insight, optimizer, output);
    } catch (err) {
      this.warn(`Routing failed, returning raw output: ${describeError(err)}`);
      rendition = passthrough(output, `internal error: ${describeError(err)}`);
    }
    return this.complete(command, started, output.exitCode, rendition);
  }

  // --- paths ---

  private async route(
    command: string,
    insight: CommandInsight,
    optimizer: Optimizer | undefined,
    output: CommandOutput,
  ): Promise<Rendition> {
    const raw = combinedOutput(output);
    const decision = await decidePostExecution({
      mode: this.config.general.mode,
      bytes: byteLength(raw),
      thresholds: this.config.outputThresholds,
      specializedMatch: insight.specialized !== undefined,
      ...this.availability(),
    });
    await this.noteBypasses(decision.bypassed, command);

    if (decision.path === "passthrough") return passthrough(output);

    if (output.timedOut) {
      await this.record(decision.path, false);
      return passthrough(output, "command timed out");
    }

    if (decision.path === "fast") {
      // Post-execution only picks Fast when an optimizer applies.
      const chosen = optimizer ?? this.deps.registry.select(insight.ctx);
      return this.applyFast(insight, chosen, raw, output);
    }
    return this.applySmart(command, insight, raw);
  }

  private async applyFast(
    insight: CommandInsight,
    optimizer: Optimizer,
    raw: string,
    output: CommandOutput,
  ): Promise<Rendition> {
    const began = this.clock();
    const result = optimizer.optimize(insight.ctx, raw);
    const elapsed = this.clock() - began;

    if (!result.success) {
      await this.record("fast", false);
      this.warn(result.error.message);
      return passthrough(output, result.error.message);
    }

    const overBudget = elapsed > this.config.fastPath.timeoutMs;
    await this.record("fast", !overBudget);
    if (overBudget) this.warn(`${optimizer.name} took ${elapsed}ms (budget ${this.config.fastPath.timeoutMs}ms)`);

    const { value } = result;
    return {
      stdout: withNewline(value.output),
      stderr: "",
      path: "fast",
      optimizerName: value.optimizerName,
      originalTokens: value.originalTokens,
      optimizedTokens: value.optimizedTokens,
    };
  }

  private async applySmart(
    command: string,
    insight: CommandInsight,
    raw: string,
  ): Promise<Rendition> {
    const pre = preprocess(raw, insight.category, this.config.preprocessing);
    const attempt = await condenseWithLlm(
      this.deps.llm,
      this.config.smartPath,
      {
        command: insight.ctx.core,
        category: insight.category,
        input: pre.text,
        lastSuccessAt: this.deps.breaker.lastSuccess("smart"),
      },
      this.clock,
    );

    const originalTokens = estimateTokens(raw);
    const smart = (text: string, fallbackReason?: string): Rendition => ({
      stdout: withNewline(text),
      stderr: "",
      path: "smart",
      optimizerName: this.deps.llm.model,
      originalTokens,
      optimizedTokens: estimateTokens(text),
      fallbackReason,
    });

    switch (attempt.status) {
      case "accepted":
        await this.record("smart", true);
        return smart(attempt.output);
      case "rejected":
        await this.record("smart", false);
        await this.emit("smart.rejected", "router", command, { reason: attempt.reason, latencyMs: attempt.latencyMs });
        return smart(pre.text, `candidate rejected: ${attempt.reason}`);
      case "failed":
        await this.record("smart", false);
        this.warn(`Smart path failed: ${attempt.error.message}`);
        return smart(pre.text, attempt.error.message);
    }
  }

  /**
   * Substituted runs are committed to Fast. Whenever the variant ran, its
   * output and exit code stand; a failed or uncompactable variant is a Fast
   * failure. Only a shell that never started leads to running the original,
   * since nothing of it has executed yet.
   */
  private async executeSubstituted(
    command: string,
    substitute: string,
    insight: CommandInsight,
    optimizer: Optimizer,
    started: number,
  ): Promise<RunResult> {
    const variant = await this.run(substitute);

    if (variant.spawnFailed) {
      await this.record("fast", false);
      const output = await this.run(command);
      return this.complete(command, started, output.exitCode, passthrough(output, "substituted command could not start"));
    }

    if (isFailedRun(variant)) {
      await this.record("fast", false);
      const reason = variant.timedOut ? "command timed out" : `substituted command failed (exit ${variant.exitCode})`;
      return this.complete(command, started, variant.exitCode, passthrough(variant, reason));
    }

    const result = optimizer.optimize(insight.ctx, combinedOutput(variant));
    if (!result.success) {
      await this.record("fast", false);
      this.warn(result.error.message);
      return this.complete(command, started, variant.exitCode, passthrough(variant, result.error.message));
    }

    await this.record("fast", true);
    const { value } = result;
    return this.complete(command, started, variant.exitCode, {
      stdout: withNewline(value.output),
      stderr: "",
      path: "fast",
      optimizerName: value.optimizerName,
      originalTokens: value.originalTokens,
      optimizedTokens: value.optimizedTokens,
    });
  }

  // --- helpers ---

  private fastOptimizer(insight: CommandInsight): Optimizer | undefined {
    if (this.config.general.mode === "fast-only") return this.deps.registry.select(insight.ctx);
    return insight.specialized;
  }

  private fastUsable(): boolean {
    return (
      modeAllowsFast(this.config.general.mode) &&
      this.config.fastPath.enabled &&
      this.deps.breaker.isAllowed("fast")
    );
  }

  private availability(): PathAvailability {
    const { breaker } = this.deps;
    return {
      fastEnabled: this.config.fastPath.enabled,
      fastClosed: breaker.isAllowed("fast"),
      smartEnabled: this.config.smartPath.enabled,
      smartClosed: breaker.isAllowed("smart"),
      smartHealthy: () => this.probeSmart(),
    };
  }

  /** One health probe per router instance. */
  private probeSmart(): Promise<boolean> {
    this.smartHealth ??= this.deps.llm.health().then(
      (report) => {
        if (!report.healthy) this.warn(`LLM unavailable: ${report.reason ?? "unhealthy"}`);
        return report.healthy;
      },
      (err: unknown) => {
        this.warn(`LLM health check failed: ${describeError(err)}`);
        return false;
      },
    );
    return this.smartHealth;
  }

  private run(command: string): Promise<CommandOutput> {
    return this.deps.runner.run(command, { timeoutMs: this.config.executor.timeoutMs, cwd: this.deps.cwd });
  }

  private async record(path: PathId, success: boolean): Promise<void> {
    const { opened } = this.deps.breaker.record(path, success);
    if (opened) {
      const status = this.deps.breaker.status(path);
      this.warn(`${path} path disabled until ${status.openUntil ?? "cooldown ends"}`);
      await this.emit("breaker.opened", "breaker", undefined, {
        path,
        failures: status.failures,
        attempts: status.attempts,
        openUntil: status.openUntil,
      });
    }
  }

  private async noteBypasses(paths: readonly PathId[], command: string): Promise<void> {
    for (const path of paths) {
      this.deps.breaker.recordBypass(path);
      await this.emit("breaker.bypassed", "breaker", command, { path });
    }
  }

  /** Event logging never affects the result; failures go to diagnostics. */
  private async emit(
    type: EventType,
    actor: string,
    command: string | undefined,
    payload: Record<string, unknown>,
  ): Promise<void> {
    try {
      await this.deps.events.log(type, actor, { command, payload });
    } catch (err) {
      this.warn(`Cannot log ${type}: ${describeError(err)}`);
    }
  }

  private async complete(command: string, started: number, exitCode: number, rendition: Rendition): Promise<RunResult> {
    const result: RunResult = { ...rendition, exitCode, latencyMs: this.clock() - started };
    await this.emit("run.completed", "router", command, {
      path: result.path,
      optimizer: result.optimizerName,
      exitCode,
      originalTokens: result.originalTokens,
      optimizedTokens: result.optimizedTokens,
      savingsPercent: savingsPercent(result.originalTokens, result.optimizedTokens),
      latencyMs: result.latencyMs,
      ...(result.fallbackReason ? { fallbackReason: result.fallbackReason } : {}),
    });
    return result;
  }
}
