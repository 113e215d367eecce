/**
 * Library entry point. The CLI lives in ./cli; everything it is built from
 * is exported here for embedding the engine elsewhere.
 */

export * from "./schemas/index.js";

export { defaultConfig, loadConfig, renderConfigYaml, resolvePaths, resolveSquishHome } from "./config/index.js";
export type { LoadConfigOptions, LoadedConfig, SquishPaths } from "./config/index.js";

export { normalizeCommand, extractCore, isSelfInvocation } from "./matching/normalizer.js";
export type { CommandContext } from "./matching/normalizer.js";
export { classifyCommand, buildDenyList, BUILTIN_DENY_LIST } from "./safety/classifier.js";
export type { CommandClassification, NeverOptimizeReason } from "./safety/classifier.js";
export { categorize, OUTPUT_CATEGORIES } from "./shared/category.js";
export type { OutputCategory } from "./shared/category.js";
export { estimateTokens, savingsPercent } from "./shared/tokens.js";
export { ok, fail, describeError } from "./shared/outcome.js";
export type { Outcome, Failure, FailureKind } from "./shared/outcome.js";

export { preprocess } from "./preprocessing/pipeline.js";
export type { PreprocessedOutput, StageName } from "./preprocessing/pipeline.js";

export { createRegistry, registryOf } from "./optimizers/registry.js";
export type { OptimizerRegistry } from "./optimizers/registry.js";
export type { Optimizer, OptimizedResult, ExecutionPlan } from "./optimizers/types.js";
export { GitOptimizer } from "./optimizers/git.js";
export { FileOptimizer } from "./optimizers/file.js";
export { BuildOptimizer } from "./optimizers/build.js";
export { ContainerOptimizer } from "./optimizers/container.js";
export { GenericOptimizer } from "./optimizers/generic.js";

export { createCircuitBreaker, BreakerStore, DEFAULT_BREAKER_SETTINGS } from "./safety/circuit-breaker.js";
export type { CircuitBreaker, BreakerSettings, PathStatus } from "./safety/circuit-breaker.js";

export { OllamaClient } from "./llm/ollama.js";
export type { LlmClient, ChatMessage, HealthReport } from "./llm/ollama.js";
export { validateCandidate } from "./llm/validation.js";
export type { GateVerdict } from "./llm/validation.js";
export { condenseWithLlm } from "./llm/smart-path.js";

export { Router } from "./router/engine.js";
export type { RouterDeps, RunResult } from "./router/engine.js";
export { DecisionCache } from "./router/decision-cache.js";
export { decidePreExecution, decidePostExecution } from "./router/decision.js";
export type { HookDecision, OptimizationPath } from "./router/decision.js";

export { handleHook } from "./hook/handler.js";
export type { HookDeps } from "./hook/handler.js";
export { parseHookInput, rewriteCommand, PROCEED_UNMODIFIED } from "./hook/protocol.js";
export type { HookResponse } from "./hook/protocol.js";

export { ShellRunner } from "./executor/process.js";
export type { CommandOutput, CommandRunner, RunOptions } from "./executor/process.js";

export { EventLogger } from "./events/logger.js";
export type { EventSink, EventFilter } from "./events/logger.js";

export { createRuntime } from "./cli/runtime.js";
export type { Runtime, RuntimeOptions } from "./cli/runtime.js";
