/**
 * Wires one invocation: configuration, breaker state, event log, LLM
 * client and router. `close()` persists the breaker; a failed write is
 * reported to diagnostics and otherwise ignored.
 */

import { loadConfig, type LoadConfigOptions, type SquishPaths } from "../config/index.js";
import { EventLogger } from "../events/logger.js";
import { ShellRunner, type CommandRunner } from "../executor/process.js";
import { OllamaClient, type LlmClient } from "../llm/ollama.js";
import { createRegistry } from "../optimizers/registry.js";
import { Router } from "../router/engine.js";
import { BreakerStore, createCircuitBreaker, type CircuitBreaker } from "../safety/circuit-breaker.js";
import type { SquishConfig } from "../schemas/config.js";
import { describeError } from "../shared/outcome.js";

export interface RuntimeOptions extends LoadConfigOptions {
  /** Write events to disk; previews turn this off. */
  recordEvents?: boolean;
  runner?: CommandRunner;
  llm?: LlmClient;
  clock?: () => number;
  /** Overrides the verbose-gated stderr diagnostics. */
  warn?: (message: string) => void;
}

export interface Runtime {
  config: SquishConfig;
  paths: SquishPaths;
  router: Router;
  breaker: CircuitBreaker;
  llm: LlmClient;
  events: EventLogger;
  warn: (message: string) => void;
  close(): Promise<void>;
}

export function diagnostics(verbose: boolean): (message: string) => void {
  return verbose ? (message) => console.error(`[squish] ${message}`) : () => undefined;
}

export async function createRuntime(opts: RuntimeOptions = {}): Promise<Runtime> {
  const loaded = await loadConfig(opts);
  const { config, paths } = loaded;
  const warn = opts.warn ?? diagnostics(config.logging.verbose);
  const clock = opts.clock ?? Date.now;

  const events = new EventLogger(paths.eventsDir, {
    enabled: (opts.recordEvents ?? true) && config.logging.enabled,
    onWarning: warn,
  });
  for (const message of loaded.warnings) {
    warn(message);
    await events.logWarning("config", message).catch((err: unknown) => warn(`Cannot log warning: ${describeError(err)}`));
  }

  const store = new BreakerStore(paths.breakerState);
  const { state, warning } = await store.load();
  if (warning) warn(warning);

  const breaker = createCircuitBreaker(
    state,
    {
      window: config.router.breakerWindow,
      threshold: config.router.breakerThreshold,
      cooldownMs: config.router.breakerCooldownMs,
    },
    clock,
  );
  const llm = opts.llm ?? new OllamaClient(config.smartPath);

  const router = new Router({
    config,
    registry: createRegistry(config.optimizers),
    breaker,
    llm,
    runner: opts.runner ?? new ShellRunner(),
    events,
    clock,
    warn,
    cwd: opts.cwd,
  });

  return {
    config,
    paths,
    router,
    breaker,
    llm,
    events,
    warn,
    async close() {
      const saved = await store.save(breaker.snapshot());
      if (!saved.success) warn(saved.error.message);
    },
  };
}
