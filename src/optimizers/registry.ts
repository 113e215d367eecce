import type { CommandContext } from "../matching/normalizer.js";
import { OptimizersConfig } from "../schemas/config.js";
import { BuildOptimizer } from "./build.js";
import { ContainerOptimizer } from "./container.js";
import { FileOptimizer } from "./file.js";
import { GenericOptimizer } from "./generic.js";
import { GitOptimizer } from "./git.js";
import type { Optimizer } from "./types.js";

export interface OptimizerRegistry {
  /** Registered optimizers in match order; the fallback is last. */
  readonly optimizers: readonly Optimizer[];
  select(ctx: CommandContext): Optimizer;
  selectSpecialized(ctx: CommandContext): Optimizer | undefined;
}

/**
 * Builds the registry from configuration. Disabled specialized optimizers
 * are left out; the generic fallback is always registered.
 */
export function createRegistry(config: OptimizersConfig = OptimizersConfig.parse({})): OptimizerRegistry {
  const specialized: Optimizer[] = [];
  if (config.git.enabled) specialized.push(new GitOptimizer(config.git));
  if (config.file.enabled) specialized.push(new FileOptimizer(config.file));
  if (config.build.enabled) specialized.push(new BuildOptimizer(config.build));
  if (config.container.enabled) specialized.push(new ContainerOptimizer(config.container));
  return registryOf(specialized, new GenericOptimizer(config.generic));
}

export function registryOf(specialized: readonly Optimizer[], fallback: Optimizer): OptimizerRegistry {
  const optimizers = [...specialized.filter((o) => !o.fallback), fallback];
  return {
    optimizers,
    select: (ctx) => optimizers.find((o) => o.canHandle(ctx)) ?? fallback,
    selectSpecialized: (ctx) => optimizers.find((o) => !o.fallback && o.canHandle(ctx)),
  };
}
