/**
 * Schema barrel export: all Zod schemas for squish.
 */

export {
  Mode,
  Profile,
  GeneralConfig,
  FastPathConfig,
  SmartPathConfig,
  OutputThresholds,
  PathFilterMode,
  PreprocessingConfig,
  RouterConfig,
  PassthroughConfig,
  LoggingConfig,
  ExecutorConfig,
  GitOptimizerConfig,
  FileOptimizerConfig,
  BuildOptimizerConfig,
  ContainerOptimizerConfig,
  GenericOptimizerConfig,
  OptimizersConfig,
  SquishConfig,
} from "./config.js";

export { PathId, PathState, BreakerState } from "./breaker.js";

export { EventType, RoutePath, SquishEvent, RunCompletedPayload, HookDecisionPayload } from "./event.js";
