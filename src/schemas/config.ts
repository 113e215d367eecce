/**
 * Configuration schema. The YAML files under ~/.squish and the project root
 * are parsed through these schemas. Every field has a default, so an empty
 * file (or no file) yields a complete configuration.
 */

import { z } from "zod";

/** Routing mode; anything but hybrid short-circuits the decision order. */
export const Mode = z.enum(["hybrid", "fast-only", "smart-only", "passthrough"]);
export type Mode = z.infer<typeof Mode>;

/** Threshold/latency preset applied beneath explicit settings. */
export const Profile = z.enum(["fast", "balanced", "quality"]);
export type Profile = z.infer<typeof Profile>;

export const GeneralConfig = z.object({
  enabled: z.boolean().default(true),
  mode: Mode.default("hybrid"),
  profile: Profile.default("balanced"),
  /** Never rewrite anything; the hook always answers "proceed unmodified". */
  safeMode: z.boolean().default(false),
  /** Executable the hook rewrites commands to (also used by the loop guard). */
  executable: z.string().min(1).default("squish"),
});
export type GeneralConfig = z.infer<typeof GeneralConfig>;

export const FastPathConfig = z.object({
  enabled: z.boolean().default(true),
  /** Transform budget; an optimizer slower than this counts as a Fast failure. */
  timeoutMs: z.number().int().positive().default(100),
});
export type FastPathConfig = z.infer<typeof FastPathConfig>;

export const SmartPathConfig = z.object({
  enabled: z.boolean().default(false),
  model: z.string().min(1).default("llama3.2:1b"),
  url: z.string().url().default("http://localhost:11434"),
  temperature: z.number().min(0).max(2).default(0),
  /** Request timeout when the model has to be loaded first. */
  coldTimeoutMs: z.number().int().positive().default(60_000),
  /** Request timeout when Smart succeeded within keepAliveMs. */
  warmTimeoutMs: z.number().int().positive().default(10_000),
  keepAliveMs: z.number().int().positive().default(300_000),
  healthTimeoutMs: z.number().int().positive().default(5_000),
  /** Candidates longer than this fraction of their input are rejected. */
  maxOutputRatio: z.number().gt(0).max(1).default(0.9),
  numPredict: z.number().int().positive().default(1024),
  numCtx: z.number().int().positive().default(8192),
});
export type SmartPathConfig = z.infer<typeof SmartPathConfig>;

export const OutputThresholds = z.object({
  /** Output smaller than this is never optimized. */
  passthroughBelowBytes: z.number().int().nonnegative().default(2048),
  /** Output at or above this size is eligible for the Smart path. */
  smartPathAboveBytes: z.number().int().nonnegative().default(10_240),
});
export type OutputThresholds = z.infer<typeof OutputThresholds>;

export const PathFilterMode = z.enum(["summary", "remove"]);
export type PathFilterMode = z.infer<typeof PathFilterMode>;

export const PreprocessingConfig = z.object({
  enabled: z.boolean().default(true),
  maxOutputBytes: z.number().int().positive().default(131_072),
  noiseRemoval: z.boolean().default(true),
  pathFiltering: z.boolean().default(true),
  pathFilterMode: PathFilterMode.default("summary"),
  deduplication: z.boolean().default(true),
  truncation: z.boolean().default(true),
  whitespaceTrim: z.boolean().default(true),
  /** Additional line prefixes treated as boilerplate. */
  extraBoilerplate: z.array(z.string().min(1)).default([]),
  /** Additional path fragments treated as noise. */
  extraNoisyPaths: z.array(z.string().min(1)).default([]),
});
export type PreprocessingConfig = z.infer<typeof PreprocessingConfig>;

export const RouterConfig = z.object({
  decisionCacheTtlMs: z.number().int().nonnegative().default(300_000),
  breakerWindow: z.number().int().positive().default(10),
  breakerThreshold: z.number().min(0).max(1).default(0.2),
  breakerCooldownMs: z.number().int().nonnegative().default(600_000),
});
export type RouterConfig = z.infer<typeof RouterConfig>;

export const PassthroughConfig = z.object({
  /** Program names never optimized, on top of the built-in deny-list. */
  commands: z.array(z.string().min(1)).default([]),
});
export type PassthroughConfig = z.infer<typeof PassthroughConfig>;

export const LoggingConfig = z.object({
  enabled: z.boolean().default(true),
  /** Events directory; defaults to <squish home>/events. */
  dir: z.string().optional(),
  /** Echo diagnostics to stderr. */
  verbose: z.boolean().default(false),
});
export type LoggingConfig = z.infer<typeof LoggingConfig>;

export const ExecutorConfig = z.object({
  timeoutMs: z.number().int().positive().default(300_000),
});
export type ExecutorConfig = z.infer<typeof ExecutorConfig>;

// --- optimizer limits ---

export const GitOptimizerConfig = z.object({
  enabled: z.boolean().default(true),
  logMaxEntries: z.number().int().positive().default(50),
  logDefaultLimit: z.number().int().positive().default(20),
  logLineMaxChars: z.number().int().min(10).default(120),
  diffMaxHunkLines: z.number().int().positive().default(15),
  diffMaxTotalLines: z.number().int().positive().default(200),
  branchMaxLocal: z.number().int().positive().default(20),
  branchMaxRemote: z.number().int().positive().default(10),
  statusMaxFiles: z.number().int().positive().default(5),
  statusMaxUntracked: z.number().int().positive().default(3),
});
export type GitOptimizerConfig = z.infer<typeof GitOptimizerConfig>;

export const DEFAULT_TREE_NOISE_DIRS = [
  "node_modules", ".git", "__pycache__", ".mypy_cache", ".pytest_cache", ".tox",
  ".next", ".nuxt", ".cache", "coverage", ".nyc_output", "vendor", "Pods",
  ".gradle", ".idea", ".vs", ".vscode", "bin", "obj", "target", "dist", "build",
  ".angular", ".svn", ".hg", ".terraform", ".serverless",
];

export const FileOptimizerConfig = z.object({
  enabled: z.boolean().default(true),
  lsMaxEntries: z.number().int().positive().default(50),
  lsMaxItems: z.number().int().positive().default(60),
  findMaxResults: z.number().int().positive().default(40),
  catMaxLines: z.number().int().positive().default(100),
  catHeadLines: z.number().int().nonnegative().default(60),
  catTailLines: z.number().int().nonnegative().default(30),
  wcMaxLines: z.number().int().min(2).default(30),
  treeMaxLines: z.number().int().min(2).default(60),
  treeNoiseDirs: z.array(z.string().min(1)).default(DEFAULT_TREE_NOISE_DIRS),
});
export type FileOptimizerConfig = z.infer<typeof FileOptimizerConfig>;

export const BuildOptimizerConfig = z.object({
  enabled: z.boolean().default(true),
  testMaxFailureLines: z.number().int().positive().default(80),
  testMaxErrorLines: z.number().int().positive().default(40),
  testMaxWarnings: z.number().int().nonnegative().default(10),
  buildMaxErrorLines: z.number().int().positive().default(60),
  buildMaxWarnings: z.number().int().nonnegative().default(10),
  lintMaxIssueLines: z.number().int().positive().default(80),
});
export type BuildOptimizerConfig = z.infer<typeof BuildOptimizerConfig>;

export const ContainerOptimizerConfig = z.object({
  enabled: z.boolean().default(true),
  psMaxRows: z.number().int().positive().default(30),
  imagesMaxRows: z.number().int().positive().default(30),
  logsMaxTail: z.number().int().positive().default(30),
  logsMaxErrors: z.number().int().nonnegative().default(20),
  inspectMaxLines: z.number().int().positive().default(60),
  resourceMaxRows: z.number().int().positive().default(30),
});
export type ContainerOptimizerConfig = z.infer<typeof ContainerOptimizerConfig>;

export const GenericOptimizerConfig = z.object({
  enabled: z.boolean().default(true),
  minSizeBytes: z.number().int().nonnegative().default(512),
  maxLines: z.number().int().min(2).default(200),
});
export type GenericOptimizerConfig = z.infer<typeof GenericOptimizerConfig>;

export const OptimizersConfig = z.object({
  git: GitOptimizerConfig.default({}),
  file: FileOptimizerConfig.default({}),
  build: BuildOptimizerConfig.default({}),
  container: ContainerOptimizerConfig.default({}),
  generic: GenericOptimizerConfig.default({}),
});
export type OptimizersConfig = z.infer<typeof OptimizersConfig>;

/** Complete configuration. */
export const SquishConfig = z.object({
  general: GeneralConfig.default({}),
  fastPath: FastPathConfig.default({}),
  smartPath: SmartPathConfig.default({}),
  outputThresholds: OutputThresholds.default({}),
  preprocessing: PreprocessingConfig.default({}),
  router: RouterConfig.default({}),
  passthrough: PassthroughConfig.default({}),
  logging: LoggingConfig.default({}),
  executor: ExecutorConfig.default({}),
  optimizers: OptimizersConfig.default({}),
});
export type SquishConfig = z.infer<typeof SquishConfig>;
