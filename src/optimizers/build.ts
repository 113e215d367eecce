/**
 * Build, test and lint optimizer. Keeps failures, errors, warnings and the
 * runner's summary lines; progress chatter is counted, not shown.
 */

import type { CommandContext } from "../matching/normalizer.js";
import { BuildOptimizerConfig } from "../schemas/config.js";
import type { Outcome } from "../shared/outcome.js";
import { section } from "./text.js";
import { TRANSFORM, compactWith, type ExecutionPlan, type OptimizedResult, type Optimizer } from "./types.js";

export type BuildCommand = "test" | "build" | "lint";

const TEST_PREFIXES = [
  "cargo test", "npm test", "npm run test", "npx jest", "npx vitest", "dotnet test", "pytest",
  "python -m pytest", "go test", "mvn test", "gradle test", "make test", "nmake test",
];

const BUILD_PREFIXES = [
  "cargo build", "cargo install", "npm install", "npm ci", "npm run build", "npx tsc", "yarn install",
  "yarn build", "pnpm install", "pnpm build", "dotnet build", "dotnet restore", "dotnet publish",
  "go build", "mvn compile", "mvn package", "gradle build", "make", "cmake", "msbuild", "nmake",
  "nuget restore", "pip install", "pip3 install", "python -m pip",
];

const LINT_PREFIXES = [
  "cargo clippy", "cargo fmt", "npx eslint", "npm run lint", "dotnet format", "pylint", "flake8",
  "ruff check", "golint", "go vet",
];

/** `prefix` as whole words: `make` matches `make -j4` but not `makepkg`. */
function startsWithWords(command: string, prefix: string): boolean {
  if (!command.startsWith(prefix)) return false;
  const rest = command.slice(prefix.length);
  return rest.length === 0 || /^\s/.test(rest);
}

export function classifyBuild(core: string): BuildCommand | undefined {
  const lower = core.toLowerCase();
  const matches = (prefixes: readonly string[]) => prefixes.some((p) => startsWithWords(lower, p));
  if (matches(TEST_PREFIXES)) return "test";
  if (matches(BUILD_PREFIXES)) return "build";
  if (matches(LINT_PREFIXES)) return "lint";
  return undefined;
}

export class BuildOptimizer implements Optimizer {
  readonly name = "build";
  readonly fallback = false;
  private readonly config: BuildOptimizerConfig;

  constructor(config: Partial<BuildOptimizerConfig> = {}) {
    this.config = BuildOptimizerConfig.parse(config);
  }

  canHandle(ctx: CommandContext): boolean {
    return classifyBuild(ctx.core) !== undefined;
  }

  plan(): ExecutionPlan {
    return TRANSFORM;
  }

  optimize(ctx: CommandContext, raw: string): Outcome<OptimizedResult> {
    const c = this.config;
    return compactWith(this.name, raw, () => {
      switch (classifyBuild(ctx.core) ?? "build") {
        case "test":
          return compactTestOutput(raw, c.testMaxFailureLines, c.testMaxErrorLines, c.testMaxWarnings);
        case "build":
          return compactBuildOutput(raw, c.buildMaxErrorLines, c.buildMaxWarnings);
        case "lint":
          return compactLintOutput(raw, c.lintMaxIssueLines);
      }
    });
  }
}

// --- line classes ---

const COMPILE_PREFIXES = ["compiling ", "downloading ", "downloaded ", "fresh ", "installing ", "resolving ", "updating "];

const INSTALL_NOISE_PREFIXES = [
  ...COMPILE_PREFIXES,
  "added ", "removed ", "changed ", "packages ", "npm warn", "up to date", "audited ", "found 0 ",
  "restore complete", "  determining projects", "  restored ",
];

function startsWithAny(lower: string, prefixes: readonly string[]): boolean {
  return prefixes.some((p) => lower.startsWith(p));
}

export function isTestSummaryLine(line: string): boolean {
  const l = line.toLowerCase();
  return (
    l.startsWith("test result:") ||
    l.startsWith("test suites:") ||
    l.startsWith("tests:") ||
    l.startsWith("time:") ||
    (l.includes("passed") &&
      (l.includes("failed") || l.includes("error") || l.includes("warning")) &&
      (l.startsWith("=") || l.includes(" in "))) ||
    l.startsWith("passed!") ||
    l.startsWith("failed!") ||
    l.startsWith("total tests:") ||
    l.startsWith("ok  \t") ||
    l.startsWith("fail\t") ||
    (l.includes("passed") && l.includes("failed") && l.length < 100) ||
    l.startsWith("build success") ||
    l.startsWith("build failure") ||
    l.startsWith("tests run:")
  );
}

export function isTestFailureLine(line: string): boolean {
  const l = line.toLowerCase();
  return (
    l.includes("... failed") ||
    l.includes("...failed") ||
    l.startsWith("✕") ||
    l.startsWith("×") ||
    (l.startsWith("fail") && !l.startsWith("fail\t")) ||
    (l.includes("failed") && (l.startsWith("failed ") || l.startsWith("f ") || l.includes("::"))) ||
    l.startsWith("--- fail:") ||
    (l.includes("assertion") && (l.includes("failed") || l.includes("error"))) ||
    (l.startsWith("thread '") && l.includes("panicked"))
  );
}

export function isErrorLine(line: string): boolean {
  const l = line.toLowerCase();
  return l.startsWith("error") || l.startsWith("e ") || l.includes("error:") || l.includes("error[") || l.startsWith("fatal:");
}

export function isWarningLine(line: string): boolean {
  const l = line.toLowerCase();
  return l.startsWith("warning") || l.startsWith("warn ") || l.includes("warning:") || l.includes("warning[");
}

export function isPassLine(line: string): boolean {
  const l = line.toLowerCase();
  return (
    l.includes("... ok") ||
    l.includes("...ok") ||
    l.startsWith("✓") ||
    l.startsWith("✔") ||
    (l.startsWith("pass") && !l.startsWith("passed")) ||
    l.endsWith("passed") ||
    l.startsWith("--- pass:")
  );
}

/** First `max` lines and an omission note, or the text as is when short. */
export function truncateToLines(text: string, max: number): string {
  const lines = text.split("\n");
  if (lines.length <= max) return text;
  return `${lines.slice(0, max).join("\n")}\n...(${lines.length - max} lines omitted, ${lines.length} total)`;
}

// --- test runs ---

export function compactTestOutput(raw: string, maxFailureLines: number, maxErrorLines: number, maxWarnings: number): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "No test output";

  const failures: string[] = [];
  const errors: string[] = [];
  const warnings: string[] = [];
  const summary: string[] = [];
  let passed = 0;
  let compiling = 0;
  let inFailure = false;

  for (const line of trimmed.split("\n")) {
    const l = line.trim();
    if (startsWithAny(l.toLowerCase(), COMPILE_PREFIXES)) {
      compiling++;
    } else if (isTestSummaryLine(l)) {
      summary.push(l);
      inFailure = false;
    } else if (isTestFailureLine(l)) {
      failures.push(l);
      inFailure = true;
    } else if (isErrorLine(l)) {
      errors.push(l);
      inFailure = true;
    } else if (isWarningLine(l)) {
      warnings.push(l);
    } else if (inFailure) {
      // A failure's context runs until the next blank line.
      if (l.length === 0) inFailure = false;
      else failures.push(l);
    } else if (isPassLine(l)) {
      passed++;
    }
  }

  const out: string[] = [];
  if (compiling > 0) out.push(`[${compiling} compilation steps]`);
  out.push(...section("FAILURES:", failures, maxFailureLines, "failure lines"));
  out.push(...section("ERRORS:", errors, maxErrorLines, "error lines"));
  out.push(...section(null, warnings, maxWarnings, "warnings"));
  if (passed > 0) out.push(`[${passed} tests passed]`);
  out.push(...summary);

  return out.length > 0 ? out.join("\n") : truncateToLines(trimmed, 50);
}

// --- builds and installs ---

const BUILD_SUMMARY = /^(finished|build succeeded|build success|successfully )|compiled successfully/;

export function compactBuildOutput(raw: string, maxErrorLines: number, maxWarnings: number): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "Build completed (no output)";

  const errors: string[] = [];
  const warnings: string[] = [];
  const summary: string[] = [];
  let steps = 0;
  let inError = false;

  for (const line of trimmed.split("\n")) {
    const l = line.trim();
    // Prefix checks run on the untrimmed line so indented MSBuild chatter matches.
    const lower = line.toLowerCase();
    if (startsWithAny(l.toLowerCase(), INSTALL_NOISE_PREFIXES) || startsWithAny(lower, INSTALL_NOISE_PREFIXES)) {
      steps++;
    } else if (BUILD_SUMMARY.test(l.toLowerCase())) {
      summary.push(l);
      inError = false;
    } else if (isErrorLine(l)) {
      errors.push(l);
      inError = true;
    } else if (inError) {
      if (l.length === 0) inError = false;
      else errors.push(l);
    } else if (isWarningLine(l)) {
      warnings.push(l);
    }
  }

  const out: string[] = [];
  if (steps > 0) out.push(`[${steps} build steps]`);
  out.push(...section("ERRORS:", errors, maxErrorLines, "error lines"));
  out.push(...section(null, warnings, maxWarnings, "warnings"));
  out.push(...summary);
  if (out.length > 0) return out.join("\n");

  return /error|failed|fatal/i.test(trimmed) ? truncateToLines(trimmed, 40) : "Build succeeded";
}

// --- linters ---

function isLintSummaryLine(lower: string): boolean {
  return (
    (lower.startsWith("warning:") && lower.includes("generated")) ||
    lower.startsWith("error: could not compile") ||
    lower.includes("problems found") ||
    lower.includes("errors and") ||
    lower.includes("0 errors")
  );
}

export function compactLintOutput(raw: string, maxIssueLines: number): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "No lint issues found";

  const issues: string[] = [];
  const summary: string[] = [];
  let inIssue = false;

  for (const line of trimmed.split("\n")) {
    const l = line.trim();
    const lower = l.toLowerCase();
    if (startsWithAny(lower, ["checking ", "compiling ", "finished"])) continue;

    if (isLintSummaryLine(lower)) {
      summary.push(l);
      inIssue = false;
    } else if (isErrorLine(l) || isWarningLine(l)) {
      issues.push(l);
      inIssue = true;
    } else if (inIssue) {
      if (l.length === 0) inIssue = false;
      else issues.push(l);
    }
  }

  const out = [...section(null, issues, maxIssueLines, "issue lines"), ...summary];
  if (out.length > 0) return out.join("\n");
  return /error|warning/i.test(trimmed) ? truncateToLines(trimmed, 40) : "No lint issues found";
}
