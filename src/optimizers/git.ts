/**
 * Version-control optimizer (git).
 *
 * `status` and `log` are substituted with compact variants before running;
 * everything else is compacted from the command's own output. Commands that
 * already ask for a compact format, or that change state (branch deletion,
 * worktree actions), are declined.
 */

import type { CommandContext } from "../matching/normalizer.js";
import { GitOptimizerConfig } from "../schemas/config.js";
import type { Outcome } from "../shared/outcome.js";
import { commaList, hasFlag, tokens } from "./text.js";
import {
  TRANSFORM,
  compactWith,
  substitutePrefix,
  type ExecutionPlan,
  type OptimizedResult,
  type Optimizer,
} from "./types.js";

export type GitSubcommand =
  | "status"
  | "log"
  | "diff"
  | "branch"
  | "show"
  | "stash"
  | "worktree"
  | "operation";

const OPERATIONS = new Set(["push", "pull", "fetch", "add", "commit"]);
const DIRECT: readonly GitSubcommand[] = ["status", "log", "diff", "branch", "show", "stash", "worktree"];
const WORKTREE_ACTIONS = new Set(["add", "remove", "prune", "lock", "unlock", "move", "repair"]);

export function classifyGit(core: string): GitSubcommand | undefined {
  const [program, sub] = tokens(core);
  if (program !== "git" || sub === undefined) return undefined;
  const direct = DIRECT.find((name) => name === sub);
  if (direct) return direct;
  if (OPERATIONS.has(sub)) return "operation";
  return undefined;
}

export class GitOptimizer implements Optimizer {
  readonly name = "git";
  readonly fallback = false;
  private readonly config: GitOptimizerConfig;

  constructor(config: Partial<GitOptimizerConfig> = {}) {
    this.config = GitOptimizerConfig.parse(config);
  }

  canHandle(ctx: CommandContext): boolean {
    const sub = classifyGit(ctx.core);
    switch (sub) {
      case undefined:
        return false;
      case "status":
        return !hasFlag(ctx.core, ["--short", "-s", "--porcelain", "-v", "--verbose"]);
      case "diff":
        return !hasFlag(ctx.core, ["--stat", "--numstat", "--shortstat"]);
      case "branch":
        return !hasFlag(ctx.core, ["-d", "-D", "-m", "-M", "-c", "-C", "--delete", "--move", "--copy"]);
      case "show":
        return !hasFlag(ctx.core, ["--stat", "--format", "--pretty"]);
      case "worktree": {
        const action = tokens(ctx.core)[2];
        return action === undefined || !WORKTREE_ACTIONS.has(action);
      }
      default:
        return true;
    }
  }

  plan(ctx: CommandContext): ExecutionPlan {
    const sub = classifyGit(ctx.core);
    if (sub === "status") return substitutePrefix(ctx, "git status", "git status --porcelain -b");
    if (sub === "log") {
      const hasFormat = hasFlag(ctx.core, ["--oneline", "--pretty", "--format"]);
      const hasLimit = hasNumericLimit(ctx.core) || hasFlag(ctx.core, ["-n", "--max-count"]);
      if (hasFormat && hasLimit) return TRANSFORM;
      let to = "git log";
      if (!hasFormat) to += " --oneline";
      if (!hasLimit) to += ` -n ${this.config.logDefaultLimit}`;
      return substitutePrefix(ctx, "git log", to);
    }
    return TRANSFORM;
  }

  optimize(ctx: CommandContext, raw: string): Outcome<OptimizedResult> {
    const config = this.config;
    return compactWith(this.name, raw, () => {
      const sub = classifyGit(ctx.core);
      switch (sub) {
        case "status":
          return looksPorcelain(raw)
            ? formatPorcelainStatus(raw, config.statusMaxFiles, config.statusMaxUntracked)
            : stripStatusHints(raw);
        case "log":
          return filterLog(raw, config.logMaxEntries, config.logLineMaxChars);
        case "diff":
          return compactDiff(raw, config.diffMaxHunkLines, config.diffMaxTotalLines);
        case "branch":
          return compactBranches(raw, config.branchMaxLocal, config.branchMaxRemote);
        case "show":
          return compactShow(raw, config.diffMaxHunkLines, config.diffMaxTotalLines);
        case "stash":
          return compactStash(ctx.core, raw, config.diffMaxHunkLines, config.diffMaxTotalLines);
        case "worktree":
          return compactWorktrees(raw);
        case "operation":
          return summarizeOperation(tokens(ctx.core)[1] ?? "operation", raw);
        case undefined:
          throw new Error(`not a supported git command: ${ctx.core}`);
      }
    });
  }
}

/** `-5`, `-20` style limits. */
export function hasNumericLimit(command: string): boolean {
  return command.split(/\s+/).some((arg) => /^-\d+$/.test(arg));
}

// --- status ---

const PORCELAIN_ENTRY = /^[ MADRCU?!]{2} \S/;
const CONFLICT_CODES = new Set(["DD", "AU", "UD", "UA", "DU", "AA", "UU"]);

export function looksPorcelain(raw: string): boolean {
  const lines = raw.split("\n").filter((line) => line.trim().length > 0);
  return lines.every((line) => line.startsWith("## ") || PORCELAIN_ENTRY.test(line));
}

export function formatPorcelainStatus(porcelain: string, maxFiles = 5, maxUntracked = 3): string {
  const lines = porcelain.split("\n").filter((line) => line.trim().length > 0);
  const out: string[] = [];
  const staged: string[] = [];
  const modified: string[] = [];
  const untracked: string[] = [];
  let conflicts = 0;

  for (const line of lines) {
    if (line.startsWith("## ")) {
      out.push(`branch: ${line.slice(3)}`);
      continue;
    }
    const code = line.slice(0, 2);
    const file = line.slice(3);
    if (CONFLICT_CODES.has(code)) {
      conflicts++;
      continue;
    }
    if (code === "??") {
      untracked.push(file);
      continue;
    }
    if ("MADRC".includes(code.charAt(0))) staged.push(file);
    if (code.charAt(1) === "M" || code.charAt(1) === "D") modified.push(file);
  }

  if (staged.length === 0 && modified.length === 0 && untracked.length === 0 && conflicts === 0) {
    out.push("clean");
    return out.join("\n");
  }
  if (staged.length > 0) out.push(`staged (${staged.length}): ${commaList(staged, maxFiles)}`);
  if (modified.length > 0) out.push(`modified (${modified.length}): ${commaList(modified, maxFiles)}`);
  if (untracked.length > 0) out.push(`untracked (${untracked.length}): ${commaList(untracked, maxUntracked)}`);
  if (conflicts > 0) out.push(`conflicts: ${conflicts}`);
  return out.join("\n");
}

/** Long-form status without the `(use "git ..." to ...)` hints. */
const STATUS_HEADER = /^(On branch |HEAD detached |Not currently on any branch)/;

/**
 * Drops `(use "git …")` hints from the last long-form status block. Output
 * before that block, or without one, keeps its parenthesised lines.
 */
export function stripStatusHints(raw: string): string {
  const lines = raw.split("\n");
  let start = lines.length;
  lines.forEach((line, index) => {
    if (STATUS_HEADER.test(line)) start = index;
  });
  return lines
    .filter((line, index) => index < start || !/^\s*\(.*\)\s*$/.test(line))
    .map((line) => line.trimEnd())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

// --- log ---

export function filterLog(raw: string, maxEntries: number, lineMaxChars: number): string {
  return raw
    .split("\n")
    .filter((line, index, all) => index < all.length - 1 || line.length > 0)
    .slice(0, maxEntries)
    .map((line) => (line.length > lineMaxChars ? `${line.slice(0, lineMaxChars - 3)}...` : line))
    .join("\n");
}

// --- diff ---

export function compactDiff(raw: string, maxHunkLines: number, maxTotalLines: number): string {
  if (raw.trim().length === 0) return "No changes";
  if (!raw.includes("diff --git")) return raw.trim();

  const stat = diffStat(raw);
  const hunks = compactHunks(raw, maxHunkLines, maxTotalLines);
  return [stat, hunks].filter((part) => part.length > 0).join("\n\n");
}

interface FileStat {
  file: string;
  added: number;
  removed: number;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

export function diffStat(diff: string): string {
  const files: FileStat[] = [];
  let current: FileStat | undefined;

  for (const line of diff.split("\n")) {
    if (line.startsWith("diff --git")) {
      current = { file: line.split(" b/")[1] ?? "unknown", added: 0, removed: 0 };
      files.push(current);
    } else if (current && line.startsWith("+") && !line.startsWith("+++")) {
      current.added++;
    } else if (current && line.startsWith("-") && !line.startsWith("---")) {
      current.removed++;
    }
  }
  if (files.length === 0) return "";

  const added = files.reduce((sum, f) => sum + f.added, 0);
  const removed = files.reduce((sum, f) => sum + f.removed, 0);
  return [
    ...files.map((f) => ` ${f.file} | +${f.added} -${f.removed}`),
    ` ${plural(files.length, "file")} changed, ${plural(added, "insertion")}(+), ${plural(removed, "deletion")}(-)`,
  ].join("\n");
}

export function compactHunks(diff: string, maxHunkLines: number, maxTotalLines: number): string {
  const kept: string[] = [];
  let hunkLines = 0;

  for (const line of diff.split("\n")) {
    if (line.startsWith("diff --git") || line.startsWith("@@ ")) {
      hunkLines = 0;
      kept.push(line);
    } else if (line.startsWith("index ") || line.startsWith("--- ") || line.startsWith("+++ ")) {
      kept.push(line);
    } else if (line.startsWith("+") || line.startsWith("-")) {
      hunkLines++;
      if (hunkLines <= maxHunkLines) kept.push(line);
      else if (hunkLines === maxHunkLines + 1) kept.push("  ...(hunk truncated)");
    }

    if (kept.length >= maxTotalLines) {
      kept.push("...(diff truncated)");
      break;
    }
  }
  return kept.join("\n");
}

// --- branch ---

export function compactBranches(raw: string, maxLocal: number, maxRemote: number): string {
  let current = "";
  const local: string[] = [];
  const remote: string[] = [];

  for (const line of raw.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.length === 0) continue;
    if (trimmed.startsWith("* ")) {
      current = trimmed.slice(2);
      continue;
    }
    const remoteMatch = /^remotes\/[^/]+\/(.+)$/.exec(trimmed);
    if (remoteMatch) {
      const name = remoteMatch[1] ?? "";
      if (!name.startsWith("HEAD ")) remote.push(name);
      continue;
    }
    local.push(trimmed);
  }

  const localTotal = Math.max(1, local.length + (current ? 1 : 0));
  const out = [
    remote.length > 0
      ? `branches: ${localTotal} local, ${remote.length} remote`
      : `branches: ${localTotal} local`,
  ];
  if (current) out.push(`* ${current}`);
  out.push(...local.slice(0, maxLocal).map((b) => `  ${b}`));
  if (local.length > maxLocal) out.push(`  +${local.length - maxLocal} more`);

  const remoteOnly = remote.filter((b) => b !== current && !local.includes(b));
  if (remoteOnly.length > 0) {
    out.push(`  remote-only (${remoteOnly.length}):`);
    out.push(...remoteOnly.slice(0, maxRemote).map((b) => `    ${b}`));
    if (remoteOnly.length > maxRemote) out.push(`    +${remoteOnly.length - maxRemote} more`);
  }
  return out.join("\n");
}

// --- show ---

export function compactShow(raw: string, maxHunkLines: number, maxTotalLines: number): string {
  const at = raw.indexOf("diff --git");
  if (at < 0) return raw.trim();

  const metadata: string[] = [];
  let previousBlank = false;
  for (const line of raw.slice(0, at).split("\n")) {
    const blank = line.trim().length === 0;
    if (blank && previousBlank) continue;
    metadata.push(line);
    previousBlank = blank;
  }

  const diff = raw.slice(at);
  const parts = [metadata.join("\n").trimEnd(), diffStat(diff), compactHunks(diff, maxHunkLines, maxTotalLines)];
  return parts.filter((part) => part.length > 0).join("\n\n").trimEnd();
}

// --- stash ---

export function compactStash(core: string, raw: string, maxHunkLines: number, maxTotalLines: number): string {
  const action = tokens(core)[2] ?? "";
  if (action === "list") return compactStashList(raw);
  if (action === "show") return compactDiff(raw, maxHunkLines, maxTotalLines);
  return summarizeStash(action || "push", raw);
}

export function compactStashList(raw: string): string {
  const entries = raw
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => {
      const colon = line.indexOf(": ");
      if (colon < 0) return line;
      const index = line.slice(0, colon);
      const rest = line.slice(colon + 2);
      // Drop the "WIP on main:" / "On main:" origin.
      const second = rest.indexOf(": ");
      const message = second < 0 ? rest.trim() : rest.slice(second + 2).trim();
      return `${index}: ${message}`;
    });
  return entries.length > 0 ? entries.join("\n") : "No stashes";
}

function firstNonEmptyLine(raw: string): string {
  return (raw.split("\n").find((line) => line.trim().length > 0) ?? raw).trim();
}

function summarizeStash(action: string, raw: string): string {
  const lower = raw.toLowerCase();
  if (lower.includes("error") || lower.includes("fatal")) {
    return `git stash ${action}: failed - ${firstNonEmptyLine(raw)}`;
  }
  if (lower.includes("no local changes") || lower.includes("no stash")) {
    return `git stash ${action}: nothing to stash`;
  }
  return `git stash ${action}: ok`;
}

// --- worktree ---

export function compactWorktrees(raw: string): string {
  const lines = raw
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines.length > 0 ? lines.join("\n") : "No worktrees";
}

// --- push / pull / fetch / add / commit ---

export function summarizeOperation(action: string, raw: string): string {
  const lower = raw.toLowerCase();
  if (lower.includes("error") || lower.includes("fatal") || lower.includes("rejected")) {
    return `git ${action}: failed - ${firstNonEmptyLine(raw)}`;
  }
  return `git ${action}: ok`;
}
