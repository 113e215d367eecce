/**
 * File-listing and file-content optimizer: ls/dir/gci, find,
 * cat/head/tail/type/get-content, wc and tree.
 */

import type { CommandContext } from "../matching/normalizer.js";
import { FileOptimizerConfig } from "../schemas/config.js";
import type { Outcome } from "../shared/outcome.js";
import { capLines, hasFlag, nonEmptyTrimmedLines, tokens } from "./text.js";
import { TRANSFORM, compactWith, type ExecutionPlan, type OptimizedResult, type Optimizer } from "./types.js";

export type FileCommand = "ls" | "find" | "cat" | "wc" | "tree";

const PROGRAMS: Record<string, FileCommand> = {
  ls: "ls",
  dir: "ls",
  gci: "ls",
  "get-childitem": "ls",
  find: "find",
  cat: "cat",
  head: "cat",
  tail: "cat",
  type: "cat",
  "get-content": "cat",
  gc: "cat",
  wc: "wc",
  tree: "tree",
};

export function classifyFileCommand(core: string): FileCommand | undefined {
  const program = tokens(core)[0];
  return program === undefined ? undefined : PROGRAMS[program];
}

export class FileOptimizer implements Optimizer {
  readonly name = "file";
  readonly fallback = false;
  private readonly config: FileOptimizerConfig;

  constructor(config: Partial<FileOptimizerConfig> = {}) {
    this.config = FileOptimizerConfig.parse(config);
  }

  canHandle(ctx: CommandContext): boolean {
    const cmd = classifyFileCommand(ctx.core);
    if (cmd === undefined) return false;
    // Single-column and custom formats are already compact.
    if (cmd === "ls") return !hasFlag(ctx.core, ["-1", "--format", "-C", "-m", "-x"]);
    return true;
  }

  plan(): ExecutionPlan {
    return TRANSFORM;
  }

  optimize(ctx: CommandContext, raw: string): Outcome<OptimizedResult> {
    const c = this.config;
    return compactWith(this.name, raw, () => {
      switch (classifyFileCommand(ctx.core)) {
        case "ls":
          return compactListing(raw, c.lsMaxEntries, c.lsMaxItems);
        case "find":
          return compactFind(raw, c.findMaxResults);
        case "cat":
          return compactContent(raw, c.catMaxLines, c.catHeadLines, c.catTailLines);
        case "wc":
          return compactWordCount(raw, c.wcMaxLines);
        case "tree":
          return compactTree(raw, c.treeMaxLines, c.treeNoiseDirs);
        case undefined:
          throw new Error(`not a file command: ${ctx.core}`);
      }
    });
  }
}

// --- ls ---

const LONG_FORMAT_ENTRY = /^[-dlcbps][r-]/;

export function compactListing(raw: string, maxEntries: number, maxItems: number): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "(empty directory)";
  const lines = trimmed.split("\n");

  if (isPowerShellListing(lines)) return compactPowerShellListing(lines, maxEntries);

  const isLong = lines.some((line) => {
    const l = line.trim();
    return l.startsWith("total ") || (l.length > 10 && LONG_FORMAT_ENTRY.test(l));
  });
  if (isLong) {
    const entries = lines.map((l) => l.trim()).filter((l) => l.length > 0 && !l.startsWith("total "));
    return capLines(entries, maxEntries, "entries");
  }

  return capLines(nonEmptyTrimmedLines(trimmed), maxItems);
}

function isSeparatorLine(line: string): boolean {
  const t = line.trim();
  return t.length > 0 && /^[-\s]+$/.test(t);
}

function isPowerShellListing(lines: readonly string[]): boolean {
  if (lines.length < 3) return false;
  const hasHeader = lines.slice(0, 5).some((l) => l.includes("Mode") && l.includes("Name"));
  return hasHeader && lines.slice(0, 6).some(isSeparatorLine);
}

function compactPowerShellListing(lines: readonly string[], maxEntries: number): string {
  const header = lines.slice(0, 5).find((l) => l.includes("Mode") && l.includes("Name"));
  const nameColumn = header?.indexOf("Name") ?? -1;
  const entries: string[] = [];
  let dirs = 0;
  let files = 0;

  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith("Directory:") || trimmed.startsWith("Mode") || isSeparatorLine(line)) {
      continue;
    }
    const mode = trimmed.split(/\s+/)[0] ?? "";
    const name = nameColumn > 0 && line.length > nameColumn ? line.slice(nameColumn).trim() : (trimmed.split(/\s+/).pop() ?? "");
    if (name.length === 0) continue;

    if (mode.startsWith("d")) {
      dirs++;
      entries.push(`[D] ${name}`);
    } else {
      files++;
      const size = powerShellSize(trimmed);
      entries.push(size ? `    ${name}  (${size})` : `    ${name}`);
    }
  }

  if (entries.length === 0) return "(empty directory)";
  return [`${dirs} directories, ${files} files`, capLines(entries, maxEntries)].join("\n");
}

/** Length column: the last numeric token before the name. */
function powerShellSize(line: string): string | undefined {
  const fields = line.split(/\s+/).slice(0, -1).reverse();
  const length = fields.find((f) => /^\d+$/.test(f));
  return length === undefined ? undefined : humanSize(Number(length));
}

export function humanSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 ** 2) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 ** 3) return `${(bytes / 1024 ** 2).toFixed(1)} MB`;
  return `${(bytes / 1024 ** 3).toFixed(1)} GB`;
}

// --- find ---

export function compactFind(raw: string, maxResults: number): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "No files found";
  return capLines(trimmed.split("\n"), maxResults);
}

// --- cat / head / tail ---

export function compactContent(raw: string, maxLines: number, headLines: number, tailLines: number): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "(empty file)";
  const lines = trimmed.split("\n");
  const total = lines.length;
  if (total <= maxLines || headLines + tailLines >= total) return trimmed;

  return [
    ...lines.slice(0, headLines),
    `... (${total - headLines - tailLines} lines omitted, ${total} total) ...`,
    ...lines.slice(total - tailLines),
  ]
    .join("\n")
    .trimEnd();
}

// --- wc ---

export function compactWordCount(raw: string, maxLines: number): string {
  const lines = nonEmptyTrimmedLines(raw);
  if (lines.length === 0) return "0";
  if (lines.length <= maxLines) return lines.join("\n");
  // Keep the first rows and the closing total row.
  return [...lines.slice(0, maxLines - 1), lines[lines.length - 1] ?? "", `...${lines.length} files total`].join("\n");
}

// --- tree ---

const TREE_DRAWING = /^[ │├└─|+`\-\t]*/;

function treeDepth(line: string): number {
  return (TREE_DRAWING.exec(line)?.[0] ?? "").length;
}

export function pruneTreeNoise(lines: readonly string[], noiseDirs: readonly string[]): string[] {
  const noise = new Set(noiseDirs.map((d) => d.toLowerCase()));
  const out: string[] = [];
  let skipDeeperThan: number | undefined;

  for (const line of lines) {
    const depth = treeDepth(line);
    if (skipDeeperThan !== undefined) {
      if (depth > skipDeeperThan) continue;
      skipDeeperThan = undefined;
    }

    const prefix = line.slice(0, depth);
    const name = line.slice(depth).trim();
    if (noise.has(name.replace(/\/$/, "").toLowerCase())) {
      out.push(`${prefix}${name.replace(/\/$/, "")}/ [contents hidden]`);
      skipDeeperThan = depth;
    } else {
      out.push(line);
    }
  }
  return out;
}

export function compactTree(raw: string, maxLines: number, noiseDirs: readonly string[]): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "(empty)";
  const lines = trimmed.split("\n");
  const pruned = pruneTreeNoise(lines, noiseDirs);
  if (pruned.length <= maxLines) return pruned.join("\n");

  const head = pruned.slice(0, maxLines - 1);
  const last = pruned[pruned.length - 1] ?? "";
  // `tree` ends with "N directories, M files"; keep it.
  if (/director|file/.test(last)) {
    const prunedNote = pruned.length < lines.length ? ` (${lines.length - pruned.length} noise lines pruned)` : "";
    return [...head, "", last, `...(${pruned.length - maxLines} lines omitted)${prunedNote}`].join("\n");
  }
  return [...head, `...+${pruned.length - maxLines + 1} more lines (${lines.length} total)`].join("\n");
}
