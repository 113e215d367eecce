/**
 * Container CLI optimizer for docker and podman. Listing tables are reduced
 * to their key columns; logs keep errors and a tail.
 */

import type { CommandContext } from "../matching/normalizer.js";
import { ContainerOptimizerConfig } from "../schemas/config.js";
import type { Outcome } from "../shared/outcome.js";
import { clip, hasFlag, section } from "./text.js";
import { TRANSFORM, compactWith, type ExecutionPlan, type OptimizedResult, type Optimizer } from "./types.js";

export type ContainerCommand =
  | "ps"
  | "images"
  | "logs"
  | "compose-ps"
  | "inspect"
  | "build"
  | "pull-push"
  | "resource-ls";

const PREFIXES: ReadonlyArray<readonly [string, ContainerCommand]> = [
  ["compose ps", "compose-ps"],
  ["compose build", "build"],
  ["ps", "ps"],
  ["container ls", "ps"],
  ["images", "images"],
  ["image ls", "images"],
  ["logs", "logs"],
  ["inspect", "inspect"],
  ["build", "build"],
  ["pull", "pull-push"],
  ["push", "pull-push"],
  ["network ls", "resource-ls"],
  ["network list", "resource-ls"],
  ["volume ls", "resource-ls"],
  ["volume list", "resource-ls"],
];

export function classifyContainer(core: string): ContainerCommand | undefined {
  const lower = core.toLowerCase().trim();
  let rest: string;
  if (lower.startsWith("docker-compose ")) rest = `compose ${lower.slice("docker-compose ".length)}`;
  else if (lower.startsWith("docker ")) rest = lower.slice("docker ".length);
  else if (lower.startsWith("podman ")) rest = lower.slice("podman ".length);
  else return undefined;

  const words = rest.split(/\s+/);
  const hit = PREFIXES.find(([prefix]) => {
    const want = prefix.split(" ");
    return want.every((w, i) => words[i] === w);
  });
  return hit?.[1];
}

export class ContainerOptimizer implements Optimizer {
  readonly name = "container";
  readonly fallback = false;
  private readonly config: ContainerOptimizerConfig;

  constructor(config: Partial<ContainerOptimizerConfig> = {}) {
    this.config = ContainerOptimizerConfig.parse(config);
  }

  canHandle(ctx: CommandContext): boolean {
    const cmd = classifyContainer(ctx.core);
    if (cmd === undefined) return false;
    // A custom --format template is already what the caller asked for.
    if (cmd === "ps" || cmd === "images") return !hasFlag(ctx.core.toLowerCase(), ["--format", "-f"]);
    return true;
  }

  plan(): ExecutionPlan {
    return TRANSFORM;
  }

  optimize(ctx: CommandContext, raw: string): Outcome<OptimizedResult> {
    const c = this.config;
    return compactWith(this.name, raw, () => {
      switch (classifyContainer(ctx.core) ?? "ps") {
        case "ps":
          return compactPs(raw, c.psMaxRows);
        case "images":
          return compactImages(raw, c.imagesMaxRows);
        case "logs":
          return compactLogs(raw, c.logsMaxTail, c.logsMaxErrors);
        case "compose-ps":
          return compactComposePs(raw, c.psMaxRows);
        case "inspect":
          return compactInspect(raw, c.inspectMaxLines);
        case "build":
          return compactImageBuild(raw);
        case "pull-push":
          return compactPullPush(raw);
        case "resource-ls":
          return compactResourceList(raw, c.resourceMaxRows);
      }
    });
  }
}

// --- table helpers ---

function columnStart(header: string, name: string): number | undefined {
  const at = header.toUpperCase().indexOf(name);
  return at < 0 ? undefined : at;
}

/** The text between two column starts; an end at or before the start reads to the end of line. */
function column(line: string, start: number | undefined, end: number | undefined): string | undefined {
  if (start === undefined || start >= line.length) return undefined;
  const stop = Math.min(end ?? line.length, line.length);
  return (stop <= start ? line.slice(start) : line.slice(start, stop)).trim();
}

export function trimTable(text: string, maxRows: number): string {
  const lines = text.split("\n");
  if (lines.length <= maxRows) return text;
  return [...lines.slice(0, maxRows), `...+${lines.length - maxRows} more rows (${lines.length} total)`].join("\n");
}

// --- ps ---

export function compactPs(raw: string, maxRows: number): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "No containers running";
  const lines = trimmed.split("\n");
  const header = lines[0] ?? "";
  if (lines.length <= 1) return header.toLowerCase().includes("container") ? "No containers running" : trimmed;

  const nameCol = columnStart(header, "NAMES");
  const imageCol = columnStart(header, "IMAGE");
  const commandCol = columnStart(header, "COMMAND");
  const statusCol = columnStart(header, "STATUS");
  const portsCol = columnStart(header, "PORTS");
  if (nameCol === undefined && imageCol === undefined) return trimTable(trimmed, maxRows);

  const rows = lines
    .slice(1)
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const name = column(line, nameCol, undefined) || "-";
      const image = clip(column(line, imageCol, commandCol ?? statusCol) || "-", 40);
      const status = column(line, statusCol, portsCol) || "-";
      // PORTS runs up to NAMES and is blank when nothing is published.
      const ports = clip(column(line, portsCol, nameCol) || "-", 30);
      return `${name} | ${image} | ${status} | ${ports}`;
    });

  return ["NAME | IMAGE | STATUS | PORTS", ...section(null, rows, maxRows, "containers")].join("\n");
}

// --- images ---

export function compactImages(raw: string, maxRows: number): string {
  const trimmed = raw.trim();
  const lines = trimmed.split("\n");
  if (trimmed.length === 0 || lines.length <= 1) return "No images";

  const header = lines[0] ?? "";
  const repoCol = columnStart(header, "REPOSITORY");
  const tagCol = columnStart(header, "TAG");
  const idCol = columnStart(header, "IMAGE ID");
  const sizeCol = columnStart(header, "SIZE");
  if (repoCol === undefined) return trimTable(trimmed, maxRows);

  const rows = lines.slice(1).filter((line) => line.trim().length > 0);
  const out = ["REPOSITORY:TAG | SIZE"];
  for (const line of rows.slice(0, maxRows)) {
    const repo = column(line, repoCol, tagCol) || "-";
    const tag = column(line, tagCol, idCol ?? sizeCol) || "-";
    const size = column(line, sizeCol, undefined) || "-";
    out.push(`${repo}:${tag} | ${size}`);
  }
  if (rows.length > maxRows) out.push(`...+${rows.length - maxRows} more (${rows.length} total)`);
  return out.join("\n");
}

// --- logs ---

const LOG_PROBLEM = /error|fatal|panic|exception|traceback/i;

export function compactLogs(raw: string, maxTail: number, maxErrors: number): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "No logs";
  const lines = trimmed.split("\n");
  if (lines.length <= maxTail + maxErrors) return trimmed;

  const problems = lines.filter((line) => LOG_PROBLEM.test(line)).slice(0, maxErrors);
  const out: string[] = [];
  if (problems.length > 0) out.push(`ERRORS/WARNINGS (${problems.length}):`, ...problems, "");
  out.push(`TAIL (${maxTail} of ${lines.length} lines):`, ...lines.slice(lines.length - maxTail));
  return out.join("\n");
}

// --- compose, inspect, resources ---

export function compactComposePs(raw: string, maxRows: number): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0 || trimmed.split("\n").length <= 1) return "No compose services running";
  return trimTable(trimmed, maxRows);
}

export function compactInspect(raw: string, maxLines: number): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "No inspect output";
  const lines = trimmed.split("\n");
  if (lines.length <= maxLines) return trimmed;
  return [...lines.slice(0, maxLines), `...(${lines.length - maxLines} lines omitted, ${lines.length} total)`].join("\n");
}

export function compactResourceList(raw: string, maxRows: number): string {
  const trimmed = raw.trim();
  return trimmed.length === 0 ? "No resources" : trimTable(trimmed, maxRows);
}

// --- build, pull, push ---

const IMAGE_BUILD_ERROR_LINES = 20;

export function compactImageBuild(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "Build completed (no output)";

  const errors: string[] = [];
  const results: string[] = [];
  let steps = 0;

  for (const line of trimmed.split("\n")) {
    const l = line.trim();
    const lower = l.toLowerCase();
    if (lower.startsWith("step ") || (lower.startsWith("#") && lower.includes("["))) {
      steps++;
    } else if (lower.includes("error") || lower.includes("failed")) {
      errors.push(l);
    } else if (/^(successfully|writing image|naming to)/.test(lower) || lower.includes("built")) {
      results.push(l);
    }
  }

  const out: string[] = [];
  if (steps > 0) out.push(`[${steps} build steps]`);
  out.push(...section("ERRORS:", errors, IMAGE_BUILD_ERROR_LINES, "error lines"));
  out.push(...results);
  return out.length > 0 ? out.join("\n") : trimTable(trimmed, 30);
}

const LAYER_PROGRESS = [
  ": pulling", ": waiting", ": downloading", ": extracting", ": verifying", ": already exists",
  ": pull complete", ": pushed", ": preparing", ": layer already exists", ": mounted from",
];

export function compactPullPush(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "completed";
  const lines = trimmed.split("\n").map((line) => line.trim());
  const kept = lines.filter((line) => {
    const lower = line.toLowerCase();
    return !LAYER_PROGRESS.some((marker) => lower.includes(marker));
  });
  return kept.length > 0 ? kept.join("\n") : (lines[lines.length - 1] ?? "completed");
}
