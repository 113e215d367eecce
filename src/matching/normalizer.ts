/**
 * Command normalizer.
 *
 * Reduces an arbitrarily wrapped shell command to the "core" command that
 * optimizers and the deny-list match against. Each pass unwraps, in order:
 *
 *   1. one level of subshell parentheses  `( ... )`
 *   2. `sh -c '...'` / `bash -c "..."` wrappers
 *   3. chained prefixes: only the last `&&` / `;` segment is kept
 *   4. pipelines: only the segment before the first `|` is kept
 *   5. leading `NAME=value` environment assignments
 *
 * Passes repeat until nothing changes, at most MAX_UNWRAP_PASSES times.
 * Unbalanced quoting fails open: the trimmed original becomes the core.
 */

import { analyzeQuoting, matchingParen, readQuoted } from "./quoting.js";

export interface CommandContext {
  /** Literal invocation text; used for loop-guard and redirection checks. */
  readonly original: string;
  /** Normalized form; used for all matching. Empty only if `original` is. */
  readonly core: string;
  /** The command re-invokes squish's own executor. */
  readonly selfInvocation: boolean;
}

export const MAX_UNWRAP_PASSES = 5;
export const DEFAULT_EXECUTABLE = "squish";

export function normalizeCommand(original: string, executable: string = DEFAULT_EXECUTABLE): CommandContext {
  return Object.freeze({
    original,
    core: extractCore(original),
    selfInvocation: isSelfInvocation(original, executable),
  });
}

export function extractCore(original: string): string {
  const trimmed = original.trim();
  if (trimmed.length === 0) return "";
  if (!analyzeQuoting(trimmed).balanced) return trimmed;

  let current = trimmed;
  for (let pass = 0; pass < MAX_UNWRAP_PASSES; pass++) {
    const next = unwrapOnce(current);
    if (next === current) break;
    current = next;
  }
  return current;
}

type Unwrapper = (command: string) => string;

const UNWRAPPERS: Unwrapper[] = [
  unwrapSubshell,
  unwrapShellWrapper,
  lastChainSegment,
  firstPipelineSegment,
  stripEnvAssignments,
];

function unwrapOnce(command: string): string {
  let current = command;
  for (const unwrap of UNWRAPPERS) {
    const next = unwrap(current).trim();
    // A step that would empty the command (or break its quoting) is skipped.
    if (next.length > 0 && analyzeQuoting(next).balanced) current = next;
  }
  return current;
}

// --- unwrappers ---

export function unwrapSubshell(command: string): string {
  if (!command.startsWith("(") || !command.endsWith(")")) return command;
  if (matchingParen(command, 0) !== command.length - 1) return command;
  return command.slice(1, -1);
}

const SHELL_WRAPPER = /^(?:\S*[\\/])?(?:bash|sh|zsh|dash)(?:\.exe)?((?:\s+-[A-Za-z]+)*)\s+/i;

export function unwrapShellWrapper(command: string): string {
  const match = SHELL_WRAPPER.exec(command);
  if (!match) return command;
  const flags = match[1] ?? "";
  // The last flag cluster must end in c (-c, -lc, -ec ...)
  const clusters = flags.trim().split(/\s+/).filter((f) => f.length > 0);
  const last = clusters[clusters.length - 1];
  if (!last || !last.toLowerCase().endsWith("c")) return command;

  const start = match[0].length;
  const quoted = readQuoted(command, start);
  if (!quoted) return command;
  // Anything after the quoted script (positional args, redirections) keeps the wrapper.
  if (command.slice(quoted.end).trim().length > 0) return command;
  return quoted.body;
}

export function lastChainSegment(command: string): string {
  const { topLevel } = analyzeQuoting(command);
  let cut = -1;
  for (let i = 0; i < command.length; i++) {
    if (!topLevel[i]) continue;
    const ch = command[i];
    if (ch === ";") {
      cut = i + 1;
    } else if (ch === "&" && command[i + 1] === "&" && topLevel[i + 1]) {
      cut = i + 2;
      i++;
    }
  }
  return cut < 0 ? command : command.slice(cut);
}

export function firstPipelineSegment(command: string): string {
  const { topLevel } = analyzeQuoting(command);
  for (let i = 0; i < command.length; i++) {
    if (!topLevel[i] || command[i] !== "|") continue;
    if (command[i + 1] === "|") {
      i++; // `||` is a conditional, not a pipe
      continue;
    }
    return command.slice(0, i);
  }
  return command;
}

const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*=/;

export function stripEnvAssignments(command: string): string {
  let rest = command;
  if (/^env\s+[A-Za-z_][A-Za-z0-9_]*=/.test(rest)) {
    rest = rest.replace(/^env\s+/, "");
  }

  for (;;) {
    const name = ENV_NAME.exec(rest);
    if (!name) return rest;

    let valueEnd = name[0].length;
    const quote = rest[valueEnd];
    if (quote === "'" || quote === '"') {
      const quoted = readQuoted(rest, valueEnd);
      if (!quoted) return rest;
      valueEnd = quoted.end;
    }
    while (valueEnd < rest.length && !/\s/.test(rest.charAt(valueEnd))) valueEnd++;

    const remainder = rest.slice(valueEnd).trimStart();
    // A bare assignment is the command itself.
    if (remainder.length === 0) return rest;
    rest = remainder;
  }
}

// --- loop guard ---

/**
 * True when `command` invokes `<executable> run ...`. The executable name
 * must start a token (so `/opt/squish-run/x` does not count) and may carry a
 * path, an `.exe` suffix or a closing quote.
 */
export function isSelfInvocation(command: string, executable: string = DEFAULT_EXECUTABLE): boolean {
  const name = executableName(executable);
  if (name.length === 0) return false;

  const lower = command.toLowerCase();
  let from = 0;
  for (;;) {
    const index = lower.indexOf(name, from);
    if (index < 0) return false;
    from = index + 1;

    const before = index === 0 ? " " : lower.charAt(index - 1);
    if (!/[\s"'\\/]/.test(before)) continue;

    const after = lower.slice(index + name.length);
    if (/^(?:\.exe)?["']?\s+run(?:\s|$)/.test(after)) return true;
  }
}

/** Lowercased basename without extension: "/usr/bin/Squish.exe" → "squish". */
export function executableName(executable: string): string {
  const unquoted = executable.trim().replace(/^["']|["']$/g, "");
  const base = unquoted.split(/[\\/]/).pop() ?? "";
  return base.replace(/\.exe$/i, "").toLowerCase();
}
