/**
 * Safety classifier. Decides, before anything runs, whether a command may
 * be routed through the optimizing executor at all.
 *
 * Precedence (first match wins):
 *   1. self-invocation (loop guard)
 *   2. deny-listed program as the core's first token
 *   3. output redirection or heredoc anywhere in the original text
 *   4. optimizable
 */

import type { CommandContext } from "../matching/normalizer.js";
import { analyzeQuoting } from "../matching/quoting.js";
import denyList from "./never-optimize.json" with { type: "json" };

export type NeverOptimizeReason = "self-invocation" | "deny-listed" | "redirect" | "heredoc";

export type CommandClassification =
  | { kind: "never-optimize"; reason: NeverOptimizeReason; detail: string }
  | { kind: "optimizable" };

export const BUILTIN_DENY_LIST: readonly string[] = [
  ...denyList.destructive,
  ...denyList.powershell,
  ...denyList.interactive,
];

/** Built-in deny-list plus configured extras, lowercased. */
export function buildDenyList(extra: readonly string[] = []): ReadonlySet<string> {
  return new Set([...BUILTIN_DENY_LIST, ...extra].map((name) => name.trim().toLowerCase()));
}

export function classifyCommand(
  ctx: CommandContext,
  denied: ReadonlySet<string> = buildDenyList(),
): CommandClassification {
  if (ctx.selfInvocation) {
    return { kind: "never-optimize", reason: "self-invocation", detail: "command already runs through squish" };
  }

  const program = programName(ctx.core);
  if (program && denied.has(program)) {
    return { kind: "never-optimize", reason: "deny-listed", detail: `${program} is never optimized` };
  }

  if (containsHeredoc(ctx.original)) {
    return { kind: "never-optimize", reason: "heredoc", detail: "command contains a heredoc" };
  }
  if (containsOutputRedirect(ctx.original)) {
    return { kind: "never-optimize", reason: "redirect", detail: "command redirects output" };
  }

  return { kind: "optimizable" };
}

/** First token of the core, without path or .exe, lowercased. */
export function programName(core: string): string {
  const first = core.trim().split(/\s+/)[0] ?? "";
  const unquoted = first.replace(/^["']|["']$/g, "");
  const base = unquoted.split(/[\\/]/).pop() ?? "";
  return base.replace(/\.exe$/i, "").toLowerCase();
}

/** `<<` (including `<<<` and `<<-`) outside quotes. */
export function containsHeredoc(command: string): boolean {
  const { unquoted } = analyzeQuoting(command);
  for (let i = 0; i + 1 < command.length; i++) {
    if (unquoted[i] && unquoted[i + 1] && command[i] === "<" && command[i + 1] === "<") return true;
  }
  return false;
}

/**
 * Unquoted `>` that writes to a file: `>`, `>>`, `2>`, `&>`, `>|`.
 * File-descriptor duplication (`2>&1`, `>&2`) and `<>` do not count.
 */
export function containsOutputRedirect(command: string): boolean {
  const { unquoted } = analyzeQuoting(command);
  for (let i = 0; i < command.length; i++) {
    if (!unquoted[i] || command[i] !== ">") continue;
    if (i > 0 && command[i - 1] === "<") continue;
    // Skip the second character of `>>`; the first already decided.
    if (i > 0 && command[i - 1] === ">" && unquoted[i - 1]) continue;

    let j = i + 1;
    if (command[j] === ">") j++;
    if (command[j] === "&") continue;
    return true;
  }
  return false;
}
