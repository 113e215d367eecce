/**
 * Noise removal: terminal escapes, carriage-return redraws, tool
 * boilerplate, progress bars and decoration rules.
 */

import { isFailureLine } from "../shared/signals.js";
import boilerplate from "./boilerplate.json" with { type: "json" };

// CSI, OSC (BEL or ST terminated), charset selection, keypad mode
const ANSI_PATTERN = /\x1b\[[0-?]*[ -/]*[@-~]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)|\x1b[()][A-B0-2]|\x1b[=>]/g;

const PROGRESS_BAR = /\[[=#>\-. ]{5,}\]|[█▓▒░■□]{3,}/;
const PERCENT_PROGRESS = /^\d{1,3}(?:\.\d+)?%\s*(?:[|[]|$)/;
// "Receiving objects:  45% (12/30)"
const COUNTED_PROGRESS = /:\s+\d{1,3}% \(\d+\/\d+\)/;
const DECORATION = /^([-=_*#~+.─━═•])\1{2,}$/;

export const BUILTIN_BOILERPLATE: readonly string[] = boilerplate.prefixes;

export interface NoiseOptions {
  extraBoilerplate?: readonly string[];
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

/** Keeps what a terminal would show after `\r` redraws. */
export function resolveCarriageReturns(line: string): string {
  const withoutCr = line.endsWith("\r") ? line.slice(0, -1) : line;
  if (!withoutCr.includes("\r")) return withoutCr;
  const segments = withoutCr.split("\r");
  for (let i = segments.length - 1; i >= 0; i--) {
    const segment = segments[i] ?? "";
    if (segment.trim().length > 0) return segment;
  }
  return "";
}

export function isProgressLine(line: string): boolean {
  const trimmed = line.trim();
  return PROGRESS_BAR.test(trimmed) || PERCENT_PROGRESS.test(trimmed) || COUNTED_PROGRESS.test(trimmed);
}

export function isDecorationLine(line: string): boolean {
  return DECORATION.test(line.trim());
}

export function removeNoise(text: string, options: NoiseOptions = {}): string {
  const prefixes = [...BUILTIN_BOILERPLATE, ...(options.extraBoilerplate ?? [])].map((p) => p.toLowerCase());
  const isBoilerplate = (line: string): boolean => {
    const lower = line.trimStart().toLowerCase();
    return prefixes.some((prefix) => lower.startsWith(prefix));
  };

  const kept: string[] = [];
  for (const raw of stripAnsi(text).split("\n")) {
    const line = resolveCarriageReturns(raw);
    if (!isFailureLine(line) && (isBoilerplate(line) || isProgressLine(line) || isDecorationLine(line))) {
      continue;
    }
    kept.push(line);
  }
  return collapseBlankRuns(kept).join("\n");
}

/** Runs of three or more blank lines become one. */
export function collapseBlankRuns(lines: readonly string[]): string[] {
  const out: string[] = [];
  let i = 0;
  while (i < lines.length) {
    const line = lines[i] ?? "";
    if (line.trim().length > 0) {
      out.push(line);
      i++;
      continue;
    }
    let end = i;
    while (end < lines.length && (lines[end] ?? "").trim().length === 0) end++;
    const run = end - i;
    for (let k = 0; k < (run >= 3 ? 1 : run); k++) out.push(lines[i + k] ?? "");
    i = end;
  }
  return out;
}
