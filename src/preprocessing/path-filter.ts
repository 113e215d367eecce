/**
 * Path filtering: lines that mention dependency, cache or build-output
 * directories are summarized (or removed). Lines carrying a failure signal
 * always stay.
 */

import type { PathFilterMode } from "../schemas/config.js";
import { isFailureLine } from "../shared/signals.js";
import { isMarkerLine, pathsFilteredMarker } from "./markers.js";
import noisyPaths from "./noisy-paths.json" with { type: "json" };

export const BUILTIN_NOISY_PATHS: readonly string[] = noisyPaths.fragments;

export interface PathFilterOptions {
  mode?: PathFilterMode;
  extraNoisyPaths?: readonly string[];
}

// Drawing characters `tree` and friends put before a path
const TREE_PREFIX = /^[\s│├└─┬┼|`+\\-]+/;

/** The noisy fragment a line mentions, or undefined. */
export function noisyFragment(line: string, fragments: readonly string[]): string | undefined {
  const normalized = line.replace(/\\/g, "/").replace(TREE_PREFIX, "");
  return fragments.find((fragment) => normalized.includes(fragment));
}

function fragmentClass(fragment: string): string {
  return fragment.replace(/\/+$/, "");
}

export function filterPaths(text: string, options: PathFilterOptions = {}): string {
  const mode = options.mode ?? "summary";
  const fragments = [...BUILTIN_NOISY_PATHS, ...(options.extraNoisyPaths ?? [])].map((f) => f.replace(/\\/g, "/"));

  const out: string[] = [];
  let runCount = 0;
  let runClasses: string[] = [];

  const flush = (): void => {
    if (runCount > 0 && mode === "summary") out.push(pathsFilteredMarker(runCount, runClasses));
    runCount = 0;
    runClasses = [];
  };

  for (const line of text.split("\n")) {
    const fragment = isMarkerLine(line) || isFailureLine(line) ? undefined : noisyFragment(line, fragments);
    if (fragment === undefined) {
      flush();
      out.push(line);
      continue;
    }
    runCount++;
    const cls = fragmentClass(fragment);
    if (!runClasses.includes(cls)) runClasses.push(cls);
  }
  flush();
  return out.join("\n");
}
