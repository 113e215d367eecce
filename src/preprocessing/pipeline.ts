/**
 * Preprocessing pipeline.
 *
 * Stage order is fixed: noise → path-filter → dedup → truncation →
 * whitespace-trim. Every stage is a pure string transform, and the pipeline
 * as a whole is idempotent: its output passes through unchanged.
 */

import { PreprocessingConfig } from "../schemas/config.js";
import type { OutputCategory } from "../shared/category.js";
import { byteLength } from "../shared/signals.js";
import { deduplicate } from "./dedup.js";
import { removeNoise } from "./noise.js";
import { filterPaths } from "./path-filter.js";
import { trimWhitespace } from "./trim.js";
import { truncateOutput } from "./truncation.js";

export type StageName = "noise" | "path-filter" | "dedup" | "truncation" | "whitespace-trim";

export interface PreprocessedOutput {
  text: string;
  originalBytes: number;
  processedBytes: number;
  /** Stages that changed the text, in order. */
  stagesApplied: StageName[];
}

interface Stage {
  name: StageName;
  enabled: boolean;
  run(text: string): string;
}

function buildStages(config: PreprocessingConfig, category: OutputCategory): Stage[] {
  return [
    {
      name: "noise",
      enabled: config.noiseRemoval,
      run: (text) => removeNoise(text, { extraBoilerplate: config.extraBoilerplate }),
    },
    {
      name: "path-filter",
      enabled: config.pathFiltering,
      run: (text) => filterPaths(text, { mode: config.pathFilterMode, extraNoisyPaths: config.extraNoisyPaths }),
    },
    { name: "dedup", enabled: config.deduplication, run: deduplicate },
    {
      name: "truncation",
      enabled: config.truncation,
      run: (text) => truncateOutput(text, config.maxOutputBytes, category),
    },
    { name: "whitespace-trim", enabled: config.whitespaceTrim, run: trimWhitespace },
  ];
}

export function preprocess(
  raw: string,
  category: OutputCategory = "generic",
  config: PreprocessingConfig = PreprocessingConfig.parse({}),
): PreprocessedOutput {
  const originalBytes = byteLength(raw);
  const stagesApplied: StageName[] = [];
  let text = raw;

  if (config.enabled) {
    for (const stage of buildStages(config, category)) {
      if (!stage.enabled) continue;
      const next = stage.run(text);
      if (next !== text) stagesApplied.push(stage.name);
      text = next;
    }
  }

  return { text, originalBytes, processedBytes: byteLength(text), stagesApplied };
}
