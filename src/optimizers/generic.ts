import type { CommandContext } from "../matching/normalizer.js";
import { GenericOptimizerConfig } from "../schemas/config.js";
import type { Outcome } from "../shared/outcome.js";
import { byteLength } from "../shared/signals.js";
import { TRANSFORM, compactWith, type ExecutionPlan, type OptimizedResult, type Optimizer } from "./types.js";

const MAX_CONSECUTIVE_BLANKS = 2;

/**
 * Strips trailing whitespace, allows at most two blank lines in a row and
 * drops trailing blanks. Beyond `maxLines`, keeps two thirds from the head
 * and the rest from the tail around an omission note.
 */
export function cleanupWhitespace(text: string, maxLines: number): string {
  const lines: string[] = [];
  let blanks = 0;
  for (const line of text.split("\n")) {
    const trimmed = line.trimEnd();
    if (trimmed.length === 0) {
      blanks++;
      if (blanks <= MAX_CONSECUTIVE_BLANKS) lines.push("");
    } else {
      blanks = 0;
      lines.push(trimmed);
    }
  }
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

  const total = lines.length;
  if (total <= maxLines) return lines.join("\n");

  const head = Math.floor((maxLines * 2) / 3);
  const tail = maxLines - head - 1;
  return [
    ...lines.slice(0, head),
    `\n... (${total - head - tail} lines omitted, ${total} total) ...\n`,
    ...lines.slice(total - tail),
  ].join("\n");
}

/** Matches every command; always last in the registry. */
export class GenericOptimizer implements Optimizer {
  readonly name = "generic";
  readonly fallback = true;
  private readonly config: GenericOptimizerConfig;

  constructor(config: Partial<GenericOptimizerConfig> = {}) {
    this.config = GenericOptimizerConfig.parse(config);
  }

  canHandle(): boolean {
    return true;
  }

  plan(): ExecutionPlan {
    return TRANSFORM;
  }

  optimize(_ctx: CommandContext, raw: string): Outcome<OptimizedResult> {
    const { enabled, minSizeBytes, maxLines } = this.config;
    return compactWith(this.name, raw, () => {
      if (!enabled) return cleanupWhitespace(raw, Number.POSITIVE_INFINITY);
      if (byteLength(raw) < minSizeBytes) return raw;
      return cleanupWhitespace(raw, maxLines);
    });
  }
}
