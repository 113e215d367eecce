/**
 * Optimizer protocol.
 *
 * An optimizer claims commands by their normalized core, may ask to run a
 * more compact variant of the command (`substitute`), and turns captured
 * output into a compact rendition. `optimize` reports failure as a value and
 * never throws.
 */

import type { CommandContext } from "../matching/normalizer.js";
import { describeError, fail, ok, type Outcome } from "../shared/outcome.js";
import { estimateTokens } from "../shared/tokens.js";

export type ExecutionPlan =
  | { strategy: "substitute"; command: string }
  | { strategy: "transform" };

export interface OptimizedResult {
  output: string;
  optimizerName: string;
  originalTokens: number;
  optimizedTokens: number;
}

export interface Optimizer {
  readonly name: string;
  /** The universal fallback; exactly one per registry, always last. */
  readonly fallback: boolean;
  canHandle(ctx: CommandContext): boolean;
  plan(ctx: CommandContext): ExecutionPlan;
  optimize(ctx: CommandContext, raw: string): Outcome<OptimizedResult>;
}

export const TRANSFORM: ExecutionPlan = { strategy: "transform" };

export function buildResult(optimizerName: string, raw: string, output: string): OptimizedResult {
  return {
    output,
    optimizerName,
    originalTokens: estimateTokens(raw),
    optimizedTokens: estimateTokens(output),
  };
}

/**
 * Runs a compaction function and packages its result. Anything it throws
 * becomes an optimizer failure.
 */
export function compactWith(
  optimizerName: string,
  raw: string,
  compact: () => string,
): Outcome<OptimizedResult> {
  try {
    return ok(buildResult(optimizerName, raw, compact()));
  } catch (err) {
    return fail("optimizer", `${optimizerName}: ${describeError(err)}`);
  }
}

// `cd dir &&` clauses and `NAME=value` assignments, which print nothing themselves.
const SILENT_PREFIX =
  /^(?:\s*cd\s+(?:"[^"]*"|'[^']*'|[^\s;&|]+)\s*(?:&&|;)|\s*[A-Za-z_][A-Za-z0-9_]*=(?:"[^"]*"|'[^']*'|[^\s;&|]*)(?=\s))*\s*$/;

/**
 * Plans a substitution of the core's leading `from` words with `to`, in
 * place inside the original command so `cd` and env prefixes survive.
 * Any other command chained or piped around the core would see the variant
 * too, so the original output is transformed instead.
 */
export function substitutePrefix(ctx: CommandContext, from: string, to: string): ExecutionPlan {
  const { original, core } = ctx;
  if (!core.toLowerCase().startsWith(from.toLowerCase())) return TRANSFORM;
  const at = original.lastIndexOf(core);
  if (at < 0) return TRANSFORM;

  const prefix = original.slice(0, at);
  const suffix = original.slice(at + core.length);
  if (!SILENT_PREFIX.test(prefix) || suffix.trim().length > 0) return TRANSFORM;

  return { strategy: "substitute", command: prefix + to + core.slice(from.length) + suffix };
}
