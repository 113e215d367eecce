/**
 * Routing decisions, before and after the command runs.
 *
 * Both functions are pure apart from the LLM health probe, which is only
 * awaited when the decision actually reaches the Smart path. Paths skipped
 * because their breaker is open are reported in `bypassed` so the caller
 * can count them.
 */

import type { PathId } from "../schemas/breaker.js";
import type { GeneralConfig, Mode, OutputThresholds } from "../schemas/config.js";
import type { CommandClassification, NeverOptimizeReason } from "../safety/classifier.js";

export type OptimizationPath = "fast" | "smart" | "passthrough";

export type UnmodifiedReason =
  | "disabled"
  | "safe-mode"
  | "passthrough-mode"
  | NeverOptimizeReason
  | "no-path-available";

export type HookDecision =
  | { action: "unmodified"; reason: UnmodifiedReason; detail?: string; bypassed: PathId[] }
  | { action: "rewrite"; expectedPath: PathId; bypassed: PathId[] };

export type PostExecutionReason =
  | "mode"
  | "below-floor"
  | "specialized-optimizer"
  | "large-output"
  | "no-path-available";

export interface PostExecutionDecision {
  path: OptimizationPath;
  reason: PostExecutionReason;
  bypassed: PathId[];
}

/** Availability of both paths at decision time. */
export interface PathAvailability {
  fastEnabled: boolean;
  fastClosed: boolean;
  smartEnabled: boolean;
  smartClosed: boolean;
  /** Awaited lazily, at most once per decision. */
  smartHealthy: () => Promise<boolean>;
}

export function modeAllowsFast(mode: Mode): boolean {
  return mode === "hybrid" || mode === "fast-only";
}

export function modeAllowsSmart(mode: Mode): boolean {
  return mode === "hybrid" || mode === "smart-only";
}

/** Why routing is switched off for this command, or null when it may be optimized. */
export function routingBlocked(
  general: GeneralConfig,
  classification: CommandClassification,
): { reason: UnmodifiedReason; detail?: string } | null {
  if (!general.enabled) return { reason: "disabled" };
  if (general.safeMode) return { reason: "safe-mode" };
  if (general.mode === "passthrough") return { reason: "passthrough-mode" };
  if (classification.kind === "never-optimize") {
    return { reason: classification.reason, detail: classification.detail };
  }
  return null;
}

export interface PreExecutionInput extends PathAvailability {
  general: GeneralConfig;
  classification: CommandClassification;
  /** A specialized (non-fallback) optimizer claims the command. */
  specializedMatch: boolean;
}

/** Decides whether the hook should rewrite the command. Never runs it. */
export async function decidePreExecution(input: PreExecutionInput): Promise<HookDecision> {
  const blocked = routingBlocked(input.general, input.classification);
  if (blocked) return { action: "unmodified", ...blocked, bypassed: [] };

  const { mode } = input.general;
  const bypassed: PathId[] = [];

  // fast-only routes everything to the optimizers, generic fallback included.
  const fastCandidate = mode === "fast-only" || input.specializedMatch;
  if (modeAllowsFast(mode) && input.fastEnabled && fastCandidate) {
    if (input.fastClosed) return { action: "rewrite", expectedPath: "fast", bypassed };
    bypassed.push("fast");
  }

  if (modeAllowsSmart(mode) && input.smartEnabled) {
    if (!input.smartClosed) {
      bypassed.push("smart");
    } else if (await input.smartHealthy()) {
      return { action: "rewrite", expectedPath: "smart", bypassed };
    }
  }

  return { action: "unmodified", reason: "no-path-available", bypassed };
}

export interface PostExecutionInput extends PathAvailability {
  mode: Mode;
  /** Size of the captured output. */
  bytes: number;
  thresholds: OutputThresholds;
  specializedMatch: boolean;
}

/**
 * Picks the path for captured output. In hybrid mode the first rule that
 * applies wins: small output passes through, a specialized optimizer takes
 * Fast, large output goes Smart, anything else passes through.
 */
export async function decidePostExecution(input: PostExecutionInput): Promise<PostExecutionDecision> {
  const { mode, bytes, thresholds } = input;
  const bypassed: PathId[] = [];
  const decide = (path: OptimizationPath, reason: PostExecutionReason): PostExecutionDecision => ({
    path,
    reason,
    bypassed,
  });

  switch (mode) {
    case "passthrough":
      return decide("passthrough", "mode");

    case "fast-only":
      if (!input.fastEnabled) return decide("passthrough", "no-path-available");
      if (input.fastClosed) return decide("fast", "mode");
      bypassed.push("fast");
      return decide("passthrough", "no-path-available");

    case "smart-only":
      if (bytes < thresholds.passthroughBelowBytes) return decide("passthrough", "below-floor");
      if (!input.smartEnabled) return decide("passthrough", "no-path-available");
      if (!input.smartClosed) {
        bypassed.push("smart");
        return decide("passthrough", "no-path-available");
      }
      return (await input.smartHealthy()) ? decide("smart", "mode") : decide("passthrough", "no-path-available");

    case "hybrid":
      break;
  }

  if (bytes < thresholds.passthroughBelowBytes) return decide("passthrough", "below-floor");

  if (input.specializedMatch && input.fastEnabled) {
    if (input.fastClosed) return decide("fast", "specialized-optimizer");
    bypassed.push("fast");
  }

  if (bytes >= thresholds.smartPathAboveBytes && input.smartEnabled) {
    if (!input.smartClosed) {
      bypassed.push("smart");
    } else if (await input.smartHealthy()) {
      return decide("smart", "large-output");
    }
  }

  return decide("passthrough", "no-path-available");
}
