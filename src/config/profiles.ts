/**
 * Profile presets. A preset sits between the built-in defaults and the
 * user's files, so an explicit setting always wins over the profile.
 */

import type { Profile } from "../schemas/config.js";

/** Partial configuration tree, in the same shape as the YAML files. */
export type ConfigLayer = Record<string, unknown>;

export const PROFILE_PRESETS: Record<Profile, ConfigLayer> = {
  // Keep the LLM out of the way: tighter budgets, higher Smart threshold.
  fast: {
    fastPath: { timeoutMs: 50 },
    smartPath: { coldTimeoutMs: 1500, warmTimeoutMs: 1500 },
    outputThresholds: { passthroughBelowBytes: 1024, smartPathAboveBytes: 20 * 1024 },
  },
  balanced: {},
  quality: {
    smartPath: { coldTimeoutMs: 90_000, warmTimeoutMs: 5000 },
    outputThresholds: { passthroughBelowBytes: 512, smartPathAboveBytes: 4 * 1024 },
  },
};
