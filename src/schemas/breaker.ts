/**
 * Persisted circuit-breaker state (~/.squish/circuit-breaker.json).
 */

import { z } from "zod";

export const PathId = z.enum(["fast", "smart"]);
export type PathId = z.infer<typeof PathId>;

export const PathState = z.object({
  /** Most recent attempts, oldest first; true = success. */
  outcomes: z.array(z.boolean()).default([]),
  /** ISO-8601; the path is open until this instant. */
  openUntil: z.string().datetime().nullable().default(null),
  /** Routing decisions that skipped this path while it was open. */
  bypassed: z.number().int().nonnegative().default(0),
  /** ISO-8601 of the latest success; the LLM client uses it to pick warm vs cold timeouts. */
  lastSuccessAt: z.string().datetime().nullable().default(null),
});
export type PathState = z.infer<typeof PathState>;

export const BreakerState = z.object({
  version: z.literal(1).default(1),
  fast: PathState.default({}),
  smart: PathState.default({}),
});
export type BreakerState = z.infer<typeof BreakerState>;
