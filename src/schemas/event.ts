/**
 * Event log schema: JSONL stream of hook decisions, executor runs and
 * breaker transitions. Feeds `squish health` and ad-hoc savings analysis.
 */

import { z } from "zod";

/** Event types; exhaustive list of observable actions. */
export const EventType = z.enum([
  // Hook
  "hook.rewrite",
  "hook.passthrough",

  // Executor
  "run.completed",

  // Circuit breaker
  "breaker.opened",
  "breaker.bypassed",

  // Smart path
  "smart.rejected",

  // System
  "system.warning",
]);
export type EventType = z.infer<typeof EventType>;

export const RoutePath = z.enum(["fast", "smart", "passthrough"]);
export type RoutePath = z.infer<typeof RoutePath>;

/** Base event structure. */
export const SquishEvent = z.object({
  /** Per-process monotonic ID (set by the event logger). */
  eventId: z.number().int().positive(),
  type: EventType,
  /** ISO-8601 timestamp. */
  timestamp: z.string().datetime(),
  /** Component that emitted the event: hook, router, breaker, config. */
  actor: z.string(),
  /** Command as the assistant wrote it, when the event concerns one. */
  command: z.string().optional(),
  /** Event-specific payload. */
  payload: z.record(z.string(), z.unknown()).default({}),
});
export type SquishEvent = z.infer<typeof SquishEvent>;

/** run.completed payload. */
export const RunCompletedPayload = z.object({
  path: RoutePath,
  optimizer: z.string().nullable(),
  exitCode: z.number().int(),
  originalTokens: z.number().int().nonnegative(),
  optimizedTokens: z.number().int().nonnegative(),
  savingsPercent: z.number(),
  latencyMs: z.number().nonnegative(),
  /** Set when the path attempted first was abandoned. */
  fallbackReason: z.string().optional(),
});
export type RunCompletedPayload = z.infer<typeof RunCompletedPayload>;

/** hook.rewrite / hook.passthrough payload. */
export const HookDecisionPayload = z.object({
  expectedPath: RoutePath.optional(),
  reason: z.string().optional(),
});
export type HookDecisionPayload = z.infer<typeof HookDecisionPayload>;
