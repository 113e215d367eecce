/**
 * Outcome values. Errors travel as data, never as exceptions, across the
 * boundaries between the router and the optimizers, the LLM client, and the
 * persisted stores.
 */

/** Which layer produced a failure; drives the fallback the router applies. */
export type FailureKind = "classification" | "optimizer" | "llm" | "persistence";

export interface Failure {
  kind: FailureKind;
  message: string;
}

export type Outcome<T> =
  | { success: true; value: T }
  | { success: false; error: Failure };

export function ok<T>(value: T): Outcome<T> {
  return { success: true, value };
}

export function fail<T = never>(kind: FailureKind, message: string): Outcome<T> {
  return { success: false, error: { kind, message } };
}

/** Normalize anything thrown into a one-line message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}

export function safeParseJson(value: string):
  | { success: true; value: unknown }
  | { success: false; error: string } {
  try {
    return { success: true, value: JSON.parse(value) };
  } catch (err) {
    return { success: false, error: describeError(err) };
  }
}
