/**
 * Per-path circuit breaker.
 *
 * Each path (fast, smart) keeps a rolling window of attempt outcomes. Once
 * the window is full and the failure ratio exceeds the threshold, the path
 * opens for `cooldownMs`; it closes on its own when the cooldown passes, and
 * the next recorded attempt starts a fresh window. Paths never affect each
 * other.
 *
 * The breaker is in-memory; BreakerStore loads and saves it around one
 * process invocation.
 */

import { readFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { BreakerState, type PathId } from "../schemas/breaker.js";
import { describeError, fail, ok, safeParseJson, type Outcome } from "../shared/outcome.js";

export interface BreakerSettings {
  window: number;
  /** Failure ratio (0..1) that must be exceeded to open. */
  threshold: number;
  cooldownMs: number;
}

export const DEFAULT_BREAKER_SETTINGS: BreakerSettings = {
  window: 10,
  threshold: 0.2,
  cooldownMs: 600_000,
};

export interface PathStatus {
  path: PathId;
  open: boolean;
  openUntil: string | null;
  failures: number;
  attempts: number;
  bypassed: number;
}

export interface RecordResult {
  /** This record opened the breaker. */
  opened: boolean;
}

export interface CircuitBreaker {
  isAllowed(path: PathId): boolean;
  record(path: PathId, success: boolean): RecordResult;
  /** Note that routing skipped an open path. */
  recordBypass(path: PathId): void;
  status(path: PathId): PathStatus;
  /** Timestamp (ms) of the latest success on the path, if any. */
  lastSuccess(path: PathId): number | null;
  snapshot(): BreakerState;
}

export function emptyBreakerState(): BreakerState {
  return BreakerState.parse({});
}

export function createCircuitBreaker(
  initial: BreakerState = emptyBreakerState(),
  settings: BreakerSettings = DEFAULT_BREAKER_SETTINGS,
  clock: () => number = Date.now,
): CircuitBreaker {
  const state: BreakerState = structuredClone(initial);

  function openUntilMs(path: PathId): number | null {
    const until = state[path].openUntil;
    return until === null ? null : Date.parse(until);
  }

  function isOpen(path: PathId): boolean {
    const until = openUntilMs(path);
    return until !== null && clock() < until;
  }

  return {
    isAllowed(path: PathId): boolean {
      return !isOpen(path);
    },

    record(path: PathId, success: boolean): RecordResult {
      const entry = state[path];
      const until = openUntilMs(path);

      // Cooldown elapsed: close and start over.
      if (until !== null && clock() >= until) {
        entry.outcomes = [];
        entry.openUntil = null;
      }

      entry.outcomes.push(success);
      if (entry.outcomes.length > settings.window) {
        entry.outcomes.splice(0, entry.outcomes.length - settings.window);
      }
      if (success) entry.lastSuccessAt = new Date(clock()).toISOString();

      if (entry.openUntil !== null || entry.outcomes.length < settings.window) {
        return { opened: false };
      }

      const failures = entry.outcomes.filter((o) => !o).length;
      if (failures / entry.outcomes.length > settings.threshold) {
        entry.openUntil = new Date(clock() + settings.cooldownMs).toISOString();
        return { opened: true };
      }
      return { opened: false };
    },

    recordBypass(path: PathId): void {
      state[path].bypassed += 1;
    },

    status(path: PathId): PathStatus {
      const entry = state[path];
      const open = isOpen(path);
      return {
        path,
        open,
        openUntil: open ? entry.openUntil : null,
        failures: entry.outcomes.filter((o) => !o).length,
        attempts: entry.outcomes.length,
        bypassed: entry.bypassed,
      };
    },

    lastSuccess(path: PathId): number | null {
      const at = state[path].lastSuccessAt;
      return at === null ? null : Date.parse(at);
    },

    snapshot(): BreakerState {
      return structuredClone(state);
    },
  };
}

// --- persistence ---

/**
 * File-backed breaker state. Reads are optimistic (any problem yields the
 * closed default); writes are atomic and report failure as a value.
 */
export class BreakerStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<{ state: BreakerState; warning?: string }> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") {
        return { state: emptyBreakerState() };
      }
      return { state: emptyBreakerState(), warning: `Cannot read breaker state: ${describeError(err)}` };
    }

    const json = safeParseJson(content);
    if (!json.success) {
      return { state: emptyBreakerState(), warning: `Corrupt breaker state: ${json.error}` };
    }
    const parsed = BreakerState.safeParse(json.value);
    if (!parsed.success) {
      return { state: emptyBreakerState(), warning: "Breaker state failed validation; starting closed" };
    }
    return { state: parsed.data };
  }

  async save(state: BreakerState): Promise<Outcome<void>> {
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFileAtomic(this.filePath, JSON.stringify(state, null, 2) + "\n");
      return ok(undefined);
    } catch (err) {
      return fail("persistence", `Cannot write breaker state: ${describeError(err)}`);
    }
  }
}
