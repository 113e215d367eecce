/**
 * Event logger: append-only JSONL event log.
 *
 * Writes one JSON object per line to <eventsDir>/YYYY-MM-DD.jsonl and keeps
 * events.jsonl pointing at the current day's file.
 */

import { appendFile, mkdir, symlink, unlink, readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { PathId } from "../schemas/breaker.js";
import {
  SquishEvent,
  type EventType,
  type HookDecisionPayload,
  type RunCompletedPayload,
} from "../schemas/event.js";
import { describeError, safeParseJson } from "../shared/outcome.js";

export type EventCallback = (event: SquishEvent) => void | Promise<void>;

export interface EventLoggerOptions {
  onEvent?: EventCallback;
  /** When false, events are built and returned but not written. */
  enabled?: boolean;
  /** Receives non-fatal problems such as a failed symlink update. */
  onWarning?: (message: string) => void;
  clock?: () => Date;
}

export interface EventFilter {
  type?: EventType;
  actor?: string;
  command?: string;
  /** Inclusive ISO-8601 lower bound. */
  since?: string;
}

/** Narrow view of the logger the router and hook depend on. */
export interface EventSink {
  log(type: EventType, actor: string, opts?: { command?: string; payload?: Record<string, unknown> }): Promise<SquishEvent>;
}

export class EventLogger implements EventSink {
  private readonly eventsDir: string;
  private readonly onEvent?: EventCallback;
  private readonly onWarning: (message: string) => void;
  private readonly enabled: boolean;
  private readonly clock: () => Date;
  private eventCounter: number = 0;

  constructor(eventsDir: string, options?: EventLoggerOptions) {
    this.eventsDir = eventsDir;
    this.onEvent = options?.onEvent;
    this.onWarning = options?.onWarning ?? ((message) => console.warn(`[squish] ${message}`));
    this.enabled = options?.enabled ?? true;
    this.clock = options?.clock ?? (() => new Date());
  }

  get directory(): string {
    return this.eventsDir;
  }

  /** Append an event to today's JSONL file. */
  async log(
    type: EventType,
    actor: string,
    opts?: {
      command?: string;
      payload?: Record<string, unknown>;
    },
  ): Promise<SquishEvent> {
    this.eventCounter += 1;

    const event = SquishEvent.parse({
      eventId: this.eventCounter,
      type,
      timestamp: this.clock().toISOString(),
      actor,
      command: opts?.command,
      payload: opts?.payload ?? {},
    });

    if (this.enabled) {
      const date = event.timestamp.slice(0, 10); // YYYY-MM-DD
      await mkdir(this.eventsDir, { recursive: true });
      await appendFile(join(this.eventsDir, `${date}.jsonl`), JSON.stringify(event) + "\n", "utf-8");
      await this.updateSymlink(date);
    }

    if (this.onEvent) {
      await Promise.resolve(this.onEvent(event));
    }

    return event;
  }

  /** Point events.jsonl at the current day's log. */
  private async updateSymlink(date: string): Promise<void> {
    const symlinkPath = join(this.eventsDir, "events.jsonl");
    const targetFilename = `${date}.jsonl`;

    try {
      await unlink(symlinkPath);
    } catch (err) {
      if (!isMissingFile(err)) {
        this.onWarning(`Failed to remove events.jsonl: ${describeError(err)}`);
        return;
      }
    }

    try {
      // Relative target so the directory can move.
      await symlink(targetFilename, symlinkPath);
    } catch (err) {
      this.onWarning(`Failed to update events.jsonl: ${describeError(err)}`);
    }
  }

  /** Log the outcome of one executor run. */
  async logRun(command: string, payload: RunCompletedPayload): Promise<void> {
    await this.log("run.completed", "router", { command, payload });
  }

  /** Log a hook decision. */
  async logHookDecision(
    type: "hook.rewrite" | "hook.passthrough",
    command: string,
    payload: HookDecisionPayload,
  ): Promise<void> {
    await this.log(type, "hook", { command, payload });
  }

  async logBreaker(
    type: "breaker.opened" | "breaker.bypassed",
    path: PathId,
    payload?: Record<string, unknown>,
  ): Promise<void> {
    await this.log(type, "breaker", { payload: { path, ...payload } });
  }

  async logWarning(actor: string, message: string): Promise<void> {
    await this.log("system.warning", actor, { payload: { message } });
  }

  /**
   * Query events from the log.
   *
   * Reads every daily file and keeps the events matching all given criteria,
   * oldest first. Lines that are not valid events are skipped.
   */
  async query(filter?: EventFilter): Promise<SquishEvent[]> {
    let files: string[];
    try {
      files = await readdir(this.eventsDir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    const jsonlFiles = files.filter((f) => /^\d{4}-\d{2}-\d{2}\.jsonl$/.test(f)).sort();

    const events: SquishEvent[] = [];

    for (const file of jsonlFiles) {
      const content = await readFile(join(this.eventsDir, file), "utf-8");
      const lines = content.split("\n").filter((line) => line.trim().length > 0);

      for (const line of lines) {
        const json = safeParseJson(line);
        if (!json.success) continue;
        const parsed = SquishEvent.safeParse(json.value);
        if (!parsed.success) continue;
        const event = parsed.data;

        if (filter?.type && event.type !== filter.type) continue;
        if (filter?.actor && event.actor !== filter.actor) continue;
        if (filter?.command && event.command !== filter.command) continue;
        if (filter?.since && event.timestamp < filter.since) continue;

        events.push(event);
      }
    }

    return events;
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
