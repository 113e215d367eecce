/**
 * `squish hook` handler. Reads the assistant's pre-tool request and answers
 * with either a rewrite to `squish run` or `{}`. It never runs the command,
 * and any failure along the way answers `{}`.
 */

import type { EventSink } from "../events/logger.js";
import type { HookDecision } from "../router/decision.js";
import { describeError } from "../shared/outcome.js";
import { PROCEED_UNMODIFIED, SHELL_TOOL, parseHookInput, rewriteResponse, type HookResponse } from "./protocol.js";

export interface HookDeps {
  decide: (command: string) => Promise<HookDecision>;
  executable: string;
  events: EventSink;
  warn?: (message: string) => void;
}

export async function handleHook(stdin: string, deps: HookDeps): Promise<HookResponse> {
  const warn = deps.warn ?? (() => undefined);
  try {
    return await respond(stdin, deps, warn);
  } catch (err) {
    warn(`Hook failed, proceeding unmodified: ${describeError(err)}`);
    return PROCEED_UNMODIFIED;
  }
}

async function respond(stdin: string, deps: HookDeps, warn: (message: string) => void): Promise<HookResponse> {
  const input = parseHookInput(stdin);
  if (!input.success) {
    warn(input.error.message);
    return PROCEED_UNMODIFIED;
  }

  const { tool_name: tool, tool_input: toolInput } = input.value;
  const command = toolInput.command?.trim() ?? "";
  if (tool !== SHELL_TOOL || command.length === 0) return PROCEED_UNMODIFIED;

  const decision = await deps.decide(command);

  if (decision.action === "unmodified") {
    await record(deps, warn, "hook.passthrough", command, { reason: decision.reason });
    return PROCEED_UNMODIFIED;
  }

  await record(deps, warn, "hook.rewrite", command, { expectedPath: decision.expectedPath });
  return rewriteResponse(deps.executable, command, `squish: ${decision.expectedPath} path`);
}

async function record(
  deps: HookDeps,
  warn: (message: string) => void,
  type: "hook.rewrite" | "hook.passthrough",
  command: string,
  payload: Record<string, unknown>,
): Promise<void> {
  try {
    await deps.events.log(type, "hook", { command, payload });
  } catch (err) {
    warn(`Cannot log ${type}: ${describeError(err)}`);
  }
}
