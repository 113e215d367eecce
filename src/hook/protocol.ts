/**
 * Pre-tool hook wire format. The assistant writes one JSON object to the
 * hook's stdin and reads one JSON object from its stdout.
 */

import { z } from "zod";
import { fail, ok, safeParseJson, type Outcome } from "../shared/outcome.js";

export const HookInput = z
  .object({
    tool_name: z.string(),
    tool_input: z.object({ command: z.string().optional() }).passthrough().default({}),
    session_id: z.string().optional(),
    cwd: z.string().optional(),
  })
  .passthrough();
export type HookInput = z.infer<typeof HookInput>;

export const HookRewrite = z.object({
  hookSpecificOutput: z.object({
    hookEventName: z.literal("PreToolUse"),
    permissionDecision: z.literal("allow"),
    permissionDecisionReason: z.string(),
    updatedInput: z.object({ command: z.string() }),
  }),
});
export type HookRewrite = z.infer<typeof HookRewrite>;

/** `{}` tells the assistant to run the tool call unmodified. */
export type HookResponse = HookRewrite | Record<string, never>;

export const PROCEED_UNMODIFIED: HookResponse = {};

/** The only tool whose input is ever rewritten. */
export const SHELL_TOOL = "Bash";

export function parseHookInput(raw: string): Outcome<HookInput> {
  const json = safeParseJson(raw);
  if (!json.success) return fail("classification", `Hook input is not JSON: ${json.error}`);
  const parsed = HookInput.safeParse(json.value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    return fail("classification", `Invalid hook input: ${issues}`);
  }
  return ok(parsed.data);
}

/** POSIX single-quoting: `it's` becomes `'it'\''s'`. */
export function shellQuote(text: string): string {
  return `'${text.replace(/'/g, `'\\''`)}'`;
}

export function rewriteCommand(executable: string, command: string): string {
  return `${executable} run ${shellQuote(command)}`;
}

export function rewriteResponse(executable: string, command: string, reason: string): HookRewrite {
  return {
    hookSpecificOutput: {
      hookEventName: "PreToolUse",
      permissionDecision: "allow",
      permissionDecisionReason: reason,
      updatedInput: { command: rewriteCommand(executable, command) },
    },
  };
}
