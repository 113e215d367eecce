/**
 * Hook registration in the assistant's settings file
 * (~/.claude/settings.json). Only the PreToolUse/Bash entry that runs our
 * hook command is ever added or removed; everything else in the file is
 * preserved as read.
 */

import { mkdir, readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { z } from "zod";
import { describeError, safeParseJson } from "../shared/outcome.js";

const HookCommand = z.object({ type: z.string(), command: z.string().optional() }).passthrough();

const MatcherGroup = z
  .object({
    matcher: z.string().optional(),
    hooks: z.array(HookCommand).default([]),
  })
  .passthrough();
type MatcherGroup = z.infer<typeof MatcherGroup>;

export const AssistantSettings = z
  .object({
    hooks: z.record(z.string(), z.array(MatcherGroup)).optional(),
  })
  .passthrough();
export type AssistantSettings = z.infer<typeof AssistantSettings>;

export const HOOK_EVENT = "PreToolUse";
export const HOOK_MATCHER = "Bash";

export function settingsPath(home: string = homedir()): string {
  return join(home, ".claude", "settings.json");
}

export function hookCommand(executable: string): string {
  return `${executable} hook`;
}

/** Missing file reads as empty settings; unreadable or foreign content throws. */
export async function readSettings(path: string): Promise<AssistantSettings> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") return {};
    throw new Error(`Cannot read ${path}: ${describeError(err)}`);
  }
  if (content.trim().length === 0) return {};

  const json = safeParseJson(content);
  if (!json.success) throw new Error(`${path} is not valid JSON: ${json.error}`);
  const parsed = AssistantSettings.safeParse(json.value);
  if (!parsed.success) throw new Error(`${path} has an unexpected "hooks" layout`);
  return parsed.data;
}

export async function writeSettings(path: string, settings: AssistantSettings): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFileAtomic(path, JSON.stringify(settings, null, 2) + "\n");
}

export function isHookRegistered(settings: AssistantSettings, command: string): boolean {
  const groups = settings.hooks?.[HOOK_EVENT] ?? [];
  return groups.some((group) => group.hooks.some((hook) => hook.command === command));
}

export function addHook(settings: AssistantSettings, command: string): AssistantSettings {
  if (isHookRegistered(settings, command)) return settings;
  const hooks = { ...settings.hooks };
  const groups = [...(hooks[HOOK_EVENT] ?? [])];
  groups.push({ matcher: HOOK_MATCHER, hooks: [{ type: "command", command }] });
  hooks[HOOK_EVENT] = groups;
  return { ...settings, hooks };
}

/** Drops our hook; groups and events left empty are removed too. */
export function removeHook(settings: AssistantSettings, command: string): AssistantSettings {
  if (!settings.hooks || !isHookRegistered(settings, command)) return settings;

  const hooks = { ...settings.hooks };
  const groups = (hooks[HOOK_EVENT] ?? [])
    .map((group): MatcherGroup => ({ ...group, hooks: group.hooks.filter((hook) => hook.command !== command) }))
    .filter((group) => group.hooks.length > 0);

  if (groups.length > 0) {
    hooks[HOOK_EVENT] = groups;
  } else {
    delete hooks[HOOK_EVENT];
  }

  const { hooks: _dropped, ...rest } = settings;
  return Object.keys(hooks).length > 0 ? { ...rest, hooks } : rest;
}
