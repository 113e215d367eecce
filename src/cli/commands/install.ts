/**
 * `squish init` / `squish uninstall`: add or remove the pre-tool hook in the
 * assistant's settings file.
 */

import { confirm } from "@inquirer/prompts";
import type { Command } from "commander";
import { loadConfig } from "../../config/index.js";
import {
  addHook,
  hookCommand,
  isHookRegistered,
  readSettings,
  removeHook,
  settingsPath,
  writeSettings,
} from "../settings.js";

export type InstallOutcome = "installed" | "already-installed" | "removed" | "not-installed" | "declined";

export interface InstallOptions {
  yes: boolean;
  /** Settings file to edit; defaults to the assistant's user settings. */
  settingsFile?: string;
  executable?: string;
}

async function resolveExecutable(opts: InstallOptions): Promise<string> {
  if (opts.executable) return opts.executable;
  const { config } = await loadConfig();
  return config.general.executable;
}

export async function installHook(opts: InstallOptions): Promise<InstallOutcome> {
  const file = opts.settingsFile ?? settingsPath();
  const command = hookCommand(await resolveExecutable(opts));
  const settings = await readSettings(file);
  if (isHookRegistered(settings, command)) return "already-installed";

  const proceed =
    opts.yes ||
    (await confirm({
      message: `Add a PreToolUse hook running "${command}" to ${file}?`,
      default: true,
    }));
  if (!proceed) return "declined";

  await writeSettings(file, addHook(settings, command));
  return "installed";
}

export async function uninstallHook(opts: InstallOptions): Promise<InstallOutcome> {
  const file = opts.settingsFile ?? settingsPath();
  const command = hookCommand(await resolveExecutable(opts));
  const settings = await readSettings(file);
  if (!isHookRegistered(settings, command)) return "not-installed";

  const proceed =
    opts.yes ||
    (await confirm({
      message: `Remove the "${command}" hook from ${file}?`,
      default: true,
    }));
  if (!proceed) return "declined";

  await writeSettings(file, removeHook(settings, command));
  return "removed";
}

const MESSAGES: Record<InstallOutcome, string> = {
  installed: "Hook installed. New shell commands will be routed through squish.",
  "already-installed": "Hook already installed; nothing to do.",
  removed: "Hook removed.",
  "not-installed": "Hook not installed; nothing to do.",
  declined: "Cancelled.",
};

export function registerInstallCommands(program: Command): void {
  program
    .command("init")
    .description("Register the squish hook in the assistant's settings")
    .option("--yes", "Skip confirmation prompt", false)
    .option("--settings <path>", "Settings file to edit")
    .action(async (opts: { yes: boolean; settings?: string }) => {
      const outcome = await installHook({ yes: opts.yes, settingsFile: opts.settings });
      console.log(MESSAGES[outcome]);
    });

  program
    .command("uninstall")
    .description("Remove the squish hook from the assistant's settings")
    .option("--yes", "Skip confirmation prompt", false)
    .option("--settings <path>", "Settings file to edit")
    .action(async (opts: { yes: boolean; settings?: string }) => {
      const outcome = await uninstallHook({ yes: opts.yes, settingsFile: opts.settings });
      console.log(MESSAGES[outcome]);
    });
}
