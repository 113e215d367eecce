/**
 * squish command-line interface.
 *
 * This module configures the Commander program with all commands
 * registered. It is separated from the entrypoint (index.ts) so tests can
 * build the program without triggering parseAsync.
 */

import { Command } from "commander";
import { registerConfigCommands } from "./commands/config.js";
import { registerHealthCommand } from "./commands/health.js";
import { registerHookCommand } from "./commands/hook.js";
import { registerInstallCommands } from "./commands/install.js";
import { registerPreviewCommand } from "./commands/preview.js";
import { registerRunCommand } from "./commands/run.js";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command()
    .name("squish")
    .version(VERSION)
    .description("Compacts shell command output for AI coding assistants")
    .enablePositionalOptions();

  // --- hot path ---
  registerHookCommand(program);
  registerRunCommand(program);

  // --- inspection ---
  registerPreviewCommand(program);
  registerHealthCommand(program);
  registerConfigCommands(program);

  // --- setup ---
  registerInstallCommands(program);

  return program;
}
