/**
 * `squish run <command...>`: the executor the hook rewrites to. Prints the
 * routed output and exits with the target command's exit code.
 */

import type { Command } from "commander";
import type { RunResult } from "../../router/engine.js";
import { createRuntime, type RuntimeOptions } from "../runtime.js";

export async function runCommand(command: string, opts: RuntimeOptions = {}): Promise<RunResult> {
  const runtime = await createRuntime(opts);
  try {
    return await runtime.router.execute(command);
  } finally {
    await runtime.close();
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Run a shell command and print its output compacted")
    .argument("<command...>", "command to run (quote it to keep shell syntax intact)")
    .passThroughOptions()
    .allowUnknownOption()
    .action(async (words: string[]) => {
      const result = await runCommand(words.join(" "));
      if (result.stdout.length > 0) process.stdout.write(result.stdout);
      if (result.stderr.length > 0) process.stderr.write(result.stderr);
      process.exitCode = result.exitCode;
    });
}
