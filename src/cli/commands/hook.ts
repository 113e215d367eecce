/**
 * `squish hook`: the assistant's pre-tool hook. Reads one request from stdin
 * and always writes exactly one JSON object to stdout.
 */

import type { Command } from "commander";
import { handleHook } from "../../hook/handler.js";
import { PROCEED_UNMODIFIED, type HookResponse } from "../../hook/protocol.js";
import { describeError } from "../../shared/outcome.js";
import { createRuntime } from "../runtime.js";

export function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on("data", (chunk: Buffer | string) => chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk));
    stream.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    stream.on("error", reject);
  });
}

export async function runHook(stdin: string): Promise<HookResponse> {
  const runtime = await createRuntime();
  try {
    return await handleHook(stdin, {
      decide: (command) => runtime.router.decidePreExecution(command),
      executable: runtime.config.general.executable,
      events: runtime.events,
      warn: runtime.warn,
    });
  } finally {
    await runtime.close();
  }
}

export function registerHookCommand(program: Command): void {
  program
    .command("hook")
    .description("Pre-tool hook: read a tool call on stdin, answer with a rewrite or {}")
    .action(async () => {
      let response: HookResponse = PROCEED_UNMODIFIED;
      try {
        response = await runHook(await readStdin());
      } catch (err) {
        console.error(`[squish] hook: ${describeError(err)}`);
      }
      process.stdout.write(JSON.stringify(response) + "\n");
    });
}
