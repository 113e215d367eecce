/**
 * Command execution. The target command runs through the platform shell
 * exactly as the assistant wrote it; stdout and stderr are captured
 * separately. A command that outlives its timeout is killed.
 */

import { spawn } from "node:child_process";

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  /** The shell itself could not be started; nothing of the command ran. */
  spawnFailed: boolean;
  durationMs: number;
}

export interface RunOptions {
  timeoutMs: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandRunner {
  /** Never rejects; a spawn failure is reported through stderr and exit code 127. */
  run(command: string, options: RunOptions): Promise<CommandOutput>;
}

/** Exit code reported for a command killed on timeout (as `timeout(1)` does). */
export const TIMEOUT_EXIT_CODE = 124;
export const SPAWN_FAILURE_EXIT_CODE = 127;

export function shellInvocation(command: string, platform: NodeJS.Platform = process.platform): [string, string[]] {
  return platform === "win32" ? ["cmd.exe", ["/d", "/s", "/c", command]] : ["sh", ["-c", command]];
}

export class ShellRunner implements CommandRunner {
  constructor(private readonly clock: () => number = Date.now) {}

  run(command: string, options: RunOptions): Promise<CommandOutput> {
    const started = this.clock();
    const [file, args] = shellInvocation(command);

    return new Promise<CommandOutput>((resolve) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let spawnFailed = false;
      let settled = false;

      const child = spawn(file, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ["inherit", "pipe", "pipe"],
        windowsHide: true,
      });

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, options.timeoutMs);

      const finish = (exitCode: number, extraStderr?: string) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        const err = Buffer.concat(stderr).toString("utf-8");
        resolve({
          stdout: Buffer.concat(stdout).toString("utf-8"),
          stderr: extraStderr ? err + extraStderr : err,
          exitCode: timedOut ? TIMEOUT_EXIT_CODE : exitCode,
          timedOut,
          spawnFailed,
          durationMs: this.clock() - started,
        });
      };

      child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));
      child.on("error", (err) => {
        // Without a pid the process never started; otherwise the error came from kill.
        spawnFailed = child.pid === undefined;
        finish(SPAWN_FAILURE_EXIT_CODE, `squish: cannot run command: ${err.message}\n`);
      });
      // A null code means the child died from a signal.
      child.on("close", (code) => finish(code ?? 1));
    });
  }
}

/** stdout followed by stderr, as a terminal would interleave them at the end. */
export function combinedOutput(output: Pick<CommandOutput, "stdout" | "stderr">): string {
  const { stdout, stderr } = output;
  if (stderr.length === 0) return stdout;
  if (stdout.length === 0) return stderr;
  return stdout.endsWith("\n") ? stdout + stderr : `${stdout}\n${stderr}`;
}

/** A run the router treats as failed on its path: killed, unspawnable, or a non-zero exit. */
export function isFailedRun(output: CommandOutput): boolean {
  return output.timedOut || output.exitCode !== 0;
}
