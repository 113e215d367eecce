/**
 * `squish config show|init`.
 */

import { access, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { Command } from "commander";
import writeFileAtomic from "write-file-atomic";
import { stringify as stringifyYaml } from "yaml";
import { loadConfig, renderConfigYaml, resolvePaths, resolveSquishHome, type LoadConfigOptions } from "../../config/index.js";

export async function showConfig(opts: LoadConfigOptions = {}): Promise<string> {
  const { config, sources, warnings } = await loadConfig(opts);
  const header = [
    `# sources: ${sources.length > 0 ? sources.join(", ") : "defaults only"}`,
    ...warnings.map((w) => `# warning: ${w}`),
  ];
  return header.join("\n") + "\n" + stringifyYaml(config, { lineWidth: 120 });
}

export interface InitConfigOptions extends LoadConfigOptions {
  project?: boolean;
  force?: boolean;
}

/** Writes a default config file; refuses to overwrite one unless forced. */
export async function initConfig(opts: InitConfigOptions = {}): Promise<{ path: string; written: boolean }> {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const paths = resolvePaths(resolveSquishHome(env, opts.homeDir), cwd, undefined, opts.homeDir);
  const path = opts.project ? paths.projectConfig : paths.userConfig;

  if (!opts.force && (await exists(path))) return { path, written: false };

  await mkdir(dirname(path), { recursive: true });
  await writeFileAtomic(path, renderConfigYaml());
  return { path, written: true };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export function registerConfigCommands(program: Command): void {
  const config = program.command("config").description("Inspect or create configuration");

  config
    .command("show")
    .description("Print the effective configuration after all layers")
    .action(async () => {
      process.stdout.write(await showConfig());
    });

  config
    .command("init")
    .description("Write a default configuration file")
    .option("--project", "Write ./.squish.yaml instead of the user file", false)
    .option("--force", "Overwrite an existing file", false)
    .action(async (opts: { project: boolean; force: boolean }) => {
      const result = await initConfig(opts);
      if (result.written) {
        console.log(`Wrote ${result.path}`);
      } else {
        console.error(`${result.path} already exists (use --force to overwrite)`);
        process.exitCode = 1;
      }
    });
}
