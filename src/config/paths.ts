import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import type { SquishConfig } from "../schemas/config.js";

export interface SquishPaths {
  /** ~/.squish, or $SQUISH_HOME */
  home: string;
  userConfig: string;
  projectConfig: string;
  eventsDir: string;
  breakerState: string;
}

export const PROJECT_CONFIG_FILE = ".squish.yaml";

export function resolveSquishHome(env: NodeJS.ProcessEnv = process.env, home: string = homedir()): string {
  const override = env["SQUISH_HOME"];
  if (override && override.trim().length > 0) return expandHome(override.trim(), home);
  return join(home, ".squish");
}

/** Expand a leading ~ and make relative paths absolute. */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return isAbsolute(path) ? path : resolve(path);
}

export function resolvePaths(
  squishHome: string,
  cwd: string,
  config?: SquishConfig,
  home: string = homedir(),
): SquishPaths {
  const logDir = config?.logging.dir;
  return {
    home: squishHome,
    userConfig: join(squishHome, "config.yaml"),
    projectConfig: join(cwd, PROJECT_CONFIG_FILE),
    eventsDir: logDir ? expandHome(logDir, home) : join(squishHome, "events"),
    breakerState: join(squishHome, "circuit-breaker.json"),
  };
}
