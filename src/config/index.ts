import { stringify as stringifyYaml } from "yaml";
import { SquishConfig } from "../schemas/config.js";

export { loadConfig, mergeLayers, environmentLayer } from "./loader.js";
export type { LoadConfigOptions, LoadedConfig } from "./loader.js";
export { resolvePaths, resolveSquishHome, expandHome, PROJECT_CONFIG_FILE } from "./paths.js";
export type { SquishPaths } from "./paths.js";
export { PROFILE_PRESETS } from "./profiles.js";

/** Fully defaulted configuration. */
export function defaultConfig(): SquishConfig {
  return SquishConfig.parse({});
}

/** YAML rendering of a configuration, as written by `squish config init`. */
export function renderConfigYaml(config: SquishConfig = defaultConfig()): string {
  const header = "# squish configuration. Every key is optional; omitted keys use defaults.\n";
  return header + stringifyYaml(config, { lineWidth: 120 });
}
