/**
 * Configuration loader.
 *
 * Layers, lowest first: built-in defaults, the profile preset, the user file
 * (~/.squish/config.yaml), the project file (./.squish.yaml), then SQUISH_*
 * environment overrides. A layer that cannot be read or does not validate is
 * dropped with a warning; loading itself never fails.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import type { z } from "zod";
import { Profile, SquishConfig } from "../schemas/config.js";
import { describeError } from "../shared/outcome.js";
import { PROFILE_PRESETS, type ConfigLayer } from "./profiles.js";
import { resolvePaths, resolveSquishHome, type SquishPaths } from "./paths.js";

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

export interface LoadedConfig {
  config: SquishConfig;
  paths: SquishPaths;
  /** Files that contributed a layer. */
  sources: string[];
  warnings: string[];
}

interface NamedLayer {
  name: string;
  layer: ConfigLayer;
}

export async function loadConfig(opts: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const home = opts.homeDir ?? homedir();
  const squishHome = resolveSquishHome(env, home);
  const basePaths = resolvePaths(squishHome, cwd, undefined, home);

  const warnings: string[] = [];
  const sources: string[] = [];
  const fileLayers: NamedLayer[] = [];

  for (const file of [basePaths.userConfig, basePaths.projectConfig]) {
    const layer = await readLayer(file, warnings);
    if (layer) {
      fileLayers.push({ name: file, layer });
      sources.push(file);
    }
  }

  const envLayer = environmentLayer(env, warnings);
  const candidates: NamedLayer[] = [...fileLayers];
  if (Object.keys(envLayer).length > 0) {
    candidates.push({ name: "environment", layer: envLayer });
  }

  const config = parseLayers(validLayers(candidates, sources, warnings), sources, warnings);

  return {
    config,
    paths: resolvePaths(squishHome, cwd, config, home),
    sources,
    warnings,
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/** Layers that validate on their own; the rest are dropped with a warning. */
function validLayers(candidates: NamedLayer[], sources: string[], warnings: string[]): NamedLayer[] {
  return candidates.filter((candidate) => {
    const result = SquishConfig.safeParse(candidate.layer);
    if (result.success) return true;
    warnings.push(`Ignoring ${candidate.name}: ${formatIssues(result.error)}`);
    const index = sources.indexOf(candidate.name);
    if (index >= 0) sources.splice(index, 1);
    return false;
  });
}

/** Drop the highest layer until the merge validates; the defaults always do. */
function parseLayers(candidates: NamedLayer[], sources: string[], warnings: string[]): SquishConfig {
  for (;;) {
    const profile = pickProfile(candidates);
    const merged = [PROFILE_PRESETS[profile], ...candidates.map((c) => c.layer)].reduce<ConfigLayer>(
      (acc, layer) => mergeLayers(acc, layer),
      {},
    );
    const result = SquishConfig.safeParse(merged);
    if (result.success) return result.data;

    const issues = formatIssues(result.error);
    const dropped = candidates.pop();
    if (!dropped) {
      throw new Error(`Invalid built-in configuration: ${issues}`);
    }
    warnings.push(`Ignoring ${dropped.name}: ${issues}`);
    const index = sources.indexOf(dropped.name);
    if (index >= 0) sources.splice(index, 1);
  }
}

async function readLayer(file: string, warnings: string[]): Promise<ConfigLayer | null> {
  let content: string;
  try {
    content = await readFile(file, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    warnings.push(`Cannot read ${file}: ${describeError(err)}`);
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    warnings.push(`Invalid YAML in ${file}: ${describeError(err)}`);
    return null;
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    warnings.push(`Ignoring ${file}: top level must be a mapping`);
    return null;
  }
  return parsed;
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

function pickProfile(layers: NamedLayer[]): Profile {
  for (let i = layers.length - 1; i >= 0; i--) {
    const general = layers[i]?.layer["general"];
    if (isPlainObject(general)) {
      const parsed = Profile.safeParse(general["profile"]);
      if (parsed.success) return parsed.data;
    }
  }
  return "balanced";
}

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

function parseFlag(name: string, value: string, warnings: string[]): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  warnings.push(`Ignoring ${name}=${value}: expected a boolean`);
  return undefined;
}

/** Build a config layer from SQUISH_* environment variables. */
export function environmentLayer(env: NodeJS.ProcessEnv, warnings: string[] = []): ConfigLayer {
  const general: Record<string, unknown> = {};
  const smartPath: Record<string, unknown> = {};
  const logging: Record<string, unknown> = {};

  if (env.SQUISH_MODE) general["mode"] = env.SQUISH_MODE.trim();
  if (env.SQUISH_PROFILE) general["profile"] = env.SQUISH_PROFILE.trim();
  if (env.SQUISH_SAFE_MODE) {
    const flag = parseFlag("SQUISH_SAFE_MODE", env.SQUISH_SAFE_MODE, warnings);
    if (flag !== undefined) general["safeMode"] = flag;
  }
  if (env.SQUISH_SMART_PATH) {
    const flag = parseFlag("SQUISH_SMART_PATH", env.SQUISH_SMART_PATH, warnings);
    if (flag !== undefined) smartPath["enabled"] = flag;
  }
  if (env.SQUISH_SMART_MODEL) smartPath["model"] = env.SQUISH_SMART_MODEL.trim();
  if (env.SQUISH_SMART_URL) smartPath["url"] = env.SQUISH_SMART_URL.trim();
  if (env.SQUISH_VERBOSE) {
    const flag = parseFlag("SQUISH_VERBOSE", env.SQUISH_VERBOSE, warnings);
    if (flag !== undefined) logging["verbose"] = flag;
  }

  const layer: ConfigLayer = {};
  if (Object.keys(general).length > 0) layer["general"] = general;
  if (Object.keys(smartPath).length > 0) layer["smartPath"] = smartPath;
  if (Object.keys(logging).length > 0) layer["logging"] = logging;
  return layer;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deep-merge mappings; arrays and scalars in `over` replace those in `base`. */
export function mergeLayers(base: ConfigLayer, over: ConfigLayer): ConfigLayer {
  const out: ConfigLayer = { ...base };
  for (const [key, value] of Object.entries(over)) {
    const existing = out[key];
    out[key] = isPlainObject(existing) && isPlainObject(value) ? mergeLayers(existing, value) : value;
  }
  return out;
}
