/**
 * Output categories. The truncation split, the LLM prompt and the
 * validation gate's structural checks all key off the category of the
 * command that produced the output.
 */

export const OUTPUT_CATEGORIES = [
  "version_control",
  "file_operations",
  "build_test",
  "container_tools",
  "logs",
  "generic",
] as const;

export type OutputCategory = (typeof OUTPUT_CATEGORIES)[number];

const VERSION_CONTROL = ["git", "svn", "hg"];
const LOG_PROGRAMS = ["journalctl", "dmesg"];
const FILE_PROGRAMS = [
  "ls", "dir", "gci", "get-childitem", "find", "cat", "type", "get-content",
  "head", "tail", "wc", "tree", "du", "df", "file", "stat",
];
const BUILD_PROGRAMS = [
  "cargo", "npm", "npx", "yarn", "pnpm", "dotnet", "make", "cmake", "gradle",
  "gradlew", "mvn", "go", "pytest", "jest", "vitest", "tsc", "eslint", "msbuild",
];
const CONTAINER_PROGRAMS = ["docker", "podman", "kubectl", "helm", "docker-compose"];

/** Category of a normalized core command. */
export function categorize(core: string): OutputCategory {
  const lower = core.trim().toLowerCase();
  const [program = "", ...args] = lower.split(/\s+/);

  if (VERSION_CONTROL.includes(program)) return "version_control";
  // `tail -f` follows a log; plain `tail` is a file read.
  if (LOG_PROGRAMS.includes(program)) return "logs";
  if (program === "tail" && args.some((a) => a === "-f" || a === "--follow")) return "logs";
  if (FILE_PROGRAMS.includes(program)) return "file_operations";
  if (BUILD_PROGRAMS.includes(program)) return "build_test";
  if (program === "python" && args[0] === "-m" && args[1] === "pytest") return "build_test";
  if (CONTAINER_PROGRAMS.includes(program)) return "container_tools";
  if (/log/.test(lower)) return "logs";
  return "generic";
}
