import type { OutputCategory } from "../shared/category.js";
import type { ChatMessage } from "./ollama.js";

export const MAX_PROMPT_INPUT_CHARS = 6000;

interface PromptTemplate {
  subject: string;
  keep: string;
  drop: string;
  exampleBefore: string;
  exampleAfter: string;
}

const TEMPLATES: Record<OutputCategory, PromptTemplate> = {
  version_control: {
    subject: "version-control output",
    keep: "branch, ahead/behind counts, changed file paths, conflicts, commit hashes and subjects",
    drop: "usage hints in parentheses, decorative lines, repeated blank lines",
    exampleBefore: [
      "On branch develop",
      "Your branch is behind 'origin/develop' by 3 commits, and can be fast-forwarded.",
      '  (use "git pull" to update your local branch)',
      "",
      "Untracked files:",
      '  (use "git add <file>..." to include in what will be committed)',
      "\tnotes.txt",
    ].join("\n"),
    exampleAfter: "branch: develop (behind 3)\nuntracked: notes.txt",
  },
  file_operations: {
    subject: "file listing or file content",
    keep: "paths, sizes, directory markers and any content the reader asked for",
    drop: "permission bits, owners, groups and timestamps",
    exampleBefore: [
      "total 24",
      "drwxr-xr-x  4 dev dev 4096 Mar  2 09:14 lib",
      "-rw-r--r--  1 dev dev  311 Mar  2 09:10 index.html",
      "-rw-r--r--  1 dev dev 2210 Mar  2 09:12 app.css",
    ].join("\n"),
    exampleAfter: "lib/\nindex.html (311 B)\napp.css (2.2 KB)",
  },
  build_test: {
    subject: "build or test output",
    keep: "errors, warnings, failing tests with file and line, the final summary",
    drop: "passing tests, progress bars, download and compile chatter",
    exampleBefore: [
      " RUN  v1.0.0 /work/app",
      " ✓ src/math.test.ts (4 tests) 3ms",
      " ❯ src/date.test.ts (2 tests | 1 failed) 5ms",
      "   × formats ISO dates",
      "     → expected '2024-01-02' to be '2024-01-01'",
      " Test Files  1 failed | 1 passed (2)",
      "      Tests  1 failed | 5 passed (6)",
    ].join("\n"),
    exampleAfter: [
      "FAIL src/date.test.ts > formats ISO dates",
      "  expected '2024-01-02' to be '2024-01-01'",
      "Tests: 1 failed, 5 passed (6)",
    ].join("\n"),
  },
  container_tools: {
    subject: "container or cluster tool output",
    keep: "names, images, status, ports and error messages",
    drop: "full IDs, labels and creation timestamps",
    exampleBefore: [
      "CONTAINER ID   IMAGE          COMMAND                  CREATED       STATUS       PORTS                  NAMES",
      'f00dcafe1234   postgres:16    "docker-entrypoint.s…"   2 days ago    Up 2 days    0.0.0.0:5432->5432/tcp db',
      'beadfeed5678   myapi:dev      "node server.js"         2 days ago    Up 2 days    0.0.0.0:8080->8080/tcp api',
    ].join("\n"),
    exampleAfter: "db | postgres:16 | Up 2 days | 5432\napi | myapi:dev | Up 2 days | 8080",
  },
  logs: {
    subject: "log output",
    keep: "errors, warnings, stack traces and the most recent entries",
    drop: "repeated informational lines and health-check noise",
    exampleBefore: [
      "10:00:01 INFO  request GET /health 200",
      "10:00:02 INFO  request GET /health 200",
      "10:00:03 WARN  pool nearly exhausted (9/10)",
      "10:00:04 ERROR query timeout after 5000ms",
      "10:00:05 INFO  request GET /health 200",
    ].join("\n"),
    exampleAfter: "WARN pool nearly exhausted (9/10)\nERROR query timeout after 5000ms\n(3 health checks omitted)",
  },
  generic: {
    subject: "command output",
    keep: "results, errors, warnings and numbers the reader needs",
    drop: "banners, blank runs and repeated lines",
    exampleBefore: [
      "Scanning 3 sources...",
      "Scanning 3 sources... done",
      "",
      "",
      "Result: 42 records matched",
    ].join("\n"),
    exampleAfter: "Result: 42 records matched",
  },
};

/** The few-shot answer for a category; the validation gate rejects echoes of it. */
export function exampleAfter(category: OutputCategory): string {
  return TEMPLATES[category].exampleAfter;
}

export function truncateForPrompt(text: string, maxChars = MAX_PROMPT_INPUT_CHARS): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}\n[... ${text.length - maxChars} more characters truncated]`;
}

export function systemPrompt(category: OutputCategory): string {
  const t = TEMPLATES[category];
  return [
    `You condense ${t.subject} for an AI coding assistant.`,
    "",
    "Rules:",
    `- Keep: ${t.keep}.`,
    `- Remove: ${t.drop}.`,
    "- Copy error and warning text exactly.",
    "- Reply with the condensed output only, no commentary and no code fences.",
    "- The reply must be shorter than the input.",
  ].join("\n");
}

export function userPrompt(command: string, category: OutputCategory, output: string): string {
  const t = TEMPLATES[category];
  return [
    "Example input:",
    "```",
    t.exampleBefore,
    "```",
    "Example reply:",
    "```",
    t.exampleAfter,
    "```",
    "",
    `Command: ${command}`,
    "Output:",
    "```",
    truncateForPrompt(output),
    "```",
  ].join("\n");
}

export function buildMessages(command: string, category: OutputCategory, output: string): ChatMessage[] {
  return [
    { role: "system", content: systemPrompt(category) },
    { role: "user", content: userPrompt(command, category, output) },
  ];
}
