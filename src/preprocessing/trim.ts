import { collapseBlankRuns } from "./noise.js";

/** Normalizes line endings and strips trailing and surrounding blank space. */
export function trimWhitespace(text: string): string {
  const lines = collapseBlankRuns(
    text
      .replace(/\r\n?/g, "\n")
      .split("\n")
      .map((line) => line.trimEnd()),
  );

  let start = 0;
  let end = lines.length;
  while (start < end && lines[start] === "") start++;
  while (end > start && lines[end - 1] === "") end--;
  return lines.slice(start, end).join("\n");
}
