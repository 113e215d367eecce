/**
 * Summary lines the pipeline writes in place of removed content. Later
 * stages (and later runs) leave them alone.
 */

export function pathsFilteredMarker(count: number, classes: readonly string[]): string {
  return `[${count} ${count === 1 ? "path" : "paths"} filtered: ${classes.join(", ")}]`;
}

export function stepsMarker(first: number, last: number, total: number): string {
  return `[steps ${first}-${last} of ${total} ok]`;
}

export function similarMarker(more: number): string {
  return `[... ${more} more similar lines]`;
}

export function elidedMarker(lines: number, bytes: number): string {
  return `[... ${lines} lines (${bytes} bytes) elided ...]`;
}

export function bytesElidedMarker(bytes: number): string {
  return `[... ${bytes} bytes elided ...]`;
}

const MARKER_PATTERN =
  /^\[(?:\d+ paths? filtered: .*|steps \d+-\d+ of \d+ ok|\.\.\. \d+ more similar lines|\.\.\. \d+ lines \(\d+ bytes\) elided \.\.\.|\.\.\. \d+ bytes elided \.\.\.)\]$/;

export function isMarkerLine(line: string): boolean {
  return MARKER_PATTERN.test(line.trim());
}
