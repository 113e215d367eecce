/**
 * Head/tail truncation with failure rescue. Applies only above the byte
 * ceiling; the result never exceeds it.
 */

import type { OutputCategory } from "../shared/category.js";
import { byteLength, isFailureLine } from "../shared/signals.js";
import { bytesElidedMarker, elidedMarker } from "./markers.js";

/** At or below this many lines, truncation cuts bytes instead of lines. */
export const MIN_LINES_FOR_LINE_TRUNCATION = 7;

interface Split {
  head: number;
  tail: number;
}

const DEFAULT_SPLIT: Split = { head: 0.4, tail: 0.4 };
// Logs matter most at the end.
const LOGS_SPLIT: Split = { head: 0.2, tail: 0.6 };

export function truncateOutput(text: string, maxBytes: number, category: OutputCategory = "generic"): string {
  if (byteLength(text) <= maxBytes) return text;

  const lines = text.split("\n");
  if (lines.length < MIN_LINES_FOR_LINE_TRUNCATION) return truncateBytes(text, maxBytes);

  const split = category === "logs" ? LOGS_SPLIT : DEFAULT_SPLIT;
  const headBudget = Math.floor(maxBytes * split.head);
  const tailBudget = Math.floor(maxBytes * split.tail);

  let headEnd = 0;
  let headBytes = 0;
  while (headEnd < lines.length) {
    const cost = byteLength(lines[headEnd] ?? "") + 1;
    if (headBytes + cost > headBudget) break;
    headBytes += cost;
    headEnd++;
  }

  let tailStart = lines.length;
  let tailBytes = 0;
  while (tailStart > headEnd) {
    const cost = byteLength(lines[tailStart - 1] ?? "") + 1;
    if (tailBytes + cost > tailBudget) break;
    tailBytes += cost;
    tailStart--;
  }

  const head = lines.slice(0, headEnd);
  const middle = lines.slice(headEnd, tailStart);
  const tail = lines.slice(tailStart);
  const marker = elidedMarker(middle.length, byteLength(middle.join("\n")));

  const fixedBytes = byteLength([...head, marker, ...tail].join("\n"));
  let room = maxBytes - fixedBytes;
  const rescued: string[] = [];
  for (const line of middle) {
    if (!isFailureLine(line)) continue;
    if (rescued.length > 0 && rescued[rescued.length - 1] === line) continue;
    const cost = byteLength(line) + 1;
    if (cost > room) continue;
    rescued.push(line);
    room -= cost;
  }
  // Adjacent to the tail, an equal line would read as a repeat.
  if (rescued.length > 0 && rescued[rescued.length - 1] === tail[0]) rescued.pop();

  const result = [...head, marker, ...rescued, ...tail].join("\n");
  return byteLength(result) <= maxBytes ? result : truncateBytes(result, maxBytes);
}

/** Keeps the longest prefix (on a character boundary) that fits with a marker. */
export function truncateBytes(text: string, maxBytes: number): string {
  const total = byteLength(text);
  if (total <= maxBytes) return text;

  // Sized for the largest possible count, so the real marker is never longer.
  const budget = maxBytes - byteLength("\n" + bytesElidedMarker(total));
  if (budget < 0) return prefixWithin(text, maxBytes);

  const kept = prefixWithin(text, budget);
  return `${kept}\n${bytesElidedMarker(total - byteLength(kept))}`;
}

function prefixWithin(text: string, maxBytes: number): string {
  let bytes = 0;
  let end = 0;
  for (const char of text) {
    const size = byteLength(char);
    if (bytes + size > maxBytes) break;
    bytes += size;
    end += char.length;
  }
  return text.slice(0, end);
}
