/**
 * Deduplication. One pass over the lines; at each position the first rule
 * that applies consumes a run:
 *
 *   1. k/N step sequences (same N, consecutive k, 3+ lines): successful
 *      sub-runs of two or more become `[steps a-b of N ok]`
 *   2. identical lines (2+): `line [repeated Nx]`
 *   3. similar lines (3+, equal once digits are masked, none failing):
 *      the first two, then `[... M more similar lines]`
 *
 * Blank lines and pipeline markers never start or join a run.
 */

import { isFailureLine } from "../shared/signals.js";
import { isMarkerLine, similarMarker, stepsMarker } from "./markers.js";

const STEP_PATTERN = /(?:^|[\s[(])(\d+)\s*\/\s*(\d+)(?=$|[\s\]):,])/;
const MIN_SEQUENCE = 3;
const MIN_SIMILAR = 3;
const SIMILAR_KEPT = 2;

interface Step {
  k: number;
  n: number;
}

export function parseStep(line: string): Step | undefined {
  const match = STEP_PATTERN.exec(line);
  if (!match) return undefined;
  const k = Number(match[1]);
  const n = Number(match[2]);
  if (n === 0 || k > n) return undefined;
  return { k, n };
}

function similarityKey(line: string): string {
  return line.trim().replace(/\d+/g, "#");
}

function participates(line: string): boolean {
  return line.trim().length > 0 && !isMarkerLine(line);
}

export function deduplicate(text: string): string {
  const lines = text.split("\n");
  const out: string[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i] ?? "";
    if (!participates(line)) {
      out.push(line);
      i++;
      continue;
    }

    const sequenceEnd = stepSequenceEnd(lines, i);
    if (sequenceEnd - i >= MIN_SEQUENCE) {
      out.push(...collapseSequence(lines.slice(i, sequenceEnd)));
      i = sequenceEnd;
      continue;
    }

    let end = i + 1;
    while (end < lines.length && participates(lines[end] ?? "") && (lines[end] ?? "").trimEnd() === line.trimEnd()) {
      end++;
    }
    if (end - i >= 2) {
      out.push(`${line.trimEnd()} [repeated ${end - i}x]`);
      i = end;
      continue;
    }

    if (!isFailureLine(line)) {
      const key = similarityKey(line);
      end = i + 1;
      while (end < lines.length) {
        const next = lines[end] ?? "";
        if (!participates(next) || isFailureLine(next) || similarityKey(next) !== key) break;
        end++;
      }
      if (end - i >= MIN_SIMILAR) {
        out.push(...lines.slice(i, i + SIMILAR_KEPT), similarMarker(end - i - SIMILAR_KEPT));
        i = end;
        continue;
      }
    }

    out.push(line);
    i++;
  }

  return out.join("\n");
}

/** Index one past the last line of the k/N sequence starting at `start`. */
function stepSequenceEnd(lines: readonly string[], start: number): number {
  const first = parseStep(lines[start] ?? "");
  if (!first) return start;
  let previous = first;
  let end = start + 1;
  while (end < lines.length) {
    const line = lines[end] ?? "";
    if (!participates(line)) break;
    const step = parseStep(line);
    if (!step || step.n !== first.n || step.k !== previous.k + 1) break;
    previous = step;
    end++;
  }
  return end;
}

function collapseSequence(run: readonly string[]): string[] {
  const out: string[] = [];
  let okStart = -1;

  const flush = (endExclusive: number): void => {
    if (okStart < 0) return;
    if (endExclusive - okStart >= 2) {
      const first = parseStep(run[okStart] ?? "");
      const last = parseStep(run[endExclusive - 1] ?? "");
      if (first && last) out.push(stepsMarker(first.k, last.k, first.n));
    } else {
      out.push(run[okStart] ?? "");
    }
    okStart = -1;
  };

  run.forEach((line, index) => {
    if (isFailureLine(line)) {
      flush(index);
      out.push(line);
    } else if (okStart < 0) {
      okStart = index;
    }
  });
  flush(run.length);
  return out;
}
