/**
 * Validation gate for model output. A candidate is cleaned of chat
 * preamble and code fences, then accepted only when it is non-empty,
 * materially shorter than its input, free of refusal and fabrication
 * phrases, not the few-shot example, free of structure the input lacks, and
 * still carries the input's failure signal.
 */

import type { OutputCategory } from "../shared/category.js";
import { byteLength, hasFailureSignal } from "../shared/signals.js";
import { exampleAfter } from "./prompts.js";

export type GateVerdict =
  | { accepted: true; output: string }
  | { accepted: false; reason: string };

export interface GateRequest {
  /** Text the model was asked to condense (already preprocessed). */
  input: string;
  candidate: string;
  category: OutputCategory;
  maxOutputRatio: number;
}

const PREAMBLE_PREFIXES = [
  "here is the condensed",
  "here's the condensed",
  "here is the optimized",
  "here's the optimized",
  "here is the summarized",
  "here's the summarized",
  "here is the summary",
  "here's the summary",
  "here is the output",
  "here's the output",
  "here is a condensed",
  "here's a condensed",
  "here are the",
  "sure, here",
  "sure! here",
  "certainly!",
  "certainly,",
  "of course!",
  "of course,",
];

const REFUSAL_MARKERS = [
  "i apologize",
  "i'm sorry",
  "as an ai",
  "i cannot",
  "i can't fulfill",
  "i can't help",
  "i don't have access",
];

const META_MARKERS = [
  "this command will",
  "this will output",
  "this outputs",
  "the above command",
  "the following command",
  "you can use",
  "you can run",
  "to achieve this",
];

/** Markers a candidate may only contain when the input has them too. */
const STRUCTURAL_MARKERS: Record<OutputCategory, readonly string[]> = {
  version_control: ["diff --git", "@@ "],
  file_operations: ["drwx", "-rw-"],
  build_test: ["error[", "panicked at"],
  container_tools: ["CONTAINER ID", "sha256:"],
  logs: ["Traceback (most recent call last)"],
  generic: [],
};

/** Removes leading chat preamble lines and one enclosing code fence. */
export function stripPreamble(text: string): string {
  const lines = text.trim().split("\n");

  while (lines.length > 0) {
    const first = (lines[0] ?? "").trim().toLowerCase();
    if (first.length === 0) {
      lines.shift();
    } else if (PREAMBLE_PREFIXES.some((p) => first.startsWith(p))) {
      lines.shift();
    } else {
      break;
    }
  }

  if (lines.length >= 2) {
    const first = (lines[0] ?? "").trim();
    const last = (lines[lines.length - 1] ?? "").trim();
    if (first.startsWith("```") && last === "```") {
      lines.pop();
      lines.shift();
    }
  }
  return lines.join("\n").trim();
}

function normalizeForEcho(text: string): string {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join("\n")
    .toLowerCase();
}

export function echoesExample(candidate: string, category: OutputCategory): boolean {
  const example = normalizeForEcho(exampleAfter(category));
  const normalized = normalizeForEcho(candidate);
  return normalized === example || (example.length > 10 && normalized.includes(example));
}

export function validateCandidate(request: GateRequest): GateVerdict {
  const { input, category, maxOutputRatio } = request;
  const output = stripPreamble(request.candidate);

  if (output.length === 0) return { accepted: false, reason: "empty candidate" };

  const inputBytes = byteLength(input);
  const outputBytes = byteLength(output);
  if (outputBytes > inputBytes * maxOutputRatio) {
    return { accepted: false, reason: `candidate is not shorter (${outputBytes} of ${inputBytes} bytes)` };
  }

  const lower = output.toLowerCase();
  const refusal = REFUSAL_MARKERS.find((m) => lower.includes(m));
  if (refusal) return { accepted: false, reason: `refusal phrase "${refusal}"` };
  const meta = META_MARKERS.find((m) => lower.includes(m));
  if (meta) return { accepted: false, reason: `meta-commentary "${meta}"` };

  if (echoesExample(output, category)) return { accepted: false, reason: "few-shot example echoed" };

  const invented = STRUCTURAL_MARKERS[category].find((m) => output.includes(m) && !input.includes(m));
  if (invented) return { accepted: false, reason: `structure "${invented}" not present in input` };

  if (hasFailureSignal(input) && !hasFailureSignal(output)) {
    return { accepted: false, reason: "failure signal dropped" };
  }

  return { accepted: true, output };
}
