import { describe, it, expect } from "vitest";
import { echoesExample, stripPreamble, validateCandidate } from "../validation.js";
import type { OutputCategory } from "../../shared/category.js";

const STATUS_INPUT = "On branch develop\n" + "\tmodified: file.ts\n".repeat(20);
const FAILING_INPUT = "error: disk full\n" + "noise line\n".repeat(20);

function gate(input: string, candidate: string, category: OutputCategory = "generic") {
  return validateCandidate({ input, candidate, category, maxOutputRatio: 0.9 });
}

describe("stripPreamble", () => {
  it("removes chat preamble and an enclosing fence", () => {
    expect(stripPreamble("Here is the condensed output:\n\n```\nbranch: main\n```")).toBe("branch: main");
    expect(stripPreamble("Sure, here you go:\nok")).toBe("ok");
  });

  it("keeps text without preamble", () => {
    expect(stripPreamble("  branch: main\nclean \n")).toBe("branch: main\nclean");
  });
});

describe("validateCandidate", () => {
  it("rejects an empty candidate", () => {
    expect(gate(STATUS_INPUT, "   ")).toEqual({ accepted: false, reason: "empty candidate" });
    expect(gate(STATUS_INPUT, "Here is the summary:\n")).toEqual({ accepted: false, reason: "empty candidate" });
  });

  it("rejects a candidate that is not materially shorter", () => {
    const input = "line one is here\n".repeat(10);
    expect(gate(input, "x".repeat(160))).toEqual({
      accepted: false,
      reason: "candidate is not shorter (160 of 170 bytes)",
    });
  });

  it("rejects refusals and meta-commentary", () => {
    expect(gate(STATUS_INPUT, "I'm sorry, I can't condense this.")).toEqual({
      accepted: false,
      reason: 'refusal phrase "i\'m sorry"',
    });
    expect(gate(STATUS_INPUT, "This command will list files")).toEqual({
      accepted: false,
      reason: 'meta-commentary "this command will"',
    });
  });

  it("rejects the few-shot example echoed back", () => {
    const echo = "branch: develop (behind 3)\nuntracked: notes.txt";
    expect(echoesExample(`  ${echo}\n`, "version_control")).toBe(true);
    expect(gate(STATUS_INPUT, echo, "version_control")).toEqual({ accepted: false, reason: "few-shot example echoed" });
  });

  it("rejects structure the input does not have", () => {
    expect(gate(STATUS_INPUT, "diff --git a/x b/x", "version_control")).toEqual({
      accepted: false,
      reason: 'structure "diff --git" not present in input',
    });
  });

  it("rejects a candidate that loses the failure signal", () => {
    expect(gate(FAILING_INPUT, "all good")).toEqual({ accepted: false, reason: "failure signal dropped" });
  });

  it("accepts a short faithful candidate with fences stripped", () => {
    expect(gate(FAILING_INPUT, "```\nerror: disk full\n```")).toEqual({ accepted: true, output: "error: disk full" });
  });
});
