import { describe, it, expect } from "vitest";
import { categorize } from "../category.js";
import { describeError, fail, ok, safeParseJson } from "../outcome.js";
import { hasFailureSignal, isFailureLine } from "../signals.js";
import { estimateTokens, savingsPercent } from "../tokens.js";

describe("tokens", () => {
  it("estimates one token per four characters, rounded up", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });

  it("computes savings to one decimal place", () => {
    expect(savingsPercent(100, 25)).toBe(75);
    expect(savingsPercent(3, 1)).toBe(66.7);
    expect(savingsPercent(10, 12)).toBe(-20);
    expect(savingsPercent(0, 5)).toBe(0);
  });
});

describe("categorize", () => {
  it.each([
    ["git log --oneline", "version_control"],
    ["tail -f app.log", "logs"],
    ["tail notes.txt", "file_operations"],
    ["journalctl -u nginx", "logs"],
    ["python -m pytest -q", "build_test"],
    ["cargo build", "build_test"],
    ["kubectl get pods", "container_tools"],
    ["show-logs --all", "logs"],
    ["echo hi", "generic"],
  ])("%s is %s", (core, category) => {
    expect(categorize(core)).toBe(category);
  });
});

describe("signals", () => {
  it("recognizes failure words and exception names", () => {
    expect(isFailureLine("test result: FAILED. 1 passed; 1 failed")).toBe(true);
    expect(isFailureLine("TypeError: x is not a function")).toBe(true);
    expect(isFailureLine("all good")).toBe(false);
    expect(hasFailureSignal("compiling\nerror[E0308]: mismatched types\n")).toBe(true);
    expect(hasFailureSignal("compiling\nfinished\n")).toBe(false);
  });
});

describe("outcome", () => {
  it("builds success and failure values", () => {
    expect(ok(3)).toEqual({ success: true, value: 3 });
    expect(fail("llm", "Request timed out")).toEqual({
      success: false,
      error: { kind: "llm", message: "Request timed out" },
    });
  });

  it("normalizes thrown values", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("plain")).toBe("plain");
    expect(describeError(42)).toBe("42");
  });

  it("parses JSON without throwing", () => {
    expect(safeParseJson('{"a":1}')).toEqual({ success: true, value: { a: 1 } });
    expect(safeParseJson("nope").success).toBe(false);
  });
});
