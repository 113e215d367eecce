import { describe, it, expect } from "vitest";
import { preprocess } from "../pipeline.js";
import { PreprocessingConfig } from "../../schemas/config.js";

const LETTERS = "abcdefghijklmnopqrstuvwxyz";

function noisyBuildLog(): string {
  const items = Array.from({ length: 50 }, (_, i) => `item ${LETTERS[i % 26]}${LETTERS[Math.floor(i / 26)]} processed`);
  items.splice(25, 0, "error: disk full");
  return [
    "\x1b[1mBuilding\x1b[0m",
    "   Compiling a v1",
    "[1/4] step one",
    "[2/4] step two",
    "[3/4] step three",
    "[4/4] step four",
    "node_modules/x/y.js",
    "node_modules/z.js",
    ...items,
    "done",
    "",
  ].join("\n");
}

describe("preprocess", () => {
  it("keeps a failing test visible while collapsing passes", () => {
    const raw = [
      "\x1b[32mPASS\x1b[0m src/a.test.ts",
      "PASS src/a.test.ts",
      "PASS src/a.test.ts",
      "FAIL src/b.test.ts",
      "  ● adds numbers",
      "",
      "Tests: 1 failed, 3 passed",
      "",
    ].join("\n");

    const result = preprocess(raw, "build_test");
    expect(result.text).toBe(
      "PASS src/a.test.ts [repeated 3x]\nFAIL src/b.test.ts\n  ● adds numbers\n\nTests: 1 failed, 3 passed",
    );
    expect(result.stagesApplied).toEqual(["noise", "dedup", "whitespace-trim"]);
    expect(result.originalBytes).toBe(Buffer.byteLength(raw));
    expect(result.processedBytes).toBe(Buffer.byteLength(result.text));
  });

  it("runs every stage in order on noisy output", () => {
    const config = PreprocessingConfig.parse({ maxOutputBytes: 400 });
    const result = preprocess(noisyBuildLog(), "build_test", config);
    expect(result.stagesApplied).toEqual(["noise", "path-filter", "dedup", "truncation", "whitespace-trim"]);
    expect(result.text.startsWith("Building\n[steps 1-4 of 4 ok]\n[2 paths filtered: node_modules]\n")).toBe(true);
    expect(result.text.split("\n")).toContain("error: disk full");
    expect(result.text.endsWith("\ndone")).toBe(true);
    expect(result.processedBytes).toBeLessThanOrEqual(400);
  });

  it("is a fixed point", () => {
    const config = PreprocessingConfig.parse({ maxOutputBytes: 400 });
    const once = preprocess(noisyBuildLog(), "build_test", config);
    const twice = preprocess(once.text, "build_test", config);
    expect(twice.text).toBe(once.text);
    expect(twice.stagesApplied).toEqual([]);
  });

  it("skips disabled stages", () => {
    const config = PreprocessingConfig.parse({ deduplication: false });
    const result = preprocess("a\na\na", "generic", config);
    expect(result.text).toBe("a\na\na");
    expect(result.stagesApplied).toEqual([]);
  });

  it("returns the input untouched when disabled", () => {
    const config = PreprocessingConfig.parse({ enabled: false });
    const raw = "\x1b[31mx\x1b[0m\n\n\n\n";
    expect(preprocess(raw, "generic", config).text).toBe(raw);
  });

  it("handles empty input", () => {
    expect(preprocess("")).toEqual({ text: "", originalBytes: 0, processedBytes: 0, stagesApplied: [] });
  });
});
