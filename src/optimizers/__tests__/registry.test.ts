import { describe, it, expect } from "vitest";
import { normalizeCommand } from "../../matching/normalizer.js";
import { OptimizersConfig } from "../../schemas/config.js";
import { GenericOptimizer, cleanupWhitespace } from "../generic.js";
import { createRegistry } from "../registry.js";

const ctx = (command: string) => normalizeCommand(command);

describe("cleanupWhitespace", () => {
  it("strips trailing spaces and limits blank runs to two", () => {
    expect(cleanupWhitespace("line 1\n\n\n\n\nline 2  \n\n\nline 3\n\n", 200)).toBe("line 1\n\n\nline 2\n\n\nline 3");
  });

  it("keeps two thirds from the head around an omission note", () => {
    const raw = Array.from({ length: 10 }, (_, i) => String(i + 1)).join("\n");
    expect(cleanupWhitespace(raw, 4)).toBe("1\n2\n\n... (7 lines omitted, 10 total) ...\n\n10");
  });
});

describe("GenericOptimizer", () => {
  it("leaves small output untouched", () => {
    const result = new GenericOptimizer().optimize(ctx("echo hi"), "hi  \n\n\n\n");
    expect(result.success && result.value.output).toBe("hi  \n\n\n\n");
  });

  it("cleans output at or above the size floor", () => {
    const result = new GenericOptimizer({ minSizeBytes: 0 }).optimize(ctx("echo hi"), "hi  \n\n\n\nthere\n");
    expect(result.success && result.value.output).toBe("hi\n\n\nthere");
  });

  it("only cleans whitespace when disabled", () => {
    const raw = Array.from({ length: 300 }, (_, i) => `row ${i}   `).join("\n");
    const result = new GenericOptimizer({ enabled: false }).optimize(ctx("echo hi"), raw);
    expect(result.success && result.value.output.split("\n")).toHaveLength(300);
    expect(result.success && result.value.output.startsWith("row 0\nrow 1\n")).toBe(true);
  });
});

describe("createRegistry", () => {
  it("registers every optimizer with the fallback last", () => {
    expect(createRegistry().optimizers.map((o) => o.name)).toEqual(["git", "file", "build", "container", "generic"]);
  });

  it("skips disabled optimizers but always keeps the fallback", () => {
    const config = OptimizersConfig.parse({ git: { enabled: false }, generic: { enabled: false } });
    expect(createRegistry(config).optimizers.map((o) => o.name)).toEqual(["file", "build", "container", "generic"]);
  });

  it("selects the first match, falling back to generic", () => {
    const registry = createRegistry();
    expect(registry.select(ctx("cd /repo && git status")).name).toBe("git");
    expect(registry.select(ctx("npm test")).name).toBe("build");
    expect(registry.select(ctx("docker ps")).name).toBe("container");
    expect(registry.select(ctx("echo hi")).name).toBe("generic");
  });

  it("finds no specialized optimizer for unknown commands", () => {
    const registry = createRegistry();
    expect(registry.selectSpecialized(ctx("echo hi"))).toBeUndefined();
    expect(registry.selectSpecialized(ctx("ls -la"))?.name).toBe("file");
  });
});
