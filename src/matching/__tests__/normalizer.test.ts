import { describe, it, expect } from "vitest";
import {
  normalizeCommand,
  extractCore,
  isSelfInvocation,
  executableName,
  stripEnvAssignments,
  MAX_UNWRAP_PASSES,
} from "../normalizer.js";
import { analyzeQuoting } from "../quoting.js";

describe("extractCore", () => {
  it("strips a directory-change prefix and env assignments", () => {
    expect(extractCore("cd /repo && LANG=C git status")).toBe("git status");
  });

  it.each([
    ["cd /repo && git status", "git status"],
    ["cd '/my repo' && GIT_PAGER=cat LC_ALL=C git status", "git status"],
    ['cd /repo && FOO="a b" git status', "git status"],
    ["cd /a; cd /b && env TERM=dumb git status", "git status"],
    ["(cd /repo && git status)", "git status"],
    ["bash -c 'cd /repo && git status'", "git status"],
    ['sh -c "LANG=C git status"', "git status"],
    ["/bin/bash -lc 'cd /x && git status'", "git status"],
  ])("recognizes a status query in %s", (input, expected) => {
    expect(extractCore(input)).toBe(expected);
  });

  it("keeps only the first pipeline segment", () => {
    expect(extractCore("git log | head -5")).toBe("git log");
  });

  it("does not split on pipes or separators inside quotes", () => {
    expect(extractCore("git log --format='%h | %s; %an'")).toBe("git log --format='%h | %s; %an'");
    expect(extractCore("echo 'git status && rm -rf /'")).toBe("echo 'git status && rm -rf /'");
  });

  it("treats || as a conditional rather than a pipe", () => {
    expect(extractCore("git status || true")).toBe("git status || true");
  });

  it("takes the last command of a chain", () => {
    expect(extractCore("npm ci && npm test")).toBe("npm test");
  });

  it("unwraps a subshell nested in a chain on a later pass", () => {
    expect(extractCore("echo start && (cd sub && npm test)")).toBe("npm test");
  });

  it("leaves plain commands untouched", () => {
    expect(extractCore("git log --format=oneline")).toBe("git log --format=oneline");
  });

  it("only unwraps parentheses that enclose the whole command", () => {
    expect(extractCore("(a) && (b)")).toBe("b");
    expect(extractCore("(echo a) | cat")).toBe("echo a");
  });

  it("never produces an empty core from a non-empty command", () => {
    expect(extractCore("cd /repo && ")).toBe("cd /repo &&");
    expect(extractCore("FOO=bar")).toBe("FOO=bar");
  });

  it("fails open on unbalanced quoting", () => {
    expect(extractCore("cd /repo && echo 'unterminated")).toBe("cd /repo && echo 'unterminated");
    expect(extractCore("  (git status  ")).toBe("(git status");
  });

  it("returns an empty core for an empty command", () => {
    expect(extractCore("   ")).toBe("");
  });

  it("stops after a bounded number of passes", () => {
    // Each pass peels one subshell; deeper nesting stays wrapped.
    const deep = "(".repeat(MAX_UNWRAP_PASSES * 2) + "git status" + ")".repeat(MAX_UNWRAP_PASSES * 2);
    const core = extractCore(deep);
    expect(core.length).toBeLessThan(deep.length);
    expect(core).toBe("(".repeat(MAX_UNWRAP_PASSES) + "git status" + ")".repeat(MAX_UNWRAP_PASSES));
  });
});

describe("stripEnvAssignments", () => {
  it("handles quoted values", () => {
    expect(stripEnvAssignments("A='x y' B=\"z\" make")).toBe("make");
  });

  it("keeps a lone assignment", () => {
    expect(stripEnvAssignments("A=1 B=2")).toBe("B=2");
  });
});

describe("isSelfInvocation", () => {
  it.each([
    "squish run 'git status'",
    "/usr/local/bin/squish run \"ls\"",
    '"C:\\tools\\squish.exe" run "dir"',
    "cd /repo && squish run 'git log'",
  ])("detects %s", (command) => {
    expect(isSelfInvocation(command)).toBe(true);
  });

  it.each([
    "cd /opt/squish/run/x && ls",
    "ls /my-squish-run-project",
    "squish test 'git status'",
    "npm run squish",
  ])("ignores %s", (command) => {
    expect(isSelfInvocation(command)).toBe(false);
  });

  it("follows a configured executable", () => {
    expect(isSelfInvocation("/opt/bin/compact run ls", "/opt/bin/compact")).toBe(true);
    expect(isSelfInvocation("squish run ls", "compact")).toBe(false);
  });

  it("normalizes executable names", () => {
    expect(executableName('"C:\\bin\\Squish.exe"')).toBe("squish");
  });
});

describe("normalizeCommand", () => {
  it("builds a frozen context", () => {
    const ctx = normalizeCommand("cd /repo && git status");
    expect(ctx).toEqual({ original: "cd /repo && git status", core: "git status", selfInvocation: false });
    expect(Object.isFrozen(ctx)).toBe(true);
  });
});

describe("analyzeQuoting", () => {
  it("marks characters inside quotes and parentheses", () => {
    const map = analyzeQuoting("a '>' (b > c) > d");
    expect(map.balanced).toBe(true);
    expect(map.unquoted[3]).toBe(false);
    expect(map.unquoted[9]).toBe(true);
    expect(map.topLevel[9]).toBe(false);
    expect(map.topLevel[14]).toBe(true);
  });

  it("treats escaped quotes as literal", () => {
    expect(analyzeQuoting('echo \\"hi').balanced).toBe(true);
  });
});
