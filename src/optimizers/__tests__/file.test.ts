import { describe, it, expect } from "vitest";
import { normalizeCommand } from "../../matching/normalizer.js";
import {
  FileOptimizer,
  classifyFileCommand,
  compactContent,
  compactFind,
  compactListing,
  compactTree,
  compactWordCount,
  humanSize,
} from "../file.js";
import { DEFAULT_TREE_NOISE_DIRS } from "../../schemas/config.js";

const TREE = [
  ".",
  "├── node_modules",
  "│   ├── a",
  "│   └── b",
  "├── src",
  "│   └── index.ts",
  "└── package.json",
  "",
  "3 directories, 4 files",
].join("\n");

describe("classifyFileCommand", () => {
  it.each([
    ["ls -la", "ls"],
    ["Get-ChildItem", "ls"],
    ["find . -name '*.ts'", "find"],
    ["head -n 5 a.txt", "cat"],
    ["wc -l src/*.ts", "wc"],
    ["tree -L 2", "tree"],
  ])("classifies %s as %s", (command, expected) => {
    expect(classifyFileCommand(command)).toBe(expected);
  });

  it("ignores other programs", () => {
    expect(classifyFileCommand("grep -r x .")).toBeUndefined();
  });
});

describe("FileOptimizer.canHandle", () => {
  const file = new FileOptimizer();

  it("declines single-column listings", () => {
    expect(file.canHandle(normalizeCommand("ls -1"))).toBe(false);
    expect(file.canHandle(normalizeCommand("ls --format=commas"))).toBe(false);
  });

  it("accepts long listings and content reads", () => {
    expect(file.canHandle(normalizeCommand("ls -la"))).toBe(true);
    expect(file.canHandle(normalizeCommand("cd src && cat index.ts"))).toBe(true);
  });
});

describe("listings", () => {
  it("caps a simple listing", () => {
    expect(compactListing("a\nb\nc\n", 50, 2)).toBe("a\nb\n...+1 more (3 total)");
  });

  it("drops the total line from a long listing", () => {
    const raw = "total 8\ndrwxr-xr-x 2 u g 4096 Jan 1 src\n-rw-r--r-- 1 u g 10 Jan 1 a.ts\n";
    expect(compactListing(raw, 1, 60)).toBe("drwxr-xr-x 2 u g 4096 Jan 1 src\n...+1 more entries (2 total)");
  });

  it("summarizes a PowerShell listing", () => {
    const raw = [
      "",
      "    Directory: C:\\repo",
      "",
      "Mode                 LastWriteTime         Length Name",
      "----                 -------------         ------ ----",
      "d-----          1/1/2024  10:00 AM".padEnd(50) + "src",
      ("-a----          1/1/2024  10:00 AM" + "2048".padStart(15)).padEnd(50) + "package.json",
      "",
    ].join("\n");
    expect(compactListing(raw, 50, 60)).toBe("1 directories, 1 files\n[D] src\n    package.json  (2.0 KB)");
  });

  it("reports an empty directory", () => {
    expect(compactListing("  \n", 50, 60)).toBe("(empty directory)");
  });

  it("formats sizes", () => {
    expect(humanSize(500)).toBe("500 B");
    expect(humanSize(1536)).toBe("1.5 KB");
    expect(humanSize(3 * 1024 * 1024)).toBe("3.0 MB");
  });
});

describe("find, cat and wc", () => {
  it("caps find results", () => {
    expect(compactFind("./a\n./b\n./c\n", 2)).toBe("./a\n./b\n...+1 more (3 total)");
    expect(compactFind("", 2)).toBe("No files found");
  });

  it("keeps the head and tail of long files", () => {
    const raw = Array.from({ length: 10 }, (_, i) => `l${i + 1}`).join("\n");
    expect(compactContent(raw, 5, 2, 2)).toBe("l1\nl2\n... (6 lines omitted, 10 total) ...\nl9\nl10");
    expect(compactContent(raw, 20, 2, 2)).toBe(raw);
    expect(compactContent("\n", 5, 2, 2)).toBe("(empty file)");
  });

  it("keeps the total row of word counts", () => {
    expect(compactWordCount("  1 a\n  2 b\n  3 c\n  6 total\n", 3)).toBe("1 a\n2 b\n6 total\n...4 files total");
    expect(compactWordCount("", 3)).toBe("0");
  });
});

describe("tree", () => {
  it("hides the contents of noise directories", () => {
    expect(compactTree(TREE, 60, DEFAULT_TREE_NOISE_DIRS)).toBe(
      [
        ".",
        "├── node_modules/ [contents hidden]",
        "├── src",
        "│   └── index.ts",
        "└── package.json",
        "",
        "3 directories, 4 files",
      ].join("\n"),
    );
  });

  it("caps long trees and keeps the summary line", () => {
    expect(compactTree(TREE, 4, DEFAULT_TREE_NOISE_DIRS)).toBe(
      [
        ".",
        "├── node_modules/ [contents hidden]",
        "├── src",
        "",
        "3 directories, 4 files",
        "...(3 lines omitted) (2 noise lines pruned)",
      ].join("\n"),
    );
  });

  it("reports empty output", () => {
    expect(compactTree("", 60, [])).toBe("(empty)");
  });
});
