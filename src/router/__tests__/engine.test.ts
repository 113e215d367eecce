import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Router, type RouterDeps } from "../engine.js";
import { DecisionCache } from "../decision-cache.js";
import { ShellRunner, type CommandOutput, type CommandRunner, type RunOptions } from "../../executor/process.js";
import type { EventSink } from "../../events/logger.js";
import type { ChatMessage, HealthReport, LlmClient } from "../../llm/ollama.js";
import { createRegistry, registryOf } from "../../optimizers/registry.js";
import { GenericOptimizer } from "../../optimizers/generic.js";
import { compactWith, TRANSFORM, type ExecutionPlan, type OptimizedResult, type Optimizer } from "../../optimizers/types.js";
import type { CommandContext } from "../../matching/normalizer.js";
import { preprocess } from "../../preprocessing/pipeline.js";
import { createCircuitBreaker, DEFAULT_BREAKER_SETTINGS } from "../../safety/circuit-breaker.js";
import { BreakerState } from "../../schemas/breaker.js";
import { SquishConfig } from "../../schemas/config.js";
import type { EventType, SquishEvent } from "../../schemas/event.js";
import { fail, ok, type Outcome } from "../../shared/outcome.js";

const NOW = Date.parse("2026-01-01T00:00:00.000Z");

class FakeRunner implements CommandRunner {
  readonly commands: string[] = [];

  constructor(private readonly outputs: Record<string, Partial<CommandOutput>>) {}

  async run(command: string, _options: RunOptions): Promise<CommandOutput> {
    this.commands.push(command);
    const scripted = this.outputs[command];
    if (!scripted) return { stdout: "", stderr: `sh: ${command}: not found\n`, exitCode: 127, timedOut: false, spawnFailed: false, durationMs: 0 };
    return { stdout: "", stderr: "", exitCode: 0, timedOut: false, spawnFailed: false, durationMs: 0, ...scripted };
  }
}

class MemoryEvents implements EventSink {
  readonly events: SquishEvent[] = [];

  async log(
    type: EventType,
    actor: string,
    opts?: { command?: string; payload?: Record<string, unknown> },
  ): Promise<SquishEvent> {
    const event: SquishEvent = {
      eventId: this.events.length + 1,
      type,
      timestamp: new Date(NOW).toISOString(),
      actor,
      command: opts?.command,
      payload: opts?.payload ?? {},
    };
    this.events.push(event);
    return event;
  }

  ofType(type: EventType): SquishEvent[] {
    return this.events.filter((e) => e.type === type);
  }
}

class FakeLlm implements LlmClient {
  readonly model = "test-model";
  calls = 0;

  constructor(
    private readonly reply: Outcome<string>,
    private readonly healthy = true,
  ) {}

  async chat(_messages: readonly ChatMessage[], _timeoutMs: number): Promise<Outcome<string>> {
    this.calls += 1;
    return this.reply;
  }

  async health(): Promise<HealthReport> {
    return this.healthy ? { healthy: true, models: [this.model] } : { healthy: false, models: [], reason: "down" };
  }
}

/** Claims `stub ...` commands; compacts to a fixed line or fails. */
class StubOptimizer implements Optimizer {
  readonly name = "stub";
  readonly fallback = false;

  constructor(private readonly behaviour: "ok" | "fail" | "slow", private readonly advance: (ms: number) => void) {}

  canHandle(ctx: CommandContext): boolean {
    return ctx.core.startsWith("stub");
  }

  plan(): ExecutionPlan {
    return TRANSFORM;
  }

  optimize(_ctx: CommandContext, raw: string): Outcome<OptimizedResult> {
    if (this.behaviour === "fail") return fail("optimizer", "stub: cannot parse");
    if (this.behaviour === "slow") this.advance(500);
    return compactWith(this.name, raw, () => "compact");
  }
}

interface Harness {
  router: Router;
  runner: FakeRunner;
  events: MemoryEvents;
  deps: RouterDeps;
}

function harness(opts: {
  outputs: Record<string, Partial<CommandOutput>>;
  config?: Record<string, unknown>;
  breaker?: Record<string, unknown>;
  llm?: FakeLlm;
  registry?: RouterDeps["registry"];
  clock?: () => number;
}): Harness {
  const config = SquishConfig.parse(opts.config ?? {});
  const clock = opts.clock ?? (() => NOW);
  const runner = new FakeRunner(opts.outputs);
  const events = new MemoryEvents();
  const deps: RouterDeps = {
    config,
    registry: opts.registry ?? createRegistry(config.optimizers),
    breaker: createCircuitBreaker(BreakerState.parse(opts.breaker ?? {}), DEFAULT_BREAKER_SETTINGS, clock),
    llm: opts.llm ?? new FakeLlm(ok("unused")),
    runner,
    events,
    clock,
  };
  return { router: new Router(deps), runner, events, deps };
}

const FAST_OPEN = { fast: { openUntil: "2026-01-01T01:00:00.000Z" } };
const SMART_ON = { smartPath: { enabled: true } };

function lines(count: number, render: (i: number) => string): string {
  return Array.from({ length: count }, (_, i) => render(i) + "\n").join("");
}

describe("Router.decidePreExecution", () => {
  it("rewrites git status to Fast", async () => {
    const { router } = harness({ outputs: {} });
    expect(await router.decidePreExecution("cd /repo && git status")).toEqual({
      action: "rewrite",
      expectedPath: "fast",
      bypassed: [],
    });
  });

  it("leaves destructive commands unmodified", async () => {
    const { router, runner } = harness({ outputs: {} });
    expect(await router.decidePreExecution("rm -rf build")).toEqual({
      action: "unmodified",
      reason: "deny-listed",
      detail: "rm is never optimized",
      bypassed: [],
    });
    expect(runner.commands).toEqual([]);
  });

  it("honours configured passthrough commands", async () => {
    const { router } = harness({ outputs: {}, config: { passthrough: { commands: ["Terraform"] } } });
    const decision = await router.decidePreExecution("terraform plan");
    expect(decision.action).toBe("unmodified");
  });

  it("records a bypass when the Fast breaker is open", async () => {
    const { router, events, deps } = harness({ outputs: {}, breaker: FAST_OPEN });
    const decision = await router.decidePreExecution("git status");
    expect(decision).toEqual({ action: "unmodified", reason: "no-path-available", bypassed: ["fast"] });
    expect(deps.breaker.status("fast").bypassed).toBe(1);
    expect(events.ofType("breaker.bypassed").map((e) => e.payload)).toEqual([{ path: "fast" }]);
  });
});

describe("Router.execute", () => {
  it("substitutes git status and compacts the porcelain output", async () => {
    const { router, runner, events, deps } = harness({
      outputs: {
        "cd /repo && git status --porcelain -b": { stdout: "## main...origin/main\n M src/app.ts\n?? notes.txt\n" },
      },
    });

    const result = await router.execute("cd /repo && git status");

    expect(runner.commands).toEqual(["cd /repo && git status --porcelain -b"]);
    expect(result.stdout).toBe("branch: main...origin/main\nmodified (1): src/app.ts\nuntracked (1): notes.txt\n");
    expect(result.stderr).toBe("");
    expect(result.path).toBe("fast");
    expect(result.optimizerName).toBe("git");
    expect(result.exitCode).toBe(0);
    expect(deps.breaker.status("fast")).toMatchObject({ attempts: 1, failures: 0 });

    const [completed] = events.ofType("run.completed");
    expect(completed?.command).toBe("cd /repo && git status");
    expect(completed?.payload["path"]).toBe("fast");
  });

  it("keeps a failed substitution's output instead of running the command again", async () => {
    const { router, runner, deps } = harness({
      outputs: {
        "git status --porcelain -b": { stderr: "fatal: not a git repository\n", exitCode: 128 },
      },
    });

    const result = await router.execute("git status");

    expect(runner.commands).toEqual(["git status --porcelain -b"]);
    expect(result).toMatchObject({
      stdout: "",
      stderr: "fatal: not a git repository\n",
      exitCode: 128,
      path: "passthrough",
      fallbackReason: "substituted command failed (exit 128)",
    });
    expect(deps.breaker.status("fast")).toMatchObject({ attempts: 1, failures: 1 });
  });

  it("runs the original command only when the substituted one never started", async () => {
    const { router, runner, deps } = harness({
      outputs: {
        "git status --porcelain -b": {
          stderr: "squish: cannot run command: spawn sh ENOENT\n",
          exitCode: 127,
          spawnFailed: true,
        },
        "git status": { stdout: "On branch main\n" },
      },
    });

    const result = await router.execute("git status");

    expect(runner.commands).toEqual(["git status --porcelain -b", "git status"]);
    expect(result).toMatchObject({
      stdout: "On branch main\n",
      exitCode: 0,
      path: "passthrough",
      fallbackReason: "substituted command could not start",
    });
    expect(deps.breaker.status("fast")).toMatchObject({ attempts: 1, failures: 1 });
  });

  it("runs a chained command with a side-effecting prefix exactly once", async () => {
    const { router, runner } = harness({
      outputs: { "sh ./build.sh && git status": { stdout: "building\n", exitCode: 2 } },
    });

    const result = await router.execute("sh ./build.sh && git status");

    expect(runner.commands).toEqual(["sh ./build.sh && git status"]);
    expect(result).toMatchObject({ stdout: "building\n", exitCode: 2, path: "passthrough" });
  });

  it("runs deny-listed commands untouched", async () => {
    const { router, events } = harness({ outputs: { "rm -rf build": { stdout: "", stderr: "", exitCode: 0 } } });
    const result = await router.execute("rm -rf build");
    expect(result.path).toBe("passthrough");
    expect(events.ofType("run.completed")).toHaveLength(1);
  });

  it("passes 1500 bytes through when the Fast breaker is open", async () => {
    const output = "x".repeat(1499) + "\n";
    const { router, deps } = harness({ outputs: { "npm test": { stdout: output } }, breaker: FAST_OPEN });

    const result = await router.execute("npm test");

    expect(result.path).toBe("passthrough");
    expect(result.stdout).toBe(output);
    expect(deps.breaker.status("fast").bypassed).toBe(0);
  });

  it("counts a bypass for larger output when Fast is open and Smart is off", async () => {
    const output = "y".repeat(4999) + "\n";
    const { router, deps } = harness({ outputs: { "npm test": { stdout: output } }, breaker: FAST_OPEN });

    const result = await router.execute("npm test");

    expect(result.path).toBe("passthrough");
    expect(deps.breaker.status("fast").bypassed).toBe(1);
  });

  it("mirrors the exit code and keeps stderr separate on passthrough", async () => {
    const { router } = harness({ outputs: { "./configure": { stdout: "checking...\n", stderr: "warning: x\n", exitCode: 2 } } });
    const result = await router.execute("./configure");
    expect(result).toMatchObject({ stdout: "checking...\n", stderr: "warning: x\n", exitCode: 2, path: "passthrough" });
  });

  describe("Fast path", () => {
    const big = lines(200, (i) => `line ${i} of output`);

    it("uses the specialized optimizer for large output", async () => {
      let now = NOW;
      const clock = () => now;
      const registry = registryOf([new StubOptimizer("ok", (ms) => (now += ms))], new GenericOptimizer());
      const { router, deps } = harness({ outputs: { "stub run": { stdout: big, exitCode: 1 } }, registry, clock });

      const result = await router.execute("stub run");

      expect(result).toMatchObject({ stdout: "compact\n", stderr: "", path: "fast", optimizerName: "stub", exitCode: 1 });
      expect(deps.breaker.status("fast")).toMatchObject({ attempts: 1, failures: 0 });
    });

    it("falls back to raw output when the optimizer fails", async () => {
      const registry = registryOf([new StubOptimizer("fail", () => undefined)], new GenericOptimizer());
      const { router, deps } = harness({ outputs: { "stub run": { stdout: big } }, registry });

      const result = await router.execute("stub run");

      expect(result).toMatchObject({ stdout: big, path: "passthrough", fallbackReason: "stub: cannot parse" });
      expect(deps.breaker.status("fast").failures).toBe(1);
    });

    it("keeps a slow result but counts it as a failure", async () => {
      let now = NOW;
      const clock = () => now;
      const registry = registryOf([new StubOptimizer("slow", (ms) => (now += ms))], new GenericOptimizer());
      const { router, deps } = harness({ outputs: { "stub run": { stdout: big } }, registry, clock });

      const result = await router.execute("stub run");

      expect(result.stdout).toBe("compact\n");
      expect(deps.breaker.status("fast").failures).toBe(1);
    });

    it("counts a timed-out command against the path it was headed for", async () => {
      const registry = registryOf([new StubOptimizer("ok", () => undefined)], new GenericOptimizer());
      const { router, deps } = harness({
        outputs: { "stub run": { stdout: big, exitCode: 124, timedOut: true } },
        registry,
      });

      const result = await router.execute("stub run");

      expect(result).toMatchObject({ path: "passthrough", exitCode: 124, fallbackReason: "command timed out" });
      expect(deps.breaker.status("fast").failures).toBe(1);
    });

    it("opens the breaker after too many failures and logs it", async () => {
      const registry = registryOf([new StubOptimizer("fail", () => undefined)], new GenericOptimizer());
      const { router, events, deps } = harness({ outputs: { "stub run": { stdout: big } }, registry });

      for (let i = 0; i < 10; i++) await router.execute("stub run");

      expect(deps.breaker.isAllowed("fast")).toBe(false);
      expect(events.ofType("breaker.opened").map((e) => e.payload["path"])).toEqual(["fast"]);
    });
  });

  describe("Smart path", () => {
    const raw = lines(800, (i) => `record ${i} processed`);
    const command = "python etl.py";

    function expectedPreprocessed(config: SquishConfig): string {
      return preprocess(raw, "generic", config.preprocessing).text;
    }

    it("returns the accepted model output", async () => {
      const llm = new FakeLlm(ok("800 records processed"));
      const { router, deps } = harness({ outputs: { [command]: { stdout: raw } }, config: SMART_ON, llm });

      const result = await router.execute(command);

      expect(result).toMatchObject({ stdout: "800 records processed\n", path: "smart", optimizerName: "test-model" });
      expect(deps.breaker.status("smart")).toMatchObject({ attempts: 1, failures: 0 });
      expect(deps.breaker.lastSuccess("smart")).toBe(NOW);
    });

    it("returns the preprocessed text when the candidate is rejected", async () => {
      const llm = new FakeLlm(ok(raw + "and more\n"));
      const { router, events, deps } = harness({ outputs: { [command]: { stdout: raw } }, config: SMART_ON, llm });

      const result = await router.execute(command);

      expect(result.stdout).toBe(expectedPreprocessed(deps.config) + "\n");
      expect(result.path).toBe("smart");
      expect(result.fallbackReason?.startsWith("candidate rejected: candidate is not shorter")).toBe(true);
      expect(deps.breaker.status("smart").failures).toBe(1);
      expect(events.ofType("smart.rejected")).toHaveLength(1);
    });

    it("returns the preprocessed text when the model call fails", async () => {
      const llm = new FakeLlm(fail("llm", "Request timed out"));
      const { router, deps } = harness({ outputs: { [command]: { stdout: raw } }, config: SMART_ON, llm });

      const result = await router.execute(command);

      expect(result.stdout).toBe(expectedPreprocessed(deps.config) + "\n");
      expect(result.fallbackReason).toBe("Request timed out");
      expect(deps.breaker.status("smart").failures).toBe(1);
    });

    it("skips the model when it is unhealthy", async () => {
      const llm = new FakeLlm(ok("unused"), false);
      const { router } = harness({ outputs: { [command]: { stdout: raw } }, config: SMART_ON, llm });

      const result = await router.execute(command);

      expect(result.path).toBe("passthrough");
      expect(result.stdout).toBe(raw);
      expect(llm.calls).toBe(0);
    });

    it("passes mid-size output through when nothing specialized matches", async () => {
      const medium = lines(200, (i) => `record ${i} processed`);
      const llm = new FakeLlm(ok("short"));
      const { router } = harness({ outputs: { [command]: { stdout: medium } }, config: SMART_ON, llm });

      const result = await router.execute(command);

      expect(result.path).toBe("passthrough");
      expect(llm.calls).toBe(0);
    });
  });
});

describe("DecisionCache", () => {
  it("reuses an analysis until its TTL passes", () => {
    let now = NOW;
    const cache = new DecisionCache(1000, () => now);
    const { router } = harness({ outputs: {} });
    let computed = 0;
    const compute = () => {
      computed += 1;
      return router.inspect("git status");
    };

    cache.resolve("git status", compute);
    cache.resolve("git status", compute);
    expect(computed).toBe(1);

    now += 1000;
    cache.resolve("git status", compute);
    expect(computed).toBe(2);
    expect(cache.size).toBe(1);
  });

  it("does not cache with a zero TTL", () => {
    const cache = new DecisionCache(0, () => NOW);
    const { router } = harness({ outputs: {} });
    let computed = 0;
    const compute = () => {
      computed += 1;
      return router.inspect("ls");
    };
    cache.resolve("ls", compute);
    cache.resolve("ls", compute);
    expect(computed).toBe(2);
    expect(cache.size).toBe(0);
  });
});

describe.skipIf(process.platform === "win32")("Router.execute with a real shell", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "squish-router-"));
    await writeFile(join(dir, "build.sh"), "echo ran >> count.txt\nexit 2\n");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("runs the prefix of a chained git status once", async () => {
    const config = SquishConfig.parse({});
    const router = new Router({
      config,
      registry: createRegistry(config.optimizers),
      breaker: createCircuitBreaker(BreakerState.parse({}), DEFAULT_BREAKER_SETTINGS, () => NOW),
      llm: new FakeLlm(ok("unused")),
      runner: new ShellRunner(),
      events: new MemoryEvents(),
      cwd: dir,
    });

    const result = await router.execute("sh ./build.sh && git status");

    expect(await readFile(join(dir, "count.txt"), "utf-8")).toBe("ran\n");
    expect(result.exitCode).toBe(2);
  });
});
