import { describe, expect, it, vi } from "vitest";
import { BackoffPolicy } from "../src/engine/backoff.js";
import { WorkflowEngine, type WorkflowEngineOptions } from "../src/engine/engine.js";
import type { TaskResult } from "../src/engine/types.js";
import { PlanError, ValidationError } from "../src/errors.js";
import type { WorkflowPlan } from "../src/planner/types.js";
import type { ProgressEvent } from "../src/progress/tracker.js";
import { defineTask } from "../src/tasks/define.js";
import { TaskRegistry } from "../src/tasks/registry.js";
import type { TaskHandler, TaskSpec } from "../src/tasks/types.js";

const policy = new BackoffPolicy({ baseDelayMs: 1, maxDelayMs: 4 });

function task(
  name: string,
  handler: TaskHandler,
  opts: { dependsOn?: string[]; maxAttempts?: number; timeoutMs?: number; title?: string } = {},
): TaskSpec {
  return defineTask({ name, handler, maxAttempts: 3, ...opts });
}

function engineFor(specs: TaskSpec[], opts: WorkflowEngineOptions = {}): WorkflowEngine {
  return new WorkflowEngine(new TaskRegistry(specs), { policy, ...opts });
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function flaky(failures: number, output: string): TaskHandler {
  let calls = 0;
  return async () => {
    calls++;
    if (calls <= failures) throw new Error(`attempt ${calls} failed`);
    return output;
  };
}

function startOf(r: TaskResult): number {
  if (r.startedAt === undefined) throw new Error(`${r.name} never started`);
  return r.startedAt;
}

function endOf(r: TaskResult): number {
  if (r.endedAt === undefined) throw new Error(`${r.name} never ended`);
  return r.endedAt;
}

describe("WorkflowEngine", () => {
  it("runs a stage, retries failures and keeps going after exhausted retries", async () => {
    const engine = engineFor([
      task("A", async () => "overview"),
      task("B", flaky(2, "site"), { dependsOn: ["A"] }),
      task("C", flaky(Infinity, "never"), { dependsOn: ["A"] }),
    ]);

    const outcome = await engine.execute([["A"], ["B", "C"]]);
    const { A, B, C } = outcome.results;

    expect(A).toMatchObject({ status: "succeeded", attempts: 1, output: "overview" });
    expect(B).toMatchObject({ status: "succeeded", attempts: 3, output: "site" });
    expect(B.error).toBeUndefined();
    expect(C).toMatchObject({ status: "failed", attempts: 3, error: "attempt 3 failed" });
    expect(C.output).toBeUndefined();
    expect(startOf(B)).toBeGreaterThanOrEqual(endOf(A));
    expect(startOf(C)).toBeGreaterThanOrEqual(endOf(A));

    expect(outcome.success).toBe(false);
    expect(outcome.cancelled).toBe(false);
    expect(outcome.metrics).toMatchObject({
      totalTasks: 3,
      successCount: 2,
      failureCount: 1,
      cancelledCount: 0,
      totalRetries: 4,
    });
    expect(outcome.metrics.successRate).toBeCloseTo(2 / 3);
    expect(outcome.metrics.tasks.B.attempts).toBe(3);
  });

  it("returns exactly one result per planned task", async () => {
    const engine = engineFor([
      task("a", async () => "ok"),
      task("b", async () => {
        throw new ValidationError("VALIDATION_FAILED", "bad input");
      }),
      task("c", flaky(Infinity, ""), { maxAttempts: 1 }),
      task("d", async () => "ok", { dependsOn: ["b"] }),
      task("unplanned", async () => "ok"),
    ]);

    const outcome = await engine.execute([["a", "b", "c"], ["d"]]);

    expect(Object.keys(outcome.results).sort()).toEqual(["a", "b", "c", "d"]);
    expect(outcome.results.b).toMatchObject({ status: "failed", attempts: 1, error: "bad input" });
    expect(outcome.results.d.status).toBe("succeeded");
  });

  it("starts a stage only after every task of the previous stage finished", async () => {
    const engine = engineFor([
      task("fast", async () => "f"),
      task("medium", async () => {
        await delay(10);
        return "m";
      }),
      task("slow", async () => {
        await delay(25);
        return "s";
      }),
      task("next1", async () => "n1"),
      task("next2", async () => "n2"),
    ]);

    const { results } = await engine.execute([["fast", "medium", "slow"], ["next1", "next2"]]);

    const lastEnd = Math.max(...["fast", "medium", "slow"].map((n) => endOf(results[n])));
    const firstStart = Math.min(...["next1", "next2"].map((n) => startOf(results[n])));
    expect(lastEnd).toBeLessThanOrEqual(firstStart);
  });

  it("hands a dependency's output to its dependent as context", async () => {
    const contexts: Array<string | undefined> = [];
    const engine = engineFor([
      task("taskA", async () => "X", { title: "Overview" }),
      task(
        "taskB",
        async (_input, context) => {
          contexts.push(context);
          return "B";
        },
        { dependsOn: ["taskA"] },
      ),
    ]);

    await engine.execute([["taskA"], ["taskB"]]);

    expect(contexts).toEqual(["## Overview\nX\n"]);
  });

  it("truncates context to the engine's excerpt length", async () => {
    const contexts: Array<string | undefined> = [];
    const engine = engineFor(
      [
        task("a", async () => "abcdefgh"),
        task(
          "b",
          async (_input, context) => {
            contexts.push(context);
            return "b";
          },
          { dependsOn: ["a"] },
        ),
      ],
      { contextExcerptLength: 4 },
    );

    await engine.execute([["a"], ["b"]]);

    expect(contexts).toEqual(["## a\nabcd\n"]);
  });

  it("runs a dependent without context when its dependency failed", async () => {
    const contexts: Array<string | undefined> = [];
    const engine = engineFor([
      task("a", flaky(Infinity, ""), { maxAttempts: 1 }),
      task(
        "b",
        async (_input, context) => {
          contexts.push(context);
          return "still written";
        },
        { dependsOn: ["a"] },
      ),
    ]);

    const { results } = await engine.execute([["a"], ["b"]]);

    expect(results.a.status).toBe("failed");
    expect(results.b).toMatchObject({ status: "succeeded", output: "still written" });
    expect(contexts).toEqual([undefined]);
  });

  it("returns empty results for an empty plan", async () => {
    const engine = engineFor([]);
    const outcome = await engine.execute([]);

    expect(outcome.results).toEqual({});
    expect(outcome.metrics.totalTasks).toBe(0);
    expect(outcome.metrics.successRate).toBe(0);
    expect(outcome.success).toBe(true);
  });

  it("passes each task its own input", async () => {
    const seen: Record<string, unknown> = {};
    const record: TaskHandler = async (input, _context, ctx) => {
      seen[ctx.taskName] = input;
      return "ok";
    };
    const engine = engineFor([task("a", record), task("b", record)]);

    await engine.execute([["a", "b"]], { a: { parcel: "North lot" } });

    expect(seen).toEqual({ a: { parcel: "North lot" }, b: undefined });
  });

  it("rejects a broken plan before running anything", async () => {
    const handler = vi.fn(async () => "ok");
    const engine = engineFor([task("a", handler)]);

    await expect(engine.execute([["a"], ["missing"]])).rejects.toBeInstanceOf(PlanError);
    expect(() => engine.start([["missing"]])).toThrow('Stage 1 references unregistered task "missing"');
    expect(handler).not.toHaveBeenCalled();
  });

  it("runs only the selected tasks", async () => {
    const contexts: Array<string | undefined> = [];
    const a = vi.fn(async () => "A");
    const engine = engineFor([
      task("a", a),
      task(
        "b",
        async (_input, context) => {
          contexts.push(context);
          return "B";
        },
        { dependsOn: ["a"] },
      ),
    ]);

    const outcome = await engine.execute([["a"], ["b"]], {}, { select: ["b"] });

    expect(Object.keys(outcome.results)).toEqual(["b"]);
    expect(a).not.toHaveBeenCalled();
    expect(contexts).toEqual([undefined]);
  });

  it("caps tasks in flight at maxConcurrency", async () => {
    let inFlight = 0;
    let peak = 0;
    const tracked: TaskHandler = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(10);
      inFlight--;
      return "ok";
    };
    const names = ["t1", "t2", "t3", "t4", "t5"];
    const engine = engineFor(
      names.map((n) => task(n, tracked)),
      { maxConcurrency: 2 },
    );

    const outcome = await engine.execute([names]);

    expect(peak).toBe(2);
    expect(outcome.metrics.successCount).toBe(5);
  });

  it("runs a whole stage at once without a cap", async () => {
    let inFlight = 0;
    let peak = 0;
    const tracked: TaskHandler = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(10);
      inFlight--;
      return "ok";
    };
    const engine = engineFor([task("t1", tracked), task("t2", tracked), task("t3", tracked)]);

    await engine.execute([["t1", "t2", "t3"]]);

    expect(peak).toBe(3);
  });

  it("fails an attempt that exceeds its timeout", async () => {
    const engine = engineFor([
      task(
        "slow",
        (_input, _context, ctx) =>
          new Promise<string>((_resolve, reject) => {
            ctx.signal.addEventListener("abort", () => reject(new Error("aborted")));
          }),
        { maxAttempts: 2, timeoutMs: 20 },
      ),
    ]);

    const { results } = await engine.execute([["slow"]]);

    expect(results.slow).toMatchObject({
      status: "failed",
      attempts: 2,
      error: 'Task "slow" timed out after 20ms',
    });
  });

  it("reports transitions in order for each task", async () => {
    const events: ProgressEvent[] = [];
    const engine = engineFor([task("A", async () => "a"), task("B", flaky(2, "b"), { dependsOn: ["A"] })]);

    await engine.execute([["A"], ["B"]], {}, { runId: "run-1", onProgress: (e) => events.push(e) });

    expect(events.filter((e) => e.taskName === "B").map((e) => e.to)).toEqual([
      "running",
      "retrying",
      "retrying",
      "succeeded",
    ]);
    expect(events.every((e) => e.runId === "run-1" && e.total === 2)).toBe(true);
    expect(events[events.length - 1].completed).toBe(2);
  });

  it("uses the given run id for results and metrics", async () => {
    const engine = engineFor([task("a", async () => "ok")]);
    const outcome = await engine.execute([["a"]], {}, { runId: "run-42" });
    expect(outcome.runId).toBe("run-42");
    expect(outcome.metrics.runId).toBe("run-42");
  });

  it("keeps concurrent runs on one engine apart", async () => {
    const engine = engineFor([
      task("a", async (input) => `a:${String(input)}`),
      task("b", async (_input, context) => context ?? "none", { dependsOn: ["a"] }),
    ]);
    const plan: WorkflowPlan = [["a"], ["b"]];

    const [first, second] = await Promise.all([
      engine.execute(plan, { a: "one" }),
      engine.execute(plan, { a: "two" }),
    ]);

    expect(first.runId).not.toBe(second.runId);
    expect(first.results.b.output).toBe("## a\na:one\n");
    expect(second.results.b.output).toBe("## a\na:two\n");
    expect(first.metrics.totalTasks).toBe(2);
    expect(second.metrics.totalTasks).toBe(2);
  });

  it("exposes a live run while it executes", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const engine = engineFor([
      task("a", async () => {
        await gate;
        return "done";
      }),
    ]);

    const { run, completion } = engine.start([["a"]]);
    expect(run.snapshot().a.status).toBe("pending");

    await delay(5);
    expect(run.snapshot().a.status).toBe("running");
    expect(run.progress.snapshot().running).toEqual(["a"]);

    release();
    const outcome = await completion;
    expect(outcome.results.a.status).toBe("succeeded");
    expect(run.snapshot().a.status).toBe("succeeded");
  });

  describe("cancellation", () => {
    it("lets running tasks finish and cancels the tasks not yet started", async () => {
      const controller = new AbortController();
      const later = vi.fn(async () => "never");
      const engine = engineFor([
        task("a", async () => {
          controller.abort();
          return "finished anyway";
        }),
        task("b", later),
        task("c", later),
      ]);

      const outcome = await engine.execute([["a"], ["b"], ["c"]], {}, { signal: controller.signal });

      expect(outcome.results.a).toMatchObject({ status: "succeeded", output: "finished anyway" });
      expect(outcome.results.b).toMatchObject({ status: "cancelled", attempts: 0 });
      expect(outcome.results.c.status).toBe("cancelled");
      expect(later).not.toHaveBeenCalled();
      expect(outcome.cancelled).toBe(true);
      expect(outcome.success).toBe(false);
      expect(outcome.metrics).toMatchObject({ totalTasks: 1, successCount: 1, cancelledCount: 2 });
    });

    it("cancels everything when the signal is already aborted", async () => {
      const handler = vi.fn(async () => "never");
      const engine = engineFor([task("a", handler), task("b", handler)]);

      const outcome = await engine.execute([["a", "b"]], {}, { signal: AbortSignal.abort() });

      expect(outcome.results.a.status).toBe("cancelled");
      expect(outcome.results.b.status).toBe("cancelled");
      expect(handler).not.toHaveBeenCalled();
      expect(outcome.metrics.successRate).toBe(0);
    });

    it("stops retrying and keeps the last failure", async () => {
      const controller = new AbortController();
      const handler = vi.fn(async (): Promise<string> => {
        throw new Error("service unavailable");
      });
      const engine = engineFor([task("a", handler), task("b", async () => "never")]);

      const outcome = await engine.execute([["a"], ["b"]], {}, {
        signal: controller.signal,
        onProgress: (e) => {
          if (e.to === "retrying") controller.abort();
        },
      });

      expect(handler).toHaveBeenCalledTimes(1);
      expect(outcome.results.a).toMatchObject({ status: "failed", attempts: 1, error: "service unavailable" });
      expect(outcome.results.b.status).toBe("cancelled");
    });

    it("does not count a retry that was cancelled during backoff", async () => {
      const controller = new AbortController();
      const engine = engineFor([
        task("a", async (): Promise<string> => {
          throw new Error("service unavailable");
        }),
      ]);

      const outcome = await engine.execute([["a"]], {}, {
        signal: controller.signal,
        onProgress: (e) => {
          if (e.to === "retrying") controller.abort();
        },
      });

      expect(outcome.results.a.attempts).toBe(1);
      expect(outcome.metrics.tasks.a.attempts).toBe(outcome.results.a.attempts);
      expect(outcome.metrics.tasks.a.retries).toBe(0);
      expect(outcome.metrics.totalRetries).toBe(0);
      expect(outcome.cancelled).toBe(false);
    });
  });
});
