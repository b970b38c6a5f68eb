import { randomUUID } from "node:crypto";
import { getConfig } from "../config.js";
import { byOrder, planTaskNames, selectTasks, validatePlan } from "../planner/plan.js";
import type { WorkflowPlan } from "../planner/types.js";
import type { TaskRegistry } from "../tasks/registry.js";
import type { TaskSpec } from "../tasks/types.js";
import { ConcurrencyLimiter } from "../utils/limiter.js";
import { BackoffPolicy } from "./backoff.js";
import { ContextBuilder } from "./context.js";
import { runWithRetry } from "./retry.js";
import { WorkflowRun } from "./run.js";
import type { ExecuteOptions, TaskInputs, WorkflowOutcome } from "./types.js";

export type WorkflowEngineOptions = {
  policy?: BackoffPolicy;
  /** Cap on tasks in flight across all runs of this engine (0 = no cap). */
  maxConcurrency?: number;
  contextExcerptLength?: number;
  now?: () => number;
};

export type RunHandle = {
  run: WorkflowRun;
  completion: Promise<WorkflowOutcome>;
};

/**
 * Runs a staged plan: stages in order, the tasks of a stage concurrently.
 * A task that fails after its retries is recorded as failed and the run
 * carries on; only a broken plan makes execute() reject.
 */
export class WorkflowEngine {
  private registry: TaskRegistry;
  private policy: BackoffPolicy;
  private contextBuilder: ContextBuilder;
  private limiter: ConcurrencyLimiter;
  private now: () => number;

  constructor(registry: TaskRegistry, opts: WorkflowEngineOptions = {}) {
    const { limits } = getConfig();
    this.registry = registry;
    this.policy = opts.policy ?? new BackoffPolicy();
    this.contextBuilder = new ContextBuilder({
      excerptLength: opts.contextExcerptLength ?? limits.contextExcerptLength,
      labelFor: (name) => registry.label(name),
    });
    this.limiter = new ConcurrencyLimiter(opts.maxConcurrency ?? limits.maxConcurrency);
    this.now = opts.now ?? Date.now;
  }

  async execute(plan: WorkflowPlan, inputs: TaskInputs = {}, opts: ExecuteOptions = {}): Promise<WorkflowOutcome> {
    return this.start(plan, inputs, opts).completion;
  }

  /**
   * Validate the plan and begin executing it. The returned run can be
   * snapshotted while `completion` is pending. Throws PlanError synchronously.
   */
  start(plan: WorkflowPlan, inputs: TaskInputs = {}, opts: ExecuteOptions = {}): RunHandle {
    validatePlan(plan, this.registry);
    const selected = opts.select ? selectTasks(plan, opts.select) : plan;

    const run = new WorkflowRun({
      runId: opts.runId ?? randomUUID(),
      taskNames: planTaskNames(selected),
      onProgress: opts.onProgress,
      now: this.now,
    });
    const completion = this.runStages(run, selected, inputs, opts.signal);
    return { run, completion };
  }

  private async runStages(
    run: WorkflowRun,
    plan: WorkflowPlan,
    inputs: TaskInputs,
    signal?: AbortSignal,
  ): Promise<WorkflowOutcome> {
    run.begin();
    run.log.info(`Starting workflow: ${plan.length} stage(s), ${run.taskNames.length} task(s)`);

    for (const [i, stage] of plan.entries()) {
      const specs = stage.map((name) => this.registry.require(name)).sort(byOrder);
      if (signal?.aborted) {
        for (const spec of specs) run.markCancelled(spec.name);
        continue;
      }

      run.log.info(`Stage ${i + 1}/${plan.length}: ${specs.map((s) => this.registry.label(s.name)).join(" + ")}`);
      if (specs.length === 1) {
        await this.limiter.run(() => this.runTask(run, specs[0], inputs, signal));
      } else {
        await Promise.all(
          specs.map((spec) => this.limiter.run(() => this.runTask(run, spec, inputs, signal))),
        );
      }
    }

    const outcome = run.finish();
    run.log.info(outcome.cancelled ? "Workflow cancelled" : "Workflow finished", {
      succeeded: outcome.metrics.successCount,
      failed: outcome.metrics.failureCount,
      cancelled: outcome.metrics.cancelledCount,
      durationMs: outcome.metrics.totalDurationMs,
    });
    return outcome;
  }

  private async runTask(
    run: WorkflowRun,
    spec: TaskSpec,
    inputs: TaskInputs,
    signal?: AbortSignal,
  ): Promise<void> {
    if (signal?.aborted) {
      run.markCancelled(spec.name);
      return;
    }

    const context = this.contextBuilder.build(spec, run.snapshot());
    if (!context.ok && context.reason === "no-completed-dependencies") {
      run.log.warn(`No completed dependency output for "${spec.name}", running without context`);
    }

    run.markRunning(spec.name);
    const outcome = await runWithRetry(spec, inputs[spec.name], context.ok ? context.context : undefined, {
      policy: this.policy,
      signal,
      onRetry: (attempt, error, delayMs) => run.markRetrying(spec.name, attempt, error, delayMs),
      onAttempt: (attempt) => run.markAttempt(spec.name, attempt),
    });

    if (outcome.ok) {
      run.markSucceeded(spec.name, outcome.output, outcome.attempts);
    } else {
      run.markFailed(spec.name, outcome.error, outcome.attempts);
    }
  }
}
