import { MetricsCollector } from "../metrics/collector.js";
import { ProgressTracker, type ProgressCallback } from "../progress/tracker.js";
import { WorkflowError, type TaskError } from "../errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import type { TaskResult, WorkflowOutcome } from "./types.js";

/**
 * State of one execution: a TaskResult per planned task plus the run's own
 * metrics and progress tracker. Every mark* call keeps all three in step.
 */
export class WorkflowRun {
  readonly runId: string;
  readonly taskNames: readonly string[];
  readonly metrics: MetricsCollector;
  readonly progress: ProgressTracker;
  readonly log: Logger;

  private results = new Map<string, TaskResult>();
  private cancelled = false;
  private now: () => number;

  constructor(opts: {
    runId: string;
    taskNames: readonly string[];
    onProgress?: ProgressCallback;
    now?: () => number;
  }) {
    this.runId = opts.runId;
    this.taskNames = opts.taskNames;
    this.now = opts.now ?? Date.now;
    this.metrics = new MetricsCollector(this.now);
    this.progress = new ProgressTracker({ runId: opts.runId, now: this.now });
    this.log = createLogger(`run ${opts.runId.slice(0, 8)}`);
    if (opts.onProgress) this.progress.registerCallback(opts.onProgress);

    for (const name of opts.taskNames) {
      this.results.set(name, { name, status: "pending", attempts: 0 });
    }
  }

  begin(): void {
    this.metrics.start(this.runId);
    this.progress.start(this.taskNames.length, this.taskNames);
  }

  markRunning(name: string): void {
    const result = this.entry(name);
    result.status = "running";
    result.attempts = 1;
    result.startedAt = this.now();
    this.metrics.recordStart(name);
    this.progress.stepStart(name);
  }

  markRetrying(name: string, attempt: number, error: TaskError, delayMs: number): void {
    const result = this.entry(name);
    result.status = "retrying";
    result.error = error.message;
    this.log.warn(`Task "${name}" failed, retrying in ${delayMs}ms`, { attempt, error: error.message });
    this.progress.stepRetry(name, attempt, error.message);
  }

  /** A retry attempt has started after its backoff. */
  markAttempt(name: string, attempt: number): void {
    const result = this.entry(name);
    result.attempts = attempt;
    this.metrics.recordRetry(name);
  }

  markSucceeded(name: string, output: string, attempts: number): void {
    const result = this.entry(name);
    result.status = "succeeded";
    result.output = output;
    result.error = undefined;
    result.attempts = attempts;
    this.close(result);
    this.metrics.recordEnd(name, output.length);
    this.progress.stepComplete(name);
  }

  markFailed(name: string, error: TaskError, attempts: number): void {
    const result = this.entry(name);
    result.status = "failed";
    result.output = undefined;
    result.error = error.message;
    result.attempts = attempts;
    this.close(result);
    this.log.error(`Task "${name}" failed after ${attempts} attempt(s)`, {
      code: error.code,
      error: error.message,
    });
    this.metrics.recordFailure(name, error.message);
    this.progress.stepFailed(name, error.message);
  }

  markCancelled(name: string): void {
    const result = this.entry(name);
    result.status = "cancelled";
    this.cancelled = true;
    this.metrics.recordCancelled(name);
    this.progress.stepCancelled(name);
  }

  /** Copies of every result; safe to hand to readers mid-run. */
  snapshot(): Record<string, TaskResult> {
    const out: Record<string, TaskResult> = {};
    for (const [name, result] of this.results) out[name] = { ...result };
    return out;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  finish(): WorkflowOutcome {
    this.metrics.end();
    const results = this.snapshot();
    return {
      runId: this.runId,
      results,
      metrics: this.metrics.summary(),
      cancelled: this.cancelled,
      success: Object.values(results).every((r) => r.status === "succeeded"),
    };
  }

  private entry(name: string): TaskResult {
    const result = this.results.get(name);
    if (!result) {
      throw new WorkflowError("UNKNOWN_TASK", `Task "${name}" is not part of run ${this.runId}`);
    }
    return result;
  }

  private close(result: TaskResult): void {
    result.endedAt = this.now();
    result.durationMs = result.endedAt - (result.startedAt ?? result.endedAt);
  }
}
