import type { TaskStatus } from "../engine/types.js";
import { WorkflowError, errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";

export type ProgressEvent = {
  runId?: string;
  taskName: string;
  from: TaskStatus;
  to: TaskStatus;
  attempt?: number;
  message?: string;
  timestamp: number;
  /** Tasks in a terminal state after this transition. */
  completed: number;
  total: number;
};

/**
 * Observer invoked synchronously on every transition. A slow callback delays
 * the task that triggered it; callbacks doing I/O should queue the work.
 */
export type ProgressCallback = (event: ProgressEvent) => void;

export type StepProgress = {
  status: TaskStatus;
  attempt: number;
  message?: string;
};

export type ProgressState = {
  total: number;
  completed: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  running: string[];
  percent: number;
  elapsedMs: number;
  steps: Record<string, StepProgress>;
};

const ALLOWED: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["running", "cancelled"],
  running: ["retrying", "succeeded", "failed"],
  retrying: ["retrying", "succeeded", "failed"],
  succeeded: [],
  failed: [],
  cancelled: [],
};

/**
 * Per-task state machine for one run. Each step call applies its transition
 * and notifies callbacks before returning, so events for a task reach
 * observers in the order they happened.
 */
export class ProgressTracker {
  private steps = new Map<string, StepProgress>();
  private callbacks: ProgressCallback[] = [];
  private total = 0;
  private startedAt = 0;
  private readonly runId?: string;
  private now: () => number;

  constructor(opts: { runId?: string; now?: () => number } = {}) {
    this.runId = opts.runId;
    this.now = opts.now ?? Date.now;
  }

  start(totalSteps: number, names: readonly string[] = []): void {
    this.total = totalSteps;
    this.startedAt = this.now();
    this.steps.clear();
    for (const name of names) this.steps.set(name, { status: "pending", attempt: 0 });
  }

  /** Returns a function that removes the callback. */
  registerCallback(fn: ProgressCallback): () => void {
    this.callbacks.push(fn);
    return () => {
      this.callbacks = this.callbacks.filter((cb) => cb !== fn);
    };
  }

  stepStart(name: string): void {
    this.transition(name, "running", { attempt: 1 });
  }

  stepRetry(name: string, attempt: number, message?: string): void {
    this.transition(name, "retrying", { attempt, message });
  }

  stepComplete(name: string): void {
    this.transition(name, "succeeded", {});
  }

  stepFailed(name: string, reason: string): void {
    this.transition(name, "failed", { message: reason });
  }

  stepCancelled(name: string): void {
    this.transition(name, "cancelled", {});
  }

  snapshot(): ProgressState {
    const steps = Object.fromEntries([...this.steps].map(([name, s]) => [name, { ...s }]));
    const values = [...this.steps.values()];
    const count = (status: TaskStatus) => values.filter((s) => s.status === status).length;
    const completed = this.completedCount();

    return {
      total: this.total,
      completed,
      succeeded: count("succeeded"),
      failed: count("failed"),
      cancelled: count("cancelled"),
      running: [...this.steps]
        .filter(([, s]) => s.status === "running" || s.status === "retrying")
        .map(([name]) => name),
      percent: this.total > 0 ? Math.round((completed / this.total) * 100) : 0,
      elapsedMs: this.startedAt > 0 ? this.now() - this.startedAt : 0,
      steps,
    };
  }

  private completedCount(): number {
    let n = 0;
    for (const s of this.steps.values()) {
      if (s.status === "succeeded" || s.status === "failed" || s.status === "cancelled") n++;
    }
    return n;
  }

  private transition(name: string, to: TaskStatus, patch: { attempt?: number; message?: string }): void {
    const step = this.steps.get(name) ?? { status: "pending", attempt: 0 };
    const from = step.status;
    if (!ALLOWED[from].includes(to)) {
      throw new WorkflowError("INVALID_TRANSITION", `Task "${name}" cannot go from ${from} to ${to}`);
    }

    const next: StepProgress = {
      status: to,
      attempt: patch.attempt ?? step.attempt,
      message: patch.message,
    };
    this.steps.set(name, next);

    this.emit({
      runId: this.runId,
      taskName: name,
      from,
      to,
      attempt: next.attempt > 0 ? next.attempt : undefined,
      message: patch.message,
      timestamp: this.now(),
      completed: this.completedCount(),
      total: this.total,
    });
  }

  private emit(event: ProgressEvent): void {
    for (const cb of this.callbacks) {
      try {
        cb(event);
      } catch (err) {
        log.warn("Progress callback threw", { task: event.taskName, error: errorMessage(err) });
      }
    }
  }
}

/** Log one line per transition, e.g. `[2/6] compliance: done`. */
export function createConsoleProgressCallback(
  labelFor: (name: string) => string = (name) => name,
): ProgressCallback {
  return (event) => {
    const label = labelFor(event.taskName);
    const head = `[${event.completed}/${event.total}] ${label}`;
    switch (event.to) {
      case "running":
        log.info(`${head}: started`);
        break;
      case "retrying":
        log.warn(`${head}: retrying after attempt ${event.attempt ?? "?"}`, { error: event.message });
        break;
      case "succeeded":
        log.info(`${head}: done`);
        break;
      case "failed":
        log.error(`${head}: failed`, { error: event.message });
        break;
      case "cancelled":
        log.warn(`${head}: cancelled`);
        break;
      default:
        log.debug(`${head}: ${event.from} -> ${event.to}`);
    }
  };
}
