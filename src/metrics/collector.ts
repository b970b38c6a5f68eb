import { randomUUID } from "node:crypto";

export type TaskMetricStatus = "running" | "succeeded" | "failed" | "cancelled";

export type TaskMetrics = {
  name: string;
  status: TaskMetricStatus;
  startedAt?: number;
  endedAt?: number;
  durationMs: number;
  attempts: number;
  retries: number;
  outputSize: number;
  error?: string;
};

export type ExecutionMetrics = {
  runId: string;
  startedAt: number;
  endedAt?: number;
  totalDurationMs: number;
  /** Tasks that ran to a terminal outcome (succeeded + failed). */
  totalTasks: number;
  successCount: number;
  failureCount: number;
  cancelledCount: number;
  totalRetries: number;
  /** successCount / totalTasks, or 0 when nothing ran. */
  successRate: number;
  tasks: Record<string, TaskMetrics>;
};

/** Flat export for log lines and telemetry sinks. Durations in seconds. */
export type MetricsRecord = {
  run_id: string;
  total_duration: number;
  total_tasks: number;
  completed: number;
  failed: number;
  cancelled: number;
  total_retries: number;
  success_rate: number;
  per_task: Record<string, { duration: number; attempts: number; status: TaskMetricStatus }>;
};

/**
 * Per-run timing and outcome bookkeeping. Every method is synchronous, so calls
 * from tasks running concurrently on the event loop never interleave.
 */
export class MetricsCollector {
  private runId: string = randomUUID();
  private startedAt: number | undefined;
  private endedAt: number | undefined;
  private tasks = new Map<string, TaskMetrics>();
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  start(runId?: string): void {
    if (runId) this.runId = runId;
    this.startedAt = this.now();
    this.endedAt = undefined;
    this.tasks.clear();
  }

  end(): void {
    this.endedAt = this.now();
  }

  recordStart(name: string): void {
    this.tasks.set(name, {
      name,
      status: "running",
      startedAt: this.now(),
      durationMs: 0,
      attempts: 1,
      retries: 0,
      outputSize: 0,
    });
  }

  recordRetry(name: string): void {
    const task = this.entry(name);
    task.retries++;
    task.attempts++;
  }

  recordEnd(name: string, outputSize: number): void {
    const task = this.entry(name);
    task.status = "succeeded";
    task.outputSize = outputSize;
    this.finish(task);
  }

  recordFailure(name: string, reason: string): void {
    const task = this.entry(name);
    task.status = "failed";
    task.error = reason;
    this.finish(task);
  }

  recordCancelled(name: string): void {
    this.tasks.set(name, {
      name,
      status: "cancelled",
      durationMs: 0,
      attempts: 0,
      retries: 0,
      outputSize: 0,
    });
  }

  summary(): ExecutionMetrics {
    const startedAt = this.startedAt ?? this.now();
    const endedAt = this.endedAt;
    const tasks = [...this.tasks.values()];

    const successCount = tasks.filter((t) => t.status === "succeeded").length;
    const failureCount = tasks.filter((t) => t.status === "failed").length;
    const cancelledCount = tasks.filter((t) => t.status === "cancelled").length;
    const totalTasks = successCount + failureCount;

    return {
      runId: this.runId,
      startedAt,
      endedAt,
      totalDurationMs: (endedAt ?? this.now()) - startedAt,
      totalTasks,
      successCount,
      failureCount,
      cancelledCount,
      totalRetries: tasks.reduce((sum, t) => sum + t.retries, 0),
      successRate: totalTasks > 0 ? successCount / totalTasks : 0,
      tasks: Object.fromEntries(tasks.map((t) => [t.name, { ...t }])),
    };
  }

  private entry(name: string): TaskMetrics {
    const existing = this.tasks.get(name);
    if (existing) return existing;
    // Out-of-order call (no recordStart): start the clock now.
    this.recordStart(name);
    return this.entry(name);
  }

  private finish(task: TaskMetrics): void {
    task.endedAt = this.now();
    task.durationMs = task.endedAt - (task.startedAt ?? task.endedAt);
  }
}

export function toMetricsRecord(metrics: ExecutionMetrics): MetricsRecord {
  const perTask: MetricsRecord["per_task"] = {};
  for (const [name, t] of Object.entries(metrics.tasks)) {
    perTask[name] = { duration: t.durationMs / 1000, attempts: t.attempts, status: t.status };
  }
  return {
    run_id: metrics.runId,
    total_duration: metrics.totalDurationMs / 1000,
    total_tasks: metrics.totalTasks,
    completed: metrics.successCount,
    failed: metrics.failureCount,
    cancelled: metrics.cancelledCount,
    total_retries: metrics.totalRetries,
    success_rate: metrics.successRate,
    per_task: perTask,
  };
}

/** Human-readable summary, one line per entry. */
export function formatSummary(metrics: ExecutionMetrics): string[] {
  const lines = [
    `Total duration: ${(metrics.totalDurationMs / 1000).toFixed(2)}s`,
    `Completed: ${metrics.successCount}/${metrics.totalTasks}` +
      (metrics.cancelledCount > 0 ? ` (${metrics.cancelledCount} cancelled)` : ""),
    `Retries: ${metrics.totalRetries}`,
    `Success rate: ${(metrics.successRate * 100).toFixed(1)}%`,
  ];
  for (const t of Object.values(metrics.tasks)) {
    const detail = t.error ? ` - ${t.error}` : "";
    lines.push(`  ${t.name}: ${t.status}, ${(t.durationMs / 1000).toFixed(2)}s, ${t.attempts} attempt(s)${detail}`);
  }
  return lines;
}
