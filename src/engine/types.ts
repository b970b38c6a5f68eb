import type { ExecutionMetrics } from "../metrics/collector.js";
import type { ProgressCallback } from "../progress/tracker.js";

export type TaskStatus = "pending" | "running" | "retrying" | "succeeded" | "failed" | "cancelled";

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set(["succeeded", "failed", "cancelled"]);

export type TaskResult = {
  name: string;
  status: TaskStatus;
  attempts: number;
  /** Present only when status is "succeeded". */
  output?: string;
  /** Last failure message; set while retrying and once failed. */
  error?: string;
  startedAt?: number;
  endedAt?: number;
  durationMs?: number;
};

/** Payloads keyed by task name. */
export type TaskInputs = Readonly<Record<string, unknown>>;

export type ExecuteOptions = {
  runId?: string;
  /** Aborting stops tasks that have not started; running attempts finish. */
  signal?: AbortSignal;
  /** Run only these tasks (dependencies outside the selection are not run). */
  select?: readonly string[];
  onProgress?: ProgressCallback;
};

export type WorkflowOutcome = {
  runId: string;
  results: Record<string, TaskResult>;
  metrics: ExecutionMetrics;
  /**
   * True when at least one task was marked cancelled without running. A task
   * stopped between retries ends as failed and does not set this.
   */
  cancelled: boolean;
  /** True when every planned task succeeded. */
  success: boolean;
};
