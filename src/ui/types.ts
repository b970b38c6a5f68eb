import type { MetricsRecord } from "../metrics/collector.js";
import type { RunRecord } from "../persistence/store.js";
import type { ProgressEvent, ProgressState } from "../progress/tracker.js";

// --- REST ---

/** A run as served by the API; `progress` is present while the run is live. */
export type RunStatus = RunRecord & {
  progress?: ProgressState;
};

// --- SSE Event Types ---

export type SSEEvent =
  | { type: "run:started"; runId: string; workflow: string; tasks: string[] }
  | { type: "task:progress"; runId: string; event: ProgressEvent }
  | { type: "run:complete"; runId: string; cancelled: boolean; metrics: MetricsRecord }
  | { type: "run:error"; runId: string; error: string }
  | { type: "run:deleted"; runId: string };
