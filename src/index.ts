// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { EngineConfig, DeepPartial } from "./config.js";

// Errors
export {
  WorkflowError,
  PlanError,
  ConfigError,
  TaskError,
  ValidationError,
  TimeoutError,
  CancelledError,
  errorMessage,
  toTaskError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  HandlerConfigSchema,
  HttpHandlerConfigSchema,
  TaskConfigSchema,
  TaskInputsSchema,
  WorkflowDefaultsSchema,
  WorkflowFileSchema,
  StartRunRequestSchema,
} from "./schemas.js";
export type { HandlerConfig, TaskConfig, WorkflowDefaults, WorkflowFile, StartRunRequest } from "./schemas.js";

// Tasks
export { defineTask } from "./tasks/define.js";
export { TaskRegistry } from "./tasks/registry.js";
export { httpHandler, isRetryableStatus } from "./tasks/http-task.js";
export type { HttpHandlerOptions } from "./tasks/http-task.js";
export type {
  TaskSpec,
  TaskDefinition,
  TypedTaskDefinition,
  TaskHandler,
  HandlerContext,
  InputSchema,
} from "./tasks/types.js";

// Planner
export { validatePlan, derivePlan, selectTasks, planTaskNames } from "./planner/plan.js";
export type { Stage, WorkflowPlan } from "./planner/types.js";

// Engine
export { WorkflowEngine } from "./engine/engine.js";
export type { WorkflowEngineOptions, RunHandle } from "./engine/engine.js";
export { WorkflowRun } from "./engine/run.js";
export { BackoffPolicy } from "./engine/backoff.js";
export type { BackoffOptions } from "./engine/backoff.js";
export { runWithRetry } from "./engine/retry.js";
export type { RetryOutcome, RetryOptions } from "./engine/retry.js";
export { ContextBuilder } from "./engine/context.js";
export type { ContextResult, ContextBuilderOptions } from "./engine/context.js";
export { TERMINAL_STATUSES } from "./engine/types.js";
export type { TaskStatus, TaskResult, TaskInputs, ExecuteOptions, WorkflowOutcome } from "./engine/types.js";

// Metrics & progress
export { MetricsCollector, toMetricsRecord, formatSummary } from "./metrics/collector.js";
export type { ExecutionMetrics, TaskMetrics, TaskMetricStatus, MetricsRecord } from "./metrics/collector.js";
export { ProgressTracker, createConsoleProgressCallback } from "./progress/tracker.js";
export type { ProgressEvent, ProgressCallback, ProgressState, StepProgress } from "./progress/tracker.js";

// Workflow files
export { buildWorkflow, loadWorkflow, readJsonFile, defaultHandlerFactories } from "./workflow/loader.js";
export type { HandlerFactory, LoadedWorkflow } from "./workflow/loader.js";

// Persistence
export { RunStore, RUN_STATES } from "./persistence/store.js";
export type { RunRecord, RunState } from "./persistence/store.js";

// UI
export { StatusServer } from "./ui/server.js";
export type { StatusServerOptions } from "./ui/server.js";
export type { RunStatus, SSEEvent } from "./ui/types.js";

// Utils
export { log, createLogger, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { sleep, withTimeout } from "./utils/async.js";
export { ConcurrencyLimiter } from "./utils/limiter.js";
