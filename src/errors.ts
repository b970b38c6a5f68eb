export type ErrorCode =
  | "VALIDATION_FAILED"
  | "DUPLICATE_REGISTRATION"
  | "UNKNOWN_TASK"
  | "INVALID_PLAN"
  | "INVALID_TRANSITION"
  | "CONFIG_INVALID"
  | "TASK_FAILED"
  | "TASK_TIMEOUT"
  | "HTTP_ERROR"
  | "CANCELLED";

export class WorkflowError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WorkflowError";
    this.code = code;
  }
}

/** Broken plan or registry wiring. Thrown synchronously, never recorded as a task failure. */
export class PlanError extends WorkflowError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = "PlanError";
  }
}

export class ConfigError extends WorkflowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
    this.name = "ConfigError";
  }
}

/**
 * Failure of a single task attempt. `retryable` decides whether the
 * backoff policy may schedule another attempt.
 */
export class TaskError extends WorkflowError {
  readonly retryable: boolean;

  constructor(
    message: string,
    opts: { retryable: boolean; code?: ErrorCode; cause?: unknown },
  ) {
    super(opts.code ?? "TASK_FAILED", message, { cause: opts.cause });
    this.name = "TaskError";
    this.retryable = opts.retryable;
  }
}

export class ValidationError extends TaskError {
  constructor(code: ErrorCode, message: string) {
    super(message, { retryable: false, code });
    this.name = "ValidationError";
  }
}

export class TimeoutError extends TaskError {
  constructor(message: string) {
    super(message, { retryable: true, code: "TASK_TIMEOUT" });
    this.name = "TimeoutError";
  }
}

export class CancelledError extends TaskError {
  constructor(message = "Workflow run was cancelled") {
    super(message, { retryable: false, code: "CANCELLED" });
    this.name = "CancelledError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Normalize anything a handler throws. Unknown failures are treated as transient. */
export function toTaskError(err: unknown): TaskError {
  if (err instanceof TaskError) return err;
  return new TaskError(errorMessage(err), { retryable: true, cause: err });
}
