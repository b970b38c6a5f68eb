import { TaskError, toTaskError } from "../errors.js";
import type { TaskSpec } from "../tasks/types.js";
import { sleep, withTimeout } from "../utils/async.js";
import { log } from "../utils/logger.js";
import type { BackoffPolicy } from "./backoff.js";

export type RetryOutcome =
  | { ok: true; output: string; attempts: number }
  | { ok: false; error: TaskError; attempts: number };

export type RetryOptions = {
  policy: BackoffPolicy;
  /** Checked between attempts; an abort stops further retries. */
  signal?: AbortSignal;
  /** Called after attempt `attempt` failed and before the backoff sleep. */
  onRetry?: (attempt: number, error: TaskError, delayMs: number) => void;
  /** Called when a retry attempt starts, once its backoff has elapsed. */
  onAttempt?: (attempt: number) => void;
};

/**
 * Run a task's handler with its per-attempt timeout, retrying retryable
 * failures with backoff. Handler failures come back as `{ ok: false }`.
 */
export async function runWithRetry(
  spec: TaskSpec,
  input: unknown,
  context: string | undefined,
  opts: RetryOptions,
): Promise<RetryOutcome> {
  for (let attempt = 1; ; attempt++) {
    if (attempt > 1) opts.onAttempt?.(attempt);
    try {
      const output = await withTimeout(
        (signal) => spec.handler(input, context, { taskName: spec.name, attempt, signal }),
        spec.timeoutMs,
        `Task "${spec.name}" timed out after ${spec.timeoutMs}ms`,
      );
      return { ok: true, output, attempts: attempt };
    } catch (err) {
      const error = toTaskError(err);

      if (attempt >= spec.maxAttempts || !opts.policy.shouldRetry(error, attempt)) {
        return { ok: false, error, attempts: attempt };
      }
      if (opts.signal?.aborted) {
        log.warn(`Task "${spec.name}" not retried: run cancelled`, { attempt });
        return { ok: false, error, attempts: attempt };
      }

      const delayMs = opts.policy.delay(attempt);
      opts.onRetry?.(attempt, error, delayMs);

      try {
        await sleep(delayMs, opts.signal);
      } catch {
        log.warn(`Task "${spec.name}" not retried: run cancelled during backoff`, { attempt });
        return { ok: false, error, attempts: attempt };
      }
    }
  }
}
