import { getConfig } from "../config.js";
import type { TaskError } from "../errors.js";

export type BackoffOptions = {
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Fraction of the delay applied as uniform ± jitter, between 0 and 1. */
  jitter?: number;
  /** Source of randomness for jitter, in [0, 1). */
  random?: () => number;
};

/**
 * Decides whether a failed attempt is retried and how long to wait first.
 * Delay for attempt k is `min(base * 2^(k-1), max)`.
 */
export class BackoffPolicy {
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: number;
  private random: () => number;

  constructor(opts: BackoffOptions = {}) {
    const { retry } = getConfig();
    this.baseDelayMs = opts.baseDelayMs ?? retry.baseDelayMs;
    this.maxDelayMs = opts.maxDelayMs ?? retry.maxDelayMs;
    this.jitter = Math.min(Math.max(opts.jitter ?? retry.jitter, 0), 1);
    this.random = opts.random ?? Math.random;
  }

  // The attempt cap is enforced by the caller; only the error class matters here.
  shouldRetry(error: TaskError, _attempt: number): boolean {
    return error.retryable;
  }

  /** Deterministic delay after the k-th failed attempt (k >= 1). */
  backoff(attempt: number): number {
    const k = Math.max(1, Math.floor(attempt));
    return Math.min(this.baseDelayMs * 2 ** (k - 1), this.maxDelayMs);
  }

  /** backoff(k) with jitter applied. */
  delay(attempt: number): number {
    const base = this.backoff(attempt);
    if (this.jitter === 0) return base;
    const factor = 1 + this.jitter * (2 * this.random() - 1);
    return Math.max(0, Math.round(base * factor));
  }
}
