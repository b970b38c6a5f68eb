import { describe, expect, it } from "vitest";
import { configure } from "../src/config.js";
import { BackoffPolicy } from "../src/engine/backoff.js";
import { TaskError, TimeoutError, ValidationError } from "../src/errors.js";

describe("BackoffPolicy", () => {
  it("doubles from the configured base up to the ceiling", () => {
    const policy = new BackoffPolicy();
    expect([1, 2, 3, 4, 5, 6].map((k) => policy.backoff(k))).toEqual([
      2000, 4000, 8000, 16000, 30000, 30000,
    ]);
  });

  it("is a pure function of the attempt number", () => {
    const policy = new BackoffPolicy({ baseDelayMs: 100, maxDelayMs: 1000 });
    expect(policy.backoff(3)).toBe(400);
    expect(policy.backoff(3)).toBe(400);
    expect(policy.backoff(5)).toBe(1000);
  });

  it("treats attempts below 1 as the first attempt", () => {
    const policy = new BackoffPolicy({ baseDelayMs: 50 });
    expect(policy.backoff(0)).toBe(50);
    expect(policy.backoff(-3)).toBe(50);
  });

  it("reads defaults from the current config", () => {
    configure({ retry: { baseDelayMs: 10, maxDelayMs: 25 } });
    const policy = new BackoffPolicy();
    expect(policy.backoff(1)).toBe(10);
    expect(policy.backoff(2)).toBe(20);
    expect(policy.backoff(3)).toBe(25);
  });

  it("returns the plain backoff when jitter is off", () => {
    const policy = new BackoffPolicy({ baseDelayMs: 100, random: () => 0 });
    expect(policy.delay(2)).toBe(200);
  });

  it("applies symmetric jitter around the backoff", () => {
    const low = new BackoffPolicy({ baseDelayMs: 2000, jitter: 0.5, random: () => 0 });
    const high = new BackoffPolicy({ baseDelayMs: 2000, jitter: 0.5, random: () => 0.75 });
    expect(low.delay(1)).toBe(1000);
    expect(high.delay(1)).toBe(2500);
  });

  it("clamps jitter into [0, 1]", () => {
    expect(new BackoffPolicy({ jitter: 3 }).jitter).toBe(1);
    expect(new BackoffPolicy({ jitter: -1 }).jitter).toBe(0);
  });

  it("retries only retryable errors", () => {
    const policy = new BackoffPolicy();
    expect(policy.shouldRetry(new TaskError("flaky", { retryable: true }), 1)).toBe(true);
    expect(policy.shouldRetry(new TimeoutError("slow"), 1)).toBe(true);
    expect(policy.shouldRetry(new ValidationError("VALIDATION_FAILED", "bad input"), 1)).toBe(false);
  });
});
