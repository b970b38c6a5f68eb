import { TaskError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { TaskHandler } from "./types.js";

export type HttpHandlerOptions = {
  url: string;
  method?: "POST" | "PUT";
  headers?: Record<string, string>;
  /** Name of a string field to read from a JSON response instead of the raw body. */
  outputField?: string;
};

/** Statuses worth another attempt: timeouts, rate limits, server errors. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Handler that delegates generation to an HTTP endpoint. The request body is
 * `{ task, attempt, input, context }`; the response body is the section text.
 */
export function httpHandler(opts: HttpHandlerOptions): TaskHandler {
  const headers = { "Content-Type": "application/json", ...opts.headers };

  return async (input, context, ctx) => {
    const start = Date.now();
    log.debug(`[${ctx.taskName}] Calling ${opts.url}`, { attempt: ctx.attempt });

    let res: Response;
    try {
      res = await fetch(opts.url, {
        method: opts.method ?? "POST",
        headers,
        body: JSON.stringify({ task: ctx.taskName, attempt: ctx.attempt, input, context: context ?? null }),
        signal: ctx.signal,
      });
    } catch (err) {
      throw new TaskError(`Request to ${opts.url} failed: ${String(err)}`, {
        retryable: true,
        code: "HTTP_ERROR",
        cause: err,
      });
    }

    const body = await res.text();
    log.debug(`[${ctx.taskName}] HTTP ${res.status}`, { durationMs: Date.now() - start, bytes: body.length });

    if (!res.ok) {
      throw new TaskError(`HTTP ${res.status}: ${body.slice(0, 200)}`, {
        retryable: isRetryableStatus(res.status),
        code: "HTTP_ERROR",
      });
    }

    return opts.outputField ? readField(body, opts.outputField) : body;
  };
}

function readField(body: string, field: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new TaskError(`Response is not JSON: ${String(err)}`, { retryable: false, code: "HTTP_ERROR" });
  }
  const value = typeof parsed === "object" && parsed !== null ? Reflect.get(parsed, field) : undefined;
  if (typeof value !== "string") {
    throw new TaskError(`Response field "${field}" is missing or not a string`, {
      retryable: true,
      code: "HTTP_ERROR",
    });
  }
  return value;
}
