import { getConfig } from "../config.js";
import { PlanError, ValidationError } from "../errors.js";
import type { InputSchema, TaskDefinition, TaskHandler, TaskSpec, TypedTaskDefinition } from "./types.js";

/**
 * Build an immutable TaskSpec, filling retry and timeout from the current
 * config. With an `input` schema the payload is validated before the handler
 * runs and a mismatch fails the task without a retry.
 */
export function defineTask<I>(def: TypedTaskDefinition<I>): TaskSpec;
export function defineTask(def: TaskDefinition): TaskSpec;
export function defineTask<I>(def: TypedTaskDefinition<I> | TaskDefinition): TaskSpec {
  const { retry, timeouts } = getConfig();
  const maxAttempts = def.maxAttempts ?? retry.maxAttempts;
  const timeoutMs = def.timeoutMs ?? timeouts.taskDefault;

  if (!def.name.trim()) {
    throw new PlanError("INVALID_PLAN", "Task name must not be empty");
  }
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new PlanError("INVALID_PLAN", `Task "${def.name}" needs maxAttempts >= 1 (got ${maxAttempts})`);
  }
  if (!(timeoutMs > 0)) {
    throw new PlanError("INVALID_PLAN", `Task "${def.name}" needs a positive timeout (got ${timeoutMs})`);
  }

  const dependencies = [...new Set(def.dependsOn ?? [])];
  if (dependencies.includes(def.name)) {
    throw new PlanError("INVALID_PLAN", `Task "${def.name}" depends on itself`);
  }

  const handler: TaskHandler =
    def.input === undefined ? def.handler : validating(def.name, def.input, def.handler);

  return Object.freeze({
    name: def.name,
    title: def.title,
    handler,
    dependencies: Object.freeze(dependencies),
    maxAttempts,
    timeoutMs,
    order: def.order ?? 0,
  });
}

function validating<I>(name: string, schema: InputSchema<I>, handler: TaskHandler<I>): TaskHandler {
  return (input, context, ctx) => {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
        .join("; ");
      return Promise.reject(
        new ValidationError("VALIDATION_FAILED", `Invalid input for task "${name}": ${issues}`),
      );
    }
    return handler(parsed.data, context, ctx);
  };
}
