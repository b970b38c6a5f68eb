import { readFile } from "node:fs/promises";
import { BackoffPolicy } from "../engine/backoff.js";
import type { WorkflowEngineOptions } from "../engine/engine.js";
import { ConfigError, errorMessage } from "../errors.js";
import { derivePlan, validatePlan } from "../planner/plan.js";
import type { WorkflowPlan } from "../planner/types.js";
import {
  HttpHandlerConfigSchema,
  WorkflowFileSchema,
  parseOrThrow,
  type HandlerConfig,
  type TaskConfig,
} from "../schemas.js";
import { defineTask } from "../tasks/define.js";
import { httpHandler } from "../tasks/http-task.js";
import { TaskRegistry } from "../tasks/registry.js";
import type { TaskHandler } from "../tasks/types.js";

/** Builds the handler for a task from its `handler` block. */
export type HandlerFactory = (config: HandlerConfig, task: TaskConfig) => TaskHandler;

export const defaultHandlerFactories: Readonly<Record<string, HandlerFactory>> = {
  http: (config, task) => httpHandler(parseOrThrow(HttpHandlerConfigSchema, config, `http handler of "${task.name}"`)),
};

export type LoadedWorkflow = {
  name: string;
  description?: string;
  registry: TaskRegistry;
  plan: WorkflowPlan;
  /** Whether `plan` came from the file's `stages` or was derived from dependencies. */
  planSource: "declared" | "derived";
  engineOptions: WorkflowEngineOptions;
};

/**
 * Turn a parsed workflow definition into a registry and a validated plan.
 * Without `stages` the plan is derived from the task dependencies.
 */
export function buildWorkflow(
  raw: unknown,
  factories: Readonly<Record<string, HandlerFactory>> = defaultHandlerFactories,
): LoadedWorkflow {
  const file = parseOrThrow(WorkflowFileSchema, raw, "workflow");
  const defaults = file.defaults ?? {};

  const registry = new TaskRegistry();
  file.tasks.forEach((task, index) => {
    const factory = Object.hasOwn(factories, task.handler.type) ? factories[task.handler.type] : undefined;
    if (!factory) {
      throw new ConfigError(
        `Task "${task.name}" uses unknown handler type "${task.handler.type}" (known: ${Object.keys(factories).join(", ")})`,
      );
    }
    registry.add(
      defineTask({
        name: task.name,
        title: task.title,
        dependsOn: task.dependsOn,
        maxAttempts: task.maxAttempts ?? defaults.maxAttempts,
        timeoutMs: task.timeoutMs ?? defaults.timeoutMs,
        order: task.order ?? index,
        handler: factory(task.handler, task),
      }),
    );
  });

  const plan = file.stages ?? derivePlan(registry.list());
  validatePlan(plan, registry);

  return {
    name: file.name,
    description: file.description,
    registry,
    plan,
    planSource: file.stages ? "declared" : "derived",
    engineOptions: {
      policy: new BackoffPolicy({
        baseDelayMs: defaults.baseDelayMs,
        maxDelayMs: defaults.maxDelayMs,
        jitter: defaults.jitter,
      }),
      maxConcurrency: defaults.maxConcurrency,
      contextExcerptLength: defaults.contextExcerptLength,
    },
  };
}

export async function loadWorkflow(
  path: string,
  factories?: Readonly<Record<string, HandlerFactory>>,
): Promise<LoadedWorkflow> {
  return buildWorkflow(await readJsonFile(path), factories);
}

export async function readJsonFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read ${path}: ${errorMessage(err)}`, { cause: err });
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
}
