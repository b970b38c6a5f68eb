import type { z } from "zod";

/** Passed to every handler call alongside the payload and context. */
export type HandlerContext = {
  taskName: string;
  /** 1-based attempt number. */
  attempt: number;
  /** Aborts when the attempt times out. */
  signal: AbortSignal;
};

/**
 * Content generator for one task. `context` is undefined when the task has no
 * completed dependency to draw from.
 */
export type TaskHandler<I = unknown> = (
  input: I,
  context: string | undefined,
  ctx: HandlerContext,
) => Promise<string>;

export type TaskSpec = Readonly<{
  name: string;
  /** Display name used in context labels and progress output. */
  title?: string;
  handler: TaskHandler;
  dependencies: readonly string[];
  maxAttempts: number;
  timeoutMs: number;
  /** Position within its stage; affects launch and log order only. */
  order: number;
}>;

type TaskDefinitionBase = {
  name: string;
  title?: string;
  dependsOn?: readonly string[];
  maxAttempts?: number;
  timeoutMs?: number;
  order?: number;
};

export type InputSchema<I> = z.ZodType<I, z.ZodTypeDef, unknown>;

/** A task whose payload is validated by `input` before the handler runs. */
export type TypedTaskDefinition<I> = TaskDefinitionBase & { input: InputSchema<I>; handler: TaskHandler<I> };

export type TaskDefinition = TaskDefinitionBase & { input?: undefined; handler: TaskHandler };
