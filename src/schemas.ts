import { z } from "zod";
import { ConfigError } from "./errors.js";

/** Parse `raw` or throw a ConfigError listing every issue. */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, what: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ConfigError(`Invalid ${what}: ${msg}`);
  }
  return result.data;
}

const taskName = z.string().trim().min(1, "task name must not be empty");

/** Extra keys are kept for the handler factory to read. */
export const HandlerConfigSchema = z
  .object({ type: z.string().min(1, "handler type is required") })
  .passthrough();

export const HttpHandlerConfigSchema = z.object({
  type: z.literal("http"),
  url: z.string().url(),
  method: z.enum(["POST", "PUT"]).optional(),
  headers: z.record(z.string()).optional(),
  outputField: z.string().min(1).optional(),
});

export const TaskConfigSchema = z.object({
  name: taskName,
  title: z.string().min(1).optional(),
  dependsOn: z.array(taskName).default([]),
  maxAttempts: z.number().int().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  order: z.number().int().optional(),
  handler: HandlerConfigSchema,
});

export const WorkflowDefaultsSchema = z
  .object({
    maxAttempts: z.number().int().min(1),
    timeoutMs: z.number().int().positive(),
    baseDelayMs: z.number().int().min(0),
    maxDelayMs: z.number().int().min(0),
    jitter: z.number().min(0).max(1),
    maxConcurrency: z.number().int().min(0),
    contextExcerptLength: z.number().int().positive(),
  })
  .partial();

export const WorkflowFileSchema = z
  .object({
    name: z.string().trim().min(1, "workflow name is required"),
    description: z.string().optional(),
    defaults: WorkflowDefaultsSchema.optional(),
    tasks: z.array(TaskConfigSchema).min(1, "workflow needs at least one task"),
    stages: z.array(z.array(taskName)).optional(),
  })
  .superRefine((wf, ctx) => {
    const seen = new Set<string>();
    wf.tasks.forEach((t, i) => {
      if (seen.has(t.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tasks", i, "name"],
          message: `duplicate task name "${t.name}"`,
        });
      }
      seen.add(t.name);
    });
  });

/** Task payloads keyed by task name. */
export const TaskInputsSchema = z.record(z.unknown());

export const StartRunRequestSchema = z.object({
  inputs: TaskInputsSchema.default({}),
  select: z.array(taskName).min(1).optional(),
});

export type HandlerConfig = z.infer<typeof HandlerConfigSchema>;
export type TaskConfig = z.infer<typeof TaskConfigSchema>;
export type WorkflowDefaults = z.infer<typeof WorkflowDefaultsSchema>;
export type WorkflowFile = z.infer<typeof WorkflowFileSchema>;
export type StartRunRequest = z.infer<typeof StartRunRequestSchema>;
