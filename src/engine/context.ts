import { getConfig } from "../config.js";
import type { TaskSpec } from "../tasks/types.js";
import type { TaskResult } from "./types.js";

export type ContextResult =
  | { ok: true; context: string; included: string[] }
  | { ok: false; reason: "no-dependencies" | "no-completed-dependencies" };

export type ContextBuilderOptions = {
  /** Characters taken from the start of each dependency's output. */
  excerptLength?: number;
  /** Heading for a dependency's excerpt; defaults to its name. */
  labelFor?: (name: string) => string;
};

/**
 * Turns the outputs of a task's completed dependencies into one context blob:
 * a `## <label>` heading and the first N characters of each output.
 */
export class ContextBuilder {
  private excerptLength: number;
  private labelFor: (name: string) => string;

  constructor(opts: ContextBuilderOptions = {}) {
    this.excerptLength = opts.excerptLength ?? getConfig().limits.contextExcerptLength;
    this.labelFor = opts.labelFor ?? ((name) => name);
  }

  build(spec: TaskSpec, results: Readonly<Record<string, TaskResult>>): ContextResult {
    if (spec.dependencies.length === 0) {
      return { ok: false, reason: "no-dependencies" };
    }

    const parts: string[] = [];
    const included: string[] = [];
    for (const dep of spec.dependencies) {
      const result = results[dep];
      if (result?.status !== "succeeded" || !result.output) continue;
      parts.push(`## ${this.labelFor(dep)}\n${result.output.slice(0, this.excerptLength)}\n`);
      included.push(dep);
    }

    if (parts.length === 0) {
      return { ok: false, reason: "no-completed-dependencies" };
    }
    return { ok: true, context: parts.join("\n"), included };
  }
}
