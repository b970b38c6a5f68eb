import { PlanError } from "../errors.js";
import type { TaskSpec } from "./types.js";

export class TaskRegistry {
  private tasks = new Map<string, TaskSpec>();

  constructor(specs: Iterable<TaskSpec> = []) {
    for (const spec of specs) this.add(spec);
  }

  add(spec: TaskSpec): void {
    if (this.tasks.has(spec.name)) {
      throw new PlanError("DUPLICATE_REGISTRATION", `Task "${spec.name}" already registered`);
    }
    this.tasks.set(spec.name, spec);
  }

  remove(name: string): boolean {
    return this.tasks.delete(name);
  }

  get(name: string): TaskSpec | undefined {
    return this.tasks.get(name);
  }

  has(name: string): boolean {
    return this.tasks.has(name);
  }

  /** Like get(), but a missing task is a broken plan. */
  require(name: string): TaskSpec {
    const spec = this.tasks.get(name);
    if (!spec) {
      throw new PlanError("UNKNOWN_TASK", `Task "${name}" is not registered`);
    }
    return spec;
  }

  list(): TaskSpec[] {
    return [...this.tasks.values()];
  }

  names(): string[] {
    return [...this.tasks.keys()];
  }

  /** Display label: the task's title when set, its name otherwise. */
  label(name: string): string {
    return this.tasks.get(name)?.title ?? name;
  }

  get size(): number {
    return this.tasks.size;
  }
}
