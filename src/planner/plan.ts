import { PlanError } from "../errors.js";
import type { TaskRegistry } from "../tasks/registry.js";
import type { TaskSpec } from "../tasks/types.js";
import { log } from "../utils/logger.js";
import type { Stage, WorkflowPlan } from "./types.js";

/** All task names in plan order. */
export function planTaskNames(plan: WorkflowPlan): string[] {
  return plan.flat();
}

/**
 * Check a plan against the registry: every task registered and planned once,
 * and every planned dependency placed in an earlier stage. Dependencies that
 * are registered but left out of the plan are allowed; they simply never
 * contribute context.
 */
export function validatePlan(plan: WorkflowPlan, registry: TaskRegistry): void {
  const stageOf = new Map<string, number>();

  plan.forEach((stage, i) => {
    for (const name of stage) {
      if (!registry.has(name)) {
        throw new PlanError("UNKNOWN_TASK", `Stage ${i + 1} references unregistered task "${name}"`);
      }
      const previous = stageOf.get(name);
      if (previous !== undefined) {
        throw new PlanError(
          "INVALID_PLAN",
          `Task "${name}" appears more than once (stages ${previous + 1} and ${i + 1})`,
        );
      }
      stageOf.set(name, i);
    }
  });

  for (const [name, i] of stageOf) {
    for (const dep of registry.require(name).dependencies) {
      if (!registry.has(dep)) {
        throw new PlanError("UNKNOWN_TASK", `Task "${name}" depends on unregistered task "${dep}"`);
      }
      const depStage = stageOf.get(dep);
      if (depStage === undefined) {
        log.debug(`Dependency "${dep}" of "${name}" is not planned; it will be left out of the context`);
        continue;
      }
      if (depStage >= i) {
        throw new PlanError(
          "INVALID_PLAN",
          `Task "${name}" in stage ${i + 1} depends on "${dep}" in stage ${depStage + 1}`,
        );
      }
    }
  }
}

/**
 * Group tasks into stages by dependency depth (Kahn's algorithm, one level per
 * stage). Within a stage tasks are sorted by `order`, then name.
 */
export function derivePlan(specs: readonly TaskSpec[]): WorkflowPlan {
  const byName = new Map(specs.map((s) => [s.name, s]));
  const remaining = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const spec of specs) {
    for (const dep of spec.dependencies) {
      if (!byName.has(dep)) {
        throw new PlanError("UNKNOWN_TASK", `Task "${spec.name}" depends on unknown task "${dep}"`);
      }
      const list = dependents.get(dep) ?? [];
      list.push(spec.name);
      dependents.set(dep, list);
    }
    remaining.set(spec.name, spec.dependencies.length);
  }

  const stages: Stage[] = [];
  let current = specs.filter((s) => s.dependencies.length === 0);
  let placed = 0;

  while (current.length > 0) {
    const stage = [...current].sort(byOrder).map((s) => s.name);
    stages.push(stage);
    placed += stage.length;

    const next: TaskSpec[] = [];
    for (const name of stage) {
      for (const dependent of dependents.get(name) ?? []) {
        const left = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, left);
        const spec = byName.get(dependent);
        if (left === 0 && spec) next.push(spec);
      }
    }
    current = next;
  }

  if (placed < specs.length) {
    const stuck = specs.filter((s) => (remaining.get(s.name) ?? 0) > 0).map((s) => s.name);
    throw new PlanError("INVALID_PLAN", `Task dependencies contain a cycle: ${stuck.join(", ")}`);
  }

  return stages;
}

/**
 * Restrict a plan to the selected tasks, dropping stages left empty.
 * Stage order is preserved.
 */
export function selectTasks(plan: WorkflowPlan, selected: readonly string[]): WorkflowPlan {
  const wanted = new Set(selected);
  const planned = new Set(planTaskNames(plan));
  const unknown = [...wanted].filter((n) => !planned.has(n));
  if (unknown.length > 0) {
    throw new PlanError("UNKNOWN_TASK", `Selected tasks are not in the plan: ${unknown.join(", ")}`);
  }

  return plan
    .map((stage) => stage.filter((name) => wanted.has(name)))
    .filter((stage) => stage.length > 0);
}

export function byOrder(a: TaskSpec, b: TaskSpec): number {
  return a.order - b.order || a.name.localeCompare(b.name);
}
