import { describe, expect, it } from "vitest";
import { PlanError, WorkflowError } from "../src/errors.js";
import { derivePlan, planTaskNames, selectTasks, validatePlan } from "../src/planner/plan.js";
import { defineTask } from "../src/tasks/define.js";
import { TaskRegistry } from "../src/tasks/registry.js";

const noop = async () => "";

function task(name: string, dependsOn: string[] = [], order?: number) {
  return defineTask({ name, dependsOn, order, handler: noop });
}

/** a -> (b, c) -> d */
function diamond() {
  return new TaskRegistry([task("a"), task("b", ["a"]), task("c", ["a"]), task("d", ["b", "c"])]);
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof WorkflowError ? err.code : undefined;
  }
  return undefined;
}

describe("validatePlan", () => {
  it("accepts dependencies placed in earlier stages", () => {
    expect(() => validatePlan([["a"], ["b", "c"], ["d"]], diamond())).not.toThrow();
  });

  it("accepts an empty plan", () => {
    expect(() => validatePlan([], diamond())).not.toThrow();
  });

  it("rejects a dependency in a later stage", () => {
    expect(() => validatePlan([["b"], ["a"]], diamond())).toThrow('Task "b" in stage 1 depends on "a" in stage 2');
  });

  it("rejects a dependency in the same stage", () => {
    const plan = [["a", "b"]];
    expect(() => validatePlan(plan, diamond())).toThrow('Task "b" in stage 1 depends on "a" in stage 1');
    expect(codeOf(() => validatePlan(plan, diamond()))).toBe("INVALID_PLAN");
  });

  it("rejects unregistered tasks", () => {
    expect(() => validatePlan([["a"], ["x"]], diamond())).toThrow('Stage 2 references unregistered task "x"');
    expect(codeOf(() => validatePlan([["x"]], diamond()))).toBe("UNKNOWN_TASK");
  });

  it("rejects a task planned twice", () => {
    expect(() => validatePlan([["a"], ["b", "a"]], diamond())).toThrow(
      'Task "a" appears more than once (stages 1 and 2)',
    );
  });

  it("rejects a dependency that is not registered", () => {
    const registry = new TaskRegistry([task("e", ["ghost"])]);
    expect(() => validatePlan([["e"]], registry)).toThrow('Task "e" depends on unregistered task "ghost"');
  });

  it("allows registered dependencies left out of the plan", () => {
    expect(() => validatePlan([["b"], ["d"]], diamond())).not.toThrow();
  });
});

describe("derivePlan", () => {
  it("groups tasks by dependency depth", () => {
    expect(derivePlan(diamond().list())).toEqual([["a"], ["b", "c"], ["d"]]);
  });

  it("sorts each stage by order, then name", () => {
    const specs = [task("root"), task("zeta", ["root"], 0), task("beta", ["root"], 1), task("alpha", ["root"], 1)];
    expect(derivePlan(specs)).toEqual([["root"], ["zeta", "alpha", "beta"]]);
  });

  it("derives a plan that passes validation", () => {
    const registry = diamond();
    expect(() => validatePlan(derivePlan(registry.list()), registry)).not.toThrow();
  });

  it("reports cycles", () => {
    const specs = [task("start"), task("x", ["y"]), task("y", ["x"])];
    expect(() => derivePlan(specs)).toThrow(PlanError);
    expect(() => derivePlan(specs)).toThrow("Task dependencies contain a cycle: x, y");
  });

  it("reports unknown dependencies", () => {
    expect(() => derivePlan([task("e", ["ghost"])])).toThrow('Task "e" depends on unknown task "ghost"');
  });

  it("returns no stages for no tasks", () => {
    expect(derivePlan([])).toEqual([]);
  });
});

describe("selectTasks", () => {
  const plan = [["a"], ["b", "c"], ["d"]];

  it("keeps selected tasks in plan order and drops empty stages", () => {
    expect(selectTasks(plan, ["c", "a"])).toEqual([["a"], ["c"]]);
    expect(selectTasks(plan, ["d"])).toEqual([["d"]]);
  });

  it("rejects names that are not planned", () => {
    expect(() => selectTasks(plan, ["a", "zz"])).toThrow("Selected tasks are not in the plan: zz");
    expect(codeOf(() => selectTasks(plan, ["zz"]))).toBe("UNKNOWN_TASK");
  });
});

describe("planTaskNames", () => {
  it("lists every planned task in order", () => {
    expect(planTaskNames([["a"], ["b", "c"], ["d"]])).toEqual(["a", "b", "c", "d"]);
  });
});
