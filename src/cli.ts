#!/usr/bin/env node

import { Command } from "commander";
import { configure } from "./config.js";
import { WorkflowEngine } from "./engine/engine.js";
import type { WorkflowOutcome } from "./engine/types.js";
import { errorMessage } from "./errors.js";
import { formatSummary, toMetricsRecord } from "./metrics/collector.js";
import { RunStore } from "./persistence/store.js";
import { createConsoleProgressCallback } from "./progress/tracker.js";
import { TaskInputsSchema, parseOrThrow } from "./schemas.js";
import { StatusServer } from "./ui/server.js";
import { log, setLogLevel } from "./utils/logger.js";
import { loadWorkflow, readJsonFile } from "./workflow/loader.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", errorMessage(reason));
});

const program = new Command();

program
  .name("sectionflow")
  .description("Run staged document-generation workflows with retries and progress tracking")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

// --- plan ---
program
  .command("plan")
  .description("Validate a workflow and print its stages (dry-run)")
  .argument("<workflow>", "Path to a workflow JSON file")
  .action(async (workflowPath: string) => {
    const wf = await loadWorkflow(workflowPath);
    console.log(`${wf.name} (${wf.planSource} plan, ${wf.registry.size} tasks)`);
    if (wf.description) console.log(wf.description);
    for (const [i, stage] of wf.plan.entries()) {
      console.log(`\n  Stage ${i + 1}:`);
      for (const name of stage) {
        const spec = wf.registry.require(name);
        const deps = spec.dependencies.length > 0 ? ` <- ${spec.dependencies.join(", ")}` : "";
        console.log(`    ${wf.registry.label(name)} [${name}]${deps}`);
      }
    }
  });

// --- run ---
type RunCommandOptions = {
  inputs?: string;
  select?: string;
  concurrency?: string;
  db?: string;
  store: boolean;
  json?: boolean;
};

program
  .command("run")
  .description("Execute a workflow and print each section")
  .argument("<workflow>", "Path to a workflow JSON file")
  .option("-i, --inputs <file>", "JSON file of task inputs keyed by task name")
  .option("-s, --select <tasks>", "Comma-separated task names to run")
  .option("-c, --concurrency <n>", "Max tasks in flight")
  .option("--db <path>", "Run history database")
  .option("--no-store", "Do not record the run")
  .option("--json", "Print the metrics record as JSON")
  .action(async (workflowPath: string, opts: RunCommandOptions) => {
    const wf = await loadWorkflow(workflowPath);
    const inputs = opts.inputs
      ? parseOrThrow(TaskInputsSchema, await readJsonFile(opts.inputs), "inputs file")
      : {};
    const select = opts.select
      ?.split(",")
      .map((s) => s.trim())
      .filter(Boolean);

    const engine = new WorkflowEngine(wf.registry, {
      ...wf.engineOptions,
      maxConcurrency: opts.concurrency ? parsePositiveInt(opts.concurrency, "--concurrency") : wf.engineOptions.maxConcurrency,
    });

    const controller = new AbortController();
    const onSigint = () => {
      if (controller.signal.aborted) process.exit(130);
      log.warn("Cancelling: tasks not yet started will be skipped (Ctrl+C again to exit)");
      controller.abort();
    };
    process.on("SIGINT", onSigint);

    const store = opts.store ? new RunStore(opts.db) : undefined;
    const startedAt = Date.now();
    try {
      const outcome = await engine.execute(wf.plan, inputs, {
        select,
        signal: controller.signal,
        onProgress: createConsoleProgressCallback((name) => wf.registry.label(name)),
      });
      store?.insert({
        runId: outcome.runId,
        workflow: wf.name,
        state: outcome.cancelled ? "cancelled" : "completed",
        results: outcome.results,
        metrics: outcome.metrics,
        startedAt,
        finishedAt: Date.now(),
      });

      if (opts.json) {
        console.log(JSON.stringify(toMetricsRecord(outcome.metrics), null, 2));
      } else {
        printOutcome(outcome, (name) => wf.registry.label(name));
      }
      if (!outcome.success) process.exitCode = 1;
    } finally {
      process.off("SIGINT", onSigint);
      store?.close();
    }
  });

// --- runs ---
const runs = program.command("runs").description("Inspect recorded runs");

runs
  .command("list")
  .description("List recent runs")
  .option("--db <path>", "Run history database")
  .option("-n, --limit <n>", "Number of runs", "20")
  .action((opts: { db?: string; limit: string }) => {
    const store = new RunStore(opts.db);
    try {
      const records = store.list(parsePositiveInt(opts.limit, "--limit"));
      if (records.length === 0) {
        console.log("No runs recorded.");
        return;
      }
      for (const r of records) {
        const results = Object.values(r.results);
        const ok = results.filter((t) => t.status === "succeeded").length;
        console.log(
          `${r.runId}  ${r.state.padEnd(9)}  ${new Date(r.startedAt).toISOString()}  ${r.workflow}  ${ok}/${results.length} succeeded`,
        );
      }
    } finally {
      store.close();
    }
  });

runs
  .command("show")
  .description("Print a recorded run as JSON")
  .argument("<runId>", "Run ID")
  .option("--db <path>", "Run history database")
  .action((runId: string, opts: { db?: string }) => {
    const store = new RunStore(opts.db);
    try {
      const record = store.get(runId);
      if (!record) {
        console.error(`Run not found: ${runId}`);
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(record, null, 2));
    } finally {
      store.close();
    }
  });

runs
  .command("delete")
  .description("Delete recorded runs")
  .argument("[runId]", "Run ID (omit with --all or --older-than)")
  .option("--db <path>", "Run history database")
  .option("--all", "Delete every recorded run")
  .option("--older-than <days>", "Delete runs started more than this many days ago")
  .action((runId: string | undefined, opts: { db?: string; all?: boolean; olderThan?: string }) => {
    const store = new RunStore(opts.db);
    try {
      if (runId) {
        const deleted = store.delete(runId);
        console.log(deleted ? `Deleted ${runId}` : `Run not found: ${runId}`);
        if (!deleted) process.exitCode = 1;
      } else if (opts.all) {
        console.log(`Deleted ${store.deleteAll()} run(s)`);
      } else if (opts.olderThan) {
        const days = parsePositiveInt(opts.olderThan, "--older-than");
        console.log(`Deleted ${store.deleteOlderThan(Date.now() - days * 86_400_000)} run(s)`);
      } else {
        console.error("Pass a run ID, --all or --older-than <days>");
        process.exitCode = 1;
      }
    } finally {
      store.close();
    }
  });

// --- serve ---
program
  .command("serve")
  .description("Serve a workflow over HTTP with live progress events")
  .argument("<workflow>", "Path to a workflow JSON file")
  .option("-p, --port <port>", "Server port")
  .option("--host <host>", "Server host")
  .option("--db <path>", "Run history database")
  .option("--no-store", "Keep runs in memory only")
  .action(async (workflowPath: string, opts: { port?: string; host?: string; db?: string; store: boolean }) => {
    configure({
      server: { port: opts.port ? parsePositiveInt(opts.port, "--port") : undefined, host: opts.host },
      store: { path: opts.db },
    });
    const wf = await loadWorkflow(workflowPath);
    const engine = new WorkflowEngine(wf.registry, wf.engineOptions);
    const runStore = opts.store ? new RunStore() : undefined;
    const server = new StatusServer({ engine, workflow: wf, runStore });

    const addr = await server.start();
    console.log(`Workflow: ${wf.name} (${wf.registry.size} tasks, ${wf.plan.length} stages)`);
    console.log(`API:      http://${addr.host}:${addr.port}/api/health`);
    console.log("Press Ctrl+C to stop.\n");

    process.on("SIGINT", () => {
      server.stop();
      runStore?.close();
      process.exit(0);
    });
  });

function printOutcome(outcome: WorkflowOutcome, labelFor: (name: string) => string): void {
  console.log("\n--- Sections ---");
  for (const result of Object.values(outcome.results)) {
    console.log(`\n[${result.status}] ${labelFor(result.name)} (${result.attempts} attempt(s))`);
    if (result.output) console.log(result.output);
    else if (result.error) console.log(`  error: ${result.error}`);
  }
  console.log("\n--- Summary ---");
  for (const line of formatSummary(outcome.metrics)) console.log(line);
}

function parsePositiveInt(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  return n;
}

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});
