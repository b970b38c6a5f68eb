import { createServer, type IncomingMessage, type ServerResponse, type Server } from "node:http";
import { getConfig } from "../config.js";
import type { RunHandle, WorkflowEngine } from "../engine/engine.js";
import { PlanError, errorMessage } from "../errors.js";
import { toMetricsRecord } from "../metrics/collector.js";
import type { RunRecord, RunStore } from "../persistence/store.js";
import { StartRunRequestSchema } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { LoadedWorkflow } from "../workflow/loader.js";
import type { RunStatus, SSEEvent } from "./types.js";

export type StatusServerOptions = {
  engine: WorkflowEngine;
  workflow: LoadedWorkflow;
  port?: number;
  host?: string;
  runStore?: RunStore;
};

type LiveRun = {
  record: RunRecord;
  handle: RunHandle;
  controller: AbortController;
};

/**
 * HTTP surface for starting runs of one workflow and watching them:
 * JSON endpoints under /api plus a server-sent event stream of progress.
 */
export class StatusServer {
  private engine: WorkflowEngine;
  private workflow: LoadedWorkflow;
  private port: number;
  private host: string;
  private server: Server | null = null;
  private runs = new Map<string, LiveRun>();
  private runStore?: RunStore;
  private sseClients = new Set<ServerResponse>();

  constructor(opts: StatusServerOptions) {
    this.engine = opts.engine;
    this.workflow = opts.workflow;
    this.port = opts.port ?? getConfig().server.port;
    this.host = opts.host ?? getConfig().server.host;
    this.runStore = opts.runStore;
  }

  async start(): Promise<{ port: number; host: string }> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err) => {
        log.error("Request handler error", { error: errorMessage(err) });
        if (!res.headersSent) {
          json(res, 500, { error: "Internal server error" });
        }
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.on("error", reject);
      server.listen(this.port, this.host, () => {
        const addr = server.address();
        if (addr && typeof addr === "object") {
          this.port = addr.port;
          this.host = addr.address;
        }
        log.info(`Status server running at http://${this.host}:${this.port}`);
        resolve({ port: this.port, host: this.host });
      });
    });
  }

  /** Abort live runs and close connections. */
  stop(): void {
    for (const live of this.runs.values()) {
      if (live.record.state === "running") live.controller.abort();
    }
    for (const client of this.sseClients) {
      client.end();
    }
    this.sseClients.clear();
    this.server?.close();
    this.server?.closeAllConnections();
    this.server = null;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const pathname = url.pathname;
    const method = req.method ?? "GET";

    // CORS
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (method === "GET" && pathname === "/api/health") {
      return this.handleHealth(res);
    }

    if (method === "GET" && pathname === "/api/events") {
      return this.handleSSE(req, res);
    }

    if (method === "GET" && pathname === "/api/runs") {
      return this.handleListRuns(res, url.searchParams.get("limit"));
    }

    if (method === "POST" && pathname === "/api/runs") {
      return this.handleStartRun(req, res);
    }

    const cancelMatch = pathname.match(/^\/api\/runs\/([^/]+)\/cancel$/);
    if (method === "POST" && cancelMatch) {
      return this.handleCancelRun(res, cancelMatch[1]);
    }

    const runMatch = pathname.match(/^\/api\/runs\/([^/]+)$/);
    if (method === "GET" && runMatch) {
      return this.handleGetRun(res, runMatch[1]);
    }

    if (method === "DELETE" && runMatch) {
      return this.handleDeleteRun(res, runMatch[1]);
    }

    json(res, 404, { error: "Not found" });
  }

  private handleHealth(res: ServerResponse): void {
    const tasks = this.workflow.registry.list().map((t) => ({
      name: t.name,
      title: t.title,
      dependencies: t.dependencies,
      maxAttempts: t.maxAttempts,
      timeoutMs: t.timeoutMs,
    }));
    const activeRuns = [...this.runs.values()].filter((r) => r.record.state === "running").length;
    json(res, 200, {
      ok: true,
      workflow: this.workflow.name,
      stages: this.workflow.plan,
      tasks,
      activeRuns,
    });
  }

  private handleSSE(req: IncomingMessage, res: ServerResponse): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(":\n\n");

    this.sseClients.add(res);
    req.on("close", () => {
      this.sseClients.delete(res);
    });
  }

  private handleListRuns(res: ServerResponse, limitParam: string | null): void {
    const limit = limitParam && /^\d+$/.test(limitParam) ? Number(limitParam) : 50;
    if (this.runStore) {
      json(res, 200, this.runStore.list(limit));
      return;
    }
    const runs = [...this.runs.values()]
      .map((r) => this.statusOf(r))
      .sort((a, b) => b.startedAt - a.startedAt)
      .slice(0, limit);
    json(res, 200, runs);
  }

  private handleGetRun(res: ServerResponse, runId: string): void {
    const live = this.runs.get(runId);
    const run = live ? this.statusOf(live) : this.runStore?.get(runId);
    if (!run) {
      json(res, 404, { error: "Run not found" });
      return;
    }
    json(res, 200, run);
  }

  private handleCancelRun(res: ServerResponse, runId: string): void {
    const live = this.runs.get(runId);
    if (!live) {
      json(res, 404, { error: "Run not found" });
      return;
    }
    if (live.record.state !== "running") {
      json(res, 409, { error: `Run is already ${live.record.state}` });
      return;
    }
    live.controller.abort();
    log.info("Run cancellation requested", { runId });
    json(res, 202, { cancelling: true, runId });
  }

  private handleDeleteRun(res: ServerResponse, runId: string): void {
    const live = this.runs.get(runId);
    if (live?.record.state === "running") {
      json(res, 409, { error: "Run is still running; cancel it first" });
      return;
    }

    const inMemory = this.runs.delete(runId);
    const fromStore = this.runStore?.delete(runId) ?? false;

    if (!inMemory && !fromStore) {
      json(res, 404, { error: "Run not found" });
      return;
    }

    this.broadcastSSE({ type: "run:deleted", runId });
    json(res, 200, { deleted: true, runId });
  }

  private async handleStartRun(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readBody(req);
    let raw: unknown;
    try {
      raw = body.trim() === "" ? {} : JSON.parse(body);
    } catch {
      json(res, 400, { error: "Invalid JSON body" });
      return;
    }

    const parsed = StartRunRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const msg = parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
      json(res, 400, { error: msg });
      return;
    }

    const controller = new AbortController();
    let handle: RunHandle;
    try {
      handle = this.engine.start(this.workflow.plan, parsed.data.inputs, {
        select: parsed.data.select,
        signal: controller.signal,
        onProgress: (event) => this.broadcastSSE({ type: "task:progress", runId: event.runId ?? "", event }),
      });
    } catch (err) {
      if (err instanceof PlanError) {
        json(res, 400, { error: err.message });
        return;
      }
      throw err;
    }

    const { run } = handle;
    const record: RunRecord = {
      runId: run.runId,
      workflow: this.workflow.name,
      state: "running",
      results: run.snapshot(),
      startedAt: Date.now(),
    };
    this.evictFinishedRuns();
    this.runs.set(run.runId, { record, handle, controller });
    this.persistRun(record);

    json(res, 201, { runId: run.runId, tasks: run.taskNames });
    this.broadcastSSE({ type: "run:started", runId: run.runId, workflow: this.workflow.name, tasks: [...run.taskNames] });

    handle.completion
      .then((outcome) => {
        record.state = outcome.cancelled ? "cancelled" : "completed";
        record.results = outcome.results;
        record.metrics = outcome.metrics;
        record.finishedAt = Date.now();
        this.persistRun(record);
        this.broadcastSSE({
          type: "run:complete",
          runId: run.runId,
          cancelled: outcome.cancelled,
          metrics: toMetricsRecord(outcome.metrics),
        });
      })
      .catch((err: unknown) => {
        record.state = "error";
        record.error = errorMessage(err);
        record.results = run.snapshot();
        record.finishedAt = Date.now();
        log.error("Run execution error", { runId: run.runId, error: record.error });
        this.persistRun(record);
        this.broadcastSSE({ type: "run:error", runId: run.runId, error: record.error });
      });
  }

  private statusOf(live: LiveRun): RunStatus {
    if (live.record.state !== "running") return live.record;
    return {
      ...live.record,
      results: live.handle.run.snapshot(),
      progress: live.handle.run.progress.snapshot(),
    };
  }

  /** Keep at most `maxRuns` runs in memory, dropping the oldest finished ones. */
  private evictFinishedRuns(): void {
    const { maxRuns } = getConfig().limits;
    for (const [runId, live] of this.runs) {
      if (this.runs.size < maxRuns) break;
      if (live.record.state !== "running") this.runs.delete(runId);
    }
  }

  private persistRun(record: RunRecord): void {
    try {
      this.runStore?.update(record);
    } catch (err) {
      log.error("Failed to persist run", { runId: record.runId, error: errorMessage(err) });
    }
  }

  private broadcastSSE(event: SSEEvent): void {
    const data = `data: ${JSON.stringify(event)}\n\n`;
    for (const client of this.sseClients) {
      client.write(data);
    }
  }
}

function json(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}
