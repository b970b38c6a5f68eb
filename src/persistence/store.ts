import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { getConfig } from "../config.js";
import type { TaskResult } from "../engine/types.js";
import type { ExecutionMetrics } from "../metrics/collector.js";

export const RUN_STATES = ["running", "completed", "cancelled", "error"] as const;
export type RunState = (typeof RUN_STATES)[number];

export type RunRecord = {
  runId: string;
  workflow: string;
  state: RunState;
  results: Record<string, TaskResult>;
  metrics?: ExecutionMetrics;
  error?: string;
  startedAt: number;
  finishedAt?: number;
};

type RunRow = {
  run_id: string;
  workflow: string;
  state: string;
  results: string;
  metrics: string | null;
  error: string | null;
  started_at: number;
  finished_at: number | null;
};

const RunStateSchema = z.enum(RUN_STATES);

/** Run history in SQLite. Pass ":memory:" for a throwaway store. */
export class RunStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? getConfig().store.path;
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id      TEXT PRIMARY KEY,
        workflow    TEXT NOT NULL,
        state       TEXT NOT NULL DEFAULT 'running',
        results     TEXT NOT NULL DEFAULT '{}',
        metrics     TEXT,
        error       TEXT,
        started_at  INTEGER NOT NULL,
        finished_at INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
    `);
  }

  insert(run: RunRecord): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO runs (run_id, workflow, state, results, metrics, error, started_at, finished_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      run.runId,
      run.workflow,
      run.state,
      JSON.stringify(run.results),
      run.metrics ? JSON.stringify(run.metrics) : null,
      run.error ?? null,
      run.startedAt,
      run.finishedAt ?? null,
    );
  }

  update(run: RunRecord): void {
    this.insert(run);
  }

  get(runId: string): RunRecord | undefined {
    const row = this.db.prepare<[string], RunRow>("SELECT * FROM runs WHERE run_id = ?").get(runId);
    return row ? rowToRecord(row) : undefined;
  }

  list(limit = 50): RunRecord[] {
    const rows = this.db
      .prepare<[number], RunRow>("SELECT * FROM runs ORDER BY started_at DESC LIMIT ?")
      .all(limit);
    return rows.map(rowToRecord);
  }

  /** Delete a specific run by ID. Returns true if deleted. */
  delete(runId: string): boolean {
    const result = this.db.prepare("DELETE FROM runs WHERE run_id = ?").run(runId);
    return result.changes > 0;
  }

  /** Delete all runs. Returns count of deleted runs. */
  deleteAll(): number {
    return this.db.prepare("DELETE FROM runs").run().changes;
  }

  /** Delete runs started before a given timestamp. */
  deleteOlderThan(timestamp: number): number {
    return this.db.prepare("DELETE FROM runs WHERE started_at < ?").run(timestamp).changes;
  }

  close(): void {
    this.db.close();
  }
}

function rowToRecord(row: RunRow): RunRecord {
  return {
    runId: row.run_id,
    workflow: row.workflow,
    state: RunStateSchema.parse(row.state),
    results: JSON.parse(row.results),
    metrics: row.metrics ? JSON.parse(row.metrics) : undefined,
    error: row.error ?? undefined,
    startedAt: row.started_at,
    finishedAt: row.finished_at ?? undefined,
  };
}
