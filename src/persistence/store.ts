import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getConfig } from "../config.js";
import type { RunResult } from "../scheduler/types.js";

/** Audit log of finished runs. Pass ":memory:" for a throwaway database. */
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
        status      TEXT NOT NULL,
        cancelled   INTEGER NOT NULL DEFAULT 0,
        rounds      INTEGER NOT NULL,
        tasks       TEXT NOT NULL DEFAULT '[]',
        handoff     TEXT NOT NULL DEFAULT '[]',
        started_at  INTEGER NOT NULL,
        finished_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
    `);
  }

  insert(run: RunResult): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO runs (run_id, status, cancelled, rounds, tasks, handoff, started_at, finished_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      run.runId,
      run.status,
      run.cancelled ? 1 : 0,
      run.rounds,
      JSON.stringify(run.tasks),
      JSON.stringify(run.handoff),
      run.startedAt,
      run.finishedAt,
    );
  }

  get(runId: string): RunResult | undefined {
    const row = this.db.prepare("SELECT * FROM runs WHERE run_id = ?").get(runId) as RunRow | undefined;
    return row ? rowToRunResult(row) : undefined;
  }

  list(limit = getConfig().limits.listRuns): RunResult[] {
    const rows = this.db.prepare("SELECT * FROM runs ORDER BY started_at DESC LIMIT ?").all(limit) as RunRow[];
    return rows.map(rowToRunResult);
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

  deleteOlderThan(timestamp: number): number {
    return this.db.prepare("DELETE FROM runs WHERE started_at < ?").run(timestamp).changes;
  }

  close(): void {
    this.db.close();
  }
}

type RunRow = {
  run_id: string;
  status: string;
  cancelled: number;
  rounds: number;
  tasks: string;
  handoff: string;
  started_at: number;
  finished_at: number;
};

function rowToRunResult(row: RunRow): RunResult {
  return {
    runId: row.run_id,
    status: row.status === "success" ? "success" : "partial-failure",
    cancelled: row.cancelled === 1,
    rounds: row.rounds,
    tasks: JSON.parse(row.tasks),
    handoff: JSON.parse(row.handoff),
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    durationMs: row.finished_at - row.started_at,
  };
}

