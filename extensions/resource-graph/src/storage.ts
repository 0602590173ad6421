/**
 * Apply History Storage (InMemory + SQLite)
 */

import { randomUUID } from "node:crypto";
import type BetterSqlite3 from "better-sqlite3";
import { z } from "zod";
import type { ApplyResult } from "./executor.js";
import type { ApplyRun, HistoryStorage, ItemStatus } from "./types.js";

/** Summarize an apply result as a history record. */
export function createApplyRun(result: ApplyResult, destroy: boolean, id: string = randomUUID()): ApplyRun {
  const counts: Record<ItemStatus, number> = { pending: 0, "in-progress": 0, applied: 0, failed: 0, skipped: 0 };
  for (const item of result.items) counts[item.status]++;
  return {
    id,
    startedAt: result.startedAt,
    completedAt: result.completedAt,
    status: result.status,
    destroy,
    counts,
    items: result.items.map((item) => ({ ...item })),
  };
}

// ── InMemory ────────────────────────────────────────────────────

export class InMemoryHistoryStorage implements HistoryStorage {
  private runs = new Map<string, ApplyRun>();

  async initialize(): Promise<void> {}

  async saveRun(run: ApplyRun): Promise<void> {
    this.runs.set(run.id, structuredClone(run));
  }

  async getRun(id: string): Promise<ApplyRun | null> {
    const run = this.runs.get(id);
    return run ? structuredClone(run) : null;
  }

  async listRuns(limit = 20): Promise<ApplyRun[]> {
    return [...this.runs.values()]
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt))
      .slice(0, limit)
      .map((r) => structuredClone(r));
  }

  async close(): Promise<void> {
    this.runs.clear();
  }
}

// ── SQLite ──────────────────────────────────────────────────────

const itemStatusSchema = z.enum(["pending", "in-progress", "applied", "failed", "skipped"]);

const applyRunSchema = z.object({
  id: z.string(),
  startedAt: z.string(),
  completedAt: z.string(),
  status: z.enum(["succeeded", "partial", "failed", "cancelled"]),
  destroy: z.boolean(),
  counts: z.object({
    pending: z.number(),
    "in-progress": z.number(),
    applied: z.number(),
    failed: z.number(),
    skipped: z.number(),
  }),
  items: z.array(
    z.object({
      itemId: z.string(),
      address: z.string(),
      action: z.enum(["create", "update", "delete", "no-op", "read"]),
      status: itemStatusSchema,
      durationMs: z.number(),
      error: z.string().optional(),
      errorCode: z.string().optional(),
    }),
  ),
});

const runRowSchema = z.object({ run_json: z.string() });

export class SQLiteHistoryStorage implements HistoryStorage {
  private db: BetterSqlite3.Database | null = null;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  async initialize(): Promise<void> {
    const Database = (await import("better-sqlite3")).default;
    this.db = new Database(this.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS apply_runs (
        id TEXT PRIMARY KEY,
        started_at TEXT NOT NULL,
        completed_at TEXT NOT NULL,
        status TEXT NOT NULL,
        destroy INTEGER NOT NULL DEFAULT 0,
        applied INTEGER NOT NULL DEFAULT 0,
        failed INTEGER NOT NULL DEFAULT 0,
        skipped INTEGER NOT NULL DEFAULT 0,
        run_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_apply_runs_started ON apply_runs(started_at DESC);
    `);
  }

  async saveRun(run: ApplyRun): Promise<void> {
    this.database()
      .prepare(
        `INSERT OR REPLACE INTO apply_runs (id, started_at, completed_at, status, destroy, applied, failed, skipped, run_json) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        run.id,
        run.startedAt,
        run.completedAt,
        run.status,
        run.destroy ? 1 : 0,
        run.counts.applied,
        run.counts.failed,
        run.counts.skipped,
        JSON.stringify(run),
      );
  }

  async getRun(id: string): Promise<ApplyRun | null> {
    const row: unknown = this.database().prepare("SELECT run_json FROM apply_runs WHERE id = ?").get(id);
    return row === undefined ? null : rowToRun(row);
  }

  async listRuns(limit = 20): Promise<ApplyRun[]> {
    const rows: unknown[] = this.database()
      .prepare("SELECT run_json FROM apply_runs ORDER BY started_at DESC LIMIT ?")
      .all(limit);
    return rows.map(rowToRun);
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  private database(): BetterSqlite3.Database {
    if (!this.db) throw new Error("History storage is not initialized");
    return this.db;
  }
}

function rowToRun(row: unknown): ApplyRun {
  const { run_json } = runRowSchema.parse(row);
  const run: unknown = JSON.parse(run_json);
  return applyRunSchema.parse(run);
}
