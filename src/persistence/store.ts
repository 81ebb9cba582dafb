import Database from "better-sqlite3";
import { join } from "node:path";
import { homedir } from "node:os";
import { mkdirSync } from "node:fs";
import { toRunRecord } from "../pipeline/report.js";
import type { PipelineRun, RunStatus } from "../pipeline/types.js";
import { RunRecordSchema, type RunRecord } from "../schemas.js";
import { log } from "../utils/logger.js";

export const DEFAULT_DB_DIR = join(homedir(), ".taskcrew");
const DEFAULT_DB_PATH = join(DEFAULT_DB_DIR, "runs.db");

export type RunSummary = {
  runId: string;
  name: string;
  status: RunStatus;
  startedAt: number;
  finishedAt?: number;
};

type RunRow = {
  run_id: string;
  name: string;
  status: string;
  record: string;
  started_at: number;
  finished_at: number | null;
};

export class RunStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? DEFAULT_DB_PATH;
    if (!dbPath) {
      mkdirSync(DEFAULT_DB_DIR, { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id      TEXT PRIMARY KEY,
        name        TEXT NOT NULL,
        status      TEXT NOT NULL,
        record      TEXT NOT NULL,
        started_at  INTEGER NOT NULL,
        finished_at INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
    `);
  }

  save(run: PipelineRun): void {
    const record = toRunRecord(run);
    this.db
      .prepare(
        `INSERT OR REPLACE INTO runs (run_id, name, status, record, started_at, finished_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(record.runId, record.name, record.status, JSON.stringify(record), record.startedAt, record.finishedAt ?? null);
  }

  get(runId: string): RunRecord | undefined {
    const row = this.db.prepare<[string], RunRow>("SELECT * FROM runs WHERE run_id = ?").get(runId);
    return row ? rowToRecord(row) : undefined;
  }

  /** Most recent first. */
  list(limit = 50): RunSummary[] {
    const rows = this.db.prepare<[number], RunRow>("SELECT * FROM runs ORDER BY started_at DESC LIMIT ?").all(limit);
    const summaries: RunSummary[] = [];
    for (const row of rows) {
      const record = rowToRecord(row);
      if (!record) continue;
      summaries.push({
        runId: record.runId,
        name: record.name,
        status: record.status,
        startedAt: record.startedAt,
        finishedAt: record.finishedAt,
      });
    }
    return summaries;
  }

  /** Delete a specific run by ID. Returns true if deleted. */
  delete(runId: string): boolean {
    const result = this.db.prepare("DELETE FROM runs WHERE run_id = ?").run(runId);
    return result.changes > 0;
  }

  /** Delete runs started before a given timestamp. Returns the count deleted. */
  deleteOlderThan(timestamp: number): number {
    const result = this.db.prepare("DELETE FROM runs WHERE started_at < ?").run(timestamp);
    return result.changes;
  }

  close(): void {
    this.db.close();
  }
}

function rowToRecord(row: RunRow): RunRecord | undefined {
  let data: unknown;
  try {
    data = JSON.parse(row.record);
  } catch (err) {
    log.warn(`Stored run "${row.run_id}" is not valid JSON`, { error: String(err) });
    return undefined;
  }
  const parsed = RunRecordSchema.safeParse(data);
  if (!parsed.success) {
    log.warn(`Stored run "${row.run_id}" does not match the run record format`, {
      issues: parsed.error.issues.length,
    });
    return undefined;
  }
  return parsed.data;
}
