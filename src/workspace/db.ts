import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { PipelineRun, StageResult } from '../runtime/types.js';

export function openStateDb(dbPath: string): Database.Database {
  if (dbPath !== ':memory:' && !existsSync(dirname(dbPath))) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  applySchema(db);
  return db;
}

export function applySchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS runs (
      id TEXT PRIMARY KEY,
      started_at TEXT NOT NULL,
      ended_at TEXT,
      outcome TEXT CHECK (outcome IN ('SUCCESS','FAILURE')),
      cancelled INTEGER NOT NULL DEFAULT 0 CHECK (cancelled IN (0,1)),
      toggles_json TEXT NOT NULL,
      report_version INTEGER,
      report_status TEXT CHECK (report_status IN ('PASS','FAIL','UNKNOWN')),
      link_url TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);

    CREATE TABLE IF NOT EXISTS stage_results (
      run_id TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
      position INTEGER NOT NULL,
      name TEXT NOT NULL,
      enabled INTEGER NOT NULL CHECK (enabled IN (0,1)),
      exit_code INTEGER,
      outcome TEXT NOT NULL CHECK (outcome IN ('OK','SOFT_FAIL','HARD_FAIL','SKIPPED')),
      error TEXT,
      duration_ms INTEGER NOT NULL,
      artifacts_json TEXT NOT NULL DEFAULT '[]',
      PRIMARY KEY (run_id, position)
    );
  `);
}

export interface RunSummaryRow {
  id: string;
  started_at: string;
  ended_at: string | null;
  outcome: 'SUCCESS' | 'FAILURE' | null;
  cancelled: number;
  report_version: number | null;
  report_status: 'PASS' | 'FAIL' | 'UNKNOWN' | null;
  link_url: string | null;
}

export interface StageRow {
  position: number;
  name: string;
  enabled: number;
  exit_code: number | null;
  outcome: StageResult['outcome'];
  error: string | null;
  duration_ms: number;
}

/** Durable record of pipeline runs and their stage results. */
export class RunHistory {
  constructor(private readonly db: Database.Database) {}

  startRun(run: PipelineRun): void {
    this.db
      .prepare(`INSERT INTO runs (id, started_at, toggles_json) VALUES (?, ?, ?)`)
      .run(run.id, run.startedAt, JSON.stringify(run.toggles));
  }

  recordStage(runId: string, position: number, result: StageResult): void {
    this.db
      .prepare(`
        INSERT INTO stage_results
          (run_id, position, name, enabled, exit_code, outcome, error, duration_ms, artifacts_json)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        runId,
        position,
        result.name,
        result.enabled ? 1 : 0,
        result.exitCode === 'skipped' ? null : result.exitCode,
        result.outcome,
        result.error ?? null,
        result.durationMs,
        JSON.stringify(result.artifacts.map((a) => a.name)),
      );
  }

  finishRun(run: PipelineRun): void {
    this.db
      .prepare(`
        UPDATE runs
        SET ended_at = ?, outcome = ?, cancelled = ?, report_version = ?, report_status = ?, link_url = ?
        WHERE id = ?
      `)
      .run(
        run.endedAt,
        run.outcome,
        run.cancelled ? 1 : 0,
        run.version?.version ?? null,
        run.version?.status ?? null,
        run.link ? (run.link.url ?? run.link.fallbackUrl) : null,
        run.id,
      );
  }

  listRuns(limit = 20): RunSummaryRow[] {
    return this.db
      .prepare(
        `SELECT id, started_at, ended_at, outcome, cancelled, report_version, report_status, link_url
         FROM runs ORDER BY started_at DESC LIMIT ?`,
      )
      .all(limit) as RunSummaryRow[];
  }

  stagesOf(runId: string): StageRow[] {
    return this.db
      .prepare(
        `SELECT position, name, enabled, exit_code, outcome, error, duration_ms
         FROM stage_results WHERE run_id = ? ORDER BY position`,
      )
      .all(runId) as StageRow[];
  }
}
