import Database from 'better-sqlite3';
import { FleetSummary } from '../types/Update';

export type RunTrigger = 'manual' | 'device' | 'scheduled';

export interface UpdateRunRecord {
  id: string;
  trigger: string;
  options: string; // JSON string
  latest_version: string;
  total: number;
  checked: number;
  needs_update: number;
  updated: number;
  success: number;
  failed: number;
  started_at: string;
  finished_at: string;
}

export interface UpdateResultRecord {
  id: number;
  run_id: string;
  position: number;
  ip: string;
  success: number;
  status: string;
  message: string;
  current_version: string;
  previous_version: string;
  latest_version: string;
  needs_update: number;
  update_started: number;
  update_completed: number;
  error_kind: string | null;
  elapsed_ms: number;
  timeout_seconds: number | null;
}

export class UpdateRunModel {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Stores a run and its outcomes in one transaction, preserving outcome order. */
  record(summary: FleetSummary, trigger: RunTrigger): UpdateRunRecord {
    const insertRun = this.db.prepare(`
      INSERT INTO update_runs (id, trigger, options, latest_version, total, checked, needs_update, updated, success, failed, started_at, finished_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertResult = this.db.prepare(`
      INSERT INTO update_results (run_id, position, ip, success, status, message, current_version, previous_version,
        latest_version, needs_update, update_started, update_completed, error_kind, elapsed_ms, timeout_seconds)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const tx = this.db.transaction(() => {
      insertRun.run(
        summary.runId,
        trigger,
        JSON.stringify(summary.options),
        summary.latestVersion,
        summary.total,
        summary.checked,
        summary.needsUpdate,
        summary.updated,
        summary.success,
        summary.failed,
        summary.startedAt,
        summary.finishedAt,
      );
      summary.outcomes.forEach((outcome, position) => {
        insertResult.run(
          summary.runId,
          position,
          outcome.ip,
          outcome.success ? 1 : 0,
          outcome.status,
          outcome.message,
          outcome.currentVersion,
          outcome.previousVersion,
          outcome.latestVersion,
          outcome.needsUpdate ? 1 : 0,
          outcome.updateStarted ? 1 : 0,
          outcome.updateCompleted ? 1 : 0,
          outcome.errorKind ?? null,
          Math.round(outcome.elapsedMs),
          outcome.timeoutSeconds ?? null,
        );
      });
    });
    tx();

    return this.getById(summary.runId)!;
  }

  getById(id: string): UpdateRunRecord | undefined {
    const stmt = this.db.prepare('SELECT * FROM update_runs WHERE id = ?');
    return stmt.get(id) as UpdateRunRecord | undefined;
  }

  getRecent(limit: number = 20): UpdateRunRecord[] {
    const stmt = this.db.prepare('SELECT * FROM update_runs ORDER BY started_at DESC, rowid DESC LIMIT ?');
    return stmt.all(limit) as UpdateRunRecord[];
  }

  getResults(runId: string): UpdateResultRecord[] {
    const stmt = this.db.prepare('SELECT * FROM update_results WHERE run_id = ? ORDER BY position ASC');
    return stmt.all(runId) as UpdateResultRecord[];
  }
}
