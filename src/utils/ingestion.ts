import type { GeoDatabase } from './database.js';
import { log } from './log.js';

export type IngestionState = 'running' | 'success' | 'failed';

export interface IngestionRunRecord {
  id: number;
  state: IngestionState;
  from_step: string;
  manifest: string;
  stats_json: string | null;
  log: string | null;
  started_at: string;
  updated_at: string | null;
  finished_at: string | null;
}

const TABLE = 'ingestion_runs';

function nowIso(): string {
  return new Date().toISOString();
}

function serializeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return typeof error === 'string' ? error : JSON.stringify(error, null, 2);
}

/** Creates the run log table; it survives schema rebuilds of the data tables. */
export function ensureIngestionTable(db: GeoDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${TABLE} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      state TEXT NOT NULL,
      from_step TEXT NOT NULL,
      manifest TEXT NOT NULL,
      stats_json TEXT,
      log TEXT,
      started_at TEXT NOT NULL,
      updated_at TEXT,
      finished_at TEXT
    )
  `);
}

export function listIngestionRuns(db: GeoDatabase): IngestionRunRecord[] {
  ensureIngestionTable(db);
  return db.prepare<[], IngestionRunRecord>(`SELECT * FROM ${TABLE} ORDER BY id`).all();
}

export class IngestionRun {
  private runId?: number;
  private stats: Record<string, unknown> = {};
  private started = false;

  constructor(private readonly db: GeoDatabase) {}

  get id(): number | undefined {
    return this.runId;
  }

  start(details: { fromStep: string; manifest: string }): void {
    if (this.started) {
      return;
    }

    ensureIngestionTable(this.db);
    const result = this.db
      .prepare<[string, string, string, string, string]>(
        `INSERT INTO ${TABLE} (state, from_step, manifest, stats_json, started_at) VALUES (?, ?, ?, ?, ?)`
      )
      .run('running', details.fromStep, details.manifest, '{}', nowIso());

    this.runId = Number(result.lastInsertRowid);
    this.started = true;
    this.stats = {};
    log.info('Ingestion run started', { ingestion_run_id: this.runId, ...details });
  }

  updateStats(partial: Record<string, unknown>): void {
    if (!this.started || this.runId === undefined) return;
    Object.assign(this.stats, partial);
    this.db
      .prepare<[string, string, number]>(`UPDATE ${TABLE} SET stats_json = ?, updated_at = ? WHERE id = ?`)
      .run(JSON.stringify(this.stats), nowIso(), this.runId);
  }

  finishSuccess(): void {
    if (!this.finish('success', null)) return;
    log.info('Ingestion run finished successfully', { ingestion_run_id: this.runId });
  }

  finishFail(error: unknown): void {
    if (!this.finish('failed', serializeError(error))) return;
    log.error('Ingestion run failed', { ingestion_run_id: this.runId, error });
  }

  private finish(state: IngestionState, message: string | null): boolean {
    if (!this.started || this.runId === undefined) return false;
    this.db
      .prepare<[string, string, string | null, string, number]>(
        `UPDATE ${TABLE} SET state = ?, stats_json = ?, log = ?, finished_at = ? WHERE id = ?`
      )
      .run(state, JSON.stringify(this.stats), message, nowIso(), this.runId);
    return true;
  }
}
