import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';

export type GeoDatabase = Database.Database;

const MEMORY_PATH = ':memory:';

/**
 * Opens (or creates) the single-file geo database.
 *
 * The handle is passed explicitly to every step; nothing in this package
 * keeps a module-level connection.
 */
export function openGeoDatabase(path: string = MEMORY_PATH): GeoDatabase {
  if (path !== MEMORY_PATH) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);

  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('temp_store = MEMORY');

  return db;
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function tableExists(db: GeoDatabase, table: string): boolean {
  const row = db
    .prepare<[string], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
    )
    .get(table);
  return row !== undefined;
}

export function countRows(db: GeoDatabase, table: string, where = ''): number {
  const sql = `SELECT COUNT(*) AS count FROM ${quoteIdentifier(table)}${where ? ` WHERE ${where}` : ''}`;
  const row = db.prepare<[], { count: number }>(sql).get();
  return row?.count ?? 0;
}

/**
 * Runs an async unit of work inside a single transaction.
 *
 * better-sqlite3's `db.transaction()` only accepts synchronous callbacks,
 * while rows arrive from file streams, so BEGIN/COMMIT are issued by hand.
 * The caller must not interleave other writes on the same handle.
 */
export async function withTransaction<T>(db: GeoDatabase, work: () => Promise<T>): Promise<T> {
  db.exec('BEGIN');
  try {
    const result = await work();
    db.exec('COMMIT');
    return result;
  } catch (error) {
    if (db.inTransaction) {
      db.exec('ROLLBACK');
    }
    throw error;
  }
}
