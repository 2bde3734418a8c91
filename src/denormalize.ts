import { createWriteStream } from 'node:fs';
import { dirname } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { stringify } from 'csv-stringify';
import {
  DENORMALIZED_TABLE,
  HEADER_TABLE,
  LOG_RECORD_COLUMN,
  POPULATION_COLUMNS,
  POPULATION_TABLE
} from './config/tables.js';
import { JoinError } from './errors.js';
import { countRows, quoteIdentifier, tableExists, type GeoDatabase } from './utils/database.js';
import { ensureDir } from './utils/fs.js';
import { log } from './utils/log.js';
import type { DenormalizedGeoRecord, GeoFilter } from './types/index.js';

export interface DenormalizedViewStats {
  headerRows: number;
  populationRows: number;
  rows: number;
  /** Header records with no population record for their log record number. */
  unmatched: number;
}

const ghr = quoteIdentifier(HEADER_TABLE);
const f02 = quoteIdentifier(POPULATION_TABLE);
const ghrp = quoteIdentifier(DENORMALIZED_TABLE);
const key = quoteIdentifier(LOG_RECORD_COLUMN);

/** Repeated non-null keys; rows without a log record number are not duplicates. */
function duplicateKeys(db: GeoDatabase, table: string): number {
  const row = db
    .prepare<[], { count: number }>(
      `SELECT COUNT(${key}) - COUNT(DISTINCT ${key}) AS count FROM ${quoteIdentifier(table)}`
    )
    .get();
  return row?.count ?? 0;
}

export function dropDenormalizedView(db: GeoDatabase): void {
  db.exec(`DROP TABLE IF EXISTS ${ghrp}`);
}

/**
 * Rebuilds `ghrp` as the left outer join of header records with their
 * population counts, then checks that the join kept every header record
 * and introduced no log record number of its own.
 */
export function buildDenormalizedView(db: GeoDatabase): DenormalizedViewStats {
  for (const table of [HEADER_TABLE, POPULATION_TABLE]) {
    if (!tableExists(db, table)) {
      throw new JoinError(`Table "${table}" does not exist; run the schema and load steps first.`);
    }
  }

  const duplicateHeaders = duplicateKeys(db, HEADER_TABLE);
  if (duplicateHeaders > 0) {
    throw new JoinError(`${duplicateHeaders} duplicate ${LOG_RECORD_COLUMN} values in ${HEADER_TABLE}.`);
  }
  const duplicatePopulation = duplicateKeys(db, POPULATION_TABLE);
  if (duplicatePopulation > 0) {
    throw new JoinError(`${duplicatePopulation} duplicate ${LOG_RECORD_COLUMN} values in ${POPULATION_TABLE}.`);
  }

  const populationColumns = POPULATION_COLUMNS.map((column) => `p.${quoteIdentifier(column)}`).join(', ');

  db.transaction(() => {
    db.exec(`DROP TABLE IF EXISTS ${ghrp}`);
    db.exec(
      `CREATE TABLE ${ghrp} AS
         SELECT g.*, ${populationColumns}
           FROM ${ghr} AS g
           LEFT OUTER JOIN ${f02} AS p ON g.${key} = p.${key}
          ORDER BY g.${key}`
    );
    for (const column of [LOG_RECORD_COLUMN, 'sumlev', 'stusab', 'geoid']) {
      db.exec(
        `CREATE INDEX ${quoteIdentifier(`idx_${DENORMALIZED_TABLE}_${column}`)} ON ${ghrp} (${quoteIdentifier(column)})`
      );
    }
  })();

  const headerRows = countRows(db, HEADER_TABLE);
  const populationRows = countRows(db, POPULATION_TABLE);
  const rows = countRows(db, DENORMALIZED_TABLE);

  if (rows !== headerRows) {
    throw new JoinError(`${DENORMALIZED_TABLE} has ${rows} rows but ${HEADER_TABLE} has ${headerRows}.`);
  }

  const foreign = countRows(
    db,
    DENORMALIZED_TABLE,
    `NOT EXISTS (SELECT 1 FROM ${ghr} AS g WHERE g.${key} IS ${ghrp}.${key})`
  );
  if (foreign > 0) {
    throw new JoinError(`${foreign} ${DENORMALIZED_TABLE} rows carry a ${LOG_RECORD_COLUMN} missing from ${HEADER_TABLE}.`);
  }

  const unmatched = countRows(
    db,
    HEADER_TABLE,
    `NOT EXISTS (SELECT 1 FROM ${f02} AS p WHERE p.${key} = ${ghr}.${key})`
  );

  const stats = { headerRows, populationRows, rows, unmatched };
  log.info('Denormalized view built', { table: DENORMALIZED_TABLE, ...stats });
  return stats;
}

function filterClause(filter: GeoFilter): { where: string; params: string[] } {
  const clauses: string[] = [];
  const params: string[] = [];

  if (filter.sumlev) {
    clauses.push('sumlev = ?');
    params.push(filter.sumlev);
  }
  if (filter.stusab) {
    clauses.push('stusab = ?');
    params.push(filter.stusab.toUpperCase());
  }
  if (filter.geocomp) {
    clauses.push('geocomp = ?');
    params.push(filter.geocomp);
  }

  return { where: clauses.length ? ` WHERE ${clauses.join(' AND ')}` : '', params };
}

function selectSql(filter: GeoFilter): { sql: string; params: string[] } {
  const { where, params } = filterClause(filter);
  return { sql: `SELECT * FROM ${ghrp}${where} ORDER BY ${key}`, params };
}

/** Reads denormalized rows by summary level, state and geographic component. */
export function queryGeoRecords(db: GeoDatabase, filter: GeoFilter = {}): DenormalizedGeoRecord[] {
  const { sql, params } = selectSql(filter);
  return db.prepare<string[], DenormalizedGeoRecord>(sql).all(...params);
}

/** Writes the filtered rows to `path` as CSV with a header row. Returns the row count. */
export async function exportGeoRecords(db: GeoDatabase, filter: GeoFilter, path: string): Promise<number> {
  if (!tableExists(db, DENORMALIZED_TABLE)) {
    throw new JoinError(`Table "${DENORMALIZED_TABLE}" does not exist; run the join step first.`);
  }

  const { sql, params } = selectSql(filter);
  const statement = db.prepare<string[], DenormalizedGeoRecord>(sql);
  const columns = statement.columns().map((column) => column.name);

  let count = 0;
  function* rows(): Generator<DenormalizedGeoRecord> {
    for (const row of statement.iterate(...params)) {
      count++;
      yield row;
    }
  }

  await ensureDir(dirname(path));
  await pipeline(Readable.from(rows()), stringify({ header: true, columns }), createWriteStream(path));

  log.info('Exported denormalized rows', { path, rows: count, filter });
  return count;
}
