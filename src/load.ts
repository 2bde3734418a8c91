import { LoadError } from './errors.js';
import { quoteIdentifier, withTransaction, type GeoDatabase } from './utils/database.js';
import { log } from './utils/log.js';
import type { ColumnDefinition, ColumnType, SourceRow, SqlValue, TableSchema } from './types/index.js';

export interface LoadTableOptions {
  /** Empty the table inside the load transaction before inserting. */
  replace?: boolean;
  /** Label used in errors and logs; defaults to the table name. */
  sourceId?: string;
}

export interface LoadTarget {
  sourceId: string;
  schema: TableSchema;
  rows: AsyncIterable<SourceRow> | Iterable<SourceRow>;
}

export type LoadStatistics = Record<string, number>;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const REAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Converts one raw field to the value stored for `type`. Empty numeric
 * fields become NULL; `undefined` means the value does not fit the type.
 */
export function coerceValue(raw: string, type: ColumnType): SqlValue | undefined {
  if (type === 'TEXT') return raw;

  const trimmed = raw.trim();
  if (!trimmed) return null;

  if (type === 'INTEGER') {
    if (!INTEGER_PATTERN.test(trimmed)) return undefined;
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) ? parsed : undefined;
  }

  if (!REAL_PATTERN.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function coerceRow(schema: TableSchema, row: SourceRow, sourceId: string): SqlValue[] {
  if (row.values.length !== schema.columns.length) {
    throw new LoadError(
      `${sourceId}: record ${row.record} has ${row.values.length} columns; table "${schema.name}" expects ${schema.columns.length}.`,
      { source: sourceId, record: row.record }
    );
  }

  return schema.columns.map((column, index) => {
    const raw = row.values[index] ?? '';
    const value = coerceValue(raw, column.type);
    if (value === undefined) {
      throw new LoadError(
        `${sourceId}: record ${row.record} column "${column.name}" expects ${column.type}, got "${raw}".`,
        { source: sourceId, record: row.record, column: column.name }
      );
    }
    return value;
  });
}

function columnSql(column: ColumnDefinition): string {
  return `${quoteIdentifier(column.name)} ${column.type}`;
}

export function createTableSql(schema: TableSchema): string {
  return `CREATE TABLE ${quoteIdentifier(schema.name)} (\n  ${schema.columns.map(columnSql).join(',\n  ')}\n)`;
}

function indexName(table: string, columns: string[]): string {
  return `idx_${table}_${columns.join('_')}`;
}

/**
 * Drops and recreates every table, leaving each one empty with exactly the
 * declared columns and indexes.
 */
export function createTables(db: GeoDatabase, schemas: readonly TableSchema[]): void {
  const create = db.transaction((list: readonly TableSchema[]) => {
    for (const schema of list) {
      db.exec(`DROP TABLE IF EXISTS ${quoteIdentifier(schema.name)}`);
      db.exec(createTableSql(schema));
      for (const columns of schema.indexes ?? []) {
        db.exec(
          `CREATE INDEX ${quoteIdentifier(indexName(schema.name, columns))} ON ${quoteIdentifier(schema.name)} (${columns.map(quoteIdentifier).join(', ')})`
        );
      }
    }
  });
  create(schemas);
  log.info('Tables created', { tables: schemas.map((schema) => schema.name) });
}

/**
 * Bulk-inserts rows in the order given, inside one transaction. Rows are
 * not deduplicated. The first row that does not fit the schema aborts the
 * load and rolls the table back to its previous contents.
 */
export async function loadTable(
  db: GeoDatabase,
  schema: TableSchema,
  rows: AsyncIterable<SourceRow> | Iterable<SourceRow>,
  options: LoadTableOptions = {}
): Promise<number> {
  const sourceId = options.sourceId ?? schema.name;
  const table = quoteIdentifier(schema.name);
  const columnList = schema.columns.map((column) => quoteIdentifier(column.name)).join(', ');
  const placeholders = schema.columns.map(() => '?').join(', ');
  const insert = db.prepare<SqlValue[]>(`INSERT INTO ${table} (${columnList}) VALUES (${placeholders})`);

  return withTransaction(db, async () => {
    if (options.replace) {
      db.exec(`DELETE FROM ${table}`);
    }
    let count = 0;
    for await (const row of rows) {
      insert.run(...coerceRow(schema, row, sourceId));
      count++;
    }
    return count;
  });
}

/**
 * Loads each target in order. A table fed by several sources is emptied
 * once, before its first source, when `replace` is set.
 */
export async function loadSources(
  db: GeoDatabase,
  targets: readonly LoadTarget[],
  options: { replace?: boolean } = {}
): Promise<LoadStatistics> {
  const stats: LoadStatistics = {};
  const cleared = new Set<string>();

  for (const target of targets) {
    const table = target.schema.name;
    const replace = Boolean(options.replace) && !cleared.has(table);
    cleared.add(table);

    const rows = await loadTable(db, target.schema, target.rows, {
      replace,
      sourceId: target.sourceId
    });
    stats[table] = (stats[table] ?? 0) + rows;
    log.info('Loaded source', { source: target.sourceId, table, rows });
  }

  return stats;
}
