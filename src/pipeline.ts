import { join } from 'node:path';
import type { PipelineConfig } from './config/pipeline.js';
import { HEADER_TABLE, POPULATION_TABLE, findReferenceTable, fixedWidthTableSchema } from './config/tables.js';
import {
  buildDenormalizedView,
  dropDenormalizedView,
  exportGeoRecords,
  type DenormalizedViewStats
} from './denormalize.js';
import { normalizeEncoding } from './encoding.js';
import { ManifestError } from './errors.js';
import { extract } from './extract.js';
import { createTables, loadSources, type LoadStatistics, type LoadTarget } from './load.js';
import { readSourceRows } from './transform.js';
import { openGeoDatabase, type GeoDatabase } from './utils/database.js';
import { pathExists } from './utils/fs.js';
import { IngestionRun } from './utils/ingestion.js';
import { log } from './utils/log.js';
import { PIPELINE_STEPS, type PipelineStep, type SourceFile, type TableSchema } from './types/index.js';

export interface PipelineOptions {
  /** Use an already open database instead of `config.databasePath`; it is left open. */
  db?: GeoDatabase;
  schemaDir?: string;
}

export interface PipelineResult {
  runId?: number;
  steps: PipelineStep[];
  sources: string[];
  tables?: LoadStatistics;
  denormalized?: DenormalizedViewStats;
  exported?: number;
}

interface PreparedSource {
  source: SourceFile;
  schema: TableSchema;
  workFile: string;
}

export function workFilePath(workDir: string, source: SourceFile): string {
  return join(workDir, `${source.id}.utf-8.txt`);
}

export function tableSchemaFor(source: SourceFile): TableSchema {
  if (source.format === 'fixed-width') {
    return fixedWidthTableSchema(source.table, source.layout);
  }
  const schema = findReferenceTable(source.table);
  if (!schema) {
    throw new ManifestError(`No table schema defined for "${source.table}" (source "${source.id}").`);
  }
  return schema;
}

function prepareSources(sources: SourceFile[], workDir: string): PreparedSource[] {
  const prepared = sources.map((source) => ({
    source,
    schema: tableSchemaFor(source),
    workFile: workFilePath(workDir, source)
  }));

  const tables = new Set(prepared.map(({ schema }) => schema.name));
  for (const required of [HEADER_TABLE, POPULATION_TABLE]) {
    if (!tables.has(required)) {
      throw new ManifestError(`No source loads the "${required}" table.`);
    }
  }

  return prepared;
}

/** Unique schemas in first-seen order; several sources may feed one table. */
function uniqueSchemas(prepared: PreparedSource[]): TableSchema[] {
  const schemas = new Map<string, TableSchema>();
  for (const { schema } of prepared) {
    if (!schemas.has(schema.name)) schemas.set(schema.name, schema);
  }
  return [...schemas.values()];
}

async function assertWorkFiles(prepared: PreparedSource[]): Promise<void> {
  const missing: string[] = [];
  for (const { source, workFile } of prepared) {
    if (!(await pathExists(workFile))) missing.push(`${source.id} (${workFile})`);
  }
  if (missing.length) {
    throw new Error(`Work files missing: ${missing.join(', ')}. Re-run from the normalize step.`);
  }
}

/**
 * Runs extract → normalize → schema → load → join → export strictly in
 * sequence. Steps before `config.fromStep` are skipped, except extract,
 * which always runs to resolve the source descriptors. Failures are
 * recorded on the ingestion run and rethrown.
 */
export async function runPipeline(config: PipelineConfig, options: PipelineOptions = {}): Promise<PipelineResult> {
  const db = options.db ?? openGeoDatabase(config.databasePath);
  const ownsDatabase = options.db === undefined;
  const firstStep = PIPELINE_STEPS.indexOf(config.fromStep);
  const shouldRun = (step: PipelineStep) => PIPELINE_STEPS.indexOf(step) >= firstStep;

  const ingestionRun = new IngestionRun(db);
  const result: PipelineResult = { steps: [], sources: [] };

  try {
    ingestionRun.start({ fromStep: config.fromStep, manifest: config.manifestPath });
    result.runId = ingestionRun.id;

    const { sources } = await extract({
      dataRoot: config.dataRoot,
      manifestPath: config.manifestPath,
      schemaDir: options.schemaDir
    });
    const prepared = prepareSources(sources, config.workDir);
    result.steps.push('extract');
    result.sources = sources.map((source) => source.id);

    if (shouldRun('normalize')) {
      for (const { source, workFile } of prepared) {
        const bytes = await normalizeEncoding(source.path, workFile, source.encoding);
        log.info('Normalized encoding', { source: source.id, encoding: source.encoding, bytes, output: workFile });
      }
      result.steps.push('normalize');
    }

    if (shouldRun('schema')) {
      dropDenormalizedView(db);
      createTables(db, uniqueSchemas(prepared));
      result.steps.push('schema');
    }

    if (shouldRun('load')) {
      await assertWorkFiles(prepared);
      const targets: LoadTarget[] = prepared.map(({ source, schema, workFile }) => ({
        sourceId: source.id,
        schema,
        rows: readSourceRows(source, workFile)
      }));
      result.tables = await loadSources(db, targets, { replace: true });
      ingestionRun.updateStats({ tables: result.tables });
      result.steps.push('load');
    }

    if (shouldRun('join')) {
      result.denormalized = buildDenormalizedView(db);
      ingestionRun.updateStats({ denormalized: result.denormalized });
      result.steps.push('join');
    }

    if (shouldRun('export')) {
      if (config.export) {
        result.exported = await exportGeoRecords(db, config.export.filter, config.export.path);
        ingestionRun.updateStats({ exported: result.exported });
        result.steps.push('export');
      } else {
        log.info('Export skipped; no export path configured');
      }
    }

    ingestionRun.finishSuccess();
    return result;
  } catch (error) {
    ingestionRun.finishFail(error);
    throw error;
  } finally {
    if (ownsDatabase) {
      db.close();
    }
  }
}
