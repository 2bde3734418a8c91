import { join, resolve } from 'node:path';
import { log } from '../utils/log.js';
import { PIPELINE_STEPS, type GeoFilter, type PipelineStep } from '../types/index.js';

export interface ExportConfig {
  path: string;
  filter: GeoFilter;
}

export interface PipelineConfig {
  dataRoot: string;
  databasePath: string;
  manifestPath: string;
  workDir: string;
  fromStep: PipelineStep;
  export?: ExportConfig;
}

export interface PipelineConfigOverrides {
  dataRoot?: string;
  databasePath?: string;
  manifestPath?: string;
  workDir?: string;
  fromStep?: string;
  exportPath?: string;
  exportSumlev?: string;
  exportState?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function isPipelineStep(value: string): value is PipelineStep {
  return PIPELINE_STEPS.some((step) => step === value);
}

export function parsePipelineStep(raw: string | undefined): PipelineStep {
  const value = nonEmpty(raw)?.toLowerCase();
  if (!value) return 'extract';
  if (isPipelineStep(value)) return value;
  log.warn('Unknown pipeline step, starting from extract', {
    value: raw,
    steps: PIPELINE_STEPS
  });
  return 'extract';
}

/** Accepts `70` or `070`; summary levels are always three digits. */
export function normalizeSummaryLevel(raw: string | undefined): string | undefined {
  const value = nonEmpty(raw);
  if (!value) return undefined;
  if (!/^\d{1,3}$/.test(value)) {
    log.warn('Ignoring invalid summary level', { value: raw });
    return undefined;
  }
  return value.padStart(3, '0');
}

export function normalizeStateAbbreviation(raw: string | undefined): string | undefined {
  const value = nonEmpty(raw)?.toUpperCase();
  if (!value) return undefined;
  if (!/^[A-Z]{2}$/.test(value)) {
    log.warn('Ignoring invalid state abbreviation', { value: raw });
    return undefined;
  }
  return value;
}

export function loadPipelineConfig(
  overrides: PipelineConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const dataRoot = resolve(nonEmpty(overrides.dataRoot) ?? nonEmpty(env.DATA_ROOT) ?? './data');
  const databasePath = resolve(
    nonEmpty(overrides.databasePath) ?? nonEmpty(env.GEO_DB_PATH) ?? join(dataRoot, 'geo.db')
  );
  const manifestPath = resolve(
    nonEmpty(overrides.manifestPath) ?? nonEmpty(env.SOURCE_MANIFEST) ?? join('config', 'sources.json')
  );
  const workDir = resolve(nonEmpty(overrides.workDir) ?? nonEmpty(env.WORK_DIR) ?? join(dataRoot, 'work'));
  const fromStep = parsePipelineStep(overrides.fromStep ?? env.FROM_STEP);

  const exportPath = nonEmpty(overrides.exportPath) ?? nonEmpty(env.EXPORT_PATH);
  const config: PipelineConfig = { dataRoot, databasePath, manifestPath, workDir, fromStep };

  if (exportPath) {
    const filter: GeoFilter = {};
    const sumlev = normalizeSummaryLevel(overrides.exportSumlev ?? env.EXPORT_SUMLEV);
    const stusab = normalizeStateAbbreviation(overrides.exportState ?? env.EXPORT_STATE);
    if (sumlev) filter.sumlev = sumlev;
    if (stusab) filter.stusab = stusab;
    config.export = { path: resolve(exportPath), filter };
  }

  return config;
}
