import { dirname, isAbsolute, join, resolve } from 'node:path';
import fg from 'fast-glob';
import { ManifestError } from './errors.js';
import { loadFixedWidthLayout } from './lib/fixedWidth.js';
import { pathExists, readJson } from './utils/fs.js';
import { log } from './utils/log.js';
import { validateSourceManifest } from './validate.js';
import type { FixedWidthLayout, SourceFile, SourceManifest, SourceManifestEntry } from './types/index.js';

export interface ExtractOptions {
  dataRoot: string;
  manifestPath: string;
  schemaDir?: string;
}

export interface ExtractResult {
  sources: SourceFile[];
  /** Ids of optional sources whose files were not found. */
  skipped: string[];
}

export async function loadSourceManifest(manifestPath: string, schemaDir?: string): Promise<SourceManifest> {
  if (!(await pathExists(manifestPath))) {
    throw new ManifestError(`Source manifest missing: ${manifestPath}`);
  }

  const manifest = await validateSourceManifest(await readJson(manifestPath), schemaDir);

  const seen = new Set<string>();
  for (const entry of manifest.sources) {
    if (seen.has(entry.id)) {
      throw new ManifestError(`Duplicate source id "${entry.id}" in ${manifestPath}`);
    }
    seen.add(entry.id);
  }

  return manifest;
}

async function locateSource(entry: SourceManifestEntry, dataRoot: string): Promise<string | undefined> {
  const matches = await fg(entry.path, { cwd: dataRoot, onlyFiles: true, absolute: true, dot: true });
  if (matches.length > 1) {
    throw new ManifestError(
      `Source "${entry.id}" pattern ${entry.path} matched ${matches.length} files: ${matches.slice(0, 5).join(', ')}`
    );
  }
  const [match] = matches;
  return match;
}

export async function extract(opts: ExtractOptions): Promise<ExtractResult> {
  if (!(await pathExists(opts.dataRoot))) {
    throw new ManifestError(`Data root missing: ${opts.dataRoot}`);
  }

  const manifest = await loadSourceManifest(opts.manifestPath, opts.schemaDir);
  const manifestDir = dirname(resolve(opts.manifestPath));
  const layouts = new Map<string, FixedWidthLayout>();

  const sources: SourceFile[] = [];
  const missing: string[] = [];
  const skipped: string[] = [];

  for (const entry of manifest.sources) {
    const path = await locateSource(entry, opts.dataRoot);
    if (!path) {
      if (entry.required === false) {
        skipped.push(entry.id);
      } else {
        missing.push(`${entry.id} (${entry.path})`);
      }
      continue;
    }

    const base = {
      id: entry.id,
      path,
      table: entry.table,
      encoding: entry.encoding,
      hasHeader: entry.hasHeader
    };

    if (entry.format === 'fixed-width') {
      if (!entry.layout) {
        throw new ManifestError(`Fixed-width source "${entry.id}" has no layout.`);
      }
      const layoutPath = isAbsolute(entry.layout) ? entry.layout : join(manifestDir, entry.layout);
      let layout = layouts.get(layoutPath);
      if (!layout) {
        layout = await loadFixedWidthLayout(layoutPath, opts.schemaDir);
        layouts.set(layoutPath, layout);
      }
      sources.push({ ...base, format: 'fixed-width', layout });
    } else {
      sources.push({ ...base, format: 'delimited', delimiter: entry.delimiter ?? ',' });
    }
  }

  if (missing.length) {
    throw new ManifestError(`Missing required source files: ${missing.join(', ')}`);
  }

  if (skipped.length) {
    log.warn('Optional sources missing (will be skipped):', skipped);
  }

  log.info('Extraction check complete', {
    dataRoot: opts.dataRoot,
    sources: sources.length,
    skipped: skipped.length
  });

  return { sources, skipped };
}
