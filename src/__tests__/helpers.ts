import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadFixedWidthLayout } from '../lib/fixedWidth.js';
import type { FixedWidthLayout } from '../types/index.js';

export const GHR_LAYOUT_PATH = join(process.cwd(), 'config', 'layouts', 'usgeo2010.json');

export function loadGhrLayout(): Promise<FixedWidthLayout> {
  return loadFixedWidthLayout(GHR_LAYOUT_PATH);
}

export async function makeTempDir(): Promise<{ path: string; cleanup: () => Promise<void> }> {
  const path = await mkdtemp(join(tmpdir(), 'census-geo-etl-'));
  return { path, cleanup: () => rm(path, { recursive: true, force: true }) };
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}
