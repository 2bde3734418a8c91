import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Ajv, type SchemaObject } from 'ajv';
import { SchemaValidationError } from './errors.js';
import type { FixedWidthLayout, SourceManifest } from './types/index.js';

const ajv = new Ajv({ allErrors: true, strict: false, useDefaults: true });

const schemaCache = new Map<string, SchemaObject>();

async function loadSchema (schemaPath: string): Promise<SchemaObject> {
  const cached = schemaCache.get(schemaPath);
  if (cached) return cached;
  const schema: SchemaObject = JSON.parse(await readFile(schemaPath, 'utf8'));
  schemaCache.set(schemaPath, schema);
  return schema;
}

/**
 * Validates `data` against the JSON schema at `schemaPath` and returns it
 * typed. Defaults declared in the schema are filled in place.
 */
export async function validateDocument<T> (schemaPath: string, data: unknown, label: string): Promise<T> {
  const validator = ajv.compile<T>(await loadSchema(schemaPath));
  if (!validator(data)) {
    const message = ajv.errorsText(validator.errors, { dataVar: label });
    throw new SchemaValidationError(message, label);
  }
  return data;
}

export const defaultSchemaDir = join(process.cwd(), 'schemas');

export async function validateSourceManifest (
  data: unknown,
  schemaDir: string = defaultSchemaDir
): Promise<SourceManifest> {
  return validateDocument<SourceManifest>(join(schemaDir, 'source_manifest.json'), data, 'manifest');
}

export async function validateFixedWidthLayout (
  data: unknown,
  schemaDir: string = defaultSchemaDir
): Promise<FixedWidthLayout> {
  return validateDocument<FixedWidthLayout>(join(schemaDir, 'fixed_width_layout.json'), data, 'layout');
}
