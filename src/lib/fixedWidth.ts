import { LayoutError } from '../errors.js';
import { readJson } from '../utils/fs.js';
import { validateFixedWidthLayout } from '../validate.js';
import type { ColumnDefinition, FixedWidthField, FixedWidthLayout } from '../types/index.js';

const fieldIndexCache = new WeakMap<FixedWidthLayout, Map<string, FixedWidthField>>();

function fieldIndex(layout: FixedWidthLayout): Map<string, FixedWidthField> {
  let index = fieldIndexCache.get(layout);
  if (!index) {
    index = new Map(layout.fields.map((field) => [field.name, field]));
    fieldIndexCache.set(layout, index);
  }
  return index;
}

function sliceField(line: string, field: FixedWidthField): string {
  const begin = field.start - 1;
  return line.slice(begin, begin + field.length);
}

/**
 * Checks what the JSON schema cannot express: fields must tile the record
 * from column 1 without gaps or overlaps, names must be unique, and derived
 * fields may only reference positional ones.
 */
export function assertLayoutConsistent(layout: FixedWidthLayout, origin = layout.name): void {
  const names = new Set<string>();
  let expectedStart = 1;

  for (const field of layout.fields) {
    if (field.start !== expectedStart) {
      throw new LayoutError(
        `Layout ${origin}: field "${field.name}" starts at column ${field.start}, expected ${expectedStart}.`
      );
    }
    if (names.has(field.name)) {
      throw new LayoutError(`Layout ${origin}: duplicate field "${field.name}".`);
    }
    names.add(field.name);
    expectedStart += field.length;
  }

  const positional = new Set(names);
  for (const derived of layout.derived) {
    if (names.has(derived.name)) {
      throw new LayoutError(`Layout ${origin}: duplicate field "${derived.name}".`);
    }
    const unknown = derived.from.filter((name) => !positional.has(name));
    if (unknown.length) {
      throw new LayoutError(
        `Layout ${origin}: derived field "${derived.name}" references unknown fields: ${unknown.join(', ')}.`
      );
    }
    names.add(derived.name);
  }
}

export async function loadFixedWidthLayout(path: string, schemaDir?: string): Promise<FixedWidthLayout> {
  const layout = await validateFixedWidthLayout(await readJson(path), schemaDir);
  assertLayoutConsistent(layout, path);
  return layout;
}

export function layoutWidth(layout: FixedWidthLayout): number {
  return layout.fields.reduce((width, field) => width + field.length, 0);
}

/** Table columns for a layout: positional fields in record order, then derived fields. */
export function layoutColumns(layout: FixedWidthLayout): ColumnDefinition[] {
  return [
    ...layout.fields.map(({ name, type }) => ({ name, type })),
    ...layout.derived.map(({ name, type }) => ({ name, type }))
  ];
}

/**
 * Slices one line into its positional fields and trims each value.
 * Lines are never rejected: a short line yields truncated or empty values.
 */
export function decodeFixedWidth(line: string, layout: FixedWidthLayout): Record<string, string> {
  const record: Record<string, string> = {};
  for (const field of layout.fields) {
    record[field.name] = sliceField(line, field).trim();
  }
  return record;
}

export function deriveFields(line: string, layout: FixedWidthLayout): Record<string, string> {
  const index = fieldIndex(layout);
  const record: Record<string, string> = {};
  for (const derived of layout.derived) {
    let raw = '';
    for (const name of derived.from) {
      const field = index.get(name);
      if (field) raw += sliceField(line, field);
    }
    record[derived.name] = raw.trim();
  }
  return record;
}

export function decodeRecord(line: string, layout: FixedWidthLayout): Record<string, string> {
  return { ...decodeFixedWidth(line, layout), ...deriveFields(line, layout) };
}

/** Decodes a line into values ordered like {@link layoutColumns}. */
export function decodeRow(line: string, layout: FixedWidthLayout): string[] {
  const values = layout.fields.map((field) => sliceField(line, field).trim());
  const derived = deriveFields(line, layout);
  for (const field of layout.derived) {
    values.push(derived[field.name] ?? '');
  }
  return values;
}

/**
 * Inverse of {@link decodeFixedWidth} for left-justified values: pads each
 * positional field with trailing spaces to its width. Derived fields are
 * ignored.
 */
export function encodeFixedWidth(record: Record<string, string | undefined>, layout: FixedWidthLayout): string {
  let line = '';
  for (const field of layout.fields) {
    const value = record[field.name] ?? '';
    if (value.length > field.length) {
      throw new RangeError(
        `Value for "${field.name}" is ${value.length} characters; the field is ${field.length} wide.`
      );
    }
    line += value.padEnd(field.length, ' ');
  }
  return line;
}
