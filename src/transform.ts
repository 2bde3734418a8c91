import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import { parse } from 'csv-parse';
import { decodeRow } from './lib/fixedWidth.js';
import type { DelimitedSourceFile, FixedWidthSourceFile, SourceFile, SourceRow } from './types/index.js';

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

async function* readDelimitedRows(source: DelimitedSourceFile, filePath: string): AsyncGenerator<SourceRow> {
  const parser = parse({
    delimiter: source.delimiter,
    from_line: source.hasHeader ? 2 : 1,
    skip_empty_lines: true,
    relax_quotes: true,
    relax_column_count: true,
    bom: true
  });
  const input = createReadStream(filePath);
  input.on('error', (error) => parser.destroy(error));
  input.pipe(parser);

  let record = 0;
  try {
    for await (const row of parser) {
      if (!isStringRow(row)) {
        throw new Error(`Unexpected record shape from ${filePath}`);
      }
      record++;
      yield { record, values: row.map((value) => value.trim()) };
    }
  } finally {
    input.destroy();
  }
}

async function* readFixedWidthRows(source: FixedWidthSourceFile, filePath: string): AsyncGenerator<SourceRow> {
  const input = createReadStream(filePath, { encoding: 'utf8' });
  const lines = createInterface({ input, crlfDelay: Infinity });

  let lineNumber = 0;
  let record = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      if (lineNumber === 1 && source.hasHeader) continue;
      if (!line.trim()) continue;
      record++;
      yield { record, values: decodeRow(line, source.layout) };
    }
  } finally {
    lines.close();
    input.destroy();
  }
}

/**
 * Streams the data rows of a (UTF-8) work file in file order. Exactly one
 * leading row is skipped when the source declares `hasHeader`, none otherwise.
 * Rows keep whatever column count the file has; the loader checks it.
 * The file is closed when the consumer stops early.
 */
export function readSourceRows(source: SourceFile, filePath: string): AsyncGenerator<SourceRow> {
  return source.format === 'fixed-width'
    ? readFixedWidthRows(source, filePath)
    : readDelimitedRows(source, filePath);
}
