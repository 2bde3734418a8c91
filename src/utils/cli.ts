export type CliArgs = Record<string, string | true>;

/** Reads `--flag value`, `--flag=value` and bare `--flag`; a repeated flag keeps its last value. */
export function parseCliArgs(tokens: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token.startsWith('--') || token === '--') continue;

    const body = token.slice(2);
    const equals = body.indexOf('=');
    if (equals !== -1) {
      result[body.slice(0, equals)] = body.slice(equals + 1);
      continue;
    }

    const next = tokens[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      result[body] = next;
      i++;
    } else {
      result[body] = true;
    }
  }

  return result;
}

export function getStringArg(args: CliArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' ? value : undefined;
}

export const USAGE = `Usage: census-geo-etl [options]

Options:
  --data-root <dir>     Directory holding the Census source files (DATA_ROOT, default ./data)
  --db <file>           SQLite database to write (GEO_DB_PATH, default <data-root>/geo.db)
  --manifest <file>     Source manifest (SOURCE_MANIFEST, default config/sources.json)
  --work-dir <dir>      UTF-8 work files (WORK_DIR, default <data-root>/work)
  --from-step <step>    Resume at extract|normalize|schema|load|join|export (FROM_STEP)
  --export <file>       Write the denormalized view as CSV (EXPORT_PATH)
  --sumlev <code>       Restrict the export to one summary level, e.g. 070 (EXPORT_SUMLEV)
  --state <abbr>        Restrict the export to one state, e.g. TX (EXPORT_STATE)
  --help                Show this message
`;
