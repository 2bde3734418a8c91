import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { HEADER_TABLE, POPULATION_TABLE, findReferenceTable, fixedWidthTableSchema } from '../../config/tables.js';
import { buildDenormalizedView, exportGeoRecords, queryGeoRecords } from '../../denormalize.js';
import { JoinError } from '../../errors.js';
import { decodeRow, encodeFixedWidth } from '../../lib/fixedWidth.js';
import { createTables, loadTable } from '../../load.js';
import { openGeoDatabase, type GeoDatabase } from '../../utils/database.js';
import type { FixedWidthLayout, GeoFilter, SourceRow, TableSchema } from '../../types/index.js';
import { loadGhrLayout, makeTempDir } from '../helpers.js';

function referenceTable(name: string): TableSchema {
  const schema = findReferenceTable(name);
  if (!schema) throw new Error(`No reference table ${name}`);
  return schema;
}

interface HeaderFields {
  logrecno: string;
  stusab: string;
  sumlev: string;
  statefp: string;
  countyfp?: string;
  placefp?: string;
  name: string;
}

const headers: HeaderFields[] = [
  { logrecno: '0000001', stusab: 'TX', sumlev: '040', statefp: '48', name: 'Texas' },
  { logrecno: '0000002', stusab: 'TX', sumlev: '070', statefp: '48', countyfp: '453', placefp: '05000', name: 'Austin city (part)' },
  { logrecno: '0000003', stusab: 'TX', sumlev: '070', statefp: '48', countyfp: '491', placefp: '05000', name: 'Austin city (part)' },
  { logrecno: '0000004', stusab: 'CA', sumlev: '070', statefp: '06', countyfp: '037', placefp: '44000', name: 'Los Angeles city' },
  { logrecno: '0000005', stusab: 'CA', sumlev: '050', statefp: '06', countyfp: '037', name: 'Los Angeles County' }
];

const population = [
  ['UR1US', 'TX', '000', '01', '0000001', '25145561', '21298039', '19000000', '2298039', '3847522', '0'],
  ['UR1US', 'TX', '000', '01', '0000002', '790000', '789000', '789000', '0', '1000', '0'],
  ['UR1US', 'CA', '000', '01', '0000004', '3792621', '3792000', '3792000', '0', '621', '0'],
  ['UR1US', 'ZZ', '000', '01', '0000099', '1', '1', '1', '0', '0', '0']
];

function sourceRows(values: string[][]): SourceRow[] {
  return values.map((entry, index) => ({ record: index + 1, values: entry }));
}

describe('denormalized view', () => {
  let layout: FixedWidthLayout;
  let db: GeoDatabase;

  beforeAll(async () => {
    layout = await loadGhrLayout();
  });

  beforeEach(async () => {
    db = openGeoDatabase(':memory:');
    const ghr = fixedWidthTableSchema(HEADER_TABLE, layout);
    const f02 = referenceTable(POPULATION_TABLE);
    createTables(db, [ghr, f02]);

    const headerValues = headers.map((fields) =>
      decodeRow(encodeFixedWidth({ fileid: 'UR1US', geocomp: '00', ...fields }, layout), layout)
    );
    await loadTable(db, ghr, sourceRows(headerValues));
    await loadTable(db, f02, sourceRows(population));
  });

  afterEach(() => {
    db.close();
  });

  const logrecnos = (filter: GeoFilter = {}) => queryGeoRecords(db, filter).map((record) => record.logrecno);

  it('keeps every header record exactly once', () => {
    expect(buildDenormalizedView(db)).toEqual({ headerRows: 5, populationRows: 4, rows: 5, unmatched: 2 });
    expect(logrecnos()).toEqual([1, 2, 3, 4, 5]);
  });

  it('leaves population counts null where no population record matches', () => {
    buildDenormalizedView(db);
    const [state, austin, austinRest] = queryGeoRecords(db, { stusab: 'TX' });

    expect(state?.p0020001).toBe(25145561);
    expect(austin?.p0020002).toBe(789000);
    expect(austin?.geoid).toBe('4805000');
    expect(austin?.name).toBe('Austin city (part)');
    expect(austinRest?.p0020001).toBeNull();
    expect(austinRest?.p0020006).toBeNull();
  });

  it('never adds population records without a header', () => {
    buildDenormalizedView(db);
    expect(logrecnos()).not.toContain(99);
    expect(queryGeoRecords(db, { stusab: 'ZZ' })).toEqual([]);
  });

  it('filters by summary level, state and geographic component', () => {
    buildDenormalizedView(db);

    expect(logrecnos({ sumlev: '070' })).toEqual([2, 3, 4]);
    expect(logrecnos({ stusab: 'tx' })).toEqual([1, 2, 3]);
    expect(logrecnos({ sumlev: '070', stusab: 'TX' })).toEqual([2, 3]);
    expect(logrecnos({ geocomp: '00' })).toEqual([1, 2, 3, 4, 5]);
    expect(logrecnos({ geocomp: '01' })).toEqual([]);
  });

  it('gives the same rows whichever filter is applied first', () => {
    buildDenormalizedView(db);

    const bySumlevThenState = queryGeoRecords(db, { sumlev: '070' })
      .filter((record) => record.stusab === 'TX')
      .map((record) => record.logrecno);
    const byStateThenSumlev = queryGeoRecords(db, { stusab: 'TX' })
      .filter((record) => record.sumlev === '070')
      .map((record) => record.logrecno);

    expect(bySumlevThenState).toEqual(byStateThenSumlev);
    expect(bySumlevThenState).toEqual(logrecnos({ sumlev: '070', stusab: 'TX' }));
  });

  it('rebuilds the view with the same contents', () => {
    buildDenormalizedView(db);
    const first = queryGeoRecords(db);
    buildDenormalizedView(db);
    expect(queryGeoRecords(db)).toEqual(first);
  });

  it('keeps a short header line without a log record number', async () => {
    await loadTable(db, fixedWidthTableSchema(HEADER_TABLE, layout), sourceRows([decodeRow('UR1US TX040', layout)]));

    expect(buildDenormalizedView(db)).toEqual({ headerRows: 6, populationRows: 4, rows: 6, unmatched: 3 });
    const [short] = queryGeoRecords(db);
    expect(short).toMatchObject({ logrecno: null, stusab: 'TX', sumlev: '040', geoid: '', p0020001: null });
    expect(logrecnos()).toEqual([null, 1, 2, 3, 4, 5]);
  });

  it('rejects duplicate log record numbers in the population table', async () => {
    await loadTable(db, referenceTable(POPULATION_TABLE), sourceRows([population[1] ?? []]));

    expect(() => buildDenormalizedView(db)).toThrow(JoinError);
    expect(() => buildDenormalizedView(db)).toThrow('1 duplicate logrecno values in f02.');
  });

  it('requires both input tables', () => {
    db.exec('DROP TABLE f02');
    expect(() => buildDenormalizedView(db)).toThrow('Table "f02" does not exist; run the schema and load steps first.');
  });

  describe('exportGeoRecords', () => {
    let dir: Awaited<ReturnType<typeof makeTempDir>>;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await dir.cleanup();
    });

    it('writes the filtered rows as CSV with a header', async () => {
      buildDenormalizedView(db);
      const path = join(dir.path, 'out', 'tx_places.csv');

      const count = await exportGeoRecords(db, { sumlev: '070', stusab: 'TX' }, path);

      expect(count).toBe(2);
      const lines = (await readFile(path, 'utf8')).split('\n');
      expect(lines).toHaveLength(4);
      expect(lines[3]).toBe('');

      const header = (lines[0] ?? '').split(',');
      expect(header.slice(0, 4)).toEqual(['fileid', 'stusab', 'sumlev', 'geocomp']);
      expect(header).toHaveLength(108);
      expect(header[header.length - 1]).toBe('p0020006');

      const first = (lines[1] ?? '').split(',');
      expect(first[header.indexOf('logrecno')]).toBe('2');
      expect(first[header.indexOf('geoid')]).toBe('4805000');
      expect(first[header.indexOf('name')]).toBe('Austin city (part)');
      expect(first[header.indexOf('p0020001')]).toBe('790000');

      const second = (lines[2] ?? '').split(',');
      expect(second[header.indexOf('logrecno')]).toBe('3');
      expect(second[header.indexOf('p0020001')]).toBe('');
    });

    it('requires the denormalized view', async () => {
      await expect(exportGeoRecords(db, {}, join(dir.path, 'out.csv'))).rejects.toBeInstanceOf(JoinError);
    });
  });
});
