import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LayoutError, SchemaValidationError } from '../../errors.js';
import {
  assertLayoutConsistent,
  decodeFixedWidth,
  decodeRecord,
  decodeRow,
  deriveFields,
  encodeFixedWidth,
  layoutColumns,
  layoutWidth,
  loadFixedWidthLayout
} from '../../lib/fixedWidth.js';
import type { FixedWidthLayout } from '../../types/index.js';
import { loadGhrLayout, makeTempDir } from '../helpers.js';

const layout: FixedWidthLayout = {
  name: 'sample',
  fields: [
    { name: 'stusab', start: 1, length: 2, type: 'TEXT' },
    { name: 'sumlev', start: 3, length: 3, type: 'TEXT' },
    { name: 'logrecno', start: 6, length: 7, type: 'INTEGER' },
    { name: 'statefp', start: 13, length: 2, type: 'TEXT' },
    { name: 'placefp', start: 15, length: 5, type: 'TEXT' },
    { name: 'name', start: 20, length: 12, type: 'TEXT' }
  ],
  derived: [{ name: 'geoid', from: ['statefp', 'placefp'], type: 'TEXT' }]
};

const austin = 'TX' + '070' + '0000012' + '48' + '05000' + 'Austin city ';

describe('decodeFixedWidth', () => {
  it('slices each field by offset and trims it', () => {
    expect(decodeFixedWidth(austin, layout)).toEqual({
      stusab: 'TX',
      sumlev: '070',
      logrecno: '0000012',
      statefp: '48',
      placefp: '05000',
      name: 'Austin city'
    });
  });

  it('yields truncated and empty values for short lines', () => {
    expect(decodeFixedWidth('TX07', layout)).toEqual({
      stusab: 'TX',
      sumlev: '07',
      logrecno: '',
      statefp: '',
      placefp: '',
      name: ''
    });
  });

  it('ignores characters past the last field', () => {
    expect(decodeFixedWidth(`${austin}EXTRA`, layout).name).toBe('Austin city');
  });
});

describe('derived fields', () => {
  it('concatenates the raw slices of the source fields', () => {
    expect(deriveFields(austin, layout)).toEqual({ geoid: '4805000' });
  });

  it('is empty when the source fields are blank', () => {
    const stateLine = 'TX' + '040' + '0000001' + '48' + '     ' + 'Texas       ';
    expect(deriveFields(stateLine, layout)).toEqual({ geoid: '48' });
    expect(deriveFields('', layout)).toEqual({ geoid: '' });
  });

  it('adds derived fields to the decoded record and row', () => {
    expect(decodeRecord(austin, layout).geoid).toBe('4805000');
    expect(decodeRow(austin, layout)).toEqual(['TX', '070', '0000012', '48', '05000', 'Austin city', '4805000']);
  });
});

describe('encodeFixedWidth', () => {
  it('reproduces valid lines from their decoded fields', () => {
    const lines = [
      austin,
      'TX' + '040' + '0000001' + '48' + '     ' + 'Texas       ',
      'CA' + '050' + '12     ' + '06' + '     ' + '            ',
      '  ' + '   ' + '       ' + '  ' + '     ' + '            '
    ];
    for (const line of lines) {
      expect(line).toHaveLength(layoutWidth(layout));
      expect(encodeFixedWidth(decodeFixedWidth(line, layout), layout)).toBe(line);
    }
  });

  it('pads missing fields with spaces', () => {
    expect(encodeFixedWidth({ stusab: 'TX' }, layout)).toBe(`TX${' '.repeat(29)}`);
  });

  it('rejects values wider than their field', () => {
    expect(() => encodeFixedWidth({ stusab: 'TEX' }, layout)).toThrow(RangeError);
  });
});

describe('assertLayoutConsistent', () => {
  it('rejects gaps between fields', () => {
    const gapped: FixedWidthLayout = {
      name: 'gapped',
      fields: [
        { name: 'a', start: 1, length: 2, type: 'TEXT' },
        { name: 'b', start: 4, length: 1, type: 'TEXT' }
      ],
      derived: []
    };
    expect(() => assertLayoutConsistent(gapped)).toThrow(LayoutError);
    expect(() => assertLayoutConsistent(gapped)).toThrow(
      'Layout gapped: field "b" starts at column 4, expected 3.'
    );
  });

  it('rejects duplicate names and unknown derived sources', () => {
    const duplicate: FixedWidthLayout = {
      name: 'duplicate',
      fields: [
        { name: 'a', start: 1, length: 1, type: 'TEXT' },
        { name: 'a', start: 2, length: 1, type: 'TEXT' }
      ],
      derived: []
    };
    expect(() => assertLayoutConsistent(duplicate)).toThrow('Layout duplicate: duplicate field "a".');

    const unknown: FixedWidthLayout = {
      name: 'unknown',
      fields: [{ name: 'a', start: 1, length: 1, type: 'TEXT' }],
      derived: [{ name: 'c', from: ['a', 'b'], type: 'TEXT' }]
    };
    expect(() => assertLayoutConsistent(unknown)).toThrow(
      'Layout unknown: derived field "c" references unknown fields: b.'
    );
  });
});

describe('loadFixedWidthLayout', () => {
  let dir: Awaited<ReturnType<typeof makeTempDir>>;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  it('loads the geographic header record layout', async () => {
    const ghr = await loadGhrLayout();
    expect(ghr.fields).toHaveLength(101);
    expect(layoutWidth(ghr)).toBe(500);
    expect(ghr.fields.find((field) => field.name === 'logrecno')).toEqual({
      name: 'logrecno',
      start: 19,
      length: 7,
      type: 'INTEGER'
    });

    const columns = layoutColumns(ghr);
    expect(columns).toHaveLength(102);
    expect(columns[columns.length - 1]).toEqual({ name: 'geoid', type: 'TEXT' });
  });

  it('decodes a full header record with its GEOID', async () => {
    const ghr = await loadGhrLayout();
    const line = encodeFixedWidth(
      {
        fileid: 'UR1US',
        stusab: 'TX',
        sumlev: '070',
        logrecno: '0000042',
        statefp: '48',
        countyfp: '453',
        placefp: '05000',
        name: 'Austin city',
        pop100: '790390',
        intptlat: '+30.3071816',
        intptlon: '-097.7559964'
      },
      ghr
    );

    expect(line).toHaveLength(500);
    const record = decodeRecord(line, ghr);
    expect(record.stusab).toBe('TX');
    expect(record.logrecno).toBe('0000042');
    expect(record.intptlon).toBe('-097.7559964');
    expect(record.geoid).toBe('4805000');
  });

  it('defaults derived fields to an empty list', async () => {
    const path = join(dir.path, 'layout.json');
    await writeFile(path, JSON.stringify({ name: 'tiny', fields: [{ name: 'a', start: 1, length: 3, type: 'TEXT' }] }));
    const loaded = await loadFixedWidthLayout(path);
    expect(loaded.derived).toEqual([]);
  });

  it('rejects layouts that do not match the schema', async () => {
    const path = join(dir.path, 'layout.json');
    await writeFile(path, JSON.stringify({ name: 'bad', fields: [{ name: 'a', start: 0, length: 3, type: 'TEXT' }] }));
    await expect(loadFixedWidthLayout(path)).rejects.toBeInstanceOf(SchemaValidationError);
  });
});
