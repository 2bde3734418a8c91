import { layoutColumns } from '../lib/fixedWidth.js';
import type { ColumnDefinition, ColumnType, FixedWidthLayout, TableSchema } from '../types/index.js';

export const HEADER_TABLE = 'ghr';
export const POPULATION_TABLE = 'f02';
export const DENORMALIZED_TABLE = 'ghrp';

export const LOG_RECORD_COLUMN = 'logrecno';

/**
 * P2 (urban and rural) counts: total, urban, inside urbanized areas,
 * inside urban clusters, rural, not defined for this file.
 */
export const POPULATION_COLUMNS = [
  'p0020001',
  'p0020002',
  'p0020003',
  'p0020004',
  'p0020005',
  'p0020006'
] as const;

function columns(type: ColumnType, ...names: string[]): ColumnDefinition[] {
  return names.map((name) => ({ name, type }));
}

export const REFERENCE_TABLES: readonly TableSchema[] = [
  {
    name: 'state',
    columns: columns('TEXT', 'statefp', 'stusps', 'name', 'statens'),
    indexes: [['statefp'], ['stusps']]
  },
  {
    name: 'county',
    columns: columns('TEXT', 'stusps', 'statefp', 'countyfp', 'name', 'classfp'),
    indexes: [['statefp', 'countyfp']]
  },
  {
    name: 'cbsa',
    columns: columns(
      'TEXT',
      'cbsa_code',
      'metro_division_code',
      'csa_code',
      'cbsa_name',
      'cbsa_type',
      'metro_division_name',
      'csa_name',
      'county_name',
      'state_name',
      'statefp',
      'countyfp',
      'county_type'
    ),
    indexes: [['statefp', 'countyfp'], ['cbsa_code']]
  },
  {
    name: 'place',
    columns: [
      ...columns('TEXT', 'stusps', 'geoid', 'ansicode', 'name', 'lsad_code', 'funcstat'),
      ...columns('INTEGER', 'pop10', 'hu10', 'aland', 'awater'),
      ...columns('REAL', 'aland_sqmi', 'awater_sqmi', 'intptlat', 'intptlong')
    ],
    indexes: [['geoid']]
  },
  {
    name: 'lsad',
    columns: columns('TEXT', 'lsad_code', 'lsad_description', 'geo_entity_type'),
    indexes: [['lsad_code']]
  },
  {
    name: 'geoclass',
    columns: columns('TEXT', 'geoclassfp', 'category', 'name', 'description'),
    indexes: [['geoclassfp']]
  },
  {
    name: POPULATION_TABLE,
    columns: [
      ...columns('TEXT', 'fileid', 'stusab', 'chariter', 'cifsn'),
      ...columns('INTEGER', LOG_RECORD_COLUMN, ...POPULATION_COLUMNS)
    ],
    indexes: [[LOG_RECORD_COLUMN]]
  }
];

/** Table schema for records decoded with a fixed-width layout. */
export function fixedWidthTableSchema(name: string, layout: FixedWidthLayout): TableSchema {
  const tableColumns = layoutColumns(layout);
  const indexes = [LOG_RECORD_COLUMN, 'sumlev', 'geoid']
    .filter((column) => tableColumns.some((candidate) => candidate.name === column))
    .map((column) => [column]);
  return { name, columns: tableColumns, indexes };
}

export function findReferenceTable(name: string): TableSchema | undefined {
  return REFERENCE_TABLES.find((schema) => schema.name === name);
}
