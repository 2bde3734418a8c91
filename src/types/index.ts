export type ColumnType = 'TEXT' | 'INTEGER' | 'REAL';

export type SqlValue = string | number | null;

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
}

export interface TableSchema {
  name: string;
  columns: ColumnDefinition[];
  indexes?: string[][];
}

/** One positional column of a fixed-width record. `start` is 1-based, as in the Census technical documentation. */
export interface FixedWidthField {
  name: string;
  start: number;
  length: number;
  type: ColumnType;
}

/** A column computed from the raw slices of other fields, e.g. GEOID = STATE || PLACE. */
export interface DerivedField {
  name: string;
  from: string[];
  type: ColumnType;
}

export interface FixedWidthLayout {
  name: string;
  description?: string;
  fields: FixedWidthField[];
  derived: DerivedField[];
}

export type SourceFormat = 'delimited' | 'fixed-width';

export type Delimiter = ',' | '\t' | '|';

export interface SourceManifestEntry {
  id: string;
  path: string;
  table: string;
  format: SourceFormat;
  delimiter?: Delimiter;
  encoding: string;
  hasHeader: boolean;
  layout?: string;
  required?: boolean;
}

export interface SourceManifest {
  sources: SourceManifestEntry[];
}

interface SourceFileBase {
  id: string;
  /** Absolute path of the original (legacy-encoded) file. */
  path: string;
  table: string;
  encoding: string;
  hasHeader: boolean;
}

export interface DelimitedSourceFile extends SourceFileBase {
  format: 'delimited';
  delimiter: Delimiter;
}

export interface FixedWidthSourceFile extends SourceFileBase {
  format: 'fixed-width';
  layout: FixedWidthLayout;
}

export type SourceFile = DelimitedSourceFile | FixedWidthSourceFile;

export interface SourceRow {
  /** 1-based data record number within the file, header excluded. */
  record: number;
  values: string[];
}

export const PIPELINE_STEPS = ['extract', 'normalize', 'schema', 'load', 'join', 'export'] as const;

export type PipelineStep = (typeof PIPELINE_STEPS)[number];

export interface GeoFilter {
  /** Summary level code, e.g. `040` (state), `050` (county), `070` (place/remainder). */
  sumlev?: string;
  /** State USPS abbreviation, e.g. `TX`. */
  stusab?: string;
  geocomp?: string;
}

/**
 * Row of the `ghrp` table: every geographic header column plus the six
 * P2 (urban and rural) population counts of the matching `f02` record.
 * The right-hand counts are null when no population record shares the
 * header's log record number.
 */
export interface DenormalizedGeoRecord {
  [column: string]: SqlValue;
  logrecno: number | null;
  fileid: string | null;
  stusab: string | null;
  sumlev: string | null;
  geocomp: string | null;
  statefp: string | null;
  countyfp: string | null;
  placefp: string | null;
  geoid: string | null;
  name: string | null;
  pop100: number | null;
  hu100: number | null;
  intptlat: number | null;
  intptlon: number | null;
  p0020001: number | null;
  p0020002: number | null;
  p0020003: number | null;
  p0020004: number | null;
  p0020005: number | null;
  p0020006: number | null;
}
