/**
 * CSV → typed record coercion for the bio and stats tables.
 *
 * Every cell arrives as text (or not at all). Text fields are trimmed and
 * default to ""; numeric fields that don't parse become null.
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import {
  BIO_TABLE,
  STATS_TABLE,
  BioRecord,
  StatsRecord,
  TableDef,
  WithExtra,
  sourceHeader,
} from './schema';

export type CsvRow = Record<string, string | undefined>;

export interface CoercionReport<R> {
  records: WithExtra<R>[];
  rowCount: number;
  /** Headers seen in the file that the table does not declare */
  unknownColumns: string[];
}

// ---------------------------------------------------------------------------
// Cell coercion
// ---------------------------------------------------------------------------

const INTEGER_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export function coerceText(value: string | null | undefined): string {
  return (value ?? '').trim();
}

export function coerceInt(value: string | null | undefined): number | null {
  const cleaned = coerceText(value);
  if (!INTEGER_RE.test(cleaned)) return null;
  const n = Number.parseInt(cleaned, 10);
  return Number.isSafeInteger(n) ? n : null;
}

export function coerceFloat(value: string | null | undefined): number | null {
  const cleaned = coerceText(value);
  if (!FLOAT_RE.test(cleaned)) return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

// ---------------------------------------------------------------------------
// Record constructors
// ---------------------------------------------------------------------------

function extraColumns<R>(table: TableDef<R>, row: CsvRow): Record<string, string> {
  const known = new Set(table.fields.map(sourceHeader));
  const extra: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) {
    if (!known.has(key)) extra[key] = coerceText(value);
  }
  return extra;
}

export function toBioRecord(row: CsvRow): WithExtra<BioRecord> {
  return {
    Number: coerceInt(row['Number']),
    Player: coerceText(row['Player']),
    FirstName: coerceText(row['FirstName']),
    LastName: coerceText(row['LastName']),
    Position: coerceText(row['Position']),
    Height: coerceText(row['Height']),
    Weight: coerceText(row['Weight']),
    Class: coerceText(row['Class']),
    Hometown: coerceText(row['Hometown']),
    HighSchool: coerceText(row['HighSchool']),
    extra: extraColumns(BIO_TABLE, row),
  };
}

export function toStatsRecord(row: CsvRow): WithExtra<StatsRecord> {
  return {
    Number: coerceInt(row['Number']),
    FirstName: coerceText(row['FirstName']),
    LastName: coerceText(row['LastName']),
    GP: coerceInt(row['GP']),
    G: coerceInt(row['G']),
    A: coerceInt(row['A']),
    PTS: coerceInt(row['PTS']),
    SH: coerceInt(row['SH']),
    SH_PCT: coerceFloat(row['SH_PCT']),
    plus_minus: coerceInt(row['plus_minus']),
    PPG: coerceInt(row['PPG']),
    SHG: coerceInt(row['SHG']),
    FG: coerceInt(row['FG']),
    GWG: coerceInt(row['GWG']),
    GTG: coerceInt(row['GTG']),
    OTG: coerceInt(row['OTG']),
    HTG: coerceInt(row['HTG']),
    UAG: coerceInt(row['UAG']),
    PN_PIM: coerceText(row['PN-PIM']),
    MIN: coerceInt(row['MIN']),
    MAJ: coerceInt(row['MAJ']),
    OTH: coerceInt(row['OTH']),
    BLK: coerceInt(row['BLK']),
    extra: extraColumns(STATS_TABLE, row),
  };
}

// ---------------------------------------------------------------------------
// Batch coercion
// ---------------------------------------------------------------------------

function coerceRows<R>(
  table: TableDef<R>,
  rows: CsvRow[],
  toRecord: (row: CsvRow) => WithExtra<R>
): CoercionReport<R> {
  const known = new Set(table.fields.map(sourceHeader));
  const unknown = new Set<string>();

  const records = rows.map(row => {
    for (const key of Object.keys(row)) {
      if (!known.has(key)) unknown.add(key);
    }
    return toRecord(row);
  });

  return { records, rowCount: rows.length, unknownColumns: [...unknown] };
}

export function coerceBioRows(rows: CsvRow[]): CoercionReport<BioRecord> {
  return coerceRows(BIO_TABLE, rows, toBioRecord);
}

export function coerceStatsRows(rows: CsvRow[]): CoercionReport<StatsRecord> {
  return coerceRows(STATS_TABLE, rows, toStatsRecord);
}

// ---------------------------------------------------------------------------
// File readers
// ---------------------------------------------------------------------------

function isCsvRow(value: unknown): value is CsvRow {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(v => v === undefined || typeof v === 'string');
}

export function parseCsvText(text: string): CsvRow[] {
  const parsed: unknown = parse(text, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!Array.isArray(parsed)) {
    throw new Error('CSV parser returned no rows');
  }
  return parsed.filter(isCsvRow);
}

export function readCsvFile(csvPath: string): CsvRow[] {
  return parseCsvText(fs.readFileSync(csvPath, 'utf8'));
}

export function readBioCsv(csvPath: string): CoercionReport<BioRecord> {
  return coerceBioRows(readCsvFile(csvPath));
}

export function readStatsCsv(csvPath: string): CoercionReport<StatsRecord> {
  return coerceStatsRows(readCsvFile(csvPath));
}
