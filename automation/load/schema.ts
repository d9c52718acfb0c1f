/**
 * Table definitions shared by the CSV coercer and both record stores.
 *
 * Records are plain objects keyed by stored column name; a `source` header is
 * only given where the CSV spells the column differently.
 */

export type SqlValue = string | number | null;

export type FieldType = 'integer' | 'real' | 'text';

export interface FieldDef<K extends string = string> {
  name: K;
  /** CSV header when it differs from the stored name */
  source?: string;
  type: FieldType;
  nullable: boolean;
  primaryKey?: boolean;
  references?: { table: string; column: string };
  description?: string;
}

/** A table without its record type, as the DDL builders see it. */
export interface TableShape {
  table: string;
  fields: ReadonlyArray<FieldDef>;
}

export interface TableDef<R> extends TableShape {
  fields: ReadonlyArray<FieldDef<keyof R & string>>;
}

/** Records whose every column holds a value a SQL driver can bind. */
export type StoredRecord<R> = { [K in keyof R]: SqlValue };

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export interface BioRecord {
  Number: number | null;
  Player: string;
  FirstName: string;
  LastName: string;
  Position: string;
  Height: string;
  Weight: string;
  Class: string;
  Hometown: string;
  HighSchool: string;
}

export const STATS_INTEGER_FIELDS = [
  'GP',
  'G',
  'A',
  'PTS',
  'SH',
  'plus_minus',
  'PPG',
  'SHG',
  'FG',
  'GWG',
  'GTG',
  'OTG',
  'HTG',
  'UAG',
  'MIN',
  'MAJ',
  'OTH',
  'BLK',
] as const;

export type StatsIntegerField = (typeof STATS_INTEGER_FIELDS)[number];

export type StatsRecord = {
  Number: number | null;
  FirstName: string;
  LastName: string;
  SH_PCT: number | null;
  /** Penalties - PIM, kept as the raw text */
  PN_PIM: string;
} & Record<StatsIntegerField, number | null>;

/** A coerced record plus any CSV columns the schema does not declare. */
export type WithExtra<R> = R & { extra: Record<string, string> };

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

export const BIO_TABLE: TableDef<BioRecord> = {
  table: 'bio',
  fields: [
    { name: 'Number', type: 'integer', nullable: true, description: 'Jersey number' },
    { name: 'Player', type: 'text', nullable: true, description: 'Full name' },
    { name: 'FirstName', type: 'text', nullable: false, primaryKey: true },
    { name: 'LastName', type: 'text', nullable: false, primaryKey: true },
    { name: 'Position', type: 'text', nullable: true },
    { name: 'Height', type: 'text', nullable: true },
    { name: 'Weight', type: 'text', nullable: true },
    { name: 'Class', type: 'text', nullable: true },
    { name: 'Hometown', type: 'text', nullable: true },
    { name: 'HighSchool', type: 'text', nullable: true },
  ],
};

const statsInteger = (name: StatsIntegerField): FieldDef<StatsIntegerField> => ({
  name,
  type: 'integer',
  nullable: true,
});

export const STATS_TABLE: TableDef<StatsRecord> = {
  table: 'stats',
  fields: [
    { name: 'Number', type: 'integer', nullable: true, description: 'Jersey number' },
    {
      name: 'FirstName',
      type: 'text',
      nullable: false,
      primaryKey: true,
      references: { table: 'bio', column: 'FirstName' },
    },
    {
      name: 'LastName',
      type: 'text',
      nullable: false,
      primaryKey: true,
      references: { table: 'bio', column: 'LastName' },
    },
    ...(['GP', 'G', 'A', 'PTS', 'SH'] as const).map(statsInteger),
    { name: 'SH_PCT', type: 'real', nullable: true },
    ...(['plus_minus', 'PPG', 'SHG', 'FG', 'GWG', 'GTG', 'OTG', 'HTG', 'UAG'] as const).map(statsInteger),
    { name: 'PN_PIM', source: 'PN-PIM', type: 'text', nullable: true, description: 'Penalty - PIM (raw)' },
    ...(['MIN', 'MAJ', 'OTH', 'BLK'] as const).map(statsInteger),
  ],
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function sourceHeader(field: FieldDef): string {
  return field.source ?? field.name;
}

/** Column values of a record in field order, ready for a parameterised INSERT. */
export function recordValues<R extends StoredRecord<R>>(table: TableDef<R>, record: R): SqlValue[] {
  return table.fields.map(f => record[f.name]);
}
