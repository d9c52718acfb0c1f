/**
 * DDL and INSERT text generated from table definitions.
 *
 * Identifiers are always double-quoted so the mixed-case column names
 * (FirstName, SH_PCT, ...) survive in both SQLite and Postgres.
 */

import { FieldType, TableShape } from '../load/schema';

export type Dialect = 'sqlite' | 'postgres';

const COLUMN_TYPES: Record<Dialect, Record<FieldType, string>> = {
  sqlite: { integer: 'INTEGER', real: 'REAL', text: 'TEXT' },
  postgres: { integer: 'integer', real: 'double precision', text: 'text' },
};

export function quoteIdent(name: string): string {
  return '"' + name.replace(/"/g, '""') + '"';
}

export function createTableSql(table: TableShape, dialect: Dialect): string {
  const lines = table.fields.map(
    f => `  ${quoteIdent(f.name)} ${COLUMN_TYPES[dialect][f.type]}${f.nullable ? '' : ' NOT NULL'}`
  );

  const pk = table.fields.filter(f => f.primaryKey).map(f => quoteIdent(f.name));
  if (pk.length > 0) {
    lines.push(`  PRIMARY KEY (${pk.join(', ')})`);
  }

  // One FOREIGN KEY per referenced table, so a composite key stays composite
  const refs = new Map<string, Array<{ column: string; target: string }>>();
  for (const f of table.fields) {
    if (!f.references) continue;
    const list = refs.get(f.references.table) ?? [];
    list.push({ column: f.name, target: f.references.column });
    refs.set(f.references.table, list);
  }
  for (const [target, cols] of refs) {
    lines.push(
      `  FOREIGN KEY (${cols.map(c => quoteIdent(c.column)).join(', ')}) ` +
      `REFERENCES ${quoteIdent(target)} (${cols.map(c => quoteIdent(c.target)).join(', ')})`
    );
  }

  return `CREATE TABLE IF NOT EXISTS ${quoteIdent(table.table)} (\n${lines.join(',\n')}\n)`;
}

/** INSERT for `rowCount` rows: `?` placeholders for SQLite, `$n` for Postgres. */
export function insertSql(table: TableShape, dialect: Dialect, rowCount = 1): string {
  const cols = table.fields.map(f => quoteIdent(f.name));
  const valuesClauses: string[] = [];

  for (let i = 0; i < rowCount; i++) {
    const offset = i * cols.length;
    const placeholders = cols.map((_, j) => (dialect === 'sqlite' ? '?' : `$${offset + j + 1}`));
    valuesClauses.push(`(${placeholders.join(', ')})`);
  }

  return `INSERT INTO ${quoteIdent(table.table)} (${cols.join(', ')}) VALUES ${valuesClauses.join(', ')}`;
}
