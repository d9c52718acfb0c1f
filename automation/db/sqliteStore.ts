import fs from 'fs';
import path from 'path';
import initSqlJs, { type Database, type SqlJsStatic, type SqlValue as SqlJsValue } from 'sql.js';
import { StoredRecord, TableDef, TableShape, recordValues } from '../load/schema';
import { RecordStore } from './recordStore';
import { createTableSql, insertSql } from './sql';

// ---------------------------------------------------------------------------
// sql.js runtime
// ---------------------------------------------------------------------------

let sqlJs: Promise<SqlJsStatic> | null = null;

/** Loads the WASM build once per process, from the installed package. */
function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    const distDir = path.dirname(require.resolve('sql.js'));
    sqlJs = initSqlJs({ locateFile: (file: string) => path.join(distDir, file) });
  }
  return sqlJs;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/**
 * Embedded store backed by a SQLite file.
 *
 * sql.js keeps the database in memory; the file is read once on open and
 * rewritten after the schema step and after every committed batch. Foreign
 * keys are declared but left unenforced (no `PRAGMA foreign_keys = ON`), so
 * stats may load before (or without) their bio rows.
 */
export class SqliteRecordStore implements RecordStore {
  readonly kind = 'sqlite' as const;

  constructor(
    private readonly db: Database,
    private readonly filename: string | null = null
  ) {}

  /** Open (or start) the database file at `filename`. */
  static async open(filename: string): Promise<SqliteRecordStore> {
    const SQL = await loadSqlJs();
    const bytes = fs.existsSync(filename) ? fs.readFileSync(filename) : null;
    return new SqliteRecordStore(new SQL.Database(bytes), filename);
  }

  /** A database that lives only as long as the store. */
  static async inMemory(): Promise<SqliteRecordStore> {
    const SQL = await loadSqlJs();
    return new SqliteRecordStore(new SQL.Database());
  }

  async ensureSchema(tables: ReadonlyArray<TableShape>): Promise<void> {
    for (const table of tables) {
      this.db.run(createTableSql(table, 'sqlite'));
    }
    this.save();
  }

  async insertAll<R extends StoredRecord<R>>(
    table: TableDef<R>,
    records: ReadonlyArray<R>
  ): Promise<number> {
    const stmt = this.db.prepare(insertSql(table, 'sqlite'));
    try {
      this.db.run('BEGIN');
      try {
        for (const row of records) {
          stmt.run(recordValues(table, row));
        }
        this.db.run('COMMIT');
      } catch (err) {
        this.db.run('ROLLBACK');
        throw err;
      }
    } finally {
      stmt.free();
    }

    this.save();
    return records.length;
  }

  /** Rows of a SELECT as column → value objects. */
  query(sql: string): Array<Record<string, SqlJsValue>> {
    const stmt = this.db.prepare(sql);
    try {
      const rows: Array<Record<string, SqlJsValue>> = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows;
    } finally {
      stmt.free();
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private save(): void {
    if (this.filename === null) return;
    fs.mkdirSync(path.dirname(path.resolve(this.filename)), { recursive: true });
    fs.writeFileSync(this.filename, this.db.export());
  }
}
