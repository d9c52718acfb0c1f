/**
 * Postgres store: one pooled client per operation, one transaction per batch.
 *
 * Unlike SQLite, Postgres enforces the stats → bio foreign key, so stats rows
 * without a matching bio row abort their batch.
 */

import { StoredRecord, TableDef, TableShape, recordValues } from '../load/schema';
import { RecordStore } from './recordStore';
import { createTableSql, insertSql } from './sql';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The part of pg.PoolClient this store uses. */
export interface PgClientLike {
  query(text: string, params?: unknown[]): Promise<unknown>;
  /** Passing an error makes the pool discard the client instead of reusing it */
  release(err?: Error | boolean): void;
}

/** The part of pg.Pool this store uses. */
export interface PgPoolLike {
  connect(): Promise<PgClientLike>;
}

// Stays well under Postgres' 65535 bind parameters per statement
const BATCH_SIZE = 500;

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class PgRecordStore implements RecordStore {
  readonly kind = 'postgres' as const;

  constructor(
    private readonly pool: PgPoolLike,
    private readonly onClose: () => Promise<void> = async () => {}
  ) {}

  async ensureSchema(tables: ReadonlyArray<TableShape>): Promise<void> {
    const client = await this.pool.connect();
    try {
      for (const table of tables) {
        await client.query(createTableSql(table, 'postgres'));
      }
    } finally {
      client.release();
    }
  }

  async insertAll<R extends StoredRecord<R>>(
    table: TableDef<R>,
    records: ReadonlyArray<R>
  ): Promise<number> {
    const client = await this.pool.connect();
    let released = false;
    try {
      await client.query('BEGIN');
      for (let i = 0; i < records.length; i += BATCH_SIZE) {
        const batch = records.slice(i, i + BATCH_SIZE);
        const params = batch.flatMap(row => recordValues(table, row));
        await client.query(insertSql(table, 'postgres', batch.length), params);
      }
      await client.query('COMMIT');
      return records.length;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr: unknown) {
        const message = rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr);
        console.error(`  [db] ${table.table}: ROLLBACK failed: ${message}`);
        client.release(err instanceof Error ? err : true);
        released = true;
      }
      throw err;
    } finally {
      if (!released) client.release();
    }
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}
