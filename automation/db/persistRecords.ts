/**
 * Persistence module: writes coerced records into the destination store.
 *
 * persistRecords():
 *   1. CREATE TABLE IF NOT EXISTS for the table (and anything it references)
 *   2. INSERT every record in one transaction
 *   3. Return { table, rowsInserted, durationMs }
 */

import { StoredRecord, TableDef, TableShape } from '../load/schema';
import { closePool, getPool, isPostgresUrl } from './client';
import { PgRecordStore } from './pgStore';
import { RecordStore } from './recordStore';
import { SqliteRecordStore } from './sqliteStore';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PersistResult {
  table: string;
  rowsInserted: number;
  durationMs: number;
}

// ---------------------------------------------------------------------------
// Store selection
// ---------------------------------------------------------------------------

/** postgres:// URLs go to Postgres; anything else is a SQLite file path. */
export async function openRecordStore(destination: string): Promise<RecordStore> {
  if (isPostgresUrl(destination)) {
    return new PgRecordStore(getPool(destination), closePool);
  }
  return SqliteRecordStore.open(destination);
}

/** Mask the password in a connection URL before it reaches a log line. */
export function describeDestination(destination: string): string {
  return isPostgresUrl(destination) ? destination.replace(/\/\/([^:@/]+):[^@/]*@/, '//$1:***@') : destination;
}

// ---------------------------------------------------------------------------
// Main entry
// ---------------------------------------------------------------------------

export async function persistRecords<R extends StoredRecord<R>>(
  store: RecordStore,
  table: TableDef<R>,
  records: ReadonlyArray<R>,
  schema: ReadonlyArray<TableShape> = [table]
): Promise<PersistResult> {
  const startTime = Date.now();

  await store.ensureSchema(schema);

  if (records.length === 0) {
    console.log(`  [db] ${table.table}: no rows to persist.`);
    return { table: table.table, rowsInserted: 0, durationMs: Date.now() - startTime };
  }

  const rowsInserted = await store.insertAll(table, records);
  const durationMs = Date.now() - startTime;
  console.log(`  [db] ${table.table}: ${rowsInserted} rows inserted in ${durationMs}ms`);

  return { table: table.table, rowsInserted, durationMs };
}
