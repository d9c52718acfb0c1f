import { StoredRecord, TableDef, TableShape } from '../load/schema';

/**
 * A relational destination for coerced records.
 *
 * `insertAll` is all-or-nothing: either every record of the batch is stored
 * or, on any error (a primary-key collision included), none is and the error
 * propagates. There is no update-on-conflict.
 */
export interface RecordStore {
  readonly kind: 'sqlite' | 'postgres';
  /** CREATE TABLE IF NOT EXISTS for each table, in the order given */
  ensureSchema(tables: ReadonlyArray<TableShape>): Promise<void>;
  insertAll<R extends StoredRecord<R>>(table: TableDef<R>, records: ReadonlyArray<R>): Promise<number>;
  close(): Promise<void>;
}
