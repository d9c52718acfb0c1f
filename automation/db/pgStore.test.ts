import { describe, it, expect, afterEach, vi } from 'vitest';
import { BIO_TABLE, BioRecord } from '../load/schema';
import { PgClientLike, PgPoolLike, PgRecordStore } from './pgStore';

/** Records every statement; fails each statement matching one of `failures`. */
class FakeClient implements PgClientLike {
  readonly statements: Array<{ text: string; params?: unknown[] }> = [];
  readonly releases: Array<Error | boolean | undefined> = [];

  constructor(private readonly failures: Array<[RegExp, string]> = []) {}

  async query(text: string, params?: unknown[]): Promise<unknown> {
    this.statements.push({ text, params });
    const failure = this.failures.find(([pattern]) => pattern.test(text));
    if (failure) throw new Error(failure[1]);
    return { rows: [] };
  }

  release(err?: Error | boolean): void {
    this.releases.push(err);
  }
}

const DUPLICATE_KEY = 'duplicate key value violates unique constraint "bio_pkey"';

function poolFor(client: FakeClient): PgPoolLike {
  return { connect: async () => client };
}

function bio(i: number): BioRecord {
  return {
    Number: i,
    Player: `Player ${i}`,
    FirstName: `First${i}`,
    LastName: `Last${i}`,
    Position: '',
    Height: '',
    Weight: '',
    Class: '',
    Hometown: '',
    HighSchool: '',
  };
}

describe('PgRecordStore', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('creates each table in order on one client', async () => {
    const client = new FakeClient();
    const store = new PgRecordStore(poolFor(client));

    await store.ensureSchema([BIO_TABLE]);

    expect(client.statements).toHaveLength(1);
    expect(client.statements[0].text.startsWith('CREATE TABLE IF NOT EXISTS "bio" (')).toBe(true);
    expect(client.releases).toEqual([undefined]);
  });

  it('wraps the inserts in a transaction', async () => {
    const client = new FakeClient();
    const store = new PgRecordStore(poolFor(client));

    const inserted = await store.insertAll<BioRecord>(BIO_TABLE, [bio(1), bio(2)]);

    expect(inserted).toBe(2);
    expect(client.statements.map(s => s.text.split(' (')[0])).toEqual([
      'BEGIN',
      'INSERT INTO "bio"',
      'COMMIT',
    ]);
    expect(client.statements[1].params).toEqual([
      1, 'Player 1', 'First1', 'Last1', '', '', '', '', '', '',
      2, 'Player 2', 'First2', 'Last2', '', '', '', '', '', '',
    ]);
    expect(client.releases).toEqual([undefined]);
  });

  it('splits large loads into batches of 500 rows', async () => {
    const client = new FakeClient();
    const store = new PgRecordStore(poolFor(client));
    const records = Array.from({ length: 501 }, (_, i) => bio(i));

    await store.insertAll<BioRecord>(BIO_TABLE, records);

    const inserts = client.statements.filter(s => s.text.startsWith('INSERT'));
    expect(inserts.map(s => s.params?.length)).toEqual([5000, 10]);
  });

  it('rolls back and rethrows when an insert fails', async () => {
    const client = new FakeClient([[/^INSERT/, DUPLICATE_KEY]]);
    const store = new PgRecordStore(poolFor(client));

    await expect(store.insertAll<BioRecord>(BIO_TABLE, [bio(1)])).rejects.toThrow(DUPLICATE_KEY);
    expect(client.statements.map(s => s.text.split(' (')[0])).toEqual([
      'BEGIN',
      'INSERT INTO "bio"',
      'ROLLBACK',
    ]);
    expect(client.releases).toEqual([undefined]);
  });

  it('keeps the insert error and discards the client when ROLLBACK also fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const client = new FakeClient([
      [/^INSERT/, DUPLICATE_KEY],
      [/^ROLLBACK/, 'Connection terminated unexpectedly'],
    ]);
    const store = new PgRecordStore(poolFor(client));

    await expect(store.insertAll<BioRecord>(BIO_TABLE, [bio(1)])).rejects.toThrow(DUPLICATE_KEY);

    expect(client.releases).toHaveLength(1);
    expect(client.releases[0]).toBeInstanceOf(Error);
    expect(client.releases[0]).toHaveProperty('message', DUPLICATE_KEY);
    expect(console.error).toHaveBeenCalledWith('  [db] bio: ROLLBACK failed: Connection terminated unexpectedly');
  });

  it('runs the close hook', async () => {
    const onClose = vi.fn(async () => {});
    const store = new PgRecordStore(poolFor(new FakeClient()), onClose);

    await store.close();

    expect(onClose).toHaveBeenCalledTimes(1);
  });
});
