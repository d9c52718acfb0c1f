/**
 * Postgres client: thin wrapper around node-postgres (pg).
 *
 * Used when the load destination is a postgres:// URL. Exports a singleton
 * pool per process.
 */

import pg from 'pg';

const { Pool } = pg;

// ---------------------------------------------------------------------------
// Singleton pool
// ---------------------------------------------------------------------------

let pool: pg.Pool | null = null;
let poolUrl: string | null = null;

export function getPool(connectionString: string): pg.Pool {
  if (pool && poolUrl !== connectionString) {
    throw new Error('A pool for a different DATABASE_URL is already open');
  }
  if (!pool) {
    pool = new Pool({
      connectionString,
      max: 2,
      idleTimeoutMillis: 30_000,
    });
    poolUrl = connectionString;
  }
  return pool;
}

// ---------------------------------------------------------------------------
// Connection lifecycle
// ---------------------------------------------------------------------------

/** True for postgres:// and postgresql:// URLs. */
export function isPostgresUrl(destination: string): boolean {
  return /^postgres(ql)?:\/\//i.test(destination);
}

/** Shut down the pool (call on process exit). */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    poolUrl = null;
  }
}
