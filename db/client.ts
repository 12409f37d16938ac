/**
 * Retention Database Client
 *
 * One lazily created pg pool shared by the postgres concept source.
 * The connection string comes from configureDatabase(), falling back to
 * RETENTION_DATABASE_URL.
 */

import { Pool, type QueryResultRow } from 'pg';

const POOL_SIZE = 5;
const IDLE_TIMEOUT_MS = 30_000;
const CONNECT_TIMEOUT_MS = 10_000;

let pool: Pool | null = null;
let connectionString: string | undefined;

export function configureDatabase(url: string): void {
  connectionString = url;
}

export function getPool(): Pool {
  if (pool) return pool;

  const url = connectionString ?? process.env.RETENTION_DATABASE_URL;
  if (!url) {
    throw new Error('No database configured: set RETENTION_DATABASE_URL');
  }

  pool = new Pool({
    connectionString: url,
    max: POOL_SIZE,
    idleTimeoutMillis: IDLE_TIMEOUT_MS,
    connectionTimeoutMillis: CONNECT_TIMEOUT_MS,
  });
  // An idle client dropping must not crash the process
  pool.on('error', (err) => {
    console.error('[retention-db] idle client error:', err.message);
  });

  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<T[]> {
  const { rows } = await getPool().query<T>(text, params);
  return rows;
}

/** First row, or null when the query matched nothing */
export async function queryOne<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<T | null> {
  const [first] = await query<T>(text, params);
  return first ?? null;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const closing = pool;
  pool = null;
  await closing.end();
}
