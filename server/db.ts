import { Pool } from 'pg';
import { Kysely, PostgresDialect } from 'kysely';
import type { Database } from './db/types.js';
import {
  DB_CONNECTION_TIMEOUT_MS,
  DB_POOL_MAX,
  DB_SSL_ENABLED,
  DB_STATEMENT_TIMEOUT_MS,
  IS_PRODUCTION,
} from './config.js';

const dbSslRejectUnauthorized =
  String(process.env.DB_SSL_REJECT_UNAUTHORIZED || (IS_PRODUCTION ? 'true' : 'false')).toLowerCase() !== 'false';

export interface DatabaseHandle {
  pool: Pool;
  db: Kysely<Database>;
}

/**
 * Builds the pool and the Kysely instance on top of it. Jobs are short-lived
 * processes, so the pool stays small and every connection and statement is
 * bounded by a timeout.
 */
export function createDatabase(connectionString: string): DatabaseHandle {
  if (!connectionString) {
    throw new Error('DATABASE_URL is not configured');
  }
  const pool = new Pool({
    connectionString,
    ssl: DB_SSL_ENABLED ? { rejectUnauthorized: dbSslRejectUnauthorized } : undefined,
    max: DB_POOL_MAX,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: DB_CONNECTION_TIMEOUT_MS,
    statement_timeout: DB_STATEMENT_TIMEOUT_MS,
  });

  pool.on('error', (err) => {
    console.error('[db] Unexpected idle pool client error:', err instanceof Error ? err.message : String(err));
  });

  const db = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });

  return { pool, db };
}
