/**
 * config/database.ts — PostgreSQL connection via Drizzle ORM
 *
 * Uses node-postgres Pool for connection management.
 * Only the `publish` command opens a connection; building facts never does.
 */
import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { env } from './env.ts';
import { childLogger } from '../shared/logger.ts';
import { MissingInputError } from '../shared/errors.ts';
import * as schema from '../db/schema.ts';

const { Pool } = pg;
const log = childLogger({ stage: 'db' });

let pool: pg.Pool | null = null;
let db: ReturnType<typeof drizzle<typeof schema>> | null = null;

/**
 * Get or create the database connection pool and Drizzle client.
 * Returns the cached instance after the first call.
 */
export function getDb() {
  if (db) return db;

  if (!env.ENABLE_DB || !env.DATABASE_URL) {
    throw new MissingInputError('DATABASE_URL', 'Set ENABLE_DB=true and DATABASE_URL to publish');
  }

  pool = new Pool({
    connectionString: env.DATABASE_URL,
    min: env.DB_POOL_MIN,
    max: env.DB_POOL_MAX,
    ssl: env.DB_SSL ? { rejectUnauthorized: false } : false,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  pool.on('error', (err) => {
    log.error({ err }, 'Unexpected pool error');
  });

  db = drizzle(pool, { schema });
  return db;
}

/**
 * Gracefully close the pool. Call on shutdown.
 */
export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
    log.info('Connection pool closed');
  }
}

export type Database = ReturnType<typeof getDb>;
