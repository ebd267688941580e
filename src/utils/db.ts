/**
 * PostgreSQL access for the notification history.
 *
 * One shared pool per process, opened lazily from a {@link DbConfig} that the
 * configuration loader has already validated. Only the PostgreSQL history
 * store and the migration runner go through here.
 *
 * @module utils/db
 */

import pg from 'pg';

const { Pool } = pg;

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  /** Pool size; a monitor run issues one query at a time. */
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  ssl: boolean;
}

export const DEFAULT_DB_CONFIG: Readonly<DbConfig> = {
  host: 'localhost',
  port: 5432,
  database: 'task_monitor',
  user: 'postgres',
  password: '',
  max: 2,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000,
  ssl: false,
};

export function createPool(config: DbConfig): pg.Pool {
  return new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max,
    idleTimeoutMillis: config.idleTimeoutMillis,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
    ssl: config.ssl,
  });
}

let pool: pg.Pool | null = null;

/**
 * The shared pool. The first call opens it from `config`; later calls
 * return the same pool until {@link closePool}.
 */
export function getPool(config: DbConfig = DEFAULT_DB_CONFIG): pg.Pool {
  if (!pool) {
    pool = createPool(config);
  }
  return pool;
}

export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<pg.QueryResult<T>> {
  return getPool().query<T>(text, params);
}

export async function closePool(): Promise<void> {
  if (pool) {
    const open = pool;
    pool = null;
    await open.end();
  }
}
