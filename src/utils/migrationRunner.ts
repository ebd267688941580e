/**
 * Simple migration runner for numbered SQL migration files.
 *
 * Reads SQL files from the migrations directory in order and executes them
 * against the database. Uses a `schema_migrations` table to track which
 * migrations have already been applied. Needed only for the PostgreSQL
 * history store.
 *
 * @module utils/migrationRunner
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type pg from 'pg';
import { ConfigError, loadDbConfig, loadDotEnv } from '../config/monitorConfig.js';
import { createLogger, toError, type LogOutput } from '../logging/logger.js';
import { closePool, getPool } from './db.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** Default migrations directory: `migrations/` at the package root. */
export const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, '..', '..', 'migrations');

/**
 * Ensure the schema_migrations tracking table exists.
 */
async function ensureMigrationsTable(client: pg.PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      filename VARCHAR(255) UNIQUE NOT NULL,
      applied_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
    );
  `);
}

/**
 * Get the list of already-applied migration filenames.
 */
async function getAppliedMigrations(client: pg.PoolClient): Promise<Set<string>> {
  const result = await client.query<{ filename: string }>(
    'SELECT filename FROM schema_migrations ORDER BY filename',
  );
  return new Set(result.rows.map((row) => row.filename));
}

/**
 * Read and sort migration files from the given directory.
 * Only `.sql` files are considered, sorted lexicographically by name.
 */
export function getMigrationFiles(migrationsDir: string = DEFAULT_MIGRATIONS_DIR): string[] {
  if (!fs.existsSync(migrationsDir)) {
    return [];
  }
  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();
}

/**
 * Run all pending migrations in order.
 *
 * Each migration is executed inside a transaction. If a migration
 * fails, its transaction is rolled back and the runner stops.
 *
 * @returns Array of filenames that were applied in this run.
 */
export async function runMigrations(
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR,
  poolOverride?: pg.Pool,
): Promise<string[]> {
  const pool = poolOverride ?? getPool();
  const client = await pool.connect();
  const applied: string[] = [];

  try {
    await ensureMigrationsTable(client);
    const alreadyApplied = await getAppliedMigrations(client);
    const files = getMigrationFiles(migrationsDir);

    for (const file of files) {
      if (alreadyApplied.has(file)) {
        continue;
      }

      const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');

      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [file]);
        await client.query('COMMIT');
        applied.push(file);
      } catch (err) {
        await client.query('ROLLBACK');
        throw new Error(
          `Migration ${file} failed: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      }
    }
  } finally {
    client.release();
  }

  return applied;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return fs.realpathSync(path.resolve(entry)) === __filename;
  } catch {
    return false;
  }
}

/** Apply pending migrations to the database named by the `DB_*` settings. */
export async function migrate(
  env: NodeJS.ProcessEnv = process.env,
  output?: LogOutput,
): Promise<number> {
  const logger = createLogger({ context: { operation: 'migrate' }, output });
  try {
    const applied = await runMigrations(DEFAULT_MIGRATIONS_DIR, getPool(loadDbConfig(env)));
    logger.info('Migrations applied', { applied });
    return 0;
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal('Invalid configuration', err, { issues: err.issues });
    } else {
      logger.fatal('Migration failed', toError(err));
    }
    return 1;
  } finally {
    await closePool();
  }
}

if (isEntryPoint()) {
  loadDotEnv();
  migrate()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      process.stderr.write(`Unexpected failure: ${toError(err).stack ?? String(err)}\n`);
      process.exitCode = 1;
    });
}
