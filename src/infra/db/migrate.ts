import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import type { Logger } from '../logging/logger.js';
import type { DbPool } from './pool.js';

export const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

export interface Migration {
  filename: string;
  version: number;
}

/**
 * List `NNN_name.sql` files in version order.
 */
export async function getMigrations(dir: string): Promise<Migration[]> {
  const files = await readdir(dir);
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(pool: DbPool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: DbPool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(pool: DbPool, dir: string, migration: Migration): Promise<void> {
  const sql = await readFile(join(dir, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [migration.version]);
    await client.query('COMMIT');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Apply every pending migration, each in its own transaction.
 * Returns the versions applied by this run.
 */
export async function runMigrations(pool: DbPool, dir: string, logger: Logger): Promise<number[]> {
  await ensureMigrationsTable(pool);
  const migrations = await getMigrations(dir);
  const applied = await getAppliedMigrations(pool);

  const pending = migrations.filter((m) => !applied.includes(m.version));
  if (pending.length === 0) {
    logger.info('No pending migrations');
    return [];
  }

  logger.info(`Found ${pending.length} pending migration(s)`);
  for (const migration of pending) {
    await applyMigration(pool, dir, migration);
    logger.info(`Applied migration ${migration.version}: ${migration.filename}`);
  }

  return pending.map((m) => m.version);
}
