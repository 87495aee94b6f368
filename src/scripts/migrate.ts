import { loadConfig } from '../config.js';
import { createLogger } from '../infra/logging/logger.js';
import { createPool } from '../infra/db/pool.js';
import { MIGRATIONS_DIR, runMigrations } from '../infra/db/migrate.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logging.level, format: config.logging.format });
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const pool = createPool(config.databaseUrl, logger);
  try {
    logger.info('Starting migrations...');
    const applied = await runMigrations(pool, MIGRATIONS_DIR, logger);
    logger.info('Migrations complete', { applied });
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error('Migration failed:', error);
  process.exit(1);
});
