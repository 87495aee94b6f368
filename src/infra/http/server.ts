import { loadConfig } from '../../config.js';
import { SafeAuditSink } from '../../application/audit.js';
import { PasswordHasher } from '../../domain/auth/password.js';
import { TokenCodec } from '../../domain/auth/tokenCodec.js';
import { PgAccountRepo } from '../db/accountRepo.js';
import { createPool } from '../db/pool.js';
import { LoggerAuditSink } from '../logging/auditSink.js';
import { createLogger } from '../logging/logger.js';
import { createApp } from './app.js';

const config = loadConfig();
const logger = createLogger({ level: config.logging.level, format: config.logging.format });

if (!config.databaseUrl) {
  throw new Error('DATABASE_URL environment variable is required');
}

const pool = createPool(config.databaseUrl, logger);
const audit = new SafeAuditSink(new LoggerAuditSink(logger.child({ logger: 'audit' })), logger);

const app = createApp({
  accounts: new PgAccountRepo(pool),
  hasher: new PasswordHasher(config.hashing),
  tokens: new TokenCodec({ secret: config.jwt.secret, algorithm: config.jwt.algorithm }),
  audit,
  logger,
  tokenTtlSeconds: config.jwt.ttlSeconds,
  rateLimiting: config.rateLimit.enabled,
  slowRequestThresholdMs: config.logging.slowRequestThresholdMs,
  docs: config.nodeEnv !== 'production',
  healthCheck: async () => {
    await pool.query('SELECT 1');
  },
});

const server = app.listen(config.port, () => {
  logger.info(`Server running on http://localhost:${config.port}`, {
    event_type: 'system',
    event_category: 'startup',
    environment: config.nodeEnv,
  });
});

function shutdown(signal: string): void {
  logger.info(`Received ${signal}, shutting down`, { event_type: 'system' });
  server.close(() => {
    pool
      .end()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error closing database pool', { error });
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
