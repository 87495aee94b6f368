import { loadConfig } from '../config.js';
import { SafeAuditSink } from '../application/audit.js';
import { RegisterUseCase } from '../application/auth/register.js';
import { PasswordHasher } from '../domain/auth/password.js';
import { PgAccountRepo } from '../infra/db/accountRepo.js';
import { createPool } from '../infra/db/pool.js';
import { LoggerAuditSink } from '../infra/logging/auditSink.js';
import { createLogger } from '../infra/logging/logger.js';

/**
 * Bootstrap an administrator: npm run create-admin -- <email> <full name> <password>
 * An existing account with that email is promoted instead.
 */
async function main(): Promise<void> {
  const [email, fullName, password] = process.argv.slice(2);
  if (!email || !fullName || !password) {
    throw new Error('Usage: create-admin <email> <full name> <password>');
  }

  const config = loadConfig();
  const logger = createLogger({ level: config.logging.level, format: config.logging.format });
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const pool = createPool(config.databaseUrl, logger);
  try {
    const accounts = new PgAccountRepo(pool);
    const audit = new SafeAuditSink(new LoggerAuditSink(logger), logger);

    const account =
      (await accounts.findByEmail(email)) ??
      (await new RegisterUseCase(accounts, new PasswordHasher(config.hashing), audit, logger).execute({
        email,
        fullName,
        password,
      }));

    await accounts.applyChanges(account.id, { isAdmin: true, isActive: true }, new Date());
    audit.record({
      category: 'user_action',
      type: 'admin_granted',
      severity: 'medium',
      subjectId: account.id,
      description: `Admin rights granted to ${account.email} from the command line`,
      details: { email: account.email },
    });
    logger.info('Admin account ready', { user_id: account.id, email: account.email });
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error('create-admin failed:', error);
  process.exit(1);
});
