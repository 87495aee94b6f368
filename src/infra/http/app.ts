import express from 'express';
import type { AccountDirectory } from '../../domain/auth/account.js';
import type { PasswordHasher } from '../../domain/auth/password.js';
import type { TokenCodec } from '../../domain/auth/tokenCodec.js';
import type { SafeAuditSink } from '../../application/audit.js';
import { AccountService } from '../../application/accounts/accountService.js';
import { AuthorizationGate } from '../../application/auth/authorizationGate.js';
import { IdentityResolver } from '../../application/auth/identityResolver.js';
import { LoginUseCase } from '../../application/auth/login.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import { NotFoundError } from '../../application/errors.js';
import type { Logger } from '../logging/logger.js';
import { adminMiddleware, authMiddleware } from './middleware/auth.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import { createRateLimiters } from './middleware/rateLimit.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createAuthRoutes } from './routes/auth.js';
import { createDocsRoutes } from './routes/docs.js';
import { createUserRoutes } from './routes/users.js';
import { buildOpenApiSpec } from './swagger.js';

export interface AppDependencies {
  accounts: AccountDirectory;
  hasher: PasswordHasher;
  tokens: TokenCodec;
  audit: SafeAuditSink;
  logger: Logger;
  tokenTtlSeconds: number;
  rateLimiting: boolean;
  slowRequestThresholdMs: number;
  /** Mount Swagger UI at /docs and the OpenAPI document at /openapi.json. */
  docs: boolean;
  /** Rejects when the backing store is unreachable. */
  healthCheck: () => Promise<void>;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies): express.Application {
  const { accounts, hasher, tokens, audit, logger } = deps;

  const resolver = new IdentityResolver(tokens, accounts, audit, logger);
  const gate = new AuthorizationGate(audit);
  const register = new RegisterUseCase(accounts, hasher, audit, logger);
  const login = new LoginUseCase({
    accounts,
    hasher,
    tokens,
    audit,
    logger,
    tokenTtlSeconds: deps.tokenTtlSeconds,
  });
  const accountService = new AccountService(accounts, hasher, audit, logger);
  const limiters = createRateLimiters(deps.rateLimiting);

  const app = express();
  app.disable('x-powered-by');

  // Middleware
  app.use(requestLogger(logger, { slowRequestThresholdMs: deps.slowRequestThresholdMs }));
  app.use(express.json());

  // Health check endpoint (no auth, no rate limit)
  app.get('/healthz', (_req, res) => {
    withTimeout(deps.healthCheck(), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((error: unknown) => {
        logger.error('Health check failed', { error });
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      });
  });

  if (deps.docs) {
    app.use(createDocsRoutes(buildOpenApiSpec()));
  }

  app.use('/api', limiters.api);
  app.use('/api/auth', createAuthRoutes({ register, login, limiters }));
  app.use(
    '/api/users',
    createUserRoutes({
      accounts: accountService,
      authenticate: authMiddleware(resolver),
      requireAdmin: adminMiddleware(gate),
    })
  );

  app.use((_req, _res, next) => {
    next(new NotFoundError('Route not found'));
  });

  // Error handler (must be last)
  app.use(createErrorHandler(logger));

  return app;
}
