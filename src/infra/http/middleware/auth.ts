import type { Request, RequestHandler } from 'express';
import type { Account } from '../../../domain/auth/account.js';
import type { RequestContext } from '../../../application/audit.js';
import type { AuthorizationGate } from '../../../application/auth/authorizationGate.js';
import type { IdentityResolver } from '../../../application/auth/identityResolver.js';
import { UnauthenticatedError } from '../../../application/errors.js';
import { asyncHandler } from './asyncHandler.js';
import { CORRELATION_HEADER } from './requestLogger.js';

export interface AuthRequest extends Request {
  account?: Account;
}

export function requestContext(req: Request): RequestContext {
  return {
    ip: req.ip,
    userAgent: req.get('user-agent'),
    correlationId: req.get(CORRELATION_HEADER),
  };
}

/**
 * The account attached by authMiddleware. Throws if the route was mounted without it.
 */
export function currentAccount(req: AuthRequest): Account {
  if (!req.account) {
    throw new UnauthenticatedError('NO_TOKEN');
  }
  return req.account;
}

/**
 * Resolve the bearer token into an account and attach it to the request.
 */
export function authMiddleware(resolver: IdentityResolver): RequestHandler {
  return asyncHandler(async (req: AuthRequest, _res, next) => {
    req.account = await resolver.resolve(req.headers.authorization, requestContext(req));
    next();
  });
}

/**
 * Admin-only guard. Must come after authMiddleware.
 */
export function adminMiddleware(gate: AuthorizationGate): RequestHandler {
  return (req: AuthRequest, _res, next) => {
    try {
      gate.requireAdmin(currentAccount(req), requestContext(req));
      next();
    } catch (error) {
      next(error);
    }
  };
}
