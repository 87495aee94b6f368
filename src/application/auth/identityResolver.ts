import type { Account, AccountDirectory } from '../../domain/auth/account.js';
import type { TokenCodec, TokenRejectionReason } from '../../domain/auth/tokenCodec.js';
import type { Logger } from '../../infra/logging/logger.js';
import { type RequestContext, type SafeAuditSink, contextDetails } from '../audit.js';
import { AccountInactiveError, UnauthenticatedError } from '../errors.js';

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

/**
 * Pull the token out of an `Authorization` header value.
 * Returns null when the header is absent or uses another scheme.
 */
export function extractBearerToken(authorization: string | undefined): string | null {
  if (!authorization) {
    return null;
  }
  const match = BEARER_PATTERN.exec(authorization.trim());
  return match ? match[1] : null;
}

/**
 * Resolves the account behind a bearer token:
 * extract -> decode -> lookup -> active check. Every failure is final.
 */
export class IdentityResolver {
  constructor(
    private readonly tokens: TokenCodec,
    private readonly accounts: AccountDirectory,
    private readonly audit: SafeAuditSink,
    private readonly logger: Logger
  ) {}

  async resolve(authorization: string | undefined, context: RequestContext = {}): Promise<Account> {
    const token = extractBearerToken(authorization);
    if (!token) {
      this.logger.debug('Request without bearer token', { reason: 'NO_TOKEN' });
      throw new UnauthenticatedError('NO_TOKEN');
    }

    const verification = this.tokens.verify(token);
    if (!verification.ok) {
      throw this.rejectToken(verification.reason, context);
    }
    const { claim } = verification;

    const account = await this.accounts.findByEmail(claim.sub);
    if (!account) {
      this.logger.warn('Valid token for unknown subject', {
        event_type: 'authentication',
        reason: 'UNKNOWN_SUBJECT',
      });
      this.audit.record({
        category: 'security',
        type: 'token_for_unknown_subject',
        severity: 'high',
        description: 'Validly signed token presented for a subject with no account',
        details: {
          subject: claim.sub,
          claim_expires_at: new Date(claim.exp * 1000).toISOString(),
          ...contextDetails(context),
        },
      });
      throw new UnauthenticatedError('UNKNOWN_SUBJECT');
    }

    if (!account.isActive) {
      this.audit.record({
        category: 'security',
        type: 'inactive_user_access_attempt',
        severity: 'medium',
        subjectId: account.id,
        description: `Inactive user ${account.email} attempted to access the API`,
        details: { email: account.email, ...contextDetails(context) },
      });
      throw new AccountInactiveError();
    }

    this.audit.record({
      category: 'data_access',
      type: 'authentication',
      severity: 'info',
      subjectId: account.id,
      description: 'Bearer token authenticated',
      details: { resource_type: 'user', operation: 'read', ...contextDetails(context) },
    });

    return account;
  }

  private rejectToken(reason: TokenRejectionReason, context: RequestContext): UnauthenticatedError {
    this.logger.warn('Bearer token rejected', { event_type: 'authentication', reason });
    this.audit.record({
      category: 'security',
      type: 'invalid_token',
      severity: reason === 'BAD_SIGNATURE' ? 'medium' : 'low',
      description: `Bearer token rejected: ${reason}`,
      details: { reason, ...contextDetails(context) },
    });
    return new UnauthenticatedError(reason);
  }
}
