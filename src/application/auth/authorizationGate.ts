import type { Account } from '../../domain/auth/account.js';
import { type RequestContext, type SafeAuditSink, contextDetails } from '../audit.js';
import { ForbiddenError } from '../errors.js';

/**
 * Privilege check applied after the identity has been resolved.
 */
export class AuthorizationGate {
  constructor(private readonly audit: SafeAuditSink) {}

  requireAdmin(account: Account, context: RequestContext = {}): Account {
    if (account.isAdmin) {
      return account;
    }

    this.audit.record({
      category: 'security',
      type: 'privilege_escalation_attempt',
      severity: 'high',
      subjectId: account.id,
      description: `Non-admin user ${account.email} attempted an admin operation`,
      details: { actor_id: account.id, actor_email: account.email, ...contextDetails(context) },
    });
    throw new ForbiddenError();
  }
}
