import type { Account, AccountChanges, AccountDirectory } from '../../domain/auth/account.js';
import type { PasswordHasher } from '../../domain/auth/password.js';
import type { Logger } from '../../infra/logging/logger.js';
import { withTiming } from '../../infra/logging/performance.js';
import { type RequestContext, type SafeAuditSink, contextDetails } from '../audit.js';
import { InvalidCredentialsError, NotFoundError } from '../errors.js';

export interface Pagination {
  skip: number;
  limit: number;
}

export interface PaginationMeta {
  totalItems: number;
  totalPages: number;
  currentPage: number;
  limit: number;
}

export interface AccountPage {
  items: Account[];
  pagination: PaginationMeta;
}

export function paginationMeta(totalItems: number, { skip, limit }: Pagination): PaginationMeta {
  return {
    totalItems,
    totalPages: Math.ceil(totalItems / limit),
    currentPage: Math.floor(skip / limit) + 1,
    limit,
  };
}

const USER_NOT_FOUND = 'User not found';

/**
 * Profile lookups and account maintenance. Callers are expected to have resolved
 * the requester (and, for admin operations, passed the authorization gate).
 */
export class AccountService {
  constructor(
    private accounts: AccountDirectory,
    private hasher: PasswordHasher,
    private audit: SafeAuditSink,
    private logger: Logger
  ) {}

  async getProfile(requester: Account, accountId: string, context: RequestContext = {}): Promise<Account> {
    return withTiming(this.logger, 'accounts.getProfile', async () => {
      const account =
        accountId === requester.id ? requester : await this.accounts.findById(accountId);
      if (!account) {
        throw new NotFoundError(USER_NOT_FOUND);
      }

      this.audit.record({
        category: 'data_access',
        type: 'user_profile_read',
        severity: 'info',
        subjectId: requester.id,
        description: 'Data access: read on user_profile',
        details: {
          resource_type: 'user_profile',
          resource_id: accountId,
          operation: 'read',
          ...contextDetails(context),
        },
      });

      return account;
    });
  }

  async listAccounts(pagination: Pagination): Promise<AccountPage> {
    const [items, total] = await Promise.all([
      this.accounts.list(pagination.skip, pagination.limit),
      this.accounts.count(),
    ]);
    return { items, pagination: paginationMeta(total, pagination) };
  }

  async updateAccount(
    actor: Account,
    accountId: string,
    changes: AccountChanges,
    context: RequestContext = {}
  ): Promise<Account> {
    return withTiming(this.logger, 'accounts.updateAccount', async () => {
      const updated = await this.accounts.applyChanges(accountId, changes, new Date());
      if (!updated) {
        throw new NotFoundError(USER_NOT_FOUND);
      }

      this.audit.record({
        category: 'user_action',
        type: 'user_update',
        severity: 'info',
        subjectId: actor.id,
        description: 'User action: user_update',
        details: {
          resource: `user:${accountId}`,
          updated_fields: changes,
          ...contextDetails(context),
        },
      });

      return updated;
    });
  }

  async changePassword(
    account: Account,
    currentPassword: string,
    newPassword: string,
    context: RequestContext = {}
  ): Promise<void> {
    return withTiming(this.logger, 'accounts.changePassword', async () => {
      const matches = await this.hasher.verify(currentPassword, account.passwordHash);
      if (!matches) {
        this.audit.record({
          category: 'authentication',
          type: 'password_change_failed',
          severity: 'low',
          subjectId: account.id,
          description: 'Password change rejected: current password did not match',
          details: contextDetails(context),
        });
        throw new InvalidCredentialsError('Current password is incorrect');
      }

      const passwordHash = await this.hasher.hash(newPassword);
      await this.accounts.updatePassword(account.id, passwordHash, new Date());

      this.audit.record({
        category: 'user_action',
        type: 'password_change',
        severity: 'info',
        subjectId: account.id,
        description: 'User action: password_change',
        details: contextDetails(context),
      });
    });
  }
}
