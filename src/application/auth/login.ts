import { randomUUID } from 'crypto';
import type { Account, AccountDirectory } from '../../domain/auth/account.js';
import type { PasswordHasher } from '../../domain/auth/password.js';
import type { TokenCodec } from '../../domain/auth/tokenCodec.js';
import type { Logger } from '../../infra/logging/logger.js';
import { withTiming } from '../../infra/logging/performance.js';
import { type RequestContext, type SafeAuditSink, contextDetails } from '../audit.js';
import { AccountInactiveError, InvalidCredentialsError } from '../errors.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number;
  userId: string;
}

export interface LoginDependencies {
  accounts: AccountDirectory;
  hasher: PasswordHasher;
  tokens: TokenCodec;
  audit: SafeAuditSink;
  logger: Logger;
  tokenTtlSeconds: number;
  now?: () => Date;
}

export class LoginUseCase {
  private readonly now: () => Date;
  private decoyHash?: Promise<string>;

  constructor(private readonly deps: LoginDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async execute(command: LoginCommand, context: RequestContext = {}): Promise<LoginResult> {
    return withTiming(this.deps.logger, 'auth.login', () => this.login(command, context));
  }

  private async login(command: LoginCommand, context: RequestContext): Promise<LoginResult> {
    const { accounts, hasher, tokens, logger } = this.deps;
    logger.info('Login attempt', { event_type: 'authentication', email: command.email });

    const account = await accounts.findByEmail(command.email);
    if (!account) {
      // Same hashing work as a real mismatch
      await hasher.verify(command.password, await this.decoy());
      this.recordFailure(command.email, 'unknown_email', context);
      throw new InvalidCredentialsError();
    }

    const passwordMatches = await hasher.verify(command.password, account.passwordHash);
    if (!passwordMatches) {
      this.recordFailure(command.email, 'invalid_password', context, account.id);
      throw new InvalidCredentialsError();
    }

    if (!account.isActive) {
      this.recordFailure(command.email, 'inactive_account', context, account.id);
      this.deps.audit.record({
        category: 'security',
        type: 'inactive_user_login_attempt',
        severity: 'medium',
        subjectId: account.id,
        description: `Inactive user ${account.email} attempted to login`,
        details: { email: account.email, ...contextDetails(context) },
      });
      throw new AccountInactiveError();
    }

    const accessToken = tokens.issue(account.email, this.deps.tokenTtlSeconds);
    await this.afterLogin(account, command.password);

    this.deps.audit.record({
      category: 'authentication',
      type: 'login_succeeded',
      severity: 'info',
      subjectId: account.id,
      description: `Authentication succeeded for ${account.email}`,
      details: { email: account.email, success: true, ...contextDetails(context) },
    });
    this.deps.audit.record({
      category: 'user_action',
      type: 'login',
      severity: 'info',
      subjectId: account.id,
      description: 'User logged in',
      details: { expires_in_seconds: this.deps.tokenTtlSeconds, ...contextDetails(context) },
    });
    logger.info('Successful login', {
      event_type: 'authentication',
      event_category: 'successful_login',
      user_id: account.id,
    });

    return {
      accessToken,
      tokenType: 'bearer',
      expiresIn: this.deps.tokenTtlSeconds,
      userId: account.id,
    };
  }

  /**
   * Stamp last_login and, if the cost settings changed since the hash was made,
   * store a fresh hash for the password we just verified. Other columns are left alone.
   */
  private async afterLogin(account: Account, password: string): Promise<void> {
    const { accounts, hasher } = this.deps;
    const rehashed = hasher.needsRehash(account.passwordHash)
      ? await hasher.hash(password)
      : undefined;

    await accounts.recordLogin(account.id, this.now(), rehashed);
  }

  private recordFailure(
    email: string,
    reason: 'unknown_email' | 'invalid_password' | 'inactive_account',
    context: RequestContext,
    accountId?: string
  ): void {
    this.deps.logger.warn('Failed login attempt', {
      event_type: 'authentication',
      event_category: 'failed_login',
      email,
      reason,
    });
    this.deps.audit.record({
      category: 'authentication',
      type: 'login_failed',
      severity: 'low',
      subjectId: accountId,
      description: `Authentication failed for ${email}`,
      details: { email, success: false, reason, ...contextDetails(context) },
    });
  }

  private decoy(): Promise<string> {
    if (!this.decoyHash) {
      const pending = this.deps.hasher.hash(randomUUID());
      this.decoyHash = pending;
      // A failed attempt is not cached; the next unknown-email login tries again
      void pending.catch(() => {
        if (this.decoyHash === pending) {
          this.decoyHash = undefined;
        }
      });
    }
    return this.decoyHash;
  }
}
