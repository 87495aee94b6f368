import { describe, it, expect, beforeEach } from 'vitest';
import { LoginUseCase } from '../login.js';
import { AccountInactiveError, InvalidCredentialsError } from '../../errors.js';
import { AccountService } from '../../accounts/accountService.js';
import { SafeAuditSink } from '../../audit.js';
import type { Account } from '../../../domain/auth/account.js';
import { PasswordHasher } from '../../../domain/auth/password.js';
import { MemoryAccountRepo } from '../../../infra/db/memoryAccountRepo.js';
import { LoggerAuditSink } from '../../../infra/logging/auditSink.js';
import { createLogger, silentLogger } from '../../../infra/logging/logger.js';
import {
  FAST_HASHING,
  type TestContext,
  createTestContext,
  rejectionOf,
  seedAccount,
} from '../../../testing/support.js';

/**
 * Runs `duringLookup` right after handing out the account, i.e. while the
 * login is still verifying the password against that copy.
 */
class InterleavingAccountRepo extends MemoryAccountRepo {
  duringLookup: () => Promise<void> = async () => undefined;

  async findByEmail(email: string): Promise<Account | null> {
    const account = await super.findByEmail(email);
    await this.duringLookup();
    return account;
  }
}

/** Fails its first hash, then behaves. */
class FlakyHasher extends PasswordHasher {
  private calls = 0;

  async hash(plainPassword: string): Promise<string> {
    this.calls += 1;
    if (this.calls === 1) {
      throw new Error('hashing pool exhausted');
    }
    return super.hash(plainPassword);
  }
}

const LOGIN_TIME = new Date('2024-03-01T09:30:00.000Z');

describe('LoginUseCase', () => {
  let ctx: TestContext;
  let useCase: LoginUseCase;

  beforeEach(() => {
    ctx = createTestContext();
    useCase = new LoginUseCase({
      accounts: ctx.accounts,
      hasher: ctx.hasher,
      tokens: ctx.tokens,
      audit: ctx.audit,
      logger: silentLogger,
      tokenTtlSeconds: 1800,
      now: () => LOGIN_TIME,
    });
  });

  it('issues a bearer token for the account email', async () => {
    const account = await seedAccount(ctx, { email: 'a@x.com', password: 'pw123456' });

    const result = await useCase.execute({ email: 'a@x.com', password: 'pw123456' });

    expect(result).toMatchObject({ tokenType: 'bearer', expiresIn: 1800, userId: account.id });
    const verification = ctx.tokens.verify(result.accessToken);
    expect(verification.ok && verification.claim.sub).toBe('a@x.com');
  });

  it('stamps last login and records the success', async () => {
    const account = await seedAccount(ctx, { email: 'a@x.com', password: 'pw123456' });

    await useCase.execute({ email: 'a@x.com', password: 'pw123456' }, { ip: '10.0.0.1' });

    const stored = await ctx.accounts.findById(account.id);
    expect(stored?.lastLogin).toEqual(LOGIN_TIME);
    expect(stored?.updatedAt).toEqual(LOGIN_TIME);
    expect(ctx.sink.events.map((event) => event.type)).toEqual(['login_succeeded', 'login']);
    expect(ctx.sink.ofType('login_succeeded')[0].details).toEqual({
      email: 'a@x.com',
      success: true,
      client_ip: '10.0.0.1',
      user_agent: 'unknown',
    });
  });

  it('gives the same error for a wrong password and an unknown email', async () => {
    await seedAccount(ctx, { email: 'a@x.com', password: 'pw123456' });

    const wrongPassword = await rejectionOf(
      useCase.execute({ email: 'a@x.com', password: 'not-the-password' })
    );
    const unknownEmail = await rejectionOf(
      useCase.execute({ email: 'nobody@x.com', password: 'pw123456' })
    );

    expect(wrongPassword).toBeInstanceOf(InvalidCredentialsError);
    expect(unknownEmail).toBeInstanceOf(InvalidCredentialsError);
    expect(wrongPassword).toEqual(unknownEmail);
    expect(wrongPassword).toMatchObject({ message: 'Incorrect email or password', status: 401 });
  });

  it('records why each failed login failed', async () => {
    const account = await seedAccount(ctx, { email: 'a@x.com', password: 'pw123456' });

    await expect(useCase.execute({ email: 'a@x.com', password: 'wrong-pass' })).rejects.toThrow();
    await expect(useCase.execute({ email: 'b@x.com', password: 'wrong-pass' })).rejects.toThrow();

    const failures = ctx.sink.ofType('login_failed');
    expect(failures.map((event) => [event.subjectId, event.details.reason])).toEqual([
      [account.id, 'invalid_password'],
      [undefined, 'unknown_email'],
    ]);
    expect(failures.every((event) => event.severity === 'low')).toBe(true);
  });

  it('refuses an inactive account only after the password matched', async () => {
    await seedAccount(ctx, { email: 'off@x.com', password: 'pw123456', isActive: false });

    await expect(
      useCase.execute({ email: 'off@x.com', password: 'wrong-pass' })
    ).rejects.toThrow(InvalidCredentialsError);
    await expect(
      useCase.execute({ email: 'off@x.com', password: 'pw123456' })
    ).rejects.toThrow(AccountInactiveError);

    expect(ctx.sink.ofType('inactive_user_login_attempt')).toHaveLength(1);
  });

  it('does not touch the stored account on failure', async () => {
    const account = await seedAccount(ctx, { email: 'a@x.com', password: 'pw123456' });

    await expect(useCase.execute({ email: 'a@x.com', password: 'wrong-pass' })).rejects.toThrow();

    expect(await ctx.accounts.findById(account.id)).toBe(account);
  });

  it('upgrades a hash made with weaker settings', async () => {
    const account = await seedAccount(ctx, { email: 'a@x.com', password: 'pw123456' });
    const stronger = new PasswordHasher({ timeCost: 3, memoryCost: 1024, parallelism: 1 });
    const upgrading = new LoginUseCase({
      accounts: ctx.accounts,
      hasher: stronger,
      tokens: ctx.tokens,
      audit: ctx.audit,
      logger: silentLogger,
      tokenTtlSeconds: 1800,
    });

    await upgrading.execute({ email: 'a@x.com', password: 'pw123456' });

    const stored = await ctx.accounts.findById(account.id);
    expect(stored?.passwordHash).not.toBe(account.passwordHash);
    expect(stored?.passwordHash).toMatch(/^\$argon2id\$v=19\$m=1024,t=3,p=1\$/);
    expect(await stronger.verify('pw123456', stored?.passwordHash ?? '')).toBe(true);
  });

  it('keeps a deactivation that lands while the password is being checked', async () => {
    const accounts = new InterleavingAccountRepo();
    const admin = await seedAccount(
      { accounts, hasher: ctx.hasher },
      { email: 'root@x.com', password: 'pw123456', isAdmin: true }
    );
    const user = await seedAccount(
      { accounts, hasher: ctx.hasher },
      { email: 'a@x.com', password: 'pw123456' }
    );
    const admins = new AccountService(accounts, ctx.hasher, ctx.audit, silentLogger);
    accounts.duringLookup = async () => {
      accounts.duringLookup = async () => undefined;
      await admins.updateAccount(admin, user.id, { isActive: false });
    };
    const racing = new LoginUseCase({
      accounts,
      hasher: ctx.hasher,
      tokens: ctx.tokens,
      audit: ctx.audit,
      logger: silentLogger,
      tokenTtlSeconds: 1800,
      now: () => LOGIN_TIME,
    });

    await racing.execute({ email: 'a@x.com', password: 'pw123456' });

    const stored = await accounts.findById(user.id);
    expect(stored?.isActive).toBe(false);
    expect(stored?.lastLogin).toEqual(LOGIN_TIME);
  });

  it('retries the decoy hash after a failed attempt', async () => {
    const flaky = new LoginUseCase({
      accounts: ctx.accounts,
      hasher: new FlakyHasher(FAST_HASHING),
      tokens: ctx.tokens,
      audit: ctx.audit,
      logger: silentLogger,
      tokenTtlSeconds: 1800,
    });

    const unknownEmail = { email: 'nobody@x.com', password: 'pw123456' };
    const first = await rejectionOf(flaky.execute(unknownEmail));
    const second = await rejectionOf(flaky.execute(unknownEmail));

    expect(first).toEqual(new Error('hashing pool exhausted'));
    expect(second).toBeInstanceOf(InvalidCredentialsError);
  });

  it('logs the token lifetime in the login audit event', async () => {
    const lines: string[] = [];
    const logger = createLogger({
      level: 'info',
      format: 'json',
      write: (_level, line) => {
        lines.push(line);
      },
    });
    await seedAccount(ctx, { email: 'a@x.com', password: 'pw123456' });
    const audited = new LoginUseCase({
      accounts: ctx.accounts,
      hasher: ctx.hasher,
      tokens: ctx.tokens,
      audit: new SafeAuditSink(new LoggerAuditSink(logger), silentLogger),
      logger: silentLogger,
      tokenTtlSeconds: 1800,
    });

    await audited.execute({ email: 'a@x.com', password: 'pw123456' });

    const loginEvent = lines
      .map((line) => JSON.parse(line))
      .find((entry) => entry.audit_event === 'login');
    expect(loginEvent.details.expires_in_seconds).toBe(1800);
  });
});
