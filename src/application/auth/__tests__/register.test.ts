import { describe, it, expect, beforeEach } from 'vitest';
import { RegisterUseCase } from '../register.js';
import { ConflictError } from '../../errors.js';
import type { Account } from '../../../domain/auth/account.js';
import { MemoryAccountRepo } from '../../../infra/db/memoryAccountRepo.js';
import { silentLogger } from '../../../infra/logging/logger.js';
import {
  type TestContext,
  createTestContext,
  rejectionOf,
  seedAccount,
} from '../../../testing/support.js';

/**
 * Directory whose email lookup misses, as if a concurrent registration
 * committed between the lookup and the insert.
 */
class RacingAccountRepo extends MemoryAccountRepo {
  async findByEmail(_email: string): Promise<Account | null> {
    return null;
  }
}

describe('RegisterUseCase', () => {
  let ctx: TestContext;
  let useCase: RegisterUseCase;

  beforeEach(() => {
    ctx = createTestContext();
    useCase = new RegisterUseCase(ctx.accounts, ctx.hasher, ctx.audit, silentLogger);
  });

  it('creates an active, non-admin account with a hashed password', async () => {
    const account = await useCase.execute({
      email: 'a@x.com',
      fullName: 'A',
      password: 'pw123456',
    });

    expect(account).toMatchObject({
      email: 'a@x.com',
      fullName: 'A',
      isActive: true,
      isAdmin: false,
      lastLogin: null,
    });
    expect(account.passwordHash).not.toBe('pw123456');
    expect(await ctx.hasher.verify('pw123456', account.passwordHash)).toBe(true);
    expect(await ctx.accounts.findById(account.id)).toEqual(account);
  });

  it('trims the email and name', async () => {
    const account = await useCase.execute({
      email: '  a@x.com ',
      fullName: ' Ada ',
      password: 'pw123456',
    });

    expect(account.email).toBe('a@x.com');
    expect(account.fullName).toBe('Ada');
  });

  it('records the registration', async () => {
    const account = await useCase.execute(
      { email: 'a@x.com', fullName: 'A', password: 'pw123456' },
      { ip: '10.0.0.2' }
    );

    expect(ctx.sink.events.map((event) => [event.category, event.type])).toEqual([
      ['user_action', 'user_registration'],
      ['security', 'user_registration'],
    ]);
    expect(ctx.sink.events.every((event) => event.subjectId === account.id)).toBe(true);
  });

  it('rejects an email that is already registered', async () => {
    await seedAccount(ctx, { email: 'a@x.com', password: 'pw123456' });

    const error = await rejectionOf(
      useCase.execute({ email: 'a@x.com', fullName: 'Other', password: 'pw654321' })
    );

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({
      code: 'CONFLICT',
      status: 409,
      message: 'User with this email already exists',
    });
    expect(await ctx.accounts.count()).toBe(1);
    expect(ctx.sink.ofType('duplicate_user_registration')).toEqual([
      expect.objectContaining({ category: 'security', severity: 'low' }),
    ]);
  });

  it('maps a duplicate detected on insert to the same conflict', async () => {
    const accounts = new RacingAccountRepo();
    await seedAccount({ accounts, hasher: ctx.hasher }, { email: 'a@x.com', password: 'pw123456' });
    const racing = new RegisterUseCase(accounts, ctx.hasher, ctx.audit, silentLogger);

    const error = await rejectionOf(
      racing.execute({ email: 'a@x.com', fullName: 'A', password: 'pw123456' })
    );

    expect(error).toBeInstanceOf(ConflictError);
    expect(await accounts.count()).toBe(1);
    expect(ctx.sink.ofType('duplicate_user_registration')).toHaveLength(1);
  });
});
