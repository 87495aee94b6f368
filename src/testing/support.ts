import { randomUUID } from 'crypto';
import type { AuditEvent, AuditSink } from '../application/audit.js';
import { SafeAuditSink } from '../application/audit.js';
import { type Account, createAccount } from '../domain/auth/account.js';
import { PasswordHasher } from '../domain/auth/password.js';
import { TokenCodec } from '../domain/auth/tokenCodec.js';
import { MemoryAccountRepo } from '../infra/db/memoryAccountRepo.js';
import { type AppDependencies, createApp } from '../infra/http/app.js';
import { silentLogger } from '../infra/logging/logger.js';

export const TEST_SECRET = 'test-secret';

/** Cheapest Argon2 settings the library accepts, so tests stay fast. */
export const FAST_HASHING = { timeCost: 2, memoryCost: 1024, parallelism: 1 };

export class RecordingAuditSink implements AuditSink {
  readonly events: AuditEvent[] = [];

  record(event: AuditEvent): void {
    this.events.push(event);
  }

  ofType(type: string): AuditEvent[] {
    return this.events.filter((event) => event.type === type);
  }
}

export interface TestContext {
  accounts: MemoryAccountRepo;
  hasher: PasswordHasher;
  tokens: TokenCodec;
  sink: RecordingAuditSink;
  audit: SafeAuditSink;
  clock: { now: number };
}

/**
 * Fresh in-memory collaborators. `clock.now` drives the token codec and can be moved by tests.
 */
export function createTestContext(startMs = Date.UTC(2024, 0, 1, 12, 0, 0)): TestContext {
  const clock = { now: startMs };
  const sink = new RecordingAuditSink();
  return {
    accounts: new MemoryAccountRepo(),
    hasher: new PasswordHasher(FAST_HASHING),
    tokens: new TokenCodec({ secret: TEST_SECRET, algorithm: 'HS256', clock: () => clock.now }),
    sink,
    audit: new SafeAuditSink(sink, silentLogger),
    clock,
  };
}

/**
 * The full HTTP app over the in-memory context, with docs off and rate limiting disabled.
 */
export function createTestApp(ctx: TestContext, overrides: Partial<AppDependencies> = {}) {
  return createApp({
    accounts: ctx.accounts,
    hasher: ctx.hasher,
    tokens: ctx.tokens,
    audit: ctx.audit,
    logger: silentLogger,
    tokenTtlSeconds: 1800,
    rateLimiting: false,
    slowRequestThresholdMs: 1000,
    docs: false,
    healthCheck: async () => undefined,
    ...overrides,
  });
}

export interface AccountSeed {
  email: string;
  password: string;
  fullName?: string;
  isActive?: boolean;
  isAdmin?: boolean;
  createdAt?: Date;
}

/**
 * Hash the password and store an account directly, bypassing registration.
 */
export async function seedAccount(
  ctx: Pick<TestContext, 'accounts' | 'hasher'>,
  seed: AccountSeed
): Promise<Account> {
  const account = createAccount({
    id: randomUUID(),
    email: seed.email,
    fullName: seed.fullName ?? 'Test User',
    passwordHash: await ctx.hasher.hash(seed.password),
    now: seed.createdAt ?? new Date(),
  });
  return ctx.accounts.persist({
    ...account,
    isActive: seed.isActive ?? true,
    isAdmin: seed.isAdmin ?? false,
  });
}

/**
 * Await a promise that is expected to reject and hand back what it rejected with.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}
