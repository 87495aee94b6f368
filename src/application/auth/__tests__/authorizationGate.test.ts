import { describe, it, expect } from 'vitest';
import { AuthorizationGate } from '../authorizationGate.js';
import { ForbiddenError } from '../../errors.js';
import { createTestContext, seedAccount } from '../../../testing/support.js';

describe('AuthorizationGate', () => {
  it('lets an admin through without recording anything', async () => {
    const ctx = createTestContext();
    const admin = await seedAccount(ctx, { email: 'root@x.com', password: 'pw123456', isAdmin: true });

    expect(new AuthorizationGate(ctx.audit).requireAdmin(admin)).toBe(admin);
    expect(ctx.sink.events).toHaveLength(0);
  });

  it('refuses a non-admin and records the escalation attempt', async () => {
    const ctx = createTestContext();
    const user = await seedAccount(ctx, { email: 'a@x.com', password: 'pw123456' });
    const gate = new AuthorizationGate(ctx.audit);

    expect(() => gate.requireAdmin(user, { ip: '10.0.0.9' })).toThrow(ForbiddenError);
    expect(ctx.sink.events).toEqual([
      {
        category: 'security',
        type: 'privilege_escalation_attempt',
        severity: 'high',
        subjectId: user.id,
        description: 'Non-admin user a@x.com attempted an admin operation',
        details: {
          actor_id: user.id,
          actor_email: 'a@x.com',
          client_ip: '10.0.0.9',
          user_agent: 'unknown',
        },
      },
    ]);
  });
});
