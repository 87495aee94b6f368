import { randomUUID } from 'crypto';
import {
  type Account,
  type AccountDirectory,
  DuplicateEmailError,
  createAccount,
} from '../../domain/auth/account.js';
import type { PasswordHasher } from '../../domain/auth/password.js';
import type { Logger } from '../../infra/logging/logger.js';
import { withTiming } from '../../infra/logging/performance.js';
import { type RequestContext, type SafeAuditSink, contextDetails } from '../audit.js';
import { ConflictError } from '../errors.js';

export interface RegisterCommand {
  email: string;
  fullName: string;
  password: string;
}

const DUPLICATE_EMAIL_MESSAGE = 'User with this email already exists';

export class RegisterUseCase {
  constructor(
    private accounts: AccountDirectory,
    private hasher: PasswordHasher,
    private audit: SafeAuditSink,
    private logger: Logger
  ) {}

  async execute(command: RegisterCommand, context: RequestContext = {}): Promise<Account> {
    return withTiming(this.logger, 'auth.register', () => this.register(command, context));
  }

  private async register(command: RegisterCommand, context: RequestContext): Promise<Account> {
    const email = command.email.trim();
    const fullName = command.fullName.trim();

    // Check if user already exists
    const existing = await this.accounts.findByEmail(email);
    if (existing) {
      this.rejectDuplicate(email, context);
    }

    const passwordHash = await this.hasher.hash(command.password);
    const account = createAccount({
      id: randomUUID(),
      email,
      fullName,
      passwordHash,
      now: new Date(),
    });

    let created: Account;
    try {
      created = await this.accounts.persist(account);
    } catch (error) {
      // Lost a race with a concurrent registration for the same email
      if (error instanceof DuplicateEmailError) {
        this.rejectDuplicate(email, context);
      }
      throw error;
    }

    this.logger.info('User created', {
      event_type: 'user_management',
      action: 'user_created',
      user_id: created.id,
    });
    this.audit.record({
      category: 'user_action',
      type: 'user_registration',
      severity: 'info',
      subjectId: created.id,
      description: 'User registered',
      details: { email: created.email, full_name: created.fullName, is_active: created.isActive },
    });
    this.audit.record({
      category: 'security',
      type: 'user_registration',
      severity: 'info',
      subjectId: created.id,
      description: `New user registered: ${created.email}`,
      details: { email: created.email, ...contextDetails(context) },
    });

    return created;
  }

  private rejectDuplicate(email: string, context: RequestContext): never {
    this.logger.warn('Registration rejected, email already exists', {
      event_type: 'user_management',
      action: 'create_user_failed',
      email,
    });
    this.audit.record({
      category: 'security',
      type: 'duplicate_user_registration',
      severity: 'low',
      description: `Attempt to register existing email: ${email}`,
      details: { email, ...contextDetails(context) },
    });
    throw new ConflictError(DUPLICATE_EMAIL_MESSAGE);
  }
}
