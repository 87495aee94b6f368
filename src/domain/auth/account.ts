/**
 * Account entity. `isAdmin` and `isActive` are always present; new accounts
 * start active and without admin rights.
 */
export interface Account {
  readonly id: string;
  readonly email: string;
  readonly fullName: string | null;
  readonly passwordHash: string;
  readonly isActive: boolean;
  readonly isAdmin: boolean;
  readonly lastLogin: Date | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewAccount {
  id: string;
  email: string;
  fullName: string | null;
  passwordHash: string;
  now: Date;
}

export function createAccount(input: NewAccount): Account {
  return {
    id: input.id,
    email: input.email,
    fullName: input.fullName,
    passwordHash: input.passwordHash,
    isActive: true,
    isAdmin: false,
    lastLogin: null,
    createdAt: input.now,
    updatedAt: input.now,
  };
}

/** Fields an administrator may change; absent fields keep their stored value. */
export interface AccountChanges {
  fullName?: string;
  isActive?: boolean;
  isAdmin?: boolean;
}

/**
 * Raised by a directory when persisting would give two accounts the same email.
 */
export class DuplicateEmailError extends Error {
  constructor(readonly email: string) {
    super(`Email already registered: ${email}`);
    this.name = 'DuplicateEmailError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Persistence contract for accounts.
 * `persist` is an upsert keyed by id and throws DuplicateEmailError on an email clash.
 * Updates after creation go through the column-scoped operations, so concurrent
 * writers never overwrite each other's fields.
 */
export interface AccountDirectory {
  findByEmail(email: string): Promise<Account | null>;
  findById(id: string): Promise<Account | null>;
  persist(account: Account): Promise<Account>;
  /** Stamp a successful login. The hash is replaced only when `rehashed` is given. */
  recordLogin(id: string, at: Date, rehashed?: string): Promise<void>;
  updatePassword(id: string, passwordHash: string, at: Date): Promise<void>;
  /** Writes only the given fields. Null when no account has that id. */
  applyChanges(id: string, changes: AccountChanges, at: Date): Promise<Account | null>;
  /** Accounts ordered by creation time, oldest first. */
  list(skip: number, limit: number): Promise<Account[]>;
  count(): Promise<number>;
}
