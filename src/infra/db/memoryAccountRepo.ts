import type { Account, AccountChanges, AccountDirectory } from '../../domain/auth/account.js';
import { DuplicateEmailError } from '../../domain/auth/account.js';

/**
 * In-process account directory with the same contract as PgAccountRepo.
 * Used by the unit and HTTP tests in place of Postgres.
 */
export class MemoryAccountRepo implements AccountDirectory {
  private readonly byId = new Map<string, Account>();

  async findByEmail(email: string): Promise<Account | null> {
    return this.ownerOf(email);
  }

  async findById(id: string): Promise<Account | null> {
    return this.byId.get(id) ?? null;
  }

  async persist(account: Account): Promise<Account> {
    const owner = this.ownerOf(account.email);
    if (owner && owner.id !== account.id) {
      throw new DuplicateEmailError(account.email);
    }
    this.byId.set(account.id, account);
    return account;
  }

  async recordLogin(id: string, at: Date, rehashed?: string): Promise<void> {
    const current = this.byId.get(id);
    if (current) {
      this.byId.set(id, {
        ...current,
        passwordHash: rehashed ?? current.passwordHash,
        lastLogin: at,
        updatedAt: at,
      });
    }
  }

  async updatePassword(id: string, passwordHash: string, at: Date): Promise<void> {
    const current = this.byId.get(id);
    if (current) {
      this.byId.set(id, { ...current, passwordHash, updatedAt: at });
    }
  }

  async applyChanges(id: string, changes: AccountChanges, at: Date): Promise<Account | null> {
    const current = this.byId.get(id);
    if (!current) {
      return null;
    }
    const updated: Account = {
      ...current,
      fullName: changes.fullName ?? current.fullName,
      isActive: changes.isActive ?? current.isActive,
      isAdmin: changes.isAdmin ?? current.isAdmin,
      updatedAt: at,
    };
    this.byId.set(id, updated);
    return updated;
  }

  async list(skip: number, limit: number): Promise<Account[]> {
    return [...this.byId.values()]
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(skip, skip + limit);
  }

  async count(): Promise<number> {
    return this.byId.size;
  }

  /** Hard delete; the service itself never removes accounts. */
  async remove(id: string): Promise<boolean> {
    return this.byId.delete(id);
  }

  private ownerOf(email: string): Account | null {
    for (const account of this.byId.values()) {
      if (account.email === email) {
        return account;
      }
    }
    return null;
  }
}
