import type { Account, AccountChanges, AccountDirectory } from '../../domain/auth/account.js';
import { DuplicateEmailError } from '../../domain/auth/account.js';
import type { DbPool } from './pool.js';

interface UserRow {
  id: string;
  email: string;
  full_name: string | null;
  password_hash: string;
  is_active: boolean;
  is_admin: boolean;
  last_login: Date | null;
  created_at: Date;
  updated_at: Date;
}

const COLUMNS =
  'id, email, full_name, password_hash, is_active, is_admin, last_login, created_at, updated_at';

const UNIQUE_VIOLATION = '23505';

function toAccount(row: UserRow): Account {
  return {
    id: row.id,
    email: row.email,
    fullName: row.full_name,
    passwordHash: row.password_hash,
    isActive: row.is_active,
    isAdmin: row.is_admin,
    lastLogin: row.last_login,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

export class PgAccountRepo implements AccountDirectory {
  constructor(private pool: DbPool) {}

  async findByEmail(email: string): Promise<Account | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${COLUMNS} FROM users WHERE email = $1`,
      [email]
    );
    return result.rows.length === 0 ? null : toAccount(result.rows[0]);
  }

  async findById(id: string): Promise<Account | null> {
    const result = await this.pool.query<UserRow>(`SELECT ${COLUMNS} FROM users WHERE id = $1`, [
      id,
    ]);
    return result.rows.length === 0 ? null : toAccount(result.rows[0]);
  }

  async persist(account: Account): Promise<Account> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (${COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         ON CONFLICT (id) DO UPDATE SET
           email = EXCLUDED.email,
           full_name = EXCLUDED.full_name,
           password_hash = EXCLUDED.password_hash,
           is_active = EXCLUDED.is_active,
           is_admin = EXCLUDED.is_admin,
           last_login = EXCLUDED.last_login,
           updated_at = EXCLUDED.updated_at
         RETURNING ${COLUMNS}`,
        [
          account.id,
          account.email,
          account.fullName,
          account.passwordHash,
          account.isActive,
          account.isAdmin,
          account.lastLogin,
          account.createdAt,
          account.updatedAt,
        ]
      );
      return toAccount(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEmailError(account.email);
      }
      throw error;
    }
  }

  async recordLogin(id: string, at: Date, rehashed?: string): Promise<void> {
    await this.pool.query(
      `UPDATE users
         SET last_login = $2, updated_at = $2, password_hash = COALESCE($3, password_hash)
       WHERE id = $1`,
      [id, at, rehashed ?? null]
    );
  }

  async updatePassword(id: string, passwordHash: string, at: Date): Promise<void> {
    await this.pool.query('UPDATE users SET password_hash = $2, updated_at = $3 WHERE id = $1', [
      id,
      passwordHash,
      at,
    ]);
  }

  async applyChanges(id: string, changes: AccountChanges, at: Date): Promise<Account | null> {
    const result = await this.pool.query<UserRow>(
      `UPDATE users
         SET full_name = COALESCE($2, full_name),
             is_active = COALESCE($3, is_active),
             is_admin = COALESCE($4, is_admin),
             updated_at = $5
       WHERE id = $1
       RETURNING ${COLUMNS}`,
      [id, changes.fullName ?? null, changes.isActive ?? null, changes.isAdmin ?? null, at]
    );
    return result.rows.length === 0 ? null : toAccount(result.rows[0]);
  }

  async list(skip: number, limit: number): Promise<Account[]> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${COLUMNS} FROM users ORDER BY created_at ASC, id ASC OFFSET $1 LIMIT $2`,
      [skip, limit]
    );
    return result.rows.map(toAccount);
  }

  async count(): Promise<number> {
    const result = await this.pool.query<{ count: string }>('SELECT COUNT(*) AS count FROM users');
    return parseInt(result.rows[0].count, 10);
  }
}
