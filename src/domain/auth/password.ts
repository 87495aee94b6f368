import { argon2id, hash, needsRehash, verify } from 'argon2';

export interface PasswordHashingOptions {
  timeCost: number;
  memoryCost: number;
  parallelism: number;
}

/**
 * Password hashing using Argon2id. Cost options are fixed for the lifetime of the
 * instance; the salt is random per hash and stored inside the resulting string.
 */
export class PasswordHasher {
  constructor(private readonly options: PasswordHashingOptions) {}

  /**
   * Hash a plain text password.
   */
  async hash(plainPassword: string): Promise<string> {
    assertString(plainPassword);
    return await hash(plainPassword, { ...this.options, type: argon2id });
  }

  /**
   * Verify a plain password against a stored hash. A malformed hash is a mismatch.
   */
  async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    assertString(plainPassword);
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }

  /**
   * True when the hash was made with other parameters than the configured ones.
   */
  needsRehash(passwordHash: string): boolean {
    try {
      return needsRehash(passwordHash, this.options);
    } catch {
      return true;
    }
  }
}

function assertString(value: unknown): asserts value is string {
  if (typeof value !== 'string') {
    throw new TypeError('Password must be a string');
  }
}
