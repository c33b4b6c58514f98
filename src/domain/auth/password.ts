import { hash, verify, argon2id } from 'argon2';

export interface CredentialHasher {
  hash(plainPassword: string): Promise<string>;
  verify(plainPassword: string, hash: string): Promise<boolean>;
}

export interface PasswordHashOptions {
  timeCost?: number;
  memoryCost?: number;
}

/**
 * Password hashing using Argon2id (salted, memory-hard).
 */
export class Password implements CredentialHasher {
  constructor(private options: PasswordHashOptions = {}) {}

  /**
   * Hash a plain text password. A fresh salt is generated on every call.
   */
  async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, { type: argon2id, ...this.options });
  }

  /**
   * Verify a plain password against a hash. Malformed hashes are a mismatch.
   */
  async verify(plainPassword: string, hash: string): Promise<boolean> {
    try {
      return await verify(hash, plainPassword);
    } catch {
      return false;
    }
  }
}
