/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: config.bcryptCost })
 * - const ok = await hasher.verify(password, user.passwordHash)
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

const DEFAULT_COST = 12;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? DEFAULT_COST;
  }

  hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }
}
