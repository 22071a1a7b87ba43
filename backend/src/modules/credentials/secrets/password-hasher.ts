/**
 * backend/src/modules/credentials/secrets/password-hasher.ts
 *
 * WHY:
 * - user_credentials.password_hash is read by the login service, which checks bcrypt
 *   hashes; the cost factor comes from config (BCRYPT_COST).
 *
 * RULES:
 * - Hash once, at credential creation. This service never verifies passwords.
 * - The plain password is never logged or passed anywhere else.
 */

import bcrypt from 'bcrypt';

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
}

export class BcryptPasswordHasher implements PasswordHasher {
  constructor(private readonly cost: number) {}

  hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }
}
