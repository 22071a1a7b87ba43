/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Two things are stored or shared only as a SHA-256 hex digest:
 *     registration dedup keys (email + company) in the guard and rate-limit keys,
 *     email verification tokens in user_credentials.
 * - Deterministic, so every instance derives the same guard key for the same sign-up.
 */

import { createHash } from 'node:crypto';

export interface TokenHasher {
  hash(raw: string): string;
}

export class Sha256TokenHasher implements TokenHasher {
  hash(raw: string): string {
    return createHash('sha256').update(raw).digest('hex');
  }
}
