/**
 * backend/src/modules/credentials/secrets/verification-token.ts
 *
 * WHY:
 * - A new credential starts unverified. The raw token goes out in the verify-email
 *   message; user_credentials keeps only its hash.
 */

import { randomBytes } from 'node:crypto';

import type { TokenHasher } from '../../../shared/security/token-hasher';

const TOKEN_BYTES = 32;

export type VerificationToken = {
  /** URL-safe; goes into the verification link. */
  token: string;
  tokenHash: string;
};

export function issueVerificationToken(hasher: TokenHasher): VerificationToken {
  const token = randomBytes(TOKEN_BYTES).toString('base64url');
  return { token, tokenHash: hasher.hash(token) };
}
