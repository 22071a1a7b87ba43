/**
 * backend/src/modules/registration/helpers/build-dedup-key.ts
 *
 * WHY:
 * - Two registrations are "the same" when they share (email, company name).
 * - The guard stores a SHA-256 fingerprint of the key, so raw emails never land in Redis.
 *
 * RULES:
 * - Pure (the hasher is passed in).
 * - Email is trimmed + lower-cased; company name is trimmed only.
 */

import type { TokenHasher } from '../../../shared/security/token-hasher';

export function buildDedupKey(email: string, companyName: string): string {
  return `${email.trim().toLowerCase()}|${companyName.trim()}`;
}

export function fingerprintDedupKey(
  hasher: TokenHasher,
  email: string,
  companyName: string,
): string {
  return hasher.hash(buildDedupKey(email, companyName));
}
