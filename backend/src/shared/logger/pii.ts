/**
 * backend/src/shared/logger/pii.ts
 *
 * WHY:
 * - Logs identify an email by its domain (and, where needed, a SHA-256 key), never the address.
 *
 * RULES:
 * - Pure functions. Never throw.
 */

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}
