/**
 * backend/src/modules/tenants/subdomain/subdomain-generator.ts
 *
 * WHY:
 * - Turns a free-text company name into a DNS-safe subdomain, and produces the
 *   numbered variants tried when the base is taken.
 *
 * RULES:
 * - Pure functions. No I/O, no Date.now(): the caller passes the clock reading.
 * - Output alphabet [a-z0-9-], no leading/trailing hyphen, length within
 *   [SUBDOMAIN_MIN_LENGTH, SUBDOMAIN_MAX_LENGTH].
 * - nextCandidate() is bounded: attempts >= MAX_NUMBERED_ATTEMPTS return the
 *   time-based fallback, which is NOT availability-checked by callers.
 */

export const SUBDOMAIN_MIN_LENGTH = 3;
export const SUBDOMAIN_MAX_LENGTH = 50;

/** base-1 … base-99 are tried; attempt 100 yields the fallback. */
const MAX_NUMBERED_ATTEMPTS = 100;

export const DEFAULT_SUBDOMAIN = 'company';
const FALLBACK_PREFIX = 'company-';
const FALLBACK_MODULUS = 10_000;

const SUBDOMAIN_PATTERN = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;

function trimHyphens(value: string): string {
  return value.replace(/^-+|-+$/g, '');
}

/**
 * Company name → base subdomain candidate.
 *
 * "Acme, Inc!!" → "acme-inc"; "   " → "company"; "AB" → "ab-company".
 * Every remaining character after sanitizing is [a-z0-9-] and hyphens are trimmed,
 * so the result always starts and ends alphanumeric.
 */
export function baseCandidate(companyName: string): string {
  if (companyName.trim().length === 0) return DEFAULT_SUBDOMAIN;

  let s = trimHyphens(
    companyName
      .toLowerCase()
      .replace(/[^a-z0-9\s-]/g, '')
      .replace(/\s+/g, '-')
      .replace(/-+/g, '-'),
  );

  if (s.length > SUBDOMAIN_MAX_LENGTH) {
    s = trimHyphens(s.slice(0, SUBDOMAIN_MAX_LENGTH));
  }

  if (s.length === 0) return DEFAULT_SUBDOMAIN;
  if (s.length < SUBDOMAIN_MIN_LENGTH) return `${s}-${DEFAULT_SUBDOMAIN}`;

  return s;
}

/**
 * The candidate for retry number `attempt` (1-based).
 *
 * - 1 … 99  → `${base}-${attempt}`, base shortened so the result fits.
 * - >= 100  → `company-${nowMs mod 10000}`.
 */
export function nextCandidate(base: string, attempt: number, nowMs: number): string {
  if (!Number.isInteger(attempt) || attempt < 1) {
    throw new RangeError(`attempt must be a positive integer, got ${attempt}`);
  }

  if (isFallbackAttempt(attempt)) {
    return fallbackCandidate(nowMs);
  }

  const suffix = `-${attempt}`;
  const stem = trimHyphens(base.slice(0, SUBDOMAIN_MAX_LENGTH - suffix.length));
  return `${stem || DEFAULT_SUBDOMAIN}${suffix}`;
}

export function fallbackCandidate(nowMs: number): string {
  return `${FALLBACK_PREFIX}${Math.abs(Math.trunc(nowMs)) % FALLBACK_MODULUS}`;
}

export function isFallbackAttempt(attempt: number): boolean {
  return attempt >= MAX_NUMBERED_ATTEMPTS;
}

export function isValidSubdomain(candidate: string): boolean {
  return (
    candidate.length >= SUBDOMAIN_MIN_LENGTH &&
    candidate.length <= SUBDOMAIN_MAX_LENGTH &&
    SUBDOMAIN_PATTERN.test(candidate)
  );
}
