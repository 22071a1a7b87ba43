/**
 * backend/src/modules/registration/guard/registration-guard.ts
 *
 * WHY:
 * - Two identical registrations (same email + company) must never run at the same time.
 * - The guard is the only cross-request mutable state in registration.
 *
 * RULES:
 * - tryAdmit(key) is atomic insert-if-absent: true ONLY for the caller that inserted.
 * - release(key) is unconditional and idempotent.
 * - After release(key), the next tryAdmit(key) must succeed (no permanent wedge).
 * - inFlightCount()/snapshot() are best-effort observability.
 * - clearAll() is an operator escape hatch for stale keys after a crash.
 *   It can let genuinely concurrent duplicates through — implementations log it at warn.
 */

export interface RegistrationGuard {
  tryAdmit(key: string): Promise<boolean>;
  release(key: string): Promise<void>;
  inFlightCount(): Promise<number>;
  snapshot(): Promise<string[]>;
  /** Returns the number of keys removed. */
  clearAll(): Promise<number>;
}
