/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "this new account needs a verification email" from "here is how emails are sent".
 * - The credential store enqueues messages; the transport (SQS, SendGrid, ...) is
 *   wired at the DI layer only.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared → nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 * - The raw verification token is allowed here — it travels to the email renderer so the
 *   tenant-scoped link can be built. It is never stored anywhere.
 * - Never put password hashes in messages.
 */

// ── Message types ─────────────────────────────────────────────

export type VerifyEmailMessage = {
  type: 'auth.verify-email';
  userId: string;
  tenantId: string;
  email: string;
  username: string;
  firstName: string | null;
  /**
   * Raw (un-hashed) verification token — goes into the email link only.
   * Only its SHA-256 hash is stored in user_credentials.
   */
  verificationToken: string;
};

// Union — add new message types as features grow (welcome email, trial reminders...)
export type QueueMessage = VerifyEmailMessage;

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
