/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Central audit event types (compliance trail stored in DB).
 * - AuditContext groups the request-level fields that repeat on every event.
 *
 * RULES:
 * - Metadata is a plain object (the store serializes it).
 * - Never import module types here (shared must stay module-agnostic).
 * - Never put emails, passwords or tokens in metadata.
 */

export type AuditAction =
  | 'registration.completed'
  | 'registration.failed'
  | 'user.registered'
  | 'user.registration_failed';

export type AuditMetadata = Record<string, unknown>;

/**
 * Request-level context, built progressively:
 * - Start of request:     requestId, ip, userAgent
 * - After tenant created: + tenantId
 * - After user created:   + userId
 */
export type AuditContext = {
  tenantId: string | null;
  userId: string | null;

  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

export type AuditEventInsert = AuditContext & {
  action: AuditAction;
  metadata?: AuditMetadata;
};

/**
 * Anything that can persist an audit event.
 * AuditRepo (Postgres) in production; tests use an in-memory store.
 */
export interface AuditEventStore {
  append(event: AuditEventInsert): Promise<void>;
}
