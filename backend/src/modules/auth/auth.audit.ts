/**
 * src/modules/auth/auth.audit.ts
 *
 * WHY:
 * - Audit trail for single-user sign-up (success and failure).
 *
 * RULES:
 * - No emails, passwords or tokens in metadata.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { AppErrorCode } from '../../shared/http/errors';

export function auditUserRegistered(
  writer: AuditWriter,
  data: { credentialId: string },
): Promise<void> {
  return writer.append('user.registered', { credentialId: data.credentialId });
}

export function auditUserRegistrationFailed(
  writer: AuditWriter,
  data: { code: AppErrorCode; reason: string | null; userCreated: boolean },
): Promise<void> {
  return writer.append('user.registration_failed', {
    code: data.code,
    reason: data.reason,
    userCreated: data.userCreated,
  });
}
