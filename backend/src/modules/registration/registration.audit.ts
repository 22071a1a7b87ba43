/**
 * src/modules/registration/registration.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the registration module.
 * - Keeps audit metadata consistent per outcome.
 *
 * RULES:
 * - Each function maps one outcome to one audit write.
 * - No DB access (delegates to AuditWriter).
 * - Never include emails, passwords or tokens in metadata.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { CreatedResource } from './ledger/created-resource-ledger';
import type { RegistrationErrorKind } from './registration.errors';
import type { RegistrationState } from './registration.types';

export function auditRegistrationCompleted(
  writer: AuditWriter,
  data: {
    subdomain: string;
    credentialId: string;
    subdomainAttempts: number;
    subdomainFallback: boolean;
  },
): Promise<void> {
  return writer.append('registration.completed', {
    subdomain: data.subdomain,
    credentialId: data.credentialId,
    subdomainAttempts: data.subdomainAttempts,
    subdomainFallback: data.subdomainFallback,
  });
}

/**
 * Written on every abort after admission. `partialState` lists what was left behind.
 */
export function auditRegistrationFailed(
  writer: AuditWriter,
  data: {
    kind: RegistrationErrorKind;
    failedAt: RegistrationState | null;
    partialState: readonly CreatedResource[];
  },
): Promise<void> {
  return writer.append('registration.failed', {
    kind: data.kind,
    failedAt: data.failedAt,
    partialState: data.partialState.map((r) => ({ kind: r.kind, id: r.id })),
  });
}
