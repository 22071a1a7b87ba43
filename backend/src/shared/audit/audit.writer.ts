/**
 * backend/src/shared/audit/audit.writer.ts
 *
 * WHY:
 * - Binds request-level context ONCE so flows don't repeat it on every audit call.
 * - Supports progressive context enrichment via withContext():
 *     start of request → requestId, ip, userAgent
 *     after tenant     → + tenantId
 *     after user       → + userId
 *   Each call returns a NEW immutable writer (no mutation).
 *
 * RULES:
 * - No module types imported here (shared must stay module-agnostic).
 * - No business rules. No AppError.
 */

import type { AuditAction, AuditContext, AuditEventStore, AuditMetadata } from './audit.types';

const EMPTY_CONTEXT: AuditContext = {
  tenantId: null,
  userId: null,
  requestId: null,
  ip: null,
  userAgent: null,
};

export class AuditWriter {
  private readonly store: AuditEventStore;
  private readonly context: Readonly<AuditContext>;

  constructor(store: AuditEventStore, context?: Partial<AuditContext>) {
    this.store = store;
    this.context = Object.freeze({ ...EMPTY_CONTEXT, ...context });
  }

  /**
   * Returns a NEW writer with merged context.
   *
   * Usage:
   *   const audit = new AuditWriter(store, { requestId, ip, userAgent });
   *   const withTenant = audit.withContext({ tenantId: tenant.id });
   */
  withContext(extra: Partial<AuditContext>): AuditWriter {
    return new AuditWriter(this.store, { ...this.context, ...extra });
  }

  async append(action: AuditAction, metadata?: AuditMetadata): Promise<void> {
    await this.store.append({
      ...this.context,
      action,
      metadata,
    });
  }
}
