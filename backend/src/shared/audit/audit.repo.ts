/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only audit writer (DB persistence).
 *
 * RULES:
 * - DAL-style component: DB concerns only.
 * - No business rules here. No AppError.
 * - Metadata is accepted as plain object and serialized here.
 */

import type { DbExecutor } from '../db/db';
import type { JsonValue } from '../db/db.schema';
import type { AuditEventInsert, AuditEventStore } from './audit.types';

function toJsonValue(input: unknown): JsonValue {
  // strips undefined / functions, guarantees a JSON-serializable value
  const value: JsonValue = JSON.parse(JSON.stringify(input ?? {}));
  return value;
}

export class AuditRepo implements AuditEventStore {
  constructor(private readonly db: DbExecutor) {}

  async append(event: AuditEventInsert): Promise<void> {
    await this.db
      .insertInto('audit_events')
      .values({
        action: event.action,
        tenant_id: event.tenantId,
        user_id: event.userId,
        request_id: event.requestId,
        ip: event.ip,
        user_agent: event.userAgent,
        metadata: toJsonValue(event.metadata ?? {}),
      })
      .execute();
  }
}
