/**
 * src/shared/audit/inmem-audit-store.ts
 *
 * WHY:
 * - Lets tests (and DB-less local runs) assert on audit events without Postgres.
 *
 * RULES:
 * - Implements AuditEventStore only.
 * - `failWith` makes every append reject (exercises the "audit failure is not fatal" path).
 */

import type { AuditEventInsert, AuditEventStore } from './audit.types';

export class InMemAuditStore implements AuditEventStore {
  readonly events: AuditEventInsert[] = [];
  failWith: Error | null = null;

  append(event: AuditEventInsert): Promise<void> {
    if (this.failWith) return Promise.reject(this.failWith);
    this.events.push(event);
    return Promise.resolve();
  }
}
