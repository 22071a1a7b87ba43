/**
 * backend/src/modules/registration/ledger/created-resource-ledger.ts
 *
 * WHY:
 * - Records every resource a registration created, in creation order.
 * - On abort the entries say exactly what was left behind (logged + audited).
 * - A compensation step can later walk `undoOrder()` (newest first) and delete each one.
 *
 * RULES:
 * - Append-only within one execution.
 * - Holds ids only; never record payloads.
 */

export type CreatedResourceKind = 'tenant' | 'user' | 'credentials';

export type CreatedResource = Readonly<{
  kind: CreatedResourceKind;
  id: string;
  createdAt: string;
}>;

export class CreatedResourceLedger {
  private readonly entries: CreatedResource[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  record(kind: CreatedResourceKind, id: string): void {
    this.entries.push(Object.freeze({ kind, id, createdAt: this.clock().toISOString() }));
  }

  list(): readonly CreatedResource[] {
    return [...this.entries];
  }

  /** Reverse creation order: the order a compensating step must undo in. */
  undoOrder(): readonly CreatedResource[] {
    return [...this.entries].reverse();
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }
}
