import { describe, it, expect } from 'vitest';
import { CreatedResourceLedger } from '../../../src/modules/registration/ledger/created-resource-ledger';
import { TestClock } from '../../helpers/test-clock';

describe('CreatedResourceLedger', () => {
  it('records resources in creation order and undoes in reverse', () => {
    const clock = new TestClock();
    const ledger = new CreatedResourceLedger(clock.now);

    expect(ledger.isEmpty).toBe(true);

    ledger.record('tenant', 'tenant-1');
    clock.advance(1000);
    ledger.record('user', 'user-1');

    expect(ledger.isEmpty).toBe(false);
    expect(ledger.list()).toEqual([
      { kind: 'tenant', id: 'tenant-1', createdAt: '2026-03-02T09:30:00.000Z' },
      { kind: 'user', id: 'user-1', createdAt: '2026-03-02T09:30:01.000Z' },
    ]);
    expect(ledger.undoOrder().map((r) => r.kind)).toEqual(['user', 'tenant']);
  });
});
