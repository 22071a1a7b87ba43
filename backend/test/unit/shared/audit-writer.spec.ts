import { describe, it, expect } from 'vitest';
import { AuditWriter } from '../../../src/shared/audit/audit.writer';
import { InMemAuditStore } from '../../../src/shared/audit/inmem-audit-store';

describe('AuditWriter', () => {
  it('merges context progressively without mutating the parent writer', async () => {
    const store = new InMemAuditStore();
    const base = new AuditWriter(store, { requestId: 'req-1', ip: '10.0.0.1' });
    const withTenant = base.withContext({ tenantId: 'tenant-1' });

    await withTenant.append('registration.completed', { subdomain: 'acme' });
    await base.append('registration.failed');

    expect(store.events).toEqual([
      {
        tenantId: 'tenant-1',
        userId: null,
        requestId: 'req-1',
        ip: '10.0.0.1',
        userAgent: null,
        action: 'registration.completed',
        metadata: { subdomain: 'acme' },
      },
      {
        tenantId: null,
        userId: null,
        requestId: 'req-1',
        ip: '10.0.0.1',
        userAgent: null,
        action: 'registration.failed',
        metadata: undefined,
      },
    ]);
  });

  it('propagates store failures to the caller', async () => {
    const store = new InMemAuditStore();
    store.failWith = new Error('audit down');

    await expect(new AuditWriter(store).append('registration.failed')).rejects.toThrow('audit down');
  });
});
