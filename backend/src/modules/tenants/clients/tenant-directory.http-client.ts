/**
 * backend/src/modules/tenants/clients/tenant-directory.http-client.ts
 *
 * WHY:
 * - TenantDirectory over the tenant service's REST API:
 *     POST /api/v1/tenants
 *     GET  /api/v1/tenants/check-subdomain/:subdomain
 *
 * RULES:
 * - Wire shapes (and their zod schemas) stay in this file.
 * - Failures surface as DependencyError (dependency: 'tenant-directory').
 */

import type { Dispatcher } from 'undici';
import { z } from 'zod';

import { JsonHttpClient } from '../../../shared/integration/json-http-client';
import type { CreateTenantInput, TenantDirectory, TenantRecord } from '../tenant.types';

const TenantWireSchema = z.object({
  id: z.union([z.string(), z.number()]),
  name: z.string(),
  subdomain: z.string(),
  status: z.string().nullish(),
  isTrial: z.boolean().nullish(),
  trialEndsAt: z.string().nullish(),
  maxUsers: z.number().int().nullish(),
  maxStorageGb: z.number().int().nullish(),
  createdAt: z.string().nullish(),
});

type TenantWire = z.infer<typeof TenantWireSchema>;

function toTenantRecord(wire: TenantWire): TenantRecord {
  return {
    id: String(wire.id),
    name: wire.name,
    subdomain: wire.subdomain,
    status: wire.status ?? null,
    isTrial: wire.isTrial ?? false,
    trialEndsAt: wire.trialEndsAt ?? null,
    maxUsers: wire.maxUsers ?? null,
    maxStorageGb: wire.maxStorageGb ?? null,
    createdAt: wire.createdAt ?? null,
  };
}

export class HttpTenantDirectory implements TenantDirectory {
  private readonly http: JsonHttpClient;

  constructor(opts: { baseUrl: string; timeoutMs: number; dispatcher?: Dispatcher }) {
    this.http = new JsonHttpClient({ ...opts, dependency: 'tenant-directory' });
  }

  async createTenant(input: CreateTenantInput): Promise<TenantRecord> {
    const wire = await this.http.call({
      method: 'POST',
      path: '/api/v1/tenants',
      body: {
        name: input.name,
        subdomain: input.subdomain,
        contactEmail: input.contactEmail,
        billingEmail: input.billingEmail,
        isTrial: input.plan.isTrial,
        trialEndsAt: input.plan.trialEndsAt,
        maxUsers: input.plan.maxUsers,
        maxStorageGb: input.plan.maxStorageGb,
      },
      schema: TenantWireSchema,
    });

    return toTenantRecord(wire);
  }

  checkSubdomainAvailable(candidate: string): Promise<boolean> {
    return this.http.call({
      method: 'GET',
      path: `/api/v1/tenants/check-subdomain/${encodeURIComponent(candidate)}`,
      schema: z.boolean(),
    });
  }
}
