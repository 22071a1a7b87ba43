/**
 * backend/src/modules/tenants/tenant.types.ts
 *
 * WHY:
 * - Tenants are owned by the tenant service; this module only talks to it.
 * - Types here describe the boundary (what we send, what we keep), not a table.
 *
 * RULES:
 * - camelCase only; wire naming stays inside the HTTP client.
 * - Timestamps stay ISO strings (they are passed through to API responses as-is).
 */

export type TenantId = string;

/** Trial plan attached to every self-service tenant. */
export type TenantPlan = {
  isTrial: boolean;
  trialEndsAt: string;
  maxUsers: number;
  maxStorageGb: number;
};

export type CreateTenantInput = {
  name: string;
  subdomain: string;
  contactEmail: string;
  billingEmail: string;
  plan: TenantPlan;
};

export type TenantRecord = {
  id: TenantId;
  name: string;
  subdomain: string;
  status: string | null;
  isTrial: boolean;
  trialEndsAt: string | null;
  maxUsers: number | null;
  maxStorageGb: number | null;
  createdAt: string | null;
};

/**
 * Tenant Directory = the tenant service, seen from here.
 *
 * Implementations throw DependencyError (dependency: 'tenant-directory') on failure.
 */
export interface TenantDirectory {
  createTenant(input: CreateTenantInput): Promise<TenantRecord>;
  checkSubdomainAvailable(candidate: string): Promise<boolean>;
}
