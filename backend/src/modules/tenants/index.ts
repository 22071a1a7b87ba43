/**
 * backend/src/modules/tenants/index.ts
 *
 * WHY:
 * - Define the public surface of the tenants module.
 * - Prevent cross-module coupling via deep imports.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export type {
  TenantDirectory,
  TenantRecord,
  TenantPlan,
  CreateTenantInput,
} from './tenant.types';
export {
  baseCandidate,
  nextCandidate,
  isFallbackAttempt,
  isValidSubdomain,
} from './subdomain/subdomain-generator';
export type {
  SubdomainAvailabilityChecker,
  FailurePolicy,
  ProbeOutcome,
  Sleep,
} from './availability/subdomain-availability.checker';
export { buildTrialPlan } from './policies/trial-plan.policy';
export type { TrialPlanSettings } from './policies/trial-plan.policy';
export { HttpTenantDirectory } from './clients/tenant-directory.http-client';
export { createTenantModule } from './tenant.module';
export type { TenantModule } from './tenant.module';
