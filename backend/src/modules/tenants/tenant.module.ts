/**
 * backend/src/modules/tenants/tenant.module.ts
 *
 * WHY:
 * - Single reusable entrypoint for "talk to the tenant service":
 *   the directory itself plus the retrying availability checker on top of it.
 *
 * RULES:
 * - No infra creation here (DI passes the directory in).
 * - No routes: registration owns the HTTP surface.
 */

import type { Logger } from '../../shared/logger/logger';
import type { TenantDirectory } from './tenant.types';
import {
  SubdomainAvailabilityChecker,
  type Sleep,
  type SubdomainAvailabilitySettings,
} from './availability/subdomain-availability.checker';
import type { TrialPlanSettings } from './policies/trial-plan.policy';

export type TenantModule = ReturnType<typeof createTenantModule>;

export function createTenantModule(deps: {
  directory: TenantDirectory;
  logger: Logger;
  availability: SubdomainAvailabilitySettings;
  trialPlan: TrialPlanSettings;
  sleep?: Sleep;
}) {
  const availabilityChecker = new SubdomainAvailabilityChecker({
    directory: deps.directory,
    logger: deps.logger,
    settings: deps.availability,
    sleep: deps.sleep,
  });

  return {
    directory: deps.directory,
    availabilityChecker,
    trialPlan: deps.trialPlan,
  };
}
