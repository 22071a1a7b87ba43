/**
 * backend/src/modules/tenants/policies/trial-plan.policy.ts
 *
 * WHY:
 * - Every self-service tenant starts on the same trial plan.
 *
 * RULES:
 * - Pure. `now` is passed in.
 */

import type { TenantPlan } from '../tenant.types';

export type TrialPlanSettings = {
  trialDays: number;
  maxUsers: number;
  maxStorageGb: number;
};

const DAY_MS = 24 * 60 * 60 * 1000;

export function buildTrialPlan(settings: TrialPlanSettings, now: Date): TenantPlan {
  return {
    isTrial: true,
    trialEndsAt: new Date(now.getTime() + settings.trialDays * DAY_MS).toISOString(),
    maxUsers: settings.maxUsers,
    maxStorageGb: settings.maxStorageGb,
  };
}
