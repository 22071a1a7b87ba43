/**
 * backend/src/modules/tenants/availability/subdomain-availability.checker.ts
 *
 * WHY:
 * - The tenant service is the source of truth for "is this subdomain free?".
 * - Transient failures are retried with linear backoff (attempt * step: 1s, 2s, ...).
 *
 * RULES:
 * - isAvailable() never throws. When every attempt fails, `onExhausted` decides:
 *   'fail-open' → true (registration proceeds; the tenant service's unique
 *   constraint is the backstop), 'fail-closed' → false.
 * - probe() is a single call outside the retry budget. On error it answers
 *   per `probeOnError` ('fail-open' → 'available', 'fail-closed' → 'unverifiable').
 * - sleep is injected (tests must not wait).
 */

import type { Logger } from '../../../shared/logger/logger';
import type { TenantDirectory } from '../tenant.types';

export type FailurePolicy = 'fail-open' | 'fail-closed';

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type ProbeOutcome = 'available' | 'taken' | 'unverifiable';

export type SubdomainAvailabilitySettings = {
  maxAttempts: number;
  backoffStepMs: number;
  onExhausted: FailurePolicy;
  probeOnError: FailurePolicy;
};

export const DEFAULT_AVAILABILITY_SETTINGS: SubdomainAvailabilitySettings = {
  maxAttempts: 3,
  backoffStepMs: 1000,
  onExhausted: 'fail-open',
  probeOnError: 'fail-closed',
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class SubdomainAvailabilityChecker {
  private readonly sleep: Sleep;

  constructor(
    private readonly deps: {
      directory: TenantDirectory;
      logger: Logger;
      settings: SubdomainAvailabilitySettings;
      sleep?: Sleep;
    },
  ) {
    this.sleep = deps.sleep ?? realSleep;
  }

  async isAvailable(candidate: string): Promise<boolean> {
    const { maxAttempts, backoffStepMs, onExhausted } = this.deps.settings;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await this.deps.directory.checkSubdomainAvailable(candidate);
      } catch (err: unknown) {
        this.deps.logger.warn({
          msg: 'tenants.subdomain_check.attempt_failed',
          flow: 'tenants.subdomain_check',
          subdomain: candidate,
          attempt,
          maxAttempts,
          error: errorMessage(err),
        });

        if (attempt < maxAttempts) {
          await this.sleep(attempt * backoffStepMs);
        }
      }
    }

    this.deps.logger.error({
      msg: 'tenants.subdomain_check.exhausted',
      flow: 'tenants.subdomain_check',
      subdomain: candidate,
      maxAttempts,
      policy: onExhausted,
    });

    return onExhausted === 'fail-open';
  }

  async probe(candidate: string): Promise<ProbeOutcome> {
    try {
      const available = await this.deps.directory.checkSubdomainAvailable(candidate);
      return available ? 'available' : 'taken';
    } catch (err: unknown) {
      const policy = this.deps.settings.probeOnError;

      this.deps.logger.warn({
        msg: 'tenants.subdomain_probe.failed',
        flow: 'tenants.subdomain_probe',
        subdomain: candidate,
        policy,
        error: errorMessage(err),
      });

      return policy === 'fail-open' ? 'available' : 'unverifiable';
    }
  }
}
