/**
 * backend/src/modules/registration/helpers/generate-unique-subdomain.ts
 *
 * WHY:
 * - Finds the first free subdomain: base, base-1 … base-99, then the time-based fallback.
 *
 * RULES:
 * - Each candidate goes through the retrying checker (isAvailable), never the raw directory.
 * - The fallback is accepted WITHOUT a check (logged at warn). If it collides, tenant
 *   creation fails with a conflict, which is the intended backstop.
 */

import type { Logger } from '../../../shared/logger/logger';
import {
  isFallbackAttempt,
  nextCandidate,
  type SubdomainAvailabilityChecker,
} from '../../tenants';

export type UniqueSubdomain = {
  subdomain: string;
  /** 0 = base accepted; n = n-th generated candidate accepted. */
  attempts: number;
  fallback: boolean;
};

export async function generateUniqueSubdomain(params: {
  base: string;
  checker: Pick<SubdomainAvailabilityChecker, 'isAvailable'>;
  nowMs: () => number;
  logger: Logger;
  requestId: string;
}): Promise<UniqueSubdomain> {
  const { base, checker } = params;

  if (await checker.isAvailable(base)) {
    return { subdomain: base, attempts: 0, fallback: false };
  }

  for (let attempt = 1; ; attempt++) {
    const candidate = nextCandidate(base, attempt, params.nowMs());

    if (isFallbackAttempt(attempt)) {
      params.logger.warn({
        msg: 'registration.subdomain.fallback_unchecked',
        flow: 'registration.register_company',
        requestId: params.requestId,
        base,
        subdomain: candidate,
        attempts: attempt,
      });
      return { subdomain: candidate, attempts: attempt, fallback: true };
    }

    if (await checker.isAvailable(candidate)) {
      return { subdomain: candidate, attempts: attempt, fallback: false };
    }
  }
}
