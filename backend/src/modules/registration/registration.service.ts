/**
 * backend/src/modules/registration/registration.service.ts
 *
 * WHY:
 * - Entry point for everything registration exposes:
 *   - registerCompany(): the full orchestration (delegates to the flow)
 *   - checkUsername() / checkEmail() / checkCompany(): pre-submit availability hints
 *   - inFlight() / clearInFlight(): operator view of the dedup guard
 *
 * RULES:
 * - Availability checks are hints only; registerCompany() re-validates everything.
 * - Availability checks are rate limited per IP.
 * - No HTTP concerns here.
 */

import type { AuditEventStore } from '../../shared/audit/audit.types';
import type { Logger } from '../../shared/logger/logger';
import { emailDomain } from '../../shared/logger/pii';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';

import type { CredentialStore } from '../credentials';
import {
  baseCandidate,
  type SubdomainAvailabilityChecker,
  type TenantDirectory,
} from '../tenants';
import type { IdentityUniquenessChecker, UserDirectory } from '../users';

import {
  executeRegisterCompanyFlow,
  type RegisterCompanySettings,
} from './flows/register-company/execute-register-company-flow';
import type { RegistrationGuard } from './guard/registration-guard';
import { AVAILABILITY_MESSAGES, REGISTRATION_RATE_LIMITS } from './registration.constants';
import type {
  AvailabilityAnswer,
  CompanyAvailabilityAnswer,
  InFlightSnapshot,
  RegistrationContext,
  RegistrationRequest,
  RegistrationResult,
} from './registration.types';

export type RegistrationServiceDeps = {
  guard: RegistrationGuard;
  tokenHasher: TokenHasher;
  rateLimiter: RateLimiter;
  logger: Logger;
  auditStore: AuditEventStore;
  tenantDirectory: TenantDirectory;
  availabilityChecker: Pick<SubdomainAvailabilityChecker, 'isAvailable' | 'probe'>;
  identityChecker: Pick<IdentityUniquenessChecker, 'emailAvailable' | 'usernameAvailable'>;
  userDirectory: UserDirectory;
  credentialStore: CredentialStore;
  settings: RegisterCompanySettings;
  clock?: () => Date;
};

type CheckContext = { ip: string; requestId: string };

export class RegistrationService {
  private readonly clock: () => Date;

  constructor(private readonly deps: RegistrationServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async registerCompany(
    request: RegistrationRequest,
    ctx: RegistrationContext,
  ): Promise<RegistrationResult> {
    return executeRegisterCompanyFlow({ ...this.deps, clock: this.clock }, request, ctx);
  }

  async checkUsername(username: string, ctx: CheckContext): Promise<AvailabilityAnswer> {
    await this.limitAvailabilityCheck(ctx);

    const available = await this.deps.identityChecker.usernameAvailable(username.trim());
    return {
      available,
      message: available
        ? AVAILABILITY_MESSAGES.usernameAvailable
        : AVAILABILITY_MESSAGES.usernameTaken,
    };
  }

  async checkEmail(email: string, ctx: CheckContext): Promise<AvailabilityAnswer> {
    await this.limitAvailabilityCheck(ctx);

    const normalized = email.trim().toLowerCase();
    const available = await this.deps.identityChecker.emailAvailable(normalized);

    this.deps.logger.info({
      msg: 'registration.check_email',
      flow: 'registration.availability',
      requestId: ctx.requestId,
      emailDomain: emailDomain(normalized),
      available,
    });

    return {
      available,
      message: available ? AVAILABILITY_MESSAGES.emailAvailable : AVAILABILITY_MESSAGES.emailTaken,
    };
  }

  /**
   * Answers for the BASE subdomain only. A taken name is still registrable
   * (a numbered subdomain is assigned), so `available: false` is a hint, not a rejection.
   */
  async checkCompany(companyName: string, ctx: CheckContext): Promise<CompanyAvailabilityAnswer> {
    await this.limitAvailabilityCheck(ctx);

    const subdomain = baseCandidate(companyName);
    const outcome = await this.deps.availabilityChecker.probe(subdomain);

    switch (outcome) {
      case 'available':
        return { available: true, subdomain, message: AVAILABILITY_MESSAGES.companyAvailable };
      case 'taken':
        return { available: false, subdomain, message: AVAILABILITY_MESSAGES.companyTaken };
      case 'unverifiable':
        return { available: false, subdomain, message: AVAILABILITY_MESSAGES.companyUnverifiable };
    }
  }

  async inFlight(): Promise<InFlightSnapshot> {
    const keys = await this.deps.guard.snapshot();
    return { count: keys.length, keys };
  }

  async clearInFlight(ctx: { requestId: string }): Promise<{ cleared: number }> {
    const cleared = await this.deps.guard.clearAll();

    this.deps.logger.warn({
      msg: 'registration.in_flight.cleared',
      flow: 'registration.admin',
      requestId: ctx.requestId,
      cleared,
    });

    return { cleared };
  }

  private async limitAvailabilityCheck(ctx: CheckContext): Promise<void> {
    await this.deps.rateLimiter.hitOrThrow({
      key: `availability:ip:${ctx.ip}`,
      ...REGISTRATION_RATE_LIMITS.availabilityCheck.perIp,
    });
  }
}
