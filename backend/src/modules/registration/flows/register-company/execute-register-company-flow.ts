/**
 * backend/src/modules/registration/flows/register-company/execute-register-company-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - One sign-up request → tenant (tenant service) → user (users service) →
 *   credentials (local DB), as one deduplicated, ordered operation.
 *
 * STATES:
 *   ADMITTED → VALIDATED → TENANT_CREATED → USER_CREATED → CREDENTIALS_CREATED → COMPLETED
 *   any non-terminal state → ABORTED
 *
 * RULES:
 * - No HTTP concerns here.
 * - Rate limits run BEFORE admission (a throttled request never holds the dedup key).
 * - A guard that fails to admit holds nothing (see CacheRegistrationGuard); the request
 *   ends as DEPENDENCY_UNAVAILABLE without touching any collaborator.
 * - The dedup key is released in `finally` on every path after admission; a release
 *   failure is logged and never replaces the real outcome.
 * - Creation steps are strictly sequential and never retried here
 *   (retries live in the subdomain availability checker only).
 * - Nothing is rolled back on abort. The ledger records what was created and the
 *   error message says partial state may exist.
 * - Never log or audit raw emails, passwords or tokens.
 */

import type { AuditEventStore } from '../../../../shared/audit/audit.types';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { Logger } from '../../../../shared/logger/logger';
import { emailDomain } from '../../../../shared/logger/pii';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { TokenHasher } from '../../../../shared/security/token-hasher';

import type { CredentialStore } from '../../../credentials';
import {
  baseCandidate,
  buildTrialPlan,
  type SubdomainAvailabilityChecker,
  type TenantDirectory,
  type TrialPlanSettings,
} from '../../../tenants';
import type { IdentityUniquenessChecker, UserDirectory } from '../../../users';

import type { RegistrationGuard } from '../../guard/registration-guard';
import { CreatedResourceLedger } from '../../ledger/created-resource-ledger';
import { RegistrationTracker } from '../../state/registration-state';
import { fingerprintDedupKey } from '../../helpers/build-dedup-key';
import { generateUniqueSubdomain } from '../../helpers/generate-unique-subdomain';
import { RegistrationDeadline } from '../../helpers/registration-deadline';
import { buildRegistrationResult } from '../../helpers/build-registration-result';
import { toRegistrationError } from '../../helpers/to-registration-error';
import { findStructuralProblem } from '../../policies/registration-request.policy';
import { RegistrationErrors, ValidationMessages } from '../../registration.errors';
import { auditRegistrationCompleted, auditRegistrationFailed } from '../../registration.audit';
import { REGISTRATION_RATE_LIMITS } from '../../registration.constants';
import type {
  RegistrationContext,
  RegistrationRequest,
  RegistrationResult,
  RegistrationState,
} from '../../registration.types';

const FLOW = 'registration.register_company';

export type RegisterCompanySettings = {
  trialPlan: TrialPlanSettings;
  baseDomain: string;
  deadlineMs: number;
};

export type RegisterCompanyFlowDeps = {
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
  clock: () => Date;
};

/**
 * ADMITTED → VALIDATED. Returns the base subdomain candidate.
 *
 * A taken base is fine (a numbered variant is generated next);
 * an unverifiable one (probe error under fail-closed) is not.
 */
async function validateRegistration(
  deps: RegisterCompanyFlowDeps,
  input: { email: string; username: string; companyName: string },
): Promise<string> {
  const problem = findStructuralProblem(input);
  if (problem) {
    throw RegistrationErrors.validationFailed(problem, { reason: 'structural' });
  }

  if (!(await deps.identityChecker.emailAvailable(input.email))) {
    throw RegistrationErrors.validationFailed(ValidationMessages.emailTaken, {
      reason: 'email_taken',
    });
  }

  if (!(await deps.identityChecker.usernameAvailable(input.username))) {
    throw RegistrationErrors.validationFailed(ValidationMessages.usernameTaken, {
      reason: 'username_taken',
    });
  }

  const base = baseCandidate(input.companyName);
  if ((await deps.availabilityChecker.probe(base)) === 'unverifiable') {
    throw RegistrationErrors.validationFailed(ValidationMessages.companyUnverifiable, {
      reason: 'company_unverifiable',
      subdomain: base,
    });
  }

  return base;
}

async function appendAuditSafely(
  logger: Logger,
  requestId: string,
  write: () => Promise<void>,
): Promise<void> {
  try {
    await write();
  } catch (err: unknown) {
    logger.error({
      msg: 'registration.audit.write_failed',
      flow: FLOW,
      requestId,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

export async function executeRegisterCompanyFlow(
  deps: RegisterCompanyFlowDeps,
  request: RegistrationRequest,
  ctx: RegistrationContext,
): Promise<RegistrationResult> {
  const { requestId } = ctx;
  const email = request.email.trim().toLowerCase();
  const username = request.username.trim();
  const companyName = request.companyName.trim();
  const emailKey = deps.tokenHasher.hash(email);
  const nowMs = () => deps.clock().getTime();

  deps.logger.info({
    msg: 'registration.start',
    flow: FLOW,
    requestId,
    emailDomain: emailDomain(email),
    emailKey,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `register:email:${emailKey}`,
    ...REGISTRATION_RATE_LIMITS.register.perEmail,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `register:ip:${ctx.ip}`,
    ...REGISTRATION_RATE_LIMITS.register.perIp,
  });

  const dedupKey = fingerprintDedupKey(deps.tokenHasher, email, companyName);

  let admitted: boolean;
  try {
    admitted = await deps.guard.tryAdmit(dedupKey);
  } catch (err: unknown) {
    const cause = err instanceof Error ? err.message : String(err);
    deps.logger.error({ msg: 'registration.guard.admit_failed', flow: FLOW, requestId, cause });
    throw RegistrationErrors.guardUnavailable({ cause });
  }

  if (!admitted) {
    deps.logger.warn({
      msg: 'registration.duplicate_in_progress',
      flow: FLOW,
      requestId,
      emailKey,
    });
    throw RegistrationErrors.duplicateInProgress();
  }

  const tracker = new RegistrationTracker(deps.clock);
  const ledger = new CreatedResourceLedger(deps.clock);
  const deadline = new RegistrationDeadline(deps.settings.deadlineMs, nowMs);
  let audit = new AuditWriter(deps.auditStore, {
    requestId,
    ip: ctx.ip,
    userAgent: ctx.userAgent,
  });

  const advance = (to: RegistrationState): void => {
    const transition = tracker.advance(to);
    deps.logger.info({
      msg: 'registration.state',
      flow: FLOW,
      requestId,
      from: transition.from,
      to: transition.to,
      elapsedMs: deadline.elapsedMs(),
    });
  };

  try {
    const base = await validateRegistration(deps, { email, username, companyName });
    advance('VALIDATED');

    deadline.assertNotExceeded(tracker.state);
    const unique = await generateUniqueSubdomain({
      base,
      checker: deps.availabilityChecker,
      nowMs,
      logger: deps.logger,
      requestId,
    });

    deadline.assertNotExceeded(tracker.state);
    const tenant = await deps.tenantDirectory.createTenant({
      name: companyName,
      subdomain: unique.subdomain,
      contactEmail: email,
      billingEmail: email,
      plan: buildTrialPlan(deps.settings.trialPlan, deps.clock()),
    });
    ledger.record('tenant', tenant.id);
    audit = audit.withContext({ tenantId: tenant.id });
    advance('TENANT_CREATED');

    deadline.assertNotExceeded(tracker.state);
    const user = await deps.userDirectory.createUser(
      { ...request.profile, username, email },
      tenant.id,
    );
    ledger.record('user', user.id);
    audit = audit.withContext({ userId: user.id });
    advance('USER_CREATED');

    deadline.assertNotExceeded(tracker.state);
    const credentials = await deps.credentialStore.createCredentials({
      username,
      email,
      password: request.password,
      profile: {
        firstName: request.profile.firstName,
        lastName: request.profile.lastName,
      },
      tenantId: tenant.id,
      userId: user.id,
    });
    ledger.record('credentials', credentials.id);
    advance('CREDENTIALS_CREATED');

    const result = buildRegistrationResult({
      tenant,
      user,
      credentials,
      baseDomain: deps.settings.baseDomain,
      now: deps.clock(),
    });
    advance('COMPLETED');

    const completedAudit = audit;
    await appendAuditSafely(deps.logger, requestId, () =>
      auditRegistrationCompleted(completedAudit, {
        subdomain: result.subdomain,
        credentialId: credentials.id,
        subdomainAttempts: unique.attempts,
        subdomainFallback: unique.fallback,
      }),
    );

    deps.logger.info({
      msg: 'registration.success',
      flow: FLOW,
      requestId,
      tenantId: tenant.id,
      userId: user.id,
      credentialId: credentials.id,
      subdomain: result.subdomain,
      subdomainAttempts: unique.attempts,
      elapsedMs: deadline.elapsedMs(),
    });

    return result;
  } catch (err: unknown) {
    const failedAt = tracker.abort();
    const error = toRegistrationError(err, failedAt, ledger.list());

    const logMeta = {
      msg: 'registration.aborted',
      flow: FLOW,
      requestId,
      kind: error.kind,
      failedAt,
      partialState: error.partialState,
      cause: err instanceof Error ? err.message : String(err),
    };
    if (error.status >= 500 || error.hasPartialState) {
      deps.logger.error(logMeta);
    } else {
      deps.logger.warn(logMeta);
    }

    const failedAudit = audit;
    await appendAuditSafely(deps.logger, requestId, () =>
      auditRegistrationFailed(failedAudit, {
        kind: error.kind,
        failedAt,
        partialState: error.partialState,
      }),
    );

    throw error;
  } finally {
    try {
      await deps.guard.release(dedupKey);
    } catch (releaseErr: unknown) {
      deps.logger.error({
        msg: 'registration.guard.release_failed',
        flow: FLOW,
        requestId,
        error: releaseErr instanceof Error ? releaseErr.message : String(releaseErr),
      });
    }
  }
}
