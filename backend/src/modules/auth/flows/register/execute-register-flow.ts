/**
 * backend/src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - One person joins an existing tenant:
 *     uniqueness (users service) → password policy → user profile (users service)
 *     → credentials + verify-email (local DB).
 *
 * RULES:
 * - No HTTP concerns here.
 * - Rate limits (per email key, per IP) run first; a throttled request is not audited.
 * - Email then username uniqueness, THEN password strength: the first failure wins.
 * - Nothing is rolled back. A failure after the profile exists says so (PARTIAL_STATE_NOTICE).
 * - Audit writes never change the outcome.
 * - Never log or audit raw emails, passwords or tokens.
 */

import type { AuditEventStore } from '../../../../shared/audit/audit.types';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { AppError } from '../../../../shared/http/errors';
import type { Logger } from '../../../../shared/logger/logger';
import { emailDomain } from '../../../../shared/logger/pii';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { TokenHasher } from '../../../../shared/security/token-hasher';

import { findPasswordProblem, type CredentialStore } from '../../../credentials';
import type { IdentityUniquenessChecker, UserDirectory } from '../../../users';

import { auditUserRegistered, auditUserRegistrationFailed } from '../../auth.audit';
import { AUTH_MESSAGES, AUTH_RATE_LIMITS } from '../../auth.constants';
import type {
  RegisterUserContext,
  RegisterUserRequest,
  RegisterUserResult,
} from '../../auth.types';
import { toRegisterUserError } from '../../helpers/to-register-user-error';

const FLOW = 'auth.register';

export type RegisterUserFlowDeps = {
  tokenHasher: TokenHasher;
  rateLimiter: RateLimiter;
  logger: Logger;
  auditStore: AuditEventStore;
  identityChecker: Pick<IdentityUniquenessChecker, 'emailAvailable' | 'usernameAvailable'>;
  userDirectory: Pick<UserDirectory, 'createUser'>;
  credentialStore: CredentialStore;
};

async function assertRegistrable(
  deps: RegisterUserFlowDeps,
  input: { email: string; username: string; password: string },
): Promise<void> {
  if (!(await deps.identityChecker.emailAvailable(input.email))) {
    throw AppError.validationError(AUTH_MESSAGES.emailTaken, { reason: 'email_taken' });
  }

  if (!(await deps.identityChecker.usernameAvailable(input.username))) {
    throw AppError.validationError(AUTH_MESSAGES.usernameTaken, { reason: 'username_taken' });
  }

  const problem = findPasswordProblem(input.password);
  if (problem) {
    throw AppError.validationError(problem, { reason: 'weak_password' });
  }
}

function reasonOf(error: AppError): string | null {
  const reason = error.meta?.reason;
  return typeof reason === 'string' ? reason : null;
}

export async function executeRegisterFlow(
  deps: RegisterUserFlowDeps,
  request: RegisterUserRequest,
  ctx: RegisterUserContext,
): Promise<RegisterUserResult> {
  const { requestId } = ctx;
  const email = request.email.trim().toLowerCase();
  const username = request.username.trim();
  const emailKey = deps.tokenHasher.hash(email);

  deps.logger.info({
    msg: 'auth.register.start',
    flow: FLOW,
    requestId,
    tenantId: request.tenantId,
    emailDomain: emailDomain(email),
    emailKey,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `register-user:email:${emailKey}`,
    ...AUTH_RATE_LIMITS.registerUser.perEmail,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `register-user:ip:${ctx.ip}`,
    ...AUTH_RATE_LIMITS.registerUser.perIp,
  });

  let audit = new AuditWriter(deps.auditStore, {
    tenantId: request.tenantId,
    requestId,
    ip: ctx.ip,
    userAgent: ctx.userAgent,
  });
  let userId: string | null = null;

  const appendAudit = async (write: (writer: AuditWriter) => Promise<void>) => {
    const writer = audit;
    try {
      await write(writer);
    } catch (err: unknown) {
      deps.logger.error({
        msg: 'auth.register.audit_write_failed',
        flow: FLOW,
        requestId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  try {
    await assertRegistrable(deps, { email, username, password: request.password });

    const user = await deps.userDirectory.createUser(
      {
        username,
        email,
        firstName: request.firstName,
        lastName: request.lastName,
        displayName: request.displayName,
        phoneNumber: null,
        jobTitle: null,
        department: null,
        timezone: request.timezone,
        language: request.language,
        marketingConsent: false,
      },
      request.tenantId,
    );
    userId = user.id;
    audit = audit.withContext({ userId: user.id });

    const credentials = await deps.credentialStore.createCredentials({
      username,
      email,
      password: request.password,
      profile: { firstName: request.firstName, lastName: request.lastName },
      tenantId: request.tenantId,
      userId: user.id,
    });

    await appendAudit((writer) => auditUserRegistered(writer, { credentialId: credentials.id }));

    deps.logger.info({
      msg: 'auth.register.success',
      flow: FLOW,
      requestId,
      tenantId: request.tenantId,
      userId: user.id,
      credentialId: credentials.id,
    });

    const result: RegisterUserResult = {
      success: true,
      message: AUTH_MESSAGES.registered,
      tenantId: request.tenantId,
      user: {
        id: user.id,
        username,
        email,
        firstName: request.firstName,
        lastName: request.lastName,
        displayName: request.displayName,
        emailVerified: false,
      },
      credentialId: credentials.id,
      emailVerificationRequired: true,
      registeredAt: credentials.createdAt,
    };
    return Object.freeze(result);
  } catch (err: unknown) {
    const userCreated = userId !== null;
    const error = toRegisterUserError(err, { userCreated });

    const logMeta = {
      msg: 'auth.register.failed',
      flow: FLOW,
      requestId,
      code: error.code,
      userId,
      cause: err instanceof Error ? err.message : String(err),
    };
    if (error.status >= 500 || userCreated) {
      deps.logger.error(logMeta);
    } else {
      deps.logger.warn(logMeta);
    }

    await appendAudit((writer) =>
      auditUserRegistrationFailed(writer, {
        code: error.code,
        reason: reasonOf(error),
        userCreated,
      }),
    );

    throw error;
  }
}
