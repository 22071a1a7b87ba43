/**
 * backend/src/modules/registration/helpers/build-registration-result.ts
 *
 * WHY:
 * - Assembles the single response of a completed registration.
 *
 * RULES:
 * - Pure function. No I/O.
 * - Output is frozen.
 * - URLs use the subdomain the tenant service confirmed, not the one we asked for.
 */

import type { CredentialRecord } from '../../credentials';
import type { TenantRecord } from '../../tenants';
import type { UserRecord } from '../../users';
import { REGISTRATION_MESSAGES } from '../registration.constants';
import type { RegistrationResult } from '../registration.types';

export function buildRegistrationResult(params: {
  tenant: TenantRecord;
  user: UserRecord;
  credentials: CredentialRecord;
  baseDomain: string;
  now: Date;
}): RegistrationResult {
  const { tenant, user, credentials } = params;
  const host = `${tenant.subdomain}.${params.baseDomain}`;
  const emailVerificationRequired = !credentials.emailVerified;

  const result: RegistrationResult = {
    success: true,
    state: 'COMPLETED',
    message: REGISTRATION_MESSAGES.completed,
    tenant: Object.freeze({ ...tenant }),
    user: Object.freeze({ ...user }),
    credentials: Object.freeze({ ...credentials }),
    subdomain: tenant.subdomain,
    loginUrl: `https://${host}/login`,
    dashboardUrl: `https://${host}/dashboard`,
    nextSteps: emailVerificationRequired
      ? REGISTRATION_MESSAGES.nextStepsVerifyEmail
      : REGISTRATION_MESSAGES.nextStepsLogin,
    emailVerificationRequired,
    registeredAt: params.now.toISOString(),
  };

  return Object.freeze(result);
}
