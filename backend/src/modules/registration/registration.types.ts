/**
 * backend/src/modules/registration/registration.types.ts
 *
 * WHY:
 * - Domain types for company registration (one request → tenant + user + credentials).
 *
 * RULES:
 * - RegistrationResult is frozen once built.
 * - Results and errors never carry passwords, hashes or verification tokens.
 */

import type { TenantRecord } from '../tenants';
import type { UserRecord } from '../users';
import type { CredentialRecord } from '../credentials';

export type RegistrationProfile = {
  firstName: string | null;
  lastName: string | null;
  phoneNumber: string | null;
  jobTitle: string | null;
  department: string | null;
  timezone: string;
  language: string;
  marketingConsent: boolean;
};

export type RegistrationRequest = {
  email: string;
  username: string;
  password: string;
  companyName: string;
  profile: RegistrationProfile;
};

/** Request-level data that is not part of the registration itself. */
export type RegistrationContext = {
  requestId: string;
  ip: string;
  userAgent: string | null;
};

const REGISTRATION_STATES = [
  'ADMITTED',
  'VALIDATED',
  'TENANT_CREATED',
  'USER_CREATED',
  'CREDENTIALS_CREATED',
  'COMPLETED',
  'ABORTED',
] as const;

export type RegistrationState = (typeof REGISTRATION_STATES)[number];

export type RegistrationResult = Readonly<{
  success: true;
  state: 'COMPLETED';
  message: string;
  tenant: TenantRecord;
  user: UserRecord;
  credentials: CredentialRecord;
  subdomain: string;
  loginUrl: string;
  dashboardUrl: string;
  nextSteps: string;
  emailVerificationRequired: boolean;
  registeredAt: string;
}>;

export type AvailabilityAnswer = {
  available: boolean;
  message: string;
};

export type CompanyAvailabilityAnswer = AvailabilityAnswer & {
  subdomain: string;
};

export type InFlightSnapshot = {
  count: number;
  keys: string[];
};
