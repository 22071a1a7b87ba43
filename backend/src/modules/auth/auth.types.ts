/**
 * backend/src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Single-user sign-up: a person joins an EXISTING tenant
 *   (users service profile + local credentials, no tenant creation).
 *
 * RULES:
 * - Results never carry the password, its hash or the verification token.
 */

export type RegisterUserRequest = {
  tenantId: string;
  username: string;
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  displayName: string | null;
  timezone: string;
  language: string;
};

export type RegisterUserContext = {
  requestId: string;
  ip: string;
  userAgent: string | null;
};

export type RegisterUserResult = Readonly<{
  success: true;
  message: string;
  tenantId: string;
  user: {
    id: string;
    username: string;
    email: string;
    firstName: string;
    lastName: string;
    displayName: string | null;
    emailVerified: false;
  };
  credentialId: string;
  emailVerificationRequired: true;
  registeredAt: string;
}>;
