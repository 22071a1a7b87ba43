/**
 * backend/src/modules/registration/registration.constants.ts
 *
 * WHY:
 * - Central place for registration constants shared across flows and the controller.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const REGISTRATION_RATE_LIMITS = {
  register: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
  availabilityCheck: {
    perIp: { limit: 60, windowSeconds: 60 },
  },
} as const;

export const REGISTRATION_MESSAGES = {
  completed: 'Registration completed successfully.',
  nextStepsVerifyEmail: 'Please check your email and verify your email address before logging in.',
  nextStepsLogin: 'You can now log in to your account and start using the CRM system.',
} as const;

export const AVAILABILITY_MESSAGES = {
  usernameAvailable: 'Username is available.',
  usernameTaken: 'Username is already taken.',
  emailAvailable: 'Email is available.',
  emailTaken: 'An account with this email already exists.',
  companyAvailable: 'Company name is available.',
  companyTaken: 'Company name is already in use. A numbered subdomain will be assigned.',
  companyUnverifiable: 'Company name availability could not be verified.',
} as const;

export const PROFILE_DEFAULTS = {
  timezone: 'UTC',
  language: 'en',
} as const;
