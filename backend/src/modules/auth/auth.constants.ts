/**
 * backend/src/modules/auth/auth.constants.ts
 */

export const AUTH_RATE_LIMITS = {
  registerUser: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
} as const;

export const AUTH_MESSAGES = {
  registered: 'User registered successfully',
  emailTaken: 'Email address is already registered',
  usernameTaken: 'Username is already taken',
} as const;

export const AUTH_PROFILE_DEFAULTS = {
  timezone: 'UTC',
  language: 'en',
} as const;
