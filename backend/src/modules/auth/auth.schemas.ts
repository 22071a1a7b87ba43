/**
 * backend/src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Shape checks for POST /api/v1/auth/register.
 *
 * RULES:
 * - Password strength is NOT checked here; the flow applies the credentials password
 *   policy after the uniqueness checks. Only presence and max length are enforced.
 */

import { z } from 'zod';

import { AUTH_PROFILE_DEFAULTS } from './auth.constants';

const PERSON_NAME_PATTERN = /^[a-zA-Z\s'-]+$/;

const personName = (label: string) =>
  z
    .string()
    .trim()
    .min(1, `${label} is required`)
    .max(100, `${label} must be at most 100 characters`)
    .regex(PERSON_NAME_PATTERN, `${label} may only contain letters, spaces, apostrophes and hyphens`);

export const registerUserSchema = z.object({
  tenantId: z.string().uuid('Invalid tenant id'),
  username: z
    .string()
    .trim()
    .min(3, 'Username must be at least 3 characters')
    .max(50, 'Username must be at most 50 characters')
    .regex(/^[a-zA-Z0-9_-]+$/, 'Username may only contain letters, digits, underscores and hyphens'),
  email: z.string().trim().email('Invalid email address').max(255),
  password: z
    .string()
    .min(1, 'Password is required')
    .max(128, 'Password must be at most 128 characters'),
  firstName: personName('First name'),
  lastName: personName('Last name'),
  displayName: z.string().trim().max(200).optional(),
  timezone: z.string().trim().min(1).max(64).default(AUTH_PROFILE_DEFAULTS.timezone),
  language: z.string().trim().min(2).max(10).default(AUTH_PROFILE_DEFAULTS.language),
});

export type RegisterUserInput = z.infer<typeof registerUserSchema>;
