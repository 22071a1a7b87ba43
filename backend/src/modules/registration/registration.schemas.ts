/**
 * backend/src/modules/registration/registration.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the registration endpoints.
 * - Prevents invalid payloads from reaching the flow.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Email is normalized to lowercase in the flow, not here.
 * - Username is optional; the controller derives one from the email when it is missing.
 * - Terms and privacy must be explicitly accepted (literal true).
 */

import { z } from 'zod';

import { PROFILE_DEFAULTS } from './registration.constants';

export const USERNAME_PATTERN = /^[a-zA-Z0-9._-]+$/;

const usernameField = z
  .string()
  .trim()
  .min(3, 'Username must be at least 3 characters')
  .max(50, 'Username must be at most 50 characters')
  .regex(USERNAME_PATTERN, 'Username may only contain letters, digits, dots, underscores and hyphens');

const optionalText = (max: number) => z.string().trim().max(max).optional();

export const registerCompanySchema = z.object({
  email: z.string().trim().email('Invalid email address').max(255),
  username: usernameField.optional(),
  password: z
    .string()
    .min(8, 'Password must be at least 8 characters')
    .max(128, 'Password must be at most 128 characters')
    .regex(/[a-z]/, 'Password must contain a lowercase letter')
    .regex(/[A-Z]/, 'Password must contain an uppercase letter')
    .regex(/\d/, 'Password must contain a digit')
    .regex(/[^a-zA-Z0-9]/, 'Password must contain a special character'),
  companyName: z.string().trim().min(1, 'Company name is required').max(255),

  firstName: optionalText(100),
  lastName: optionalText(100),
  phoneNumber: optionalText(32),
  jobTitle: optionalText(100),
  department: optionalText(100),
  timezone: z.string().trim().min(1).max(64).default(PROFILE_DEFAULTS.timezone),
  language: z.string().trim().min(2).max(10).default(PROFILE_DEFAULTS.language),
  marketingConsent: z.boolean().default(false),

  acceptTerms: z.literal(true, {
    errorMap: () => ({ message: 'Terms of service must be accepted' }),
  }),
  acceptPrivacy: z.literal(true, {
    errorMap: () => ({ message: 'Privacy policy must be accepted' }),
  }),
});

export type RegisterCompanyInput = z.infer<typeof registerCompanySchema>;

export const checkUsernameParamsSchema = z.object({
  username: usernameField,
});

export const checkEmailQuerySchema = z.object({
  email: z.string().trim().email('Invalid email address').max(255),
});

export const checkCompanyQuerySchema = z.object({
  companyName: z.string().trim().min(1, 'Company name is required').max(255),
});
