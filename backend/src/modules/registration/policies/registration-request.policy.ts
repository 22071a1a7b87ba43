/**
 * backend/src/modules/registration/policies/registration-request.policy.ts
 *
 * WHY:
 * - The structural part of validation: required identifiers must be present
 *   before any network call is made.
 * - HTTP callers are already validated by zod; this guards every other caller of the flow.
 *
 * RULES:
 * - Pure. Returns the first problem or null.
 */

import { ValidationMessages } from '../registration.errors';
import type { RegistrationRequest } from '../registration.types';

export function findStructuralProblem(
  request: Pick<RegistrationRequest, 'email' | 'username' | 'companyName'>,
): string | null {
  if (request.email.trim().length === 0) return ValidationMessages.emailRequired;
  if (request.username.trim().length === 0) return ValidationMessages.usernameRequired;
  if (request.companyName.trim().length === 0) return ValidationMessages.companyNameRequired;
  return null;
}
