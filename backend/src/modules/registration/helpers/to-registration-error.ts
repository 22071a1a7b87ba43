/**
 * backend/src/modules/registration/helpers/to-registration-error.ts
 *
 * WHY:
 * - Every abort path ends in exactly one RegistrationError.
 * - The state the execution failed in tells us which step failed:
 *     VALIDATED      → tenant creation (incl. subdomain search)
 *     TENANT_CREATED → user creation
 *     USER_CREATED   → credential creation
 *
 * RULES:
 * - DependencyError.kind decides the error kind:
 *     unavailable → DEPENDENCY_UNAVAILABLE, conflict → DEPENDENCY_CONFLICT,
 *     rejected / invalid_response → UNEXPECTED_FAILURE.
 * - Deadline exceeded → DEPENDENCY_UNAVAILABLE.
 * - A non-empty ledger appends PARTIAL_STATE_NOTICE to the message.
 */

import { isDependencyError } from '../../../shared/integration/dependency-error';
import type { CreatedResource } from '../ledger/created-resource-ledger';
import {
  PARTIAL_STATE_NOTICE,
  RegistrationError,
  type RegistrationErrorKind,
} from '../registration.errors';
import type { RegistrationState } from '../registration.types';
import { DeadlineExceededError } from './registration-deadline';

type Step = 'tenant' | 'user' | 'credentials' | 'other';

type AbortKind = Extract<
  RegistrationErrorKind,
  'DEPENDENCY_UNAVAILABLE' | 'DEPENDENCY_CONFLICT' | 'UNEXPECTED_FAILURE'
>;

const STEP_BY_STATE: Partial<Record<RegistrationState, Step>> = {
  VALIDATED: 'tenant',
  TENANT_CREATED: 'user',
  USER_CREATED: 'credentials',
};

const MESSAGES: Record<Step, Record<AbortKind, string>> = {
  tenant: {
    DEPENDENCY_UNAVAILABLE: 'The company workspace service is unavailable. Please try again later.',
    DEPENDENCY_CONFLICT: 'This company workspace address was just taken. Please try again.',
    UNEXPECTED_FAILURE: 'The company workspace could not be created.',
  },
  user: {
    DEPENDENCY_UNAVAILABLE: 'The user profile service is unavailable.',
    DEPENDENCY_CONFLICT: 'A user profile with this username or email already exists.',
    UNEXPECTED_FAILURE: 'The user profile could not be created.',
  },
  credentials: {
    DEPENDENCY_UNAVAILABLE: 'Login credentials could not be stored right now.',
    DEPENDENCY_CONFLICT: 'Login credentials already exist for this username or email.',
    UNEXPECTED_FAILURE: 'Login credentials could not be created.',
  },
  other: {
    DEPENDENCY_UNAVAILABLE: 'A required service is unavailable. Please try again later.',
    DEPENDENCY_CONFLICT: 'The registration conflicts with an existing account.',
    UNEXPECTED_FAILURE: 'Registration failed unexpectedly.',
  },
};

function kindFor(err: unknown): AbortKind {
  if (err instanceof DeadlineExceededError) return 'DEPENDENCY_UNAVAILABLE';
  if (isDependencyError(err)) {
    if (err.kind === 'unavailable') return 'DEPENDENCY_UNAVAILABLE';
    if (err.kind === 'conflict') return 'DEPENDENCY_CONFLICT';
  }
  return 'UNEXPECTED_FAILURE';
}

export function toRegistrationError(
  err: unknown,
  failedAt: RegistrationState,
  partialState: readonly CreatedResource[],
): RegistrationError {
  if (err instanceof RegistrationError) return err;

  const kind = kindFor(err);
  const step = STEP_BY_STATE[failedAt] ?? 'other';
  const base =
    err instanceof DeadlineExceededError
      ? 'Registration took too long to complete. Please try again later.'
      : MESSAGES[step][kind];

  return new RegistrationError({
    kind,
    failedAt,
    partialState,
    message: partialState.length > 0 ? `${base} ${PARTIAL_STATE_NOTICE}` : base,
    meta: {
      step,
      cause: err instanceof Error ? err.message : String(err),
      ...(isDependencyError(err)
        ? { dependency: err.dependency, dependencyKind: err.kind, dependencyStatus: err.status }
        : {}),
    },
  });
}
