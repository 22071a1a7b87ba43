/**
 * backend/src/modules/auth/helpers/to-register-user-error.ts
 *
 * WHY:
 * - Single-user sign-up ends in exactly one AppError, whatever failed:
 *     AppError (validation)      → unchanged
 *     DependencyError unavailable → 503 SERVICE_UNAVAILABLE
 *     DependencyError conflict    → 409 CONFLICT
 *     anything else               → 500 INTERNAL
 *
 * RULES:
 * - Once the users service has created the profile, the message carries
 *   PARTIAL_STATE_NOTICE (nothing is rolled back).
 */

import { AppError, type AppErrorMeta } from '../../../shared/http/errors';
import { isDependencyError } from '../../../shared/integration/dependency-error';

import { PARTIAL_STATE_NOTICE } from '../../registration';

type Step = 'user' | 'credentials';

const MESSAGES: Record<Step, { unavailable: string; conflict: string; failed: string }> = {
  user: {
    unavailable: 'The user profile service is unavailable. Please try again later.',
    conflict: 'A user profile with this username or email already exists.',
    failed: 'The user profile could not be created.',
  },
  credentials: {
    unavailable: 'Login credentials could not be stored right now.',
    conflict: 'Login credentials already exist for this username or email.',
    failed: 'Login credentials could not be created.',
  },
};

export function toRegisterUserError(err: unknown, opts: { userCreated: boolean }): AppError {
  if (err instanceof AppError) return err;

  const step: Step = opts.userCreated ? 'credentials' : 'user';
  const withNotice = (message: string) =>
    opts.userCreated ? `${message} ${PARTIAL_STATE_NOTICE}` : message;

  const meta: AppErrorMeta = {
    step,
    cause: err instanceof Error ? err.message : String(err),
  };

  if (!isDependencyError(err)) {
    return AppError.internal(withNotice('Registration failed unexpectedly.'), meta);
  }

  const depMeta = { ...meta, dependency: err.dependency, dependencyKind: err.kind };
  if (err.kind === 'unavailable') {
    return AppError.serviceUnavailable(withNotice(MESSAGES[step].unavailable), depMeta);
  }
  if (err.kind === 'conflict') {
    return AppError.conflict(withNotice(MESSAGES[step].conflict), depMeta);
  }
  return AppError.internal(withNotice(MESSAGES[step].failed), depMeta);
}
