import { describe, it, expect } from 'vitest';
import { toRegisterUserError } from '../../../src/modules/auth/helpers/to-register-user-error';
import { AppError } from '../../../src/shared/http/errors';
import { DependencyError } from '../../../src/shared/integration/dependency-error';
import { PARTIAL_STATE_NOTICE } from '../../../src/modules/registration';

function dependencyError(kind: 'unavailable' | 'conflict' | 'rejected'): DependencyError {
  return new DependencyError({ dependency: 'user-directory', kind, message: `users ${kind}` });
}

describe('toRegisterUserError', () => {
  it('passes AppErrors through unchanged', () => {
    const original = AppError.validationError('Username is already taken');

    expect(toRegisterUserError(original, { userCreated: false })).toBe(original);
  });

  it('maps a rejected profile to 500 without a partial-state notice', () => {
    const error = toRegisterUserError(dependencyError('rejected'), { userCreated: false });

    expect(error.status).toBe(500);
    expect(error.code).toBe('INTERNAL');
    expect(error.message).toBe('The user profile could not be created.');
    expect(error.meta).toEqual({
      step: 'user',
      cause: 'users rejected',
      dependency: 'user-directory',
      dependencyKind: 'rejected',
    });
  });

  it('maps an unavailable credential store after the profile exists to 503 with the notice', () => {
    const error = toRegisterUserError(dependencyError('unavailable'), { userCreated: true });

    expect(error.status).toBe(503);
    expect(error.code).toBe('SERVICE_UNAVAILABLE');
    expect(error.message).toBe(
      `Login credentials could not be stored right now. ${PARTIAL_STATE_NOTICE}`,
    );
  });

  it('maps a user profile conflict to 409', () => {
    const error = toRegisterUserError(dependencyError('conflict'), { userCreated: false });

    expect(error.status).toBe(409);
    expect(error.code).toBe('CONFLICT');
    expect(error.message).toBe('A user profile with this username or email already exists.');
  });
});
