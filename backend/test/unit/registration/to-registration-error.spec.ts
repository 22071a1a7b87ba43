import { describe, it, expect } from 'vitest';
import { toRegistrationError } from '../../../src/modules/registration/helpers/to-registration-error';
import { DeadlineExceededError } from '../../../src/modules/registration/helpers/registration-deadline';
import {
  PARTIAL_STATE_NOTICE,
  RegistrationErrors,
} from '../../../src/modules/registration/registration.errors';
import type { CreatedResource } from '../../../src/modules/registration/ledger/created-resource-ledger';
import { DependencyError } from '../../../src/shared/integration/dependency-error';

const tenant: CreatedResource = { kind: 'tenant', id: 'tenant-1', createdAt: '2026-03-02T09:30:00.000Z' };
const user: CreatedResource = { kind: 'user', id: 'user-1', createdAt: '2026-03-02T09:30:00.000Z' };

describe('toRegistrationError', () => {
  it('passes registration errors through unchanged', () => {
    const original = RegistrationErrors.validationFailed('Email is required.');

    expect(toRegistrationError(original, 'ADMITTED', [])).toBe(original);
  });

  it('maps an unavailable tenant service to DEPENDENCY_UNAVAILABLE / 503', () => {
    const err = toRegistrationError(
      new DependencyError({ dependency: 'tenant-directory', kind: 'unavailable', message: 'down' }),
      'VALIDATED',
      [],
    );

    expect(err.kind).toBe('DEPENDENCY_UNAVAILABLE');
    expect(err.status).toBe(503);
    expect(err.code).toBe('SERVICE_UNAVAILABLE');
    expect(err.failedAt).toBe('VALIDATED');
    expect(err.message).toBe('The company workspace service is unavailable. Please try again later.');
    expect(err.hasPartialState).toBe(false);
  });

  it('maps a credential conflict after tenant and user to DEPENDENCY_CONFLICT with the partial-state notice', () => {
    const err = toRegistrationError(
      new DependencyError({ dependency: 'credential-store', kind: 'conflict', message: 'dup' }),
      'USER_CREATED',
      [tenant, user],
    );

    expect(err.kind).toBe('DEPENDENCY_CONFLICT');
    expect(err.status).toBe(409);
    expect(err.message).toBe(
      `Login credentials already exist for this username or email. ${PARTIAL_STATE_NOTICE}`,
    );
    expect(err.partialState).toEqual([tenant, user]);
  });

  it('maps rejected and invalid responses to UNEXPECTED_FAILURE', () => {
    const rejected = toRegistrationError(
      new DependencyError({ dependency: 'user-directory', kind: 'rejected', message: 'bad', status: 400 }),
      'TENANT_CREATED',
      [tenant],
    );
    const invalid = toRegistrationError(
      new DependencyError({ dependency: 'user-directory', kind: 'invalid_response', message: 'shape' }),
      'TENANT_CREATED',
      [tenant],
    );

    expect(rejected.kind).toBe('UNEXPECTED_FAILURE');
    expect(rejected.status).toBe(500);
    expect(rejected.meta).toMatchObject({
      step: 'user',
      dependency: 'user-directory',
      dependencyKind: 'rejected',
      dependencyStatus: 400,
    });
    expect(invalid.kind).toBe('UNEXPECTED_FAILURE');
  });

  it('maps a passed deadline to DEPENDENCY_UNAVAILABLE', () => {
    const err = toRegistrationError(new DeadlineExceededError(1000, 1500, 'VALIDATED'), 'VALIDATED', []);

    expect(err.kind).toBe('DEPENDENCY_UNAVAILABLE');
    expect(err.message).toBe('Registration took too long to complete. Please try again later.');
  });

  it('maps anything else to UNEXPECTED_FAILURE', () => {
    const err = toRegistrationError(new TypeError('boom'), 'CREDENTIALS_CREATED', [tenant]);

    expect(err.kind).toBe('UNEXPECTED_FAILURE');
    expect(err.message).toBe(`Registration failed unexpectedly. ${PARTIAL_STATE_NOTICE}`);
    expect(err.meta).toEqual({ step: 'other', cause: 'boom' });
  });
});
