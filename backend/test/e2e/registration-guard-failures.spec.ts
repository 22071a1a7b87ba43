import { describe, it, expect } from 'vitest';
import { InMemRegistrationGuard } from '../../src/modules/registration';
import { logger } from '../../src/shared/logger/logger';
import { buildTestApp } from '../helpers/build-test-app';
import { FlakyIndexCache } from '../helpers/flaky-index-cache';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

const URL = '/api/v1/auth/register/complete';

function registrationBody(overrides: Record<string, unknown> = {}) {
  return {
    email: 'a@b.com',
    username: 'abee',
    password: 'Str0ng!Pass',
    companyName: 'Acme Co',
    acceptTerms: true,
    acceptPrivacy: true,
    ...overrides,
  };
}

/** Real in-memory guard that counts releases and can be told to fail them. */
class CountingGuard extends InMemRegistrationGuard {
  releases = 0;
  failRelease = false;
  failAdmit = false;

  constructor() {
    super(logger);
  }

  tryAdmit(key: string): Promise<boolean> {
    if (this.failAdmit) return Promise.reject(new Error('guard store down'));
    return super.tryAdmit(key);
  }

  release(key: string): Promise<void> {
    this.releases += 1;
    if (this.failRelease) return Promise.reject(new Error('guard store down'));
    return super.release(key);
  }
}

describe('registration guard failures', () => {
  it('answers 503 and calls no collaborator when admission fails', async () => {
    const guard = new CountingGuard();
    guard.failAdmit = true;
    const { app, calls, fakes, close } = await buildTestApp({ overrides: { guard } });

    try {
      const res = await app.inject({ method: 'POST', url: URL, payload: registrationBody() });

      expect(res.statusCode).toBe(503);
      expect(res.json<ErrorResponseBody>()).toEqual({
        error: {
          code: 'SERVICE_UNAVAILABLE',
          message: 'Registration is temporarily unavailable. Please try again later.',
        },
      });
      expect(calls).toEqual([]);
      expect(guard.releases).toBe(0);
      expect(fakes.audit.events).toHaveLength(0);
    } finally {
      await close();
    }
  });

  it('keeps the 201 when releasing the key fails', async () => {
    const guard = new CountingGuard();
    guard.failRelease = true;
    const { app, close } = await buildTestApp({ overrides: { guard } });

    try {
      const res = await app.inject({ method: 'POST', url: URL, payload: registrationBody() });

      expect(res.statusCode).toBe(201);
      expect(guard.releases).toBe(1);
    } finally {
      await close();
    }
  });

  it('keeps the original error when releasing the key fails after an abort', async () => {
    const guard = new CountingGuard();
    guard.failRelease = true;
    const { app, fakes, close } = await buildTestApp({ overrides: { guard } });
    fakes.users.seed({ username: 'someone', email: 'a@b.com' });

    try {
      const res = await app.inject({ method: 'POST', url: URL, payload: registrationBody() });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorResponseBody>()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'An account with this email already exists.' },
      });
      expect(guard.releases).toBe(1);
    } finally {
      await close();
    }
  });

  it('does not wedge the key when the cache guard index write fails', async () => {
    const cache = new FlakyIndexCache();
    const { app, deps, close } = await buildTestApp({
      config: {
        registration: {
          guardDriver: 'redis',
          guardTtlSeconds: 120,
          deadlineMs: 60_000,
          baseDomain: 'mycrm.com',
        },
      },
      overrides: { cache },
    });

    try {
      const failed = await app.inject({ method: 'POST', url: URL, payload: registrationBody() });
      expect(failed.statusCode).toBe(503);
      expect(failed.json<ErrorResponseBody>().error.code).toBe('SERVICE_UNAVAILABLE');

      cache.failIndexWrites = false;
      const retried = await app.inject({ method: 'POST', url: URL, payload: registrationBody() });
      expect(retried.statusCode).toBe(201);
      expect(await deps.registration.guard.inFlightCount()).toBe(0);
    } finally {
      await close();
    }
  });
});
