import { describe, it, expect, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../../src/app/server';
import { AppError } from '../../../src/shared/http/errors';
import { logger } from '../../../src/shared/logger/logger';
import { RegistrationErrors } from '../../../src/modules/registration';
import { RateLimitError } from '../../../src/shared/security/rate-limit';

describe('registerErrorHandler', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    vi.restoreAllMocks();
    await app.close();
  });

  async function appThrowing(err: Error): Promise<FastifyInstance> {
    app = await buildServer();
    app.get('/boom', async () => {
      throw err;
    });
    return app;
  }

  it('maps AppError to its status and code without leaking meta', async () => {
    await appThrowing(AppError.conflict('Already there', { email: 'a@b.com' }));

    const res = await app.inject({ method: 'GET', url: '/boom' });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: { code: 'CONFLICT', message: 'Already there' } });
  });

  it('maps a 5xx AppError to its status and code and logs it at error level', async () => {
    const errorSpy = vi.spyOn(logger, 'error');
    const warnSpy = vi.spyOn(logger, 'warn');
    await appThrowing(RegistrationErrors.guardUnavailable({ cause: 'redis down' }));

    const res = await app.inject({ method: 'GET', url: '/boom' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({
      error: {
        code: 'SERVICE_UNAVAILABLE',
        message: 'Registration is temporarily unavailable. Please try again later.',
      },
    });
    expect(errorSpy).toHaveBeenCalledWith(
      'app_error',
      expect.objectContaining({ flow: 'http.error', code: 'SERVICE_UNAVAILABLE', status: 503 }),
    );
    expect(warnSpy).not.toHaveBeenCalledWith('app_error', expect.anything());
  });

  it('logs a 4xx AppError at warn level with redacted meta', async () => {
    const warnSpy = vi.spyOn(logger, 'warn');
    await appThrowing(AppError.validationError('Bad input', { email: 'a@b.com', reason: 'x' }));

    const res = await app.inject({ method: 'GET', url: '/boom' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'Bad input' } });
    expect(warnSpy).toHaveBeenCalledWith(
      'app_error',
      expect.objectContaining({
        code: 'VALIDATION_ERROR',
        meta: { email: '[REDACTED]', reason: 'x' },
      }),
    );
  });

  it('maps RateLimitError to 429', async () => {
    await appThrowing(new RateLimitError('rl:register:ip:1.2.3.4', 20, 900));

    const res = await app.inject({ method: 'GET', url: '/boom' });

    expect(res.statusCode).toBe(429);
    expect(res.json()).toEqual({
      error: { code: 'RATE_LIMITED', message: 'Too many requests. Try again later.' },
    });
  });

  it('maps unknown errors to a generic 500', async () => {
    await appThrowing(new Error('db password is hunter2'));

    const res = await app.inject({ method: 'GET', url: '/boom' });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: { code: 'INTERNAL', message: 'Internal server error' } });
  });

  it('maps malformed JSON bodies to 400', async () => {
    app = await buildServer();
    app.post('/echo', async (req) => req.body);

    const res = await app.inject({
      method: 'POST',
      url: '/echo',
      headers: { 'content-type': 'application/json' },
      payload: '{"email":',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'Invalid request.' } });
  });
});
