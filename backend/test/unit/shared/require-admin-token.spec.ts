import { describe, it, expect } from 'vitest';
import type { IncomingHttpHeaders } from 'node:http';
import { AppError } from '../../../src/shared/http/errors';
import { requireAdminToken } from '../../../src/shared/http/require-admin-token';

function requestWith(headers: IncomingHttpHeaders): { headers: IncomingHttpHeaders } {
  return { headers };
}

function errorOf(fn: () => void): AppError | null {
  try {
    fn();
    return null;
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
}

const TOKEN = 'test-admin-token-0001';

describe('requireAdminToken', () => {
  it('is 404 when no token is configured', () => {
    const err = errorOf(() => requireAdminToken(requestWith({ 'x-admin-token': TOKEN }), null));

    expect(err?.status).toBe(404);
  });

  it('is 401 when the header is missing or wrong', () => {
    expect(errorOf(() => requireAdminToken(requestWith({}), TOKEN))?.status).toBe(401);
    expect(
      errorOf(() => requireAdminToken(requestWith({ 'x-admin-token': 'nope' }), TOKEN))?.message,
    ).toBe('Admin token required');
  });

  it('passes with the configured token', () => {
    expect(errorOf(() => requireAdminToken(requestWith({ 'x-admin-token': TOKEN }), TOKEN))).toBeNull();
  });
});
