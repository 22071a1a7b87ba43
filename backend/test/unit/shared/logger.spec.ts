import { describe, it, expect, afterEach, vi } from 'vitest';
import { logger, redactMeta, redactSecrets } from '../../../src/shared/logger/logger';
import { requestLogger } from '../../../src/shared/logger/with-context';

describe('redactMeta', () => {
  it('replaces sensitive keys and keeps the rest', () => {
    expect(redactMeta({ email: 'a@b.com', password: 'test-secret', step: 'user' })).toEqual({
      email: '[REDACTED]',
      password: '[REDACTED]',
      step: 'user',
    });
  });

  it('passes non-objects through', () => {
    expect(redactMeta(undefined)).toBeUndefined();
    expect(redactMeta('plain')).toBe('plain');
  });
});

describe('redactSecrets format', () => {
  it('redacts top-level secrets before the line is written', () => {
    const out = redactSecrets().transform({
      level: 'info',
      message: 'credentials.created',
      verificationToken: 'raw-token',
      emailDomain: 'b.com',
    });

    expect(out).toEqual({
      level: 'info',
      message: 'credentials.created',
      verificationToken: '[REDACTED]',
      emailDomain: 'b.com',
    });
  });
});

describe('requestLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('tags every line with the flow, requestId and host', () => {
    const infoSpy = vi.spyOn(logger, 'info');
    const log = requestLogger({ requestContext: { requestId: 'req-0001', host: 'api.test' } }, 'http');

    log.info('response', { status: 201 });

    expect(infoSpy).toHaveBeenCalledWith('response', {
      flow: 'http',
      requestId: 'req-0001',
      host: 'api.test',
      status: 201,
    });
  });
});
