import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';

const HealthResponseSchema = z.object({
  ok: z.boolean(),
  env: z.string(),
  service: z.string(),
  guardDriver: z.enum(['memory', 'redis']),
  requestId: z.string(),
});

type HealthResponse = z.infer<typeof HealthResponseSchema>;

describe('GET /health', () => {
  it('returns ok payload with service identity and request id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'health-check-0001' },
      });

      expect(res.statusCode).toBe(200);

      const parsed: HealthResponse = HealthResponseSchema.parse(res.json());

      expect(parsed.ok).toBe(true);
      expect(parsed.env).toBe('test');
      expect(parsed.service).toBe('tenant-onboarding-backend');
      expect(parsed.guardDriver).toBe('memory');
      expect(parsed.requestId).toBe('health-check-0001');
    } finally {
      await close();
    }
  });

  it('generates a request id when the header is missing or malformed', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'bad id!' },
      });

      const parsed = HealthResponseSchema.parse(res.json());
      expect(parsed.requestId).not.toBe('bad id!');
      expect(parsed.requestId).toMatch(/^[0-9a-f-]{36}$/);
    } finally {
      await close();
    }
  });
});
