/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, audit events and downstream calls.
 * - Host is kept for log correlation behind the gateway.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 *
 * RULES:
 * - An incoming `x-request-id` (set by the gateway) is reused when it looks sane,
 *   so one registration can be followed across services.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  host: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{8,128}$/;

function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim();
  if (!trimmed) return null;

  // strip port if present (e.g., "api.localhost:3000")
  return trimmed.split(':')[0]?.toLowerCase() ?? null;
}

export function resolveRequestId(rawHeader: unknown): string {
  if (typeof rawHeader === 'string' && REQUEST_ID_PATTERN.test(rawHeader)) {
    return rawHeader;
  }
  return randomUUID();
}

export function registerRequestContext(app: FastifyInstance) {
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.requestContext = {
      requestId: resolveRequestId(req.headers['x-request-id']),
      host: parseHost(req.headers.host),
    };

    done();
  });
}
