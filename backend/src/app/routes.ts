/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - One place that mounts every HTTP surface of the onboarding service:
 *     /health
 *     company sign-up, availability hints, operator endpoints (registration module)
 *     single-user sign-up (auth module)
 *
 * RULES:
 * - Wiring only. Modules own their paths.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  // Platform probe; also reports which dedup guard this instance runs.
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      guardDriver: opts.config.registration.guardDriver,
      requestId: req.requestContext.requestId,
    };
  });

  opts.deps.registration.registerRoutes(app);
  opts.deps.auth.registerRoutes(app);
}
