/**
 * backend/src/modules/registration/registration.module.ts
 *
 * WHY:
 * - Encapsulates registration module wiring.
 * - DI creates infra and the tenants/users/credentials modules; this module composes them.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';

import { RegistrationController } from './registration.controller';
import { registerRegistrationRoutes } from './registration.routes';
import { RegistrationService, type RegistrationServiceDeps } from './registration.service';

export type RegistrationModule = ReturnType<typeof createRegistrationModule>;

export function createRegistrationModule(
  deps: RegistrationServiceDeps & { adminToken: string | null },
) {
  const { adminToken, ...serviceDeps } = deps;

  const registrationService = new RegistrationService(serviceDeps);
  const controller = new RegistrationController(registrationService, adminToken);

  return {
    registrationService,
    guard: deps.guard,
    registerRoutes(app: FastifyInstance) {
      registerRegistrationRoutes(app, controller);
    },
  };
}
