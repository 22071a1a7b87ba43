/**
 * backend/src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Wires single-user sign-up on top of the users and credentials modules.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';

import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';
import { AuthService, type AuthServiceDeps } from './auth.service';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: AuthServiceDeps) {
  const authService = new AuthService(deps);
  const controller = new AuthController(authService);

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
