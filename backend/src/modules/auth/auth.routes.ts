/**
 * backend/src/modules/auth/auth.routes.ts
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  // Single user joining an existing tenant (company sign-up is /register/complete)
  app.post('/api/v1/auth/register', controller.register.bind(controller));
}
