/**
 * backend/src/modules/registration/registration.routes.ts
 *
 * WHY:
 * - Declares registration endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { RegistrationController } from './registration.controller';

export function registerRegistrationRoutes(
  app: FastifyInstance,
  controller: RegistrationController,
) {
  app.post('/api/v1/auth/register/complete', controller.registerCompany.bind(controller));

  // Availability hints (pre-submit)
  app.get('/api/v1/auth/check-username/:username', controller.checkUsername.bind(controller));
  app.get('/api/v1/auth/check-email', controller.checkEmail.bind(controller));
  app.get('/api/v1/auth/check-company', controller.checkCompany.bind(controller));

  // Operator endpoints (x-admin-token)
  app.get('/api/v1/admin/registrations/in-flight', controller.listInFlight.bind(controller));
  app.delete('/api/v1/admin/registrations/in-flight', controller.clearInFlight.bind(controller));
}
