/**
 * backend/src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps POST /api/v1/auth/register onto AuthService.register().
 *
 * RULES:
 * - No business rules here (password strength and uniqueness live in the flow).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';

import { registerUserSchema } from './auth.schemas';
import type { AuthService } from './auth.service';

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const parsed = registerUserSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const { displayName, ...input } = parsed.data;
    const result = await this.authService.register(
      { ...input, displayName: displayName ? displayName : null },
      {
        requestId: req.requestContext.requestId,
        ip: req.ip,
        userAgent: req.headers['user-agent'] ?? null,
      },
    );

    return reply.status(201).send(result);
  }
}
