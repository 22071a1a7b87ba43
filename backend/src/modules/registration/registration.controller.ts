/**
 * backend/src/modules/registration/registration.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for registration endpoints.
 * - Returns structured responses.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here (username derivation is input shaping, not a rule).
 * - Admin endpoints go through requireAdminToken.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireAdminToken } from '../../shared/http/require-admin-token';

import { deriveUsernameFromEmail } from './helpers/derive-username';
import {
  checkCompanyQuerySchema,
  checkEmailQuerySchema,
  checkUsernameParamsSchema,
  registerCompanySchema,
  type RegisterCompanyInput,
} from './registration.schemas';
import type { RegistrationService } from './registration.service';
import type { RegistrationRequest } from './registration.types';

function orNull(value: string | undefined): string | null {
  return value ? value : null;
}

function toRegistrationRequest(input: RegisterCompanyInput): RegistrationRequest {
  return {
    email: input.email,
    username: input.username ?? deriveUsernameFromEmail(input.email),
    password: input.password,
    companyName: input.companyName,
    profile: {
      firstName: orNull(input.firstName),
      lastName: orNull(input.lastName),
      phoneNumber: orNull(input.phoneNumber),
      jobTitle: orNull(input.jobTitle),
      department: orNull(input.department),
      timezone: input.timezone,
      language: input.language,
      marketingConsent: input.marketingConsent,
    },
  };
}

export class RegistrationController {
  constructor(
    private readonly registrationService: RegistrationService,
    private readonly adminToken: string | null,
  ) {}

  async registerCompany(req: FastifyRequest, reply: FastifyReply) {
    const parsed = registerCompanySchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.registrationService.registerCompany(
      toRegistrationRequest(parsed.data),
      {
        requestId: req.requestContext.requestId,
        ip: req.ip,
        userAgent: req.headers['user-agent'] ?? null,
      },
    );

    return reply.status(201).send(result);
  }

  async checkUsername(req: FastifyRequest, reply: FastifyReply) {
    const parsed = checkUsernameParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw AppError.validationError('Invalid username', {
        issues: parsed.error.issues,
      });
    }

    const answer = await this.registrationService.checkUsername(parsed.data.username, {
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });
    return reply.status(200).send(answer);
  }

  async checkEmail(req: FastifyRequest, reply: FastifyReply) {
    const parsed = checkEmailQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.validationError('Invalid email', {
        issues: parsed.error.issues,
      });
    }

    const answer = await this.registrationService.checkEmail(parsed.data.email, {
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });
    return reply.status(200).send(answer);
  }

  async checkCompany(req: FastifyRequest, reply: FastifyReply) {
    const parsed = checkCompanyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.validationError('Invalid company name', {
        issues: parsed.error.issues,
      });
    }

    const answer = await this.registrationService.checkCompany(parsed.data.companyName, {
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });
    return reply.status(200).send(answer);
  }

  async listInFlight(req: FastifyRequest, reply: FastifyReply) {
    requireAdminToken(req, this.adminToken);

    const snapshot = await this.registrationService.inFlight();
    return reply.status(200).send(snapshot);
  }

  async clearInFlight(req: FastifyRequest, reply: FastifyReply) {
    requireAdminToken(req, this.adminToken);

    const result = await this.registrationService.clearInFlight({
      requestId: req.requestContext.requestId,
    });
    return reply.status(200).send(result);
  }
}
