/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces, created resource ids) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - RateLimitError → 429 response.
 * - Fastify body/querystring validation errors → 400.
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log full error details (meta through redactMeta) under flow 'http.error'.
 */

import type { FastifyError, FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { AppError } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { redactMeta } from '../logger/logger';
import { requestLogger } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

function buildResponse(code: string, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = requestLogger(req, 'http.error');

    // 1) Known application errors
    if (err instanceof AppError) {
      const meta = {
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      };
      if (err.status >= 500) {
        log.error('app_error', meta);
      } else {
        log.warn('app_error', meta);
      }

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        key: err.key,
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      return reply
        .status(429)
        .send(buildResponse('RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Fastify's own 4xx (malformed JSON, unsupported media type, ...)
    if (typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500) {
      log.warn('request_error', {
        status: err.statusCode,
        message: err.message,
      });

      return reply
        .status(err.statusCode)
        .send(buildResponse('VALIDATION_ERROR', 'Invalid request.'));
    }

    // 4) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
