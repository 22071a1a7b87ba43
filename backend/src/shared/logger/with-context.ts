/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - HTTP-level lines (request, response, error mapping) must join the flow lines of the
 *   same sign-up on `requestId`; flows log the same field from RegistrationContext.
 *
 * HOW TO USE:
 * - `requestLogger(req, 'http.error').warn('app_error', { code, status })`
 */

import type { FastifyRequest } from 'fastify';
import { logger } from './logger';

type LogMeta = Record<string, unknown>;
type LogFn = (msg: string, meta?: LogMeta) => void;

export type RequestLogger = {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
};

export function requestLogger(
  req: Pick<FastifyRequest, 'requestContext'>,
  flow: string,
): RequestLogger {
  const base = {
    flow,
    requestId: req.requestContext?.requestId,
    host: req.requestContext?.host,
  };

  return {
    info: (msg, meta = {}) => logger.info(msg, { ...base, ...meta }),
    warn: (msg, meta = {}) => logger.warn(msg, { ...base, ...meta }),
    error: (msg, meta = {}) => logger.error(msg, { ...base, ...meta }),
    debug: (msg, meta = {}) => logger.debug(msg, { ...base, ...meta }),
  };
}
