/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts.
 * - Global request context (requestId + host) and the error handler are attached here.
 * - Routes are registered in app/routes.ts.
 */

import Fastify from 'fastify';

import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { requestLogger } from '../shared/logger/with-context';

export async function buildServer() {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerErrorHandler(app);

  // Basic request logging (requestId + host)
  app.addHook('onRequest', async (req) => {
    requestLogger(req, 'http').info('request', {
      method: req.method,
      url: req.url,
    });
  });

  app.addHook('onResponse', async (req, reply) => {
    requestLogger(req, 'http').info('response', {
      method: req.method,
      url: req.url,
      status: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
    });
  });

  return app;
}
