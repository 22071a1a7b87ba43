/**
 * backend/src/shared/http/require-admin-token.ts
 *
 * WHY:
 * - Operational endpoints (in-flight registration keys) must not be public.
 * - Centralizes the check so admin controllers do not drift.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB or services.
 * - Throws AppError so error-handler maps it consistently.
 *
 * Guard sequence (LOCKED):
 * 1) admin token not configured -> 404 (endpoint is effectively disabled)
 * 2) header missing or wrong -> 401 "Admin token required"
 */

import { timingSafeEqual } from 'node:crypto';
import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';

export const ADMIN_TOKEN_HEADER = 'x-admin-token';

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

export function requireAdminToken(
  req: Pick<FastifyRequest, 'headers'>,
  expectedToken: string | null,
): void {
  if (!expectedToken) {
    throw AppError.notFound();
  }

  const presented = req.headers[ADMIN_TOKEN_HEADER];
  if (typeof presented !== 'string' || !safeEqual(presented, expectedToken)) {
    throw AppError.unauthorized('Admin token required');
  }
}
