/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - One winston logger for the onboarding service (JSON lines, `service` + `env` on each).
 * - Sign-up payloads carry passwords, verification tokens and emails; none of them
 *   may reach a log line, whoever wrote the call.
 *
 * HOW TO USE:
 * - Flows log objects: `logger.info({ msg: 'registration.start', flow, requestId, ... })`.
 * - HTTP hooks use `requestLogger(req, flow)` (with-context.ts).
 * - Identify an address by `emailDomain` / `emailKey`, never the address itself.
 *
 * RULES:
 * - Top-level SENSITIVE_LOG_KEYS are replaced by '[REDACTED]' before any transport sees them.
 * - Nested meta (e.g. AppError.meta) goes through redactMeta() at the call site.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'tenant-onboarding-backend';
const level = process.env.LOG_LEVEL ?? 'info';
// Test runs set LOG_SILENT=true (test/setup-env.ts).
const silent = process.env.LOG_SILENT === 'true';

export const SENSITIVE_LOG_KEYS: ReadonlySet<string> = new Set([
  'password',
  'passwordHash',
  'verificationToken',
  'token',
  'adminToken',
  'secret',
  'email',
]);

const REDACTED = '[REDACTED]';

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_LOG_KEYS.has(k) ? REDACTED : v;
  }
  return out;
}

export const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (SENSITIVE_LOG_KEYS.has(key)) info[key] = REDACTED;
  }
  return info;
});

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    redactSecrets(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console({ silent })],
});

export type Logger = winston.Logger;
