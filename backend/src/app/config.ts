/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - Tests build an AppConfig directly (see test/helpers/build-test-app.ts).
 *
 * TYPING:
 * - nodeEnv and the failure policies are unions, not plain strings, so invalid
 *   values ('prod', 'open') are caught at startup by Zod rather than silently
 *   falling through to the wrong branch in di.ts.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');
const FailurePolicySchema = z.enum(['fail-open', 'fail-closed']);

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('tenant-onboarding-backend'),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Downstream services
  TENANT_SERVICE_URL: z.string().url().default('http://localhost:8081'),
  USERS_SERVICE_URL: z.string().url().default('http://localhost:8082'),
  DOWNSTREAM_TIMEOUT_MS: z.coerce.number().int().min(100).max(60_000).default(5000),

  // Subdomain availability
  SUBDOMAIN_CHECK_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  SUBDOMAIN_CHECK_BACKOFF_MS: z.coerce.number().int().min(0).max(30_000).default(1000),
  SUBDOMAIN_CHECK_FAILURE_POLICY: FailurePolicySchema.default('fail-open'),
  COMPANY_PROBE_FAILURE_POLICY: FailurePolicySchema.default('fail-closed'),
  IDENTITY_LOOKUP_FAILURE_POLICY: FailurePolicySchema.default('fail-open'),

  // Registration guard / deadline
  REGISTRATION_GUARD_DRIVER: z.enum(['memory', 'redis']).default('memory'),
  REGISTRATION_GUARD_TTL_SECONDS: z.coerce.number().int().min(10).max(3600).default(120),
  REGISTRATION_DEADLINE_MS: z.coerce.number().int().min(1000).max(600_000).default(60_000),

  // Trial plan defaults
  TENANT_TRIAL_DAYS: z.coerce.number().int().min(1).max(365).default(14),
  TENANT_TRIAL_MAX_USERS: z.coerce.number().int().min(1).default(5),
  TENANT_TRIAL_MAX_STORAGE_GB: z.coerce.number().int().min(1).default(10),

  APP_BASE_DOMAIN: z.string().min(1).default('mycrm.com'),

  // Admin endpoints are disabled (404) unless a token is configured.
  ADMIN_API_TOKEN: z.string().min(16).optional(),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type FailurePolicySetting = z.infer<typeof FailurePolicySchema>;
export type GuardDriver = 'memory' | 'redis';

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  downstream: {
    tenantServiceUrl: string;
    usersServiceUrl: string;
    timeoutMs: number;
  };

  subdomainCheck: {
    maxAttempts: number;
    backoffStepMs: number;
    onExhausted: FailurePolicySetting;
    probeOnError: FailurePolicySetting;
  };

  identityLookupOnError: FailurePolicySetting;

  registration: {
    guardDriver: GuardDriver;
    guardTtlSeconds: number;
    deadlineMs: number;
    baseDomain: string;
  };

  trialPlan: {
    trialDays: number;
    maxUsers: number;
    maxStorageGb: number;
  };

  adminToken: string | null;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    downstream: {
      tenantServiceUrl: parsed.TENANT_SERVICE_URL,
      usersServiceUrl: parsed.USERS_SERVICE_URL,
      timeoutMs: parsed.DOWNSTREAM_TIMEOUT_MS,
    },

    subdomainCheck: {
      maxAttempts: parsed.SUBDOMAIN_CHECK_MAX_ATTEMPTS,
      backoffStepMs: parsed.SUBDOMAIN_CHECK_BACKOFF_MS,
      onExhausted: parsed.SUBDOMAIN_CHECK_FAILURE_POLICY,
      probeOnError: parsed.COMPANY_PROBE_FAILURE_POLICY,
    },

    identityLookupOnError: parsed.IDENTITY_LOOKUP_FAILURE_POLICY,

    registration: {
      guardDriver: parsed.REGISTRATION_GUARD_DRIVER,
      guardTtlSeconds: parsed.REGISTRATION_GUARD_TTL_SECONDS,
      deadlineMs: parsed.REGISTRATION_DEADLINE_MS,
      baseDomain: parsed.APP_BASE_DOMAIN,
    },

    trialPlan: {
      trialDays: parsed.TENANT_TRIAL_DAYS,
      maxUsers: parsed.TENANT_TRIAL_MAX_USERS,
      maxStorageGb: parsed.TENANT_TRIAL_MAX_STORAGE_GB,
    },

    adminToken: parsed.ADMIN_API_TOKEN ?? null,
  };
}
