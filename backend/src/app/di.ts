/**
 * backend/src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis, downstream HTTP clients) and shares them safely.
 * - Keeps modules testable: tests pass overrides (fakes / in-memory stores).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test, guard driver)
 *   belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import { Sha256TokenHasher, type TokenHasher } from '../shared/security/token-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { AuditRepo } from '../shared/audit/audit.repo';
import type { AuditEventStore } from '../shared/audit/audit.types';

import { InMemQueue } from '../shared/messaging/inmem-queue';
import type { Queue } from '../shared/messaging/queue';

import {
  createTenantModule,
  HttpTenantDirectory,
  type Sleep,
  type TenantDirectory,
  type TenantModule,
} from '../modules/tenants';
import {
  createUserModule,
  HttpUserDirectory,
  type UserDirectory,
  type UserModule,
} from '../modules/users';
import {
  BcryptPasswordHasher,
  createCredentialModule,
  type CredentialModule,
  type CredentialStore,
  type PasswordHasher,
} from '../modules/credentials';
import {
  CacheRegistrationGuard,
  createRegistrationModule,
  InMemRegistrationGuard,
  type RegistrationGuard,
  type RegistrationModule,
} from '../modules/registration';
import { createAuthModule, type AuthModule } from '../modules/auth';

/**
 * Test seams. Anything given here replaces the real infra of the same name.
 * A provided cache also means no Redis connection is opened.
 */
export type DepsOverrides = {
  cache?: Cache;
  db?: Db;
  rateLimiter?: RateLimiter;
  passwordHasher?: PasswordHasher;
  auditStore?: AuditEventStore;
  queue?: Queue;
  guard?: RegistrationGuard;
  tenantDirectory?: TenantDirectory;
  userDirectory?: UserDirectory;
  credentialStore?: CredentialStore;
  sleep?: Sleep;
  clock?: () => Date;
};

export type AppDeps = {
  db: Db;
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;

  auditStore: AuditEventStore;

  // messaging
  queue: Queue;

  // modules
  tenants: TenantModule;
  users: UserModule;
  credentials: CredentialModule;
  registration: RegistrationModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

/** Redis is mandatory outside tests (rate limits, optional cache-backed guard). */
async function connectCache(
  config: AppConfig,
  override: Cache | undefined,
): Promise<{ cache: Cache; closeCache: () => Promise<void> }> {
  if (override) {
    return { cache: override, closeCache: async () => {} };
  }

  const redis = await RedisCache.connect(config.redisUrl);
  return { cache: redis, closeCache: () => redis.close() };
}

function buildGuard(config: AppConfig, cache: Cache): RegistrationGuard {
  if (config.registration.guardDriver === 'redis') {
    return new CacheRegistrationGuard({
      cache,
      logger,
      ttlSeconds: config.registration.guardTtlSeconds,
    });
  }
  return new InMemRegistrationGuard(logger);
}

export async function buildDeps(
  config: AppConfig,
  overrides: DepsOverrides = {},
): Promise<AppDeps> {
  const db = overrides.db ?? createDb(config.databaseUrl);

  const { cache, closeCache } = await connectCache(config, overrides.cache);

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ?? new BcryptPasswordHasher(config.bcryptCost);

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter =
    overrides.rateLimiter ??
    new RateLimiter(cache, {
      prefix: 'rl',
      disabled: config.nodeEnv === 'test',
    });

  const auditStore: AuditEventStore = overrides.auditStore ?? new AuditRepo(db);

  // In-memory queue; swap for a real broker adapter here.
  const queue: Queue = overrides.queue ?? new InMemQueue();

  const guard = overrides.guard ?? buildGuard(config, cache);

  // modules (no HTTP / no business logic here)
  const tenants = createTenantModule({
    directory:
      overrides.tenantDirectory ??
      new HttpTenantDirectory({
        baseUrl: config.downstream.tenantServiceUrl,
        timeoutMs: config.downstream.timeoutMs,
      }),
    logger,
    availability: config.subdomainCheck,
    trialPlan: config.trialPlan,
    sleep: overrides.sleep,
  });

  const users = createUserModule({
    directory:
      overrides.userDirectory ??
      new HttpUserDirectory({
        baseUrl: config.downstream.usersServiceUrl,
        timeoutMs: config.downstream.timeoutMs,
      }),
    logger,
    onLookupError: config.identityLookupOnError,
  });

  const credentials = createCredentialModule(
    overrides.credentialStore
      ? { store: overrides.credentialStore }
      : { db, passwordHasher, tokenHasher, queue, logger },
  );

  const registration = createRegistrationModule({
    guard,
    tokenHasher,
    rateLimiter,
    logger,
    auditStore,
    tenantDirectory: tenants.directory,
    availabilityChecker: tenants.availabilityChecker,
    identityChecker: users.identityChecker,
    userDirectory: users.directory,
    credentialStore: credentials.store,
    settings: {
      trialPlan: tenants.trialPlan,
      baseDomain: config.registration.baseDomain,
      deadlineMs: config.registration.deadlineMs,
    },
    clock: overrides.clock,
    adminToken: config.adminToken,
  });

  const auth = createAuthModule({
    tokenHasher,
    rateLimiter,
    logger,
    auditStore,
    identityChecker: users.identityChecker,
    userDirectory: users.directory,
    credentialStore: credentials.store,
  });

  return {
    db,
    cache,
    logger,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    auditStore,
    queue,
    tenants,
    users,
    credentials,
    registration,
    auth,
    close: async () => {
      await closeCache();
      await db.destroy();
    },
  };
}
