/**
 * backend/src/modules/credentials/credential.module.ts
 *
 * WHY:
 * - Encapsulates Credentials module wiring (support module, no routes).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - A ready-made CredentialStore may be injected (tests, alternative backends);
 *   otherwise the Postgres store is built from `db`.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { CredentialStore } from './credential.types';
import type { PasswordHasher } from './secrets/password-hasher';
import { DbCredentialStore } from './db-credential.store';

export type CredentialModule = ReturnType<typeof createCredentialModule>;

export function createCredentialModule(
  deps:
    | { store: CredentialStore }
    | {
        db: DbExecutor;
        passwordHasher: PasswordHasher;
        tokenHasher: TokenHasher;
        queue: Queue;
        logger: Logger;
      },
) {
  const store: CredentialStore = 'store' in deps ? deps.store : new DbCredentialStore(deps);

  return { store };
}
