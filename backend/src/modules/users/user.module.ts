/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Users module is a support module (no routes of its own).
 *   Registration consumes its directory and identity checker.
 *
 * RULES:
 * - No infra creation here (DI passes the directory in).
 * - No globals/singletons here.
 */

import type { Logger } from '../../shared/logger/logger';
import type { UserDirectory } from './user.types';
import {
  IdentityUniquenessChecker,
  type LookupFailurePolicy,
} from './identity/identity-uniqueness.checker';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  directory: UserDirectory;
  logger: Logger;
  onLookupError: LookupFailurePolicy;
}) {
  const identityChecker = new IdentityUniquenessChecker({
    directory: deps.directory,
    logger: deps.logger,
    onLookupError: deps.onLookupError,
  });

  return {
    directory: deps.directory,
    identityChecker,
  };
}
