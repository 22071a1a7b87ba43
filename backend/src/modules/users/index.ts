/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports.
 */

export type { UserDirectory, UserRecord, NewUserProfile } from './user.types';
export type {
  IdentityUniquenessChecker,
  LookupFailurePolicy,
} from './identity/identity-uniqueness.checker';
export { HttpUserDirectory } from './clients/user-directory.http-client';
export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
