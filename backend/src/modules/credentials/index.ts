/**
 * backend/src/modules/credentials/index.ts
 *
 * WHY:
 * - Define the public surface of the credentials module.
 */

export type { CredentialStore, CredentialRecord, CreateCredentialsInput } from './credential.types';
export { DbCredentialStore } from './db-credential.store';
export type { PasswordHasher } from './secrets/password-hasher';
export { BcryptPasswordHasher } from './secrets/password-hasher';
export { findPasswordProblem, PASSWORD_MESSAGES } from './policies/password.policy';
export { createCredentialModule } from './credential.module';
export type { CredentialModule } from './credential.module';
