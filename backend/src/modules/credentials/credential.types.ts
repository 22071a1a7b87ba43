/**
 * backend/src/modules/credentials/credential.types.ts
 *
 * WHY:
 * - Login credentials are the one thing this service stores itself.
 *
 * RULES:
 * - CredentialRecord never carries the password hash or the verification token.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export type CredentialId = string;

export type CreateCredentialsInput = {
  username: string;
  email: string;
  password: string;
  profile: {
    firstName: string | null;
    lastName: string | null;
  };
  tenantId: string;
  userId: string;
};

export type CredentialRecord = {
  id: CredentialId;
  tenantId: string;
  userId: string;
  username: string;
  email: string;
  emailVerified: boolean;
  createdAt: string;
};

/**
 * Credential Store. Implementations throw DependencyError
 * (dependency: 'credential-store') on failure; 'conflict' when the
 * username or email already has credentials.
 */
export interface CredentialStore {
  createCredentials(input: CreateCredentialsInput): Promise<CredentialRecord>;
}
