/**
 * src/modules/credentials/dal/credential.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for user_credentials.
 * - Unique username / email enforced by DB constraints.
 *
 * RULES:
 * - No transactions started here (callers own tx).
 * - No AppError. No policies.
 * - id is generated by the caller.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class CredentialRepo {
  constructor(private readonly db: DbExecutor) {}

  async insertCredential(params: {
    id: string;
    tenantId: string;
    userId: string;
    username: string;
    email: string;
    passwordHash: string;
    verificationTokenHash: string;
    now: Date;
  }): Promise<void> {
    await this.db
      .insertInto('user_credentials')
      .values({
        id: params.id,
        tenant_id: params.tenantId,
        user_id: params.userId,
        username: params.username,
        email: params.email.toLowerCase(),
        password_hash: params.passwordHash,
        email_verification_token_hash: params.verificationTokenHash,
        created_at: params.now,
        updated_at: params.now,
      })
      .execute();
  }
}
