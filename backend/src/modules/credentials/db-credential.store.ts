/**
 * backend/src/modules/credentials/db-credential.store.ts
 *
 * WHY:
 * - Postgres-backed CredentialStore: one row in user_credentials per registered user.
 * - Also starts email verification: a URL-safe token is generated, only its
 *   SHA-256 hash is stored, and the raw token goes out on the queue.
 *
 * RULES:
 * - Never store or log the raw password or raw verification token.
 * - DB failures become DependencyError:
 *     unique violation (or pre-check hit) → 'conflict'
 *     anything else from the DB           → 'unavailable'
 * - Queue failure does not undo the credentials (logged; the user can ask for a new link).
 */

import { randomUUID } from 'node:crypto';

import type { DbExecutor } from '../../shared/db/db';
import { isUniqueViolation } from '../../shared/db/db';
import { DependencyError } from '../../shared/integration/dependency-error';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { TokenHasher } from '../../shared/security/token-hasher';

import { CredentialRepo } from './dal/credential.repo';
import {
  selectCredentialByEmailSql,
  selectCredentialByUsernameSql,
} from './dal/credential.query-sql';
import type { CreateCredentialsInput, CredentialRecord, CredentialStore } from './credential.types';
import type { PasswordHasher } from './secrets/password-hasher';
import { issueVerificationToken } from './secrets/verification-token';

function conflict(message: string): DependencyError {
  return new DependencyError({ dependency: 'credential-store', kind: 'conflict', message });
}

export class DbCredentialStore implements CredentialStore {
  private readonly repo: CredentialRepo;
  private readonly clock: () => Date;

  constructor(
    private readonly deps: {
      db: DbExecutor;
      passwordHasher: PasswordHasher;
      tokenHasher: TokenHasher;
      queue: Queue;
      logger: Logger;
      clock?: () => Date;
    },
  ) {
    this.repo = new CredentialRepo(deps.db);
    this.clock = deps.clock ?? (() => new Date());
  }

  async createCredentials(input: CreateCredentialsInput): Promise<CredentialRecord> {
    const email = input.email.trim().toLowerCase();
    const username = input.username.trim();

    const existing = await this.runDb(async () => ({
      byUsername: await selectCredentialByUsernameSql(this.deps.db, username),
      byEmail: await selectCredentialByEmailSql(this.deps.db, email),
    }));
    if (existing.byUsername) throw conflict('Credentials already exist for this username');
    if (existing.byEmail) throw conflict('Credentials already exist for this email');

    const passwordHash = await this.deps.passwordHasher.hash(input.password);
    const verification = issueVerificationToken(this.deps.tokenHasher);
    const id = randomUUID();
    const now = this.clock();

    await this.runDb(() =>
      this.repo.insertCredential({
        id,
        tenantId: input.tenantId,
        userId: input.userId,
        username,
        email,
        passwordHash,
        verificationTokenHash: verification.tokenHash,
        now,
      }),
    );

    try {
      await this.deps.queue.enqueue({
        type: 'auth.verify-email',
        userId: input.userId,
        tenantId: input.tenantId,
        email,
        username,
        firstName: input.profile.firstName,
        verificationToken: verification.token,
      });
    } catch (err: unknown) {
      this.deps.logger.error({
        msg: 'credentials.verify_email.enqueue_failed',
        flow: 'credentials.create',
        credentialId: id,
        userId: input.userId,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    return {
      id,
      tenantId: input.tenantId,
      userId: input.userId,
      username,
      email,
      emailVerified: false,
      createdAt: now.toISOString(),
    };
  }

  private async runDb<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err: unknown) {
      throw new DependencyError({
        dependency: 'credential-store',
        kind: isUniqueViolation(err) ? 'conflict' : 'unavailable',
        message: err instanceof Error ? err.message : 'Credential store failure',
        cause: err,
      });
    }
  }
}
