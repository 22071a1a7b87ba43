/**
 * backend/src/modules/users/identity/identity-uniqueness.checker.ts
 *
 * WHY:
 * - "Is this username / email still free?" asked of the users service.
 *
 * RULES:
 * - null (not found) → available; a record → taken.
 * - A lookup error is answered by `onLookupError`:
 *   'fail-open' → available (the users service's own uniqueness check is the backstop),
 *   'fail-closed' → not available.
 * - No retries. Never throws.
 * - Logs carry the email domain only, never the full address.
 */

import type { Logger } from '../../../shared/logger/logger';
import { emailDomain } from '../../../shared/logger/pii';
import type { UserDirectory, UserRecord } from '../user.types';

export type LookupFailurePolicy = 'fail-open' | 'fail-closed';

export class IdentityUniquenessChecker {
  constructor(
    private readonly deps: {
      directory: UserDirectory;
      logger: Logger;
      onLookupError: LookupFailurePolicy;
    },
  ) {}

  usernameAvailable(username: string): Promise<boolean> {
    return this.check(() => this.deps.directory.findUserByUsername(username), {
      field: 'username',
      username,
    });
  }

  emailAvailable(email: string): Promise<boolean> {
    return this.check(() => this.deps.directory.findUserByEmail(email), {
      field: 'email',
      emailDomain: emailDomain(email),
    });
  }

  private async check(
    lookup: () => Promise<UserRecord | null>,
    logMeta: Record<string, string>,
  ): Promise<boolean> {
    try {
      const existing = await lookup();
      return existing === null;
    } catch (err: unknown) {
      const policy = this.deps.onLookupError;

      this.deps.logger.warn({
        msg: 'users.identity_lookup.failed',
        flow: 'users.identity_lookup',
        ...logMeta,
        policy,
        error: err instanceof Error ? err.message : String(err),
      });

      return policy === 'fail-open';
    }
  }
}
