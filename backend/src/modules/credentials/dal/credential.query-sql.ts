/**
 * src/modules/credentials/dal/credential.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for user_credentials.
 *
 * RULES:
 * - No AppError. No policies. No transactions started here.
 * - Emails are compared lower-cased (the column is lower-cased by constraint).
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UserCredentials } from '../../../shared/db/db.schema';

export type CredentialRow = Selectable<UserCredentials>;

export async function selectCredentialByUsernameSql(
  db: DbExecutor,
  username: string,
): Promise<CredentialRow | undefined> {
  return db
    .selectFrom('user_credentials')
    .selectAll()
    .where('username', '=', username)
    .executeTakeFirst();
}

export async function selectCredentialByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<CredentialRow | undefined> {
  return db
    .selectFrom('user_credentials')
    .selectAll()
    .where('email', '=', email.toLowerCase())
    .executeTakeFirst();
}
