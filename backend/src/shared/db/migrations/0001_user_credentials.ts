/**
 * src/shared/db/migrations/0001_user_credentials.ts
 *
 * WHY:
 * - Login credentials are the only user data this service owns.
 *   Tenants and user profiles live in their own services; we keep their ids.
 *
 * RULES:
 * - username and email are globally unique (login identifiers).
 * - email is stored lower-cased.
 * - Only the SHA-256 hash of the email verification token is stored.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('user_credentials')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('tenant_id', 'text', (col) => col.notNull())
    .addColumn('user_id', 'text', (col) => col.notNull())
    .addColumn('username', 'text', (col) => col.notNull().unique())
    .addColumn('email', 'text', (col) => col.notNull().unique())
    .addColumn('password_hash', 'text', (col) => col.notNull())
    .addColumn('email_verified', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('email_verification_token_hash', 'text')
    .addColumn('failed_login_attempts', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE user_credentials
      ADD CONSTRAINT user_credentials_email_lowercase_check
      CHECK (email = lower(email));
  `.execute(db);

  await sql`CREATE INDEX user_credentials_tenant_id_idx ON user_credentials(tenant_id);`.execute(db);
  await sql`
    CREATE UNIQUE INDEX user_credentials_verification_token_hash_idx
    ON user_credentials(email_verification_token_hash)
    WHERE email_verification_token_hash IS NOT NULL;
  `.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('user_credentials').ifExists().execute();
}
