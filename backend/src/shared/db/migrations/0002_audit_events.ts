/**
 * src/shared/db/migrations/0002_audit_events.ts
 *
 * WHY:
 * - Append-only trail of registration outcomes (completed / failed).
 *
 * RULES:
 * - tenant_id / user_id are ids issued by the tenant and users services (text, nullable:
 *   a failed registration may have neither).
 * - Additive only. No business logic here.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await sql`CREATE EXTENSION IF NOT EXISTS "pgcrypto";`.execute(db);

  await db.schema
    .createTable('audit_events')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('action', 'text', (col) => col.notNull())
    .addColumn('tenant_id', 'text')
    .addColumn('user_id', 'text')
    .addColumn('request_id', 'text')
    .addColumn('ip', 'text')
    .addColumn('user_agent', 'text')
    .addColumn('metadata', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`CREATE INDEX audit_events_action_idx ON audit_events(action);`.execute(db);
  await sql`
    CREATE INDEX audit_events_tenant_id_created_at_desc_idx
    ON audit_events(tenant_id, created_at DESC);
  `.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('audit_events').ifExists().execute();
}
