/**
 * backend/src/shared/db/db.schema.ts
 *
 * WHY:
 * - Kysely needs a `Database` interface to type every query.
 * - The service owns exactly two tables, so the interface is maintained by hand
 *   next to the migrations that create them.
 *
 * RULES:
 * - Keep in lockstep with src/shared/db/migrations (same column names, same nullability).
 * - Generated<T> = column has a DB default (optional on insert).
 * - Timestamps are read as Date, written as Date or ISO string.
 */

import type { ColumnType, Generated } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;
export type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export type JsonPrimitive = boolean | number | string | null;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue | undefined };
export type JsonValue = JsonArray | JsonObject | JsonPrimitive;

export interface UserCredentials {
  id: string;
  tenant_id: string;
  user_id: string;
  username: string;
  email: string;
  password_hash: string;
  email_verified: Generated<boolean>;
  email_verification_token_hash: string | null;
  failed_login_attempts: Generated<number>;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface AuditEvents {
  id: Generated<string>;
  action: string;
  tenant_id: string | null;
  user_id: string | null;
  request_id: string | null;
  ip: string | null;
  user_agent: string | null;
  metadata: Generated<JsonValue>;
  created_at: GeneratedTimestamp;
}

export interface DB {
  user_credentials: UserCredentials;
  audit_events: AuditEvents;
}
