/**
 * backend/src/modules/users/clients/user-directory.http-client.ts
 *
 * WHY:
 * - UserDirectory over the users service's REST API:
 *     POST /api/v1/users
 *     GET  /api/v1/users/username/:username
 *     GET  /api/v1/users/email/:email
 *
 * RULES:
 * - 404 on lookups = "no such user" (null), never an error.
 * - Failures surface as DependencyError (dependency: 'user-directory').
 */

import type { Dispatcher } from 'undici';
import { z } from 'zod';

import { JsonHttpClient } from '../../../shared/integration/json-http-client';
import type { NewUserProfile, UserDirectory, UserRecord } from '../user.types';

const UserWireSchema = z.object({
  id: z.union([z.string(), z.number()]),
  username: z.string(),
  email: z.string(),
  firstName: z.string().nullish(),
  lastName: z.string().nullish(),
  fullName: z.string().nullish(),
  status: z.string().nullish(),
});

type UserWire = z.infer<typeof UserWireSchema>;

function toUserRecord(wire: UserWire): UserRecord {
  return {
    id: String(wire.id),
    username: wire.username,
    email: wire.email,
    firstName: wire.firstName ?? null,
    lastName: wire.lastName ?? null,
    fullName: wire.fullName ?? null,
    status: wire.status ?? null,
  };
}

export class HttpUserDirectory implements UserDirectory {
  private readonly http: JsonHttpClient;

  constructor(opts: { baseUrl: string; timeoutMs: number; dispatcher?: Dispatcher }) {
    this.http = new JsonHttpClient({ ...opts, dependency: 'user-directory' });
  }

  async createUser(profile: NewUserProfile, tenantId: string): Promise<UserRecord> {
    const wire = await this.http.call({
      method: 'POST',
      path: '/api/v1/users',
      body: { ...profile, tenantId },
      schema: UserWireSchema,
    });

    return toUserRecord(wire);
  }

  async findUserByUsername(username: string): Promise<UserRecord | null> {
    const wire = await this.http.find(
      `/api/v1/users/username/${encodeURIComponent(username)}`,
      UserWireSchema,
    );
    return wire ? toUserRecord(wire) : null;
  }

  async findUserByEmail(email: string): Promise<UserRecord | null> {
    const wire = await this.http.find(
      `/api/v1/users/email/${encodeURIComponent(email)}`,
      UserWireSchema,
    );
    return wire ? toUserRecord(wire) : null;
  }
}
