/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - User profiles are owned by the users service.
 * - These types describe what we send it and what we keep from its replies.
 *
 * RULES:
 * - camelCase only; wire naming stays inside the HTTP client.
 * - Passwords never appear here (credentials are local, see modules/credentials).
 */

export type UserId = string;

export type NewUserProfile = {
  username: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  /** Single-user sign-up only; company registration leaves it to the users service. */
  displayName?: string | null;
  phoneNumber: string | null;
  jobTitle: string | null;
  department: string | null;
  timezone: string;
  language: string;
  marketingConsent: boolean;
};

export type UserRecord = {
  id: UserId;
  username: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  fullName: string | null;
  status: string | null;
};

/**
 * User Directory = the users service, seen from here.
 *
 * - find* return null when the user does not exist.
 * - Implementations throw DependencyError (dependency: 'user-directory') on failure.
 */
export interface UserDirectory {
  createUser(profile: NewUserProfile, tenantId: string): Promise<UserRecord>;
  findUserByUsername(username: string): Promise<UserRecord | null>;
  findUserByEmail(email: string): Promise<UserRecord | null>;
}
