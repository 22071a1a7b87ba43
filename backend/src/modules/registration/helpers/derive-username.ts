/**
 * backend/src/modules/registration/helpers/derive-username.ts
 *
 * WHY:
 * - The sign-up form may omit the username; one is derived from the email local part.
 *
 * RULES:
 * - Pure. Deterministic.
 * - Characters outside [a-zA-Z0-9._-] are dropped: "John.Doe+crm@acme.io" → "john.doecrm".
 * - Too short results are padded: "ab@x.io" → "ab123".
 */

const MAX_LENGTH = 50;
const MIN_LENGTH = 3;

export function deriveUsernameFromEmail(email: string): string {
  const at = email.indexOf('@');
  const localPart = at >= 0 ? email.slice(0, at) : email;

  let username = localPart.replace(/[^a-zA-Z0-9._-]/g, '').toLowerCase();

  if (username.length > 0 && !/^[a-z0-9]/.test(username)) {
    username = `user${username}`;
  }

  if (username.length > MAX_LENGTH) {
    username = username.slice(0, MAX_LENGTH);
  }

  if (username.length < MIN_LENGTH) {
    username = `${username}123`;
  }

  return username;
}
