/**
 * backend/src/modules/credentials/policies/password.policy.ts
 *
 * WHY:
 * - Single-user sign-up checks password strength after the uniqueness checks,
 *   so a taken email is reported before a weak password.
 *
 * RULES:
 * - Pure. Returns the first problem as a user-facing message, or null.
 * - Special characters are the ones the login service accepts: @ $ ! % * ? &
 */

export const MIN_PASSWORD_LENGTH = 8;

export const PASSWORD_MESSAGES = {
  tooShort: `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`,
  weak: 'Password must contain at least one uppercase letter, one lowercase letter, one digit, and one special character',
} as const;

export function findPasswordProblem(password: string): string | null {
  if (password.length < MIN_PASSWORD_LENGTH) return PASSWORD_MESSAGES.tooShort;

  const strong =
    /[a-z]/.test(password) &&
    /[A-Z]/.test(password) &&
    /\d/.test(password) &&
    /[@$!%*?&]/.test(password);

  return strong ? null : PASSWORD_MESSAGES.weak;
}
