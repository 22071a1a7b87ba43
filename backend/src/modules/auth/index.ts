/**
 * backend/src/modules/auth/index.ts
 *
 * WHY:
 * - Define the public surface of the auth module.
 */

export type { RegisterUserRequest, RegisterUserResult, RegisterUserContext } from './auth.types';
export { AUTH_MESSAGES } from './auth.constants';
export { AuthService } from './auth.service';
export { createAuthModule } from './auth.module';
export type { AuthModule } from './auth.module';
