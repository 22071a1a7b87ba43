/**
 * backend/src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Entry point for single-user sign-up; the controller talks to this, not to the flow.
 */

import {
  executeRegisterFlow,
  type RegisterUserFlowDeps,
} from './flows/register/execute-register-flow';
import type { RegisterUserContext, RegisterUserRequest, RegisterUserResult } from './auth.types';

export type AuthServiceDeps = RegisterUserFlowDeps;

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  register(request: RegisterUserRequest, ctx: RegisterUserContext): Promise<RegisterUserResult> {
    return executeRegisterFlow(this.deps, request, ctx);
  }
}
