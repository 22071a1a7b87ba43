/**
 * backend/src/modules/registration/index.ts
 *
 * WHY:
 * - Define the public surface of the registration module.
 */

export type {
  RegistrationRequest,
  RegistrationContext,
  RegistrationResult,
  RegistrationState,
  AvailabilityAnswer,
  CompanyAvailabilityAnswer,
  InFlightSnapshot,
} from './registration.types';
export { RegistrationError, RegistrationErrors, PARTIAL_STATE_NOTICE } from './registration.errors';
export type { RegistrationErrorKind } from './registration.errors';
export type { RegistrationGuard } from './guard/registration-guard';
export { InMemRegistrationGuard } from './guard/inmem-registration.guard';
export { CacheRegistrationGuard } from './guard/cache-registration.guard';
export type { RegisterCompanySettings } from './flows/register-company/execute-register-company-flow';
export { RegistrationService } from './registration.service';
export { createRegistrationModule } from './registration.module';
export type { RegistrationModule } from './registration.module';
