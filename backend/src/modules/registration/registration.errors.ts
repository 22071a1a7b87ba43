/**
 * backend/src/modules/registration/registration.errors.ts
 *
 * WHY:
 * - Registration owns its error taxonomy:
 *     DUPLICATE_IN_PROGRESS  → 409 REGISTRATION_IN_PROGRESS
 *     VALIDATION_FAILED      → 400 VALIDATION_ERROR
 *     DEPENDENCY_UNAVAILABLE → 503 SERVICE_UNAVAILABLE
 *     DEPENDENCY_CONFLICT    → 409 CONFLICT
 *     UNEXPECTED_FAILURE     → 500 INTERNAL
 * - RegistrationError IS an AppError, so the global error handler maps it
 *   without knowing about registration.
 *
 * RULES:
 * - Messages are short and carry no identifiers.
 * - Failures after a creation step say that partial state may exist.
 * - partialState (created resource ids) is for logs/audit only, never for responses.
 */

import { AppError, type AppErrorCode, type AppErrorMeta } from '../../shared/http/errors';
import type { CreatedResource } from './ledger/created-resource-ledger';
import type { RegistrationState } from './registration.types';

export type RegistrationErrorKind =
  | 'DUPLICATE_IN_PROGRESS'
  | 'VALIDATION_FAILED'
  | 'DEPENDENCY_UNAVAILABLE'
  | 'DEPENDENCY_CONFLICT'
  | 'UNEXPECTED_FAILURE';

const TRANSPORT: Record<RegistrationErrorKind, { code: AppErrorCode; status: number }> = {
  DUPLICATE_IN_PROGRESS: { code: 'REGISTRATION_IN_PROGRESS', status: 409 },
  VALIDATION_FAILED: { code: 'VALIDATION_ERROR', status: 400 },
  DEPENDENCY_UNAVAILABLE: { code: 'SERVICE_UNAVAILABLE', status: 503 },
  DEPENDENCY_CONFLICT: { code: 'CONFLICT', status: 409 },
  UNEXPECTED_FAILURE: { code: 'INTERNAL', status: 500 },
};

export class RegistrationError extends AppError {
  readonly kind: RegistrationErrorKind;
  /** State the execution was in when it aborted; null when never admitted. */
  readonly failedAt: RegistrationState | null;
  readonly partialState: readonly CreatedResource[];

  constructor(opts: {
    kind: RegistrationErrorKind;
    message: string;
    failedAt: RegistrationState | null;
    partialState?: readonly CreatedResource[];
    meta?: AppErrorMeta;
  }) {
    super({ ...TRANSPORT[opts.kind], message: opts.message, meta: opts.meta });
    this.name = 'RegistrationError';
    this.kind = opts.kind;
    this.failedAt = opts.failedAt;
    this.partialState = Object.freeze([...(opts.partialState ?? [])]);
  }

  get hasPartialState(): boolean {
    return this.partialState.length > 0;
  }
}

export const PARTIAL_STATE_NOTICE =
  'Some account resources may have been partially created. Please contact support before retrying.';

export const RegistrationErrors = {
  duplicateInProgress() {
    return new RegistrationError({
      kind: 'DUPLICATE_IN_PROGRESS',
      failedAt: null,
      message: 'A registration for this email and company is already in progress.',
    });
  },

  /** The dedup guard itself could not be reached; nothing was admitted or created. */
  guardUnavailable(meta?: AppErrorMeta) {
    return new RegistrationError({
      kind: 'DEPENDENCY_UNAVAILABLE',
      failedAt: null,
      message: 'Registration is temporarily unavailable. Please try again later.',
      meta,
    });
  },

  validationFailed(message: string, meta?: AppErrorMeta) {
    return new RegistrationError({
      kind: 'VALIDATION_FAILED',
      failedAt: 'ADMITTED',
      message,
      meta,
    });
  },
} as const;

export const ValidationMessages = {
  emailRequired: 'Email is required.',
  usernameRequired: 'Username is required.',
  companyNameRequired: 'Company name is required.',
  emailTaken: 'An account with this email already exists.',
  usernameTaken: 'This username is already taken.',
  companyUnverifiable: 'Company name availability could not be verified. Please try again later.',
} as const;
