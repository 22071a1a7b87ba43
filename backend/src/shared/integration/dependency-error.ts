/**
 * src/shared/integration/dependency-error.ts
 *
 * WHY:
 * - One error type for "a collaborator we call failed", whatever the transport.
 * - Flows classify failures by `kind`, not by parsing messages or HTTP codes.
 *
 * RULES:
 * - Not an AppError: it never reaches the HTTP layer directly.
 *   The calling flow maps it onto its own error taxonomy.
 * - `message` is for logs only; may contain downstream text.
 */

export type DependencyName = 'tenant-directory' | 'user-directory' | 'credential-store';

/**
 * - unavailable:      transport failure, timeout, 5xx
 * - conflict:         uniqueness violated on the collaborator side (409 / unique index)
 * - rejected:         collaborator refused the input (other 4xx, success=false)
 * - invalid_response: reply could not be understood
 */
export type DependencyErrorKind = 'unavailable' | 'conflict' | 'rejected' | 'invalid_response';

export class DependencyError extends Error {
  readonly dependency: DependencyName;
  readonly kind: DependencyErrorKind;
  readonly status: number | null;

  constructor(opts: {
    dependency: DependencyName;
    kind: DependencyErrorKind;
    message: string;
    status?: number;
    cause?: unknown;
  }) {
    super(opts.message, { cause: opts.cause });
    this.name = 'DependencyError';
    this.dependency = opts.dependency;
    this.kind = opts.kind;
    this.status = opts.status ?? null;
  }
}

export function isDependencyError(err: unknown): err is DependencyError {
  return err instanceof DependencyError;
}
