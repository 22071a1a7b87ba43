/**
 * backend/src/modules/registration/helpers/registration-deadline.ts
 *
 * WHY:
 * - A stuck downstream call must not hold the dedup key forever.
 * - The flow checks the deadline before each creation step.
 *
 * RULES:
 * - Cooperative: it never interrupts an in-flight call (transport timeouts do that).
 */

import type { RegistrationState } from '../registration.types';

export class DeadlineExceededError extends Error {
  constructor(
    readonly budgetMs: number,
    readonly elapsedMs: number,
    readonly before: RegistrationState,
  ) {
    super(`Registration deadline of ${budgetMs}ms exceeded after ${elapsedMs}ms (${before})`);
    this.name = 'DeadlineExceededError';
  }
}

export class RegistrationDeadline {
  private readonly startedAtMs: number;

  constructor(
    private readonly budgetMs: number,
    private readonly nowMs: () => number,
  ) {
    this.startedAtMs = nowMs();
  }

  elapsedMs(): number {
    return this.nowMs() - this.startedAtMs;
  }

  assertNotExceeded(state: RegistrationState): void {
    const elapsed = this.elapsedMs();
    if (elapsed > this.budgetMs) {
      throw new DeadlineExceededError(this.budgetMs, elapsed, state);
    }
  }
}
