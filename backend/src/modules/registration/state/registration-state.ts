/**
 * backend/src/modules/registration/state/registration-state.ts
 *
 * WHY:
 * - One registration execution walks a fixed path:
 *     ADMITTED → VALIDATED → TENANT_CREATED → USER_CREATED → CREDENTIALS_CREATED → COMPLETED
 *   and may abort (ABORTED) from any non-terminal state.
 * - The table makes "which step did we fail in" explicit and testable.
 *
 * RULES:
 * - Pure. No I/O.
 * - An invalid transition is a programming error (thrown, never returned to clients).
 */

import type { RegistrationState } from '../registration.types';

export const VALID_REGISTRATION_TRANSITIONS: Readonly<
  Record<RegistrationState, readonly RegistrationState[]>
> = {
  ADMITTED: ['VALIDATED', 'ABORTED'],
  VALIDATED: ['TENANT_CREATED', 'ABORTED'],
  TENANT_CREATED: ['USER_CREATED', 'ABORTED'],
  USER_CREATED: ['CREDENTIALS_CREATED', 'ABORTED'],
  CREDENTIALS_CREATED: ['COMPLETED', 'ABORTED'],
  COMPLETED: [],
  ABORTED: [],
};

export class InvalidRegistrationTransitionError extends Error {
  constructor(
    readonly from: RegistrationState,
    readonly to: RegistrationState,
  ) {
    super(`Invalid registration state transition: ${from} -> ${to}`);
    this.name = 'InvalidRegistrationTransitionError';
  }
}

export function canTransition(from: RegistrationState, to: RegistrationState): boolean {
  return VALID_REGISTRATION_TRANSITIONS[from].includes(to);
}

export function isTerminalRegistrationState(state: RegistrationState): boolean {
  return VALID_REGISTRATION_TRANSITIONS[state].length === 0;
}

export type RegistrationTransition = Readonly<{
  from: RegistrationState;
  to: RegistrationState;
  at: string;
}>;

/**
 * Tracks the state of ONE execution and keeps its transition history.
 */
export class RegistrationTracker {
  private current: RegistrationState = 'ADMITTED';
  private readonly transitions: RegistrationTransition[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  get state(): RegistrationState {
    return this.current;
  }

  get history(): readonly RegistrationTransition[] {
    return [...this.transitions];
  }

  get isTerminal(): boolean {
    return isTerminalRegistrationState(this.current);
  }

  advance(to: RegistrationState): RegistrationTransition {
    if (!canTransition(this.current, to)) {
      throw new InvalidRegistrationTransitionError(this.current, to);
    }

    const transition = Object.freeze({ from: this.current, to, at: this.clock().toISOString() });
    this.transitions.push(transition);
    this.current = to;
    return transition;
  }

  /**
   * Moves to ABORTED and returns the state the execution failed in.
   * Calling it on a terminal state is a no-op that returns the current state.
   */
  abort(): RegistrationState {
    const failedAt = this.current;
    if (!this.isTerminal) this.advance('ABORTED');
    return failedAt;
  }
}
