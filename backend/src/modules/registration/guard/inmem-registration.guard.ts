/**
 * backend/src/modules/registration/guard/inmem-registration.guard.ts
 *
 * WHY:
 * - Single-process guard: one Set shared by every request in this process.
 *
 * RULES:
 * - Each method runs to completion on the event loop, so has+add is atomic
 *   with respect to other requests. Never put an await between them.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { RegistrationGuard } from './registration-guard';

export class InMemRegistrationGuard implements RegistrationGuard {
  private readonly keys = new Set<string>();

  constructor(private readonly logger: Logger) {}

  tryAdmit(key: string): Promise<boolean> {
    if (this.keys.has(key)) return Promise.resolve(false);
    this.keys.add(key);
    return Promise.resolve(true);
  }

  release(key: string): Promise<void> {
    this.keys.delete(key);
    return Promise.resolve();
  }

  inFlightCount(): Promise<number> {
    return Promise.resolve(this.keys.size);
  }

  snapshot(): Promise<string[]> {
    return Promise.resolve([...this.keys]);
  }

  clearAll(): Promise<number> {
    const cleared = this.keys.size;
    this.keys.clear();

    this.logger.warn({
      msg: 'registration.guard.cleared',
      flow: 'registration.guard',
      driver: 'memory',
      cleared,
    });

    return Promise.resolve(cleared);
  }
}
