/**
 * Manually advanced clock shared by the app under test and its fakes.
 */
export class TestClock {
  private ms: number;

  constructor(start = '2026-03-02T09:30:00.000Z') {
    this.ms = Date.parse(start);
  }

  readonly now = (): Date => new Date(this.ms);

  readonly nowMs = (): number => this.ms;

  advance(ms: number): void {
    this.ms += ms;
  }
}
