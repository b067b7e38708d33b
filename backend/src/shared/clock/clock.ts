/**
 * backend/src/shared/clock/clock.ts
 *
 * WHY:
 * - Session issue/expiry and credential timestamps depend on "now".
 * - Injecting the clock keeps expiry rules testable without sleeping.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Manually advanced clock for tests and scripted scenarios.
 */
export class FixedClock implements Clock {
  private current: number;

  constructor(start: Date = new Date('2026-01-01T00:00:00.000Z')) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advanceSeconds(seconds: number): void {
    this.current += seconds * 1000;
  }
}
