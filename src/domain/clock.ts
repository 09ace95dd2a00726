/**
 * rental-repairs-core - Clock
 *
 * Source of "now" for timestamps and age-based rules. Injected so tests can
 * pin time.
 */

export interface IClock {
  now(): Date;
}

export const systemClock: IClock = {
  now: () => new Date(),
};

/**
 * Clock that returns a fixed instant until moved.
 *
 * @example
 * ```typescript
 * const clock = new FixedClock(new Date('2024-03-01T09:00:00Z'));
 * clock.advanceHours(5);
 * ```
 */
export class FixedClock implements IClock {
  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(instant: Date): void {
    this.current = new Date(instant.getTime());
  }

  advanceHours(hours: number): void {
    this.current = new Date(this.current.getTime() + hours * 60 * 60 * 1000);
  }
}
