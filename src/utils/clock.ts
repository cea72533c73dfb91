/**
 * Time source for everything that stamps or compares times.
 * The service runs on the system clock; the simulator and the tests
 * drive a ManualClock instead.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};

export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date | number = Date.UTC(2024, 0, 1, 8, 0, 0)) {
    this.current = typeof start === 'number' ? start : start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  /**
   * Move forward to `time`. A time already passed leaves the clock alone.
   */
  advanceTo(time: Date): Date {
    this.current = Math.max(this.current, time.getTime());
    return this.now();
  }

  advanceMinutes(minutes: number): Date {
    this.current += minutes * 60000;
    return this.now();
  }

  advanceMs(ms: number): Date {
    this.current += ms;
    return this.now();
  }
}
