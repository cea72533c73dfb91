import { describe, it, expect } from 'vitest';
import { ManualClock } from '../src/utils/clock';

const T0 = Date.UTC(2024, 0, 1, 8, 0, 0);

describe('ManualClock', () => {
  it('should advance by minutes and milliseconds', () => {
    const clock = new ManualClock(T0);

    expect(clock.advanceMinutes(2)).toEqual(new Date(T0 + 120000));
    expect(clock.advanceMs(500)).toEqual(new Date(T0 + 120500));
  });

  it('should jump forward to a later time', () => {
    const clock = new ManualClock(T0);

    expect(clock.advanceTo(new Date(T0 + 3600000))).toEqual(new Date(T0 + 3600000));
    expect(clock.now()).toEqual(new Date(T0 + 3600000));
  });

  it('should never move backwards', () => {
    const clock = new ManualClock(T0);
    clock.advanceMinutes(10);

    expect(clock.advanceTo(new Date(T0))).toEqual(new Date(T0 + 600000));
  });
});
