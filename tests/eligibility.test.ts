import { describe, it, expect } from 'vitest';
import {
  DriverStatus,
  EligibilityReason,
  RideOutcome,
  RideStatus,
  type Driver,
  type Ride
} from '../src/models/types';
import { EligibilityFilter } from '../src/matchers/EligibilityFilter';
import {
  IdleDriverRule,
  RecentCancellationRule,
  SameRiderCooldownRule,
  createRules
} from '../src/matchers/rules';
import { emptyHistory, recordOutcome } from '../src/store/driverHistory';
import { DEFAULT_DISPATCH_CONFIG } from '../src/config/config';
import { CITY_CENTER, kmFromCenter } from './factories';

// =============================================================================
// TEST DATA FACTORIES
// =============================================================================

const T0 = Date.UTC(2024, 0, 1, 8, 0, 0);
const minutes = (n: number) => new Date(T0 + n * 60000);

const limits = {
  capacity: DEFAULT_DISPATCH_CONFIG.historyCapacity,
  cooldownMinutes: DEFAULT_DISPATCH_CONFIG.sameRiderCooldownMinutes
};

const createDriver = (overrides: Partial<Driver> = {}): Driver => ({
  id: 'driver-1',
  name: 'Test Driver',
  location: CITY_CENTER,
  status: DriverStatus.IDLE,
  activeRideId: null,
  history: emptyHistory(),
  createdAt: minutes(0),
  version: 1,
  ...overrides
});

const createRide = (overrides: Partial<Ride> = {}): Ride => ({
  id: 'ride-1',
  riderId: 'rider-1',
  pickup: CITY_CENTER,
  dropoff: kmFromCenter(5),
  status: RideStatus.CREATE_RIDE,
  driverId: null,
  createdAt: minutes(0),
  assignedAt: null,
  arrivedAt: null,
  startedAt: null,
  endedAt: null,
  cancelledAt: null,
  cancelledBy: null,
  fare: null,
  version: 1,
  ...overrides
});

/**
 * A driver whose history holds the given outcomes, oldest first.
 */
const driverWithOutcomes = (outcomes: RideOutcome[], riderId = 'rider-other'): Driver => {
  let history = emptyHistory();
  outcomes.forEach((outcome, i) => {
    history = recordOutcome(history, {
      rideId: `past-${i}`,
      riderId,
      outcome,
      at: minutes(i)
    }, limits);
  });
  return createDriver({ history });
};

const completedWith = (riderId: string, at: Date): Driver =>
  createDriver({
    history: recordOutcome(emptyHistory(), {
      rideId: 'past-1',
      riderId,
      outcome: RideOutcome.COMPLETED,
      at
    }, limits)
  });

describe('Eligibility', () => {
  const filter = new EligibilityFilter(DEFAULT_DISPATCH_CONFIG);
  const ride = createRide();

  // ===========================================================================
  // INDIVIDUAL RULES
  // ===========================================================================

  describe('IdleDriverRule', () => {
    const rule = new IdleDriverRule();
    const context = { now: minutes(0), config: DEFAULT_DISPATCH_CONFIG };

    it('should pass an idle driver', () => {
      expect(rule.passes(ride, createDriver(), context)).toBe(true);
    });

    it('should fail a driver holding a ride', () => {
      const busy = createDriver({ status: DriverStatus.ASSIGNED, activeRideId: 'ride-9' });
      expect(rule.passes(ride, busy, context)).toBe(false);
    });
  });

  describe('SameRiderCooldownRule', () => {
    const rule = new SameRiderCooldownRule();
    const driver = completedWith('rider-1', minutes(0));
    const at = (n: number) => ({ now: minutes(n), config: DEFAULT_DISPATCH_CONFIG });

    it('should block the same rider inside the window', () => {
      expect(rule.passes(ride, driver, at(1))).toBe(false);
      expect(rule.passes(ride, driver, at(29))).toBe(false);
    });

    it('should allow the same rider again once the window has passed', () => {
      expect(rule.passes(ride, driver, at(30))).toBe(true);
      expect(rule.passes(ride, driver, at(31))).toBe(true);
    });

    it('should allow the same rider at the completion instant itself', () => {
      expect(rule.passes(ride, driver, at(0))).toBe(true);
    });

    it('should not block other riders', () => {
      const otherRide = createRide({ riderId: 'rider-2' });
      expect(rule.passes(otherRide, driver, at(5))).toBe(true);
    });
  });

  describe('RecentCancellationRule', () => {
    const rule = new RecentCancellationRule();
    const context = { now: minutes(60), config: DEFAULT_DISPATCH_CONFIG };

    it('should fail a driver whose last two outcomes are cancellations', () => {
      const driver = driverWithOutcomes([RideOutcome.COMPLETED, RideOutcome.CANCELLED, RideOutcome.CANCELLED]);
      expect(rule.passes(ride, driver, context)).toBe(false);
    });

    it('should pass a driver with a single cancellation', () => {
      expect(rule.passes(ride, driverWithOutcomes([RideOutcome.CANCELLED]), context)).toBe(true);
    });

    it('should pass once a completion follows the cancellations', () => {
      const driver = driverWithOutcomes([RideOutcome.CANCELLED, RideOutcome.CANCELLED, RideOutcome.COMPLETED]);
      expect(rule.passes(ride, driver, context)).toBe(true);
    });

    it('should pass a cancellation then completion', () => {
      const driver = driverWithOutcomes([RideOutcome.CANCELLED, RideOutcome.COMPLETED]);
      expect(rule.passes(ride, driver, context)).toBe(true);
    });
  });

  it('should create the rules in priority order', () => {
    expect(createRules().map(r => r.failureReason)).toEqual([
      EligibilityReason.DRIVER_NOT_IDLE,
      EligibilityReason.RECENT_RIDE_WITH_RIDER,
      EligibilityReason.RECENT_CANCELLATIONS
    ]);
  });

  // ===========================================================================
  // FILTER
  // ===========================================================================

  describe('EligibilityFilter', () => {
    it('should report the first failing rule as the reason', () => {
      const busyAndCancelling = createDriver({
        ...driverWithOutcomes([RideOutcome.CANCELLED, RideOutcome.CANCELLED]),
        status: DriverStatus.ON_TRIP,
        activeRideId: 'ride-9'
      });

      expect(filter.evaluate(ride, busyAndCancelling, minutes(60))).toEqual({
        eligible: false,
        reason: EligibilityReason.DRIVER_NOT_IDLE
      });
    });

    it('should mark a clean idle driver eligible', () => {
      expect(filter.evaluate(ride, createDriver(), minutes(0))).toEqual({
        eligible: true,
        reason: EligibilityReason.ELIGIBLE
      });
    });

    it('should partition candidates and count exclusions per reason', () => {
      const candidates = [
        { driver: createDriver({ id: 'a' }), distanceKm: 0.2 },
        { driver: { ...completedWith('rider-1', minutes(50)), id: 'b' }, distanceKm: 0.4 },
        { driver: { ...driverWithOutcomes([RideOutcome.CANCELLED, RideOutcome.CANCELLED]), id: 'c' }, distanceKm: 0.6 },
        { driver: createDriver({ id: 'd' }), distanceKm: 0.8 }
      ];

      const { eligible, excluded } = filter.partition(ride, candidates, minutes(60));

      expect(eligible.map(c => c.driver.id)).toEqual(['a', 'd']);
      expect(excluded).toEqual({
        [EligibilityReason.DRIVER_NOT_IDLE]: 0,
        [EligibilityReason.RECENT_RIDE_WITH_RIDER]: 1,
        [EligibilityReason.RECENT_CANCELLATIONS]: 1
      });
    });
  });
});
