import { describe, it, expect, beforeEach } from 'vitest';
import { CancellationSource, DriverStatus, RideStatus } from '../src/models/types';
import {
  ConfigurationMissingError,
  InvalidTransitionError,
  NotFoundError
} from '../src/models/errors';
import { RideService } from '../src/services/RideService';
import { AllocationDispatcher } from '../src/matchers/AllocationDispatcher';
import { InMemoryEntityStore } from '../src/store/InMemoryEntityStore';
import { DEFAULT_PRICING } from '../src/config/config';
import { ManualClock } from '../src/utils/clock';
import { createTestContext, kmFromCenter } from './factories';

describe('RideService', () => {
  let clock: ManualClock;
  let store: InMemoryEntityStore;
  let rides: RideService;
  let dispatcher: AllocationDispatcher;

  beforeEach(async () => {
    ({ clock, store } = createTestContext());
    rides = new RideService(store, { clock });
    dispatcher = new AllocationDispatcher(store, { clock });

    await rides.registerRider({ id: 'rider-1', name: 'Asha', home: kmFromCenter(0) });
    await rides.registerDriver({ id: 'driver-1', name: 'Ravi', location: kmFromCenter(0.5) });
  });

  /**
   * Request a ride 10 km long and dispatch it to driver-1.
   */
  const requestAndAssign = async (id = 'ride-1') => {
    await rides.requestRide({ id, riderId: 'rider-1', pickup: kmFromCenter(0), dropoff: kmFromCenter(10) });
    const outcome = await dispatcher.dispatchRide(id);
    expect(outcome.status).toBe('assigned');
  };

  // ===========================================================================
  // HAPPY PATH
  // ===========================================================================

  describe('Lifecycle', () => {
    it('should walk a ride from request to completion and price it', async () => {
      await rides.savePricing('default', { baseFare: 50, perKmRate: 10, perMinuteRate: 2, perWaitMinuteRate: 1 });
      await requestAndAssign();

      clock.advanceMinutes(4);
      const arrived = await rides.arrive('ride-1');
      expect(arrived.status).toBe(RideStatus.DRIVER_ARRIVED);

      clock.advanceMinutes(2);
      const started = await rides.start('ride-1');
      expect(started.status).toBe(RideStatus.STARTED);
      expect((await store.getDriver('driver-1'))?.status).toBe(DriverStatus.ON_TRIP);

      clock.advanceMinutes(20);
      const completed = await rides.end('ride-1');

      expect(completed.status).toBe(RideStatus.COMPLETED);
      expect(completed.endedAt).toEqual(clock.now());
      expect(completed.fare?.total).toBe(192);
      expect(completed.fare?.waitingFare).toBe(2);
      expect(completed.fare?.timeFare).toBe(40);

      const driver = await store.getDriver('driver-1');
      expect(driver?.status).toBe(DriverStatus.IDLE);
      expect(driver?.activeRideId).toBeNull();
      expect(driver?.location).toEqual(kmFromCenter(10));
      expect(driver?.history.completedRides).toBe(1);
    });
  });

  // ===========================================================================
  // INVALID TRANSITIONS
  // ===========================================================================

  describe('Invalid transitions', () => {
    it('should refuse to cancel a started ride', async () => {
      await requestAndAssign();
      await rides.arrive('ride-1');
      await rides.start('ride-1');

      await expect(rides.cancel('ride-1')).rejects.toBeInstanceOf(InvalidTransitionError);
      expect((await store.getRide('ride-1'))?.status).toBe(RideStatus.STARTED);
      expect((await store.getDriver('driver-1'))?.status).toBe(DriverStatus.ON_TRIP);
    });

    it('should name the current status in the error', async () => {
      await rides.requestRide({ id: 'ride-1', riderId: 'rider-1', pickup: kmFromCenter(0), dropoff: kmFromCenter(3) });

      const error = await rides.arrive('ride-1').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(InvalidTransitionError);
      if (!(error instanceof InvalidTransitionError)) return;
      expect(error.currentStatus).toBe(RideStatus.CREATE_RIDE);
      expect(error.allowedFrom).toEqual([RideStatus.ASSIGNED]);
      expect(error.code).toBe('INVALID_TRANSITION');
    });

    it('should report an unknown ride as not found', async () => {
      await expect(rides.start('ride-missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should complete a ride only once under concurrent end calls', async () => {
      await rides.seedPricing();
      await requestAndAssign();
      await rides.arrive('ride-1');
      await rides.start('ride-1');

      const results = await Promise.allSettled([rides.end('ride-1'), rides.end('ride-1')]);

      expect(results.map(r => r.status).sort()).toEqual(['fulfilled', 'rejected']);
      const rejected = results.find(r => r.status === 'rejected');
      expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(InvalidTransitionError);
      expect((await store.getDriver('driver-1'))?.history.completedRides).toBe(1);
    });
  });

  // ===========================================================================
  // CANCELLATION
  // ===========================================================================

  describe('Cancellation', () => {
    it('should free the driver when an assigned ride is cancelled', async () => {
      await requestAndAssign();

      const cancelled = await rides.cancel('ride-1');

      expect(cancelled.status).toBe(RideStatus.CANCELLED);
      expect(cancelled.cancelledBy).toBe(CancellationSource.RIDER);
      const driver = await store.getDriver('driver-1');
      expect(driver?.status).toBe(DriverStatus.IDLE);
      expect(driver?.activeRideId).toBeNull();
      expect(driver?.history.cancelledRides).toBe(0);
    });

    it('should count a driver cancellation against the driver', async () => {
      await requestAndAssign();
      await rides.arrive('ride-1');

      await rides.cancel('ride-1', CancellationSource.DRIVER);

      expect((await store.getDriver('driver-1'))?.history.cancelledRides).toBe(1);
    });

    it('should cancel a ride still waiting for a driver', async () => {
      await rides.requestRide({ id: 'ride-1', riderId: 'rider-1', pickup: kmFromCenter(0), dropoff: kmFromCenter(3) });

      const cancelled = await rides.cancel('ride-1', CancellationSource.SYSTEM);

      expect(cancelled.status).toBe(RideStatus.CANCELLED);
      expect(cancelled.driverId).toBeNull();
      expect(await store.listPendingRides()).toEqual([]);
    });
  });

  // ===========================================================================
  // PRICING
  // ===========================================================================

  describe('Pricing', () => {
    it('should leave the ride started when no pricing config exists', async () => {
      await requestAndAssign();
      await rides.arrive('ride-1');
      await rides.start('ride-1');

      await expect(rides.end('ride-1')).rejects.toBeInstanceOf(ConfigurationMissingError);

      const ride = await store.getRide('ride-1');
      expect(ride?.status).toBe(RideStatus.STARTED);
      expect(ride?.fare).toBeNull();
      expect((await store.getDriver('driver-1'))?.status).toBe(DriverStatus.ON_TRIP);
    });

    it('should seed default pricing without overwriting an existing config', async () => {
      const seeded = await rides.seedPricing();
      expect(seeded).toMatchObject({ key: 'default', ...DEFAULT_PRICING });

      await rides.savePricing('default', { baseFare: 30, perKmRate: 12, perMinuteRate: 2, perWaitMinuteRate: 1 });
      const again = await rides.seedPricing();
      expect(again.baseFare).toBe(30);
    });

    it('should report an unknown pricing key as not found', async () => {
      await expect(rides.getPricing('surge')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
