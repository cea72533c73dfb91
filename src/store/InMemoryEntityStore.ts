/**
 * In-memory EntityStore.
 *
 * Records live in Maps owned by this class. Each public method runs to
 * completion without awaiting anything, so a guarded write is atomic with
 * respect to every other store call made from the event loop.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  CancellationSource,
  DriverStatus,
  RideOutcome,
  RideStatus,
  type Coordinates,
  type DispatchConfig,
  type Driver,
  type DriverCandidate,
  type NewDriver,
  type NewRide,
  type NewRider,
  type PricingConfig,
  type PricingRates,
  type Ride,
  type Rider
} from '../models/types';
import { allowedFromStatuses, type RideTransition } from '../models/rideLifecycle';
import { ConflictError, NotFoundError } from '../models/errors';
import { DEFAULT_DISPATCH_CONFIG } from '../config/config';
import { haversineDistanceKm } from '../utils/geo';
import { systemClock, type Clock } from '../utils/clock';
import { emptyHistory, recordOutcome, type HistoryLimits } from './driverHistory';
import {
  compareIds,
  type ConflictKind,
  type EntityStore,
  type GuardedWriteResult,
  type RideListFilter,
  type WriteConflict
} from './EntityStore';

export interface InMemoryEntityStoreOptions {
  clock?: Clock;
  config?: Pick<DispatchConfig, 'historyCapacity' | 'sameRiderCooldownMinutes'>;
}

export class InMemoryEntityStore implements EntityStore {
  private riders = new Map<string, Rider>();
  private drivers = new Map<string, Driver>();
  private rides = new Map<string, Ride>();
  private pricing = new Map<string, PricingConfig>();

  private readonly clock: Clock;
  private readonly historyLimits: HistoryLimits;

  constructor(options: InMemoryEntityStoreOptions = {}) {
    const config = options.config ?? DEFAULT_DISPATCH_CONFIG;
    this.clock = options.clock ?? systemClock;
    this.historyLimits = {
      capacity: config.historyCapacity,
      cooldownMinutes: config.sameRiderCooldownMinutes
    };
  }

  // ===========================================================================
  // RIDERS
  // ===========================================================================

  async createRider(input: NewRider): Promise<Rider> {
    const id = input.id ?? uuidv4();
    if (this.riders.has(id)) {
      throw new ConflictError(`Rider ${id} already exists`);
    }
    const rider: Rider = {
      id,
      name: input.name,
      home: { ...input.home },
      createdAt: this.clock.now()
    };
    this.riders.set(id, rider);
    return snapshot(rider);
  }

  async getRider(riderId: string): Promise<Rider | null> {
    const rider = this.riders.get(riderId);
    return rider ? snapshot(rider) : null;
  }

  async listRiders(): Promise<Rider[]> {
    return [...this.riders.values()]
      .sort((a, b) => compareIds(a.id, b.id))
      .map(snapshot);
  }

  // ===========================================================================
  // DRIVERS
  // ===========================================================================

  async createDriver(input: NewDriver): Promise<Driver> {
    const id = input.id ?? uuidv4();
    if (this.drivers.has(id)) {
      throw new ConflictError(`Driver ${id} already exists`);
    }
    const driver: Driver = {
      id,
      name: input.name,
      location: { ...input.location },
      status: DriverStatus.IDLE,
      activeRideId: null,
      history: emptyHistory(),
      createdAt: this.clock.now(),
      version: 1
    };
    this.drivers.set(id, driver);
    return snapshot(driver);
  }

  async getDriver(driverId: string): Promise<Driver | null> {
    const driver = this.drivers.get(driverId);
    return driver ? snapshot(driver) : null;
  }

  async listDrivers(): Promise<Driver[]> {
    return [...this.drivers.values()]
      .sort((a, b) => compareIds(a.id, b.id))
      .map(snapshot);
  }

  async listDriversWithin(center: Coordinates, radiusKm: number): Promise<DriverCandidate[]> {
    const candidates: DriverCandidate[] = [];

    for (const driver of this.drivers.values()) {
      if (driver.status !== DriverStatus.IDLE || driver.activeRideId !== null) continue;

      const distanceKm = haversineDistanceKm(center, driver.location);
      if (distanceKm <= radiusKm) {
        candidates.push({ driver: snapshot(driver), distanceKm });
      }
    }

    return candidates.sort((a, b) =>
      a.distanceKm !== b.distanceKm
        ? a.distanceKm - b.distanceKm
        : compareIds(a.driver.id, b.driver.id)
    );
  }

  // ===========================================================================
  // RIDES
  // ===========================================================================

  async createRide(input: NewRide): Promise<Ride> {
    if (!this.riders.has(input.riderId)) {
      throw new NotFoundError('rider', input.riderId);
    }
    const id = input.id ?? uuidv4();
    if (this.rides.has(id)) {
      throw new ConflictError(`Ride ${id} already exists`);
    }

    const ride: Ride = {
      id,
      riderId: input.riderId,
      pickup: { ...input.pickup },
      dropoff: { ...input.dropoff },
      status: RideStatus.CREATE_RIDE,
      driverId: null,
      createdAt: input.createdAt ?? this.clock.now(),
      assignedAt: null,
      arrivedAt: null,
      startedAt: null,
      endedAt: null,
      cancelledAt: null,
      cancelledBy: null,
      fare: null,
      version: 1
    };
    this.rides.set(id, ride);
    return snapshot(ride);
  }

  async getRide(rideId: string): Promise<Ride | null> {
    const ride = this.rides.get(rideId);
    return ride ? snapshot(ride) : null;
  }

  async listRides(filter: RideListFilter = {}): Promise<Ride[]> {
    return [...this.rides.values()]
      .filter(r =>
        (filter.status === undefined || r.status === filter.status) &&
        (filter.driverId === undefined || r.driverId === filter.driverId) &&
        (filter.riderId === undefined || r.riderId === filter.riderId)
      )
      .sort(byCreation)
      .map(snapshot);
  }

  async listPendingRides(): Promise<Ride[]> {
    return this.listRides({ status: RideStatus.CREATE_RIDE });
  }

  // ===========================================================================
  // PRICING
  // ===========================================================================

  async savePricingConfig(key: string, rates: PricingRates): Promise<PricingConfig> {
    const config: PricingConfig = {
      key,
      baseFare: rates.baseFare,
      perKmRate: rates.perKmRate,
      perMinuteRate: rates.perMinuteRate,
      perWaitMinuteRate: rates.perWaitMinuteRate,
      updatedAt: this.clock.now()
    };
    this.pricing.set(key, config);
    return snapshot(config);
  }

  async getPricingConfig(key: string): Promise<PricingConfig | null> {
    const config = this.pricing.get(key);
    return config ? snapshot(config) : null;
  }

  async listPricingConfigs(): Promise<PricingConfig[]> {
    return [...this.pricing.values()]
      .sort((a, b) => compareIds(a.key, b.key))
      .map(snapshot);
  }

  // ===========================================================================
  // GUARDED WRITES
  // ===========================================================================

  async tryAssign(
    rideId: string,
    driverId: string,
    expectedRideStatus: RideStatus,
    expectedDriverStatus: DriverStatus,
    at: Date
  ): Promise<GuardedWriteResult> {
    const ride = this.rides.get(rideId);
    if (!ride) return refuse({ entity: 'ride', id: rideId, kind: 'not_found' });

    const driver = this.drivers.get(driverId);
    if (!driver) return refuse({ entity: 'driver', id: driverId, kind: 'not_found' });

    if (ride.status !== expectedRideStatus) {
      return refuse(statusMismatch('ride', rideId, expectedRideStatus, ride.status));
    }
    if (driver.status !== expectedDriverStatus) {
      return refuse(statusMismatch('driver', driverId, expectedDriverStatus, driver.status));
    }
    if (driver.activeRideId !== null) {
      return refuse({ entity: 'driver', id: driverId, kind: 'driver_busy', actual: driver.activeRideId });
    }
    if (ride.driverId !== null) {
      return refuse({ entity: 'ride', id: rideId, kind: 'status_mismatch', actual: ride.driverId });
    }

    const nextRide: Ride = {
      ...ride,
      status: RideStatus.ASSIGNED,
      driverId,
      assignedAt: at,
      version: ride.version + 1
    };
    const nextDriver: Driver = {
      ...driver,
      status: DriverStatus.ASSIGNED,
      activeRideId: rideId,
      version: driver.version + 1
    };

    return this.commit(nextRide, nextDriver);
  }

  async transitionRide(rideId: string, transition: RideTransition): Promise<GuardedWriteResult> {
    const ride = this.rides.get(rideId);
    if (!ride) return refuse({ entity: 'ride', id: rideId, kind: 'not_found' });

    const allowedFrom = allowedFromStatuses(transition.type);
    if (!allowedFrom.includes(ride.status)) {
      return refuse(statusMismatch('ride', rideId, allowedFrom, ride.status));
    }

    if (transition.type === 'complete' && ride.version !== transition.expectedVersion) {
      return refuse({
        entity: 'ride',
        id: rideId,
        kind: 'version_mismatch',
        expected: transition.expectedVersion,
        actual: ride.version
      });
    }

    // Only a pending ride has no driver, and only cancel applies to it
    if (ride.driverId === null) {
      if (transition.type !== 'cancel') {
        return refuse({ entity: 'driver', id: '', kind: 'not_found', expected: 'bound driver' });
      }
      return this.commit({
        ...ride,
        status: RideStatus.CANCELLED,
        cancelledAt: transition.at,
        cancelledBy: transition.cancelledBy,
        version: ride.version + 1
      }, null);
    }

    const driver = this.drivers.get(ride.driverId);
    if (!driver) return refuse({ entity: 'driver', id: ride.driverId, kind: 'not_found' });
    if (driver.activeRideId !== ride.id) {
      return refuse({ entity: 'driver', id: driver.id, kind: 'driver_busy', expected: ride.id, actual: driver.activeRideId });
    }

    switch (transition.type) {
      case 'arrive': {
        if (driver.status !== DriverStatus.ASSIGNED) {
          return refuse(statusMismatch('driver', driver.id, DriverStatus.ASSIGNED, driver.status));
        }
        return this.commit(
          { ...ride, status: RideStatus.DRIVER_ARRIVED, arrivedAt: transition.at, version: ride.version + 1 },
          { ...driver, version: driver.version + 1 }
        );
      }

      case 'start': {
        if (driver.status !== DriverStatus.ASSIGNED) {
          return refuse(statusMismatch('driver', driver.id, DriverStatus.ASSIGNED, driver.status));
        }
        return this.commit(
          { ...ride, status: RideStatus.STARTED, startedAt: transition.at, version: ride.version + 1 },
          { ...driver, status: DriverStatus.ON_TRIP, version: driver.version + 1 }
        );
      }

      case 'complete': {
        if (driver.status !== DriverStatus.ON_TRIP) {
          return refuse(statusMismatch('driver', driver.id, DriverStatus.ON_TRIP, driver.status));
        }
        const history = recordOutcome(driver.history, {
          rideId: ride.id,
          riderId: ride.riderId,
          outcome: RideOutcome.COMPLETED,
          at: transition.at
        }, this.historyLimits);

        return this.commit(
          {
            ...ride,
            status: RideStatus.COMPLETED,
            endedAt: transition.at,
            fare: { ...transition.fare },
            version: ride.version + 1
          },
          {
            ...driver,
            status: DriverStatus.IDLE,
            activeRideId: null,
            location: { ...ride.dropoff },
            history,
            version: driver.version + 1
          }
        );
      }

      case 'cancel': {
        if (driver.status !== DriverStatus.ASSIGNED) {
          return refuse(statusMismatch('driver', driver.id, DriverStatus.ASSIGNED, driver.status));
        }
        const history = transition.cancelledBy === CancellationSource.DRIVER
          ? recordOutcome(driver.history, {
              rideId: ride.id,
              riderId: ride.riderId,
              outcome: RideOutcome.CANCELLED,
              at: transition.at
            }, this.historyLimits)
          : driver.history;

        return this.commit(
          {
            ...ride,
            status: RideStatus.CANCELLED,
            cancelledAt: transition.at,
            cancelledBy: transition.cancelledBy,
            version: ride.version + 1
          },
          {
            ...driver,
            status: DriverStatus.IDLE,
            activeRideId: null,
            history,
            version: driver.version + 1
          }
        );
      }
    }
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private commit(ride: Ride, driver: Driver | null): GuardedWriteResult {
    this.rides.set(ride.id, ride);
    if (driver) {
      this.drivers.set(driver.id, driver);
    }
    return { ok: true, ride: snapshot(ride), driver: driver ? snapshot(driver) : null };
  }
}

function snapshot<T>(record: T): T {
  return structuredClone(record);
}

function refuse(conflict: WriteConflict): GuardedWriteResult {
  return { ok: false, conflict };
}

function statusMismatch(
  entity: WriteConflict['entity'],
  id: string,
  expected: string | readonly string[],
  actual: string
): WriteConflict {
  const kind: ConflictKind = 'status_mismatch';
  return { entity, id, kind, expected, actual };
}

function byCreation(a: Ride, b: Ride): number {
  const diff = a.createdAt.getTime() - b.createdAt.getTime();
  return diff !== 0 ? diff : compareIds(a.id, b.id);
}
