/**
 * EntityStore - Single owner of rider, driver, ride and pricing records
 *
 * Reads hand out snapshots; nothing outside the store ever holds a live
 * record. Every change to an existing driver or ride is a guarded write:
 * the store re-reads the record, checks the caller's expectation (status
 * and/or version) and only then applies the change, all in one step.
 * A failed guard is reported as a WriteConflict, never thrown.
 */

import type {
  Coordinates,
  Driver,
  DriverCandidate,
  DriverStatus,
  NewDriver,
  NewRide,
  NewRider,
  PricingConfig,
  PricingRates,
  Ride,
  Rider,
  RideStatus
} from '../models/types';
import type { RideTransition } from '../models/rideLifecycle';

// =============================================================================
// WRITE RESULTS
// =============================================================================

export type ConflictKind =
  | 'not_found'
  | 'status_mismatch'
  | 'version_mismatch'
  | 'driver_busy';

/**
 * Why a guarded write was refused.
 */
export interface WriteConflict {
  entity: 'ride' | 'driver';
  id: string;
  kind: ConflictKind;
  expected?: string | number | readonly string[];
  actual?: string | number | null;
}

/**
 * Outcome of a guarded write. On success both touched records are returned
 * as fresh snapshots; `driver` is null when the ride had no driver.
 */
export type GuardedWriteResult =
  | { ok: true; ride: Ride; driver: Driver | null }
  | { ok: false; conflict: WriteConflict };

export interface RideListFilter {
  status?: RideStatus;
  driverId?: string;
  riderId?: string;
}

/**
 * Orders identifiers by plain code-unit comparison, so "lowest id" means the
 * same thing on every machine.
 */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// =============================================================================
// STORE INTERFACE
// =============================================================================

export interface EntityStore {
  // ----- Riders -----
  createRider(input: NewRider): Promise<Rider>;
  getRider(riderId: string): Promise<Rider | null>;
  listRiders(): Promise<Rider[]>;

  // ----- Drivers -----
  createDriver(input: NewDriver): Promise<Driver>;
  getDriver(driverId: string): Promise<Driver | null>;
  listDrivers(): Promise<Driver[]>;

  /**
   * Idle drivers within `radiusKm` (inclusive) of `center`, nearest first,
   * ties broken by lowest driver id.
   */
  listDriversWithin(center: Coordinates, radiusKm: number): Promise<DriverCandidate[]>;

  // ----- Rides -----
  createRide(input: NewRide): Promise<Ride>;
  getRide(rideId: string): Promise<Ride | null>;
  listRides(filter?: RideListFilter): Promise<Ride[]>;

  /**
   * Rides awaiting a driver, oldest first (ties by id).
   */
  listPendingRides(): Promise<Ride[]>;

  // ----- Pricing -----
  savePricingConfig(key: string, rates: PricingRates): Promise<PricingConfig>;
  getPricingConfig(key: string): Promise<PricingConfig | null>;
  listPricingConfigs(): Promise<PricingConfig[]>;

  // ----- Guarded writes -----

  /**
   * Bind a driver to a ride. Refused when either record is missing, either
   * status differs from the expectation, or the driver already holds an
   * active ride. On success the ride becomes `assigned` and the driver
   * `assigned`, together.
   */
  tryAssign(
    rideId: string,
    driverId: string,
    expectedRideStatus: RideStatus,
    expectedDriverStatus: DriverStatus,
    at: Date
  ): Promise<GuardedWriteResult>;

  /**
   * Apply a lifecycle transition, guarded by the statuses the transition
   * table allows it from (and by version for `complete`).
   */
  transitionRide(rideId: string, transition: RideTransition): Promise<GuardedWriteResult>;
}
