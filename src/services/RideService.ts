/**
 * RideService - Lifecycle commands issued from outside the dispatcher
 *
 * KEY DESIGN DECISIONS:
 *
 * 1. Same Discipline As Dispatch: Every command is a guarded store write.
 *    A refused write is turned into a typed error here; the store itself
 *    never throws for a lost guard.
 *
 * 2. Status Checked Up Front: The ride is read before the write so a
 *    command against a ride in the wrong state fails with
 *    InvalidTransitionError naming the current status. The store repeats
 *    the check atomically; if the ride moved in between, the guard wins.
 *
 * 3. Fare At Completion: `end` prices the ride from the config stored
 *    under the configured key, then completes it with a version guard so a
 *    fare is never attached to a ride that changed since it was priced.
 *    A missing config leaves the ride in `started`.
 */

import {
  CancellationSource,
  RideStatus,
  type DispatchConfig,
  type Driver,
  type NewDriver,
  type NewRide,
  type NewRider,
  type PricingConfig,
  type PricingRates,
  type Ride,
  type Rider
} from '../models/types';
import {
  allowedFromStatuses,
  type RideTransition,
  type RideTransitionType
} from '../models/rideLifecycle';
import {
  ConfigurationMissingError,
  ConflictError,
  InvalidTransitionError,
  NotFoundError
} from '../models/errors';
import type { EntityStore, GuardedWriteResult, WriteConflict } from '../store/EntityStore';
import { calculateFare } from '../pricing/fareCalculator';
import { DEFAULT_DISPATCH_CONFIG, DEFAULT_PRICING } from '../config/config';
import { systemClock, type Clock } from '../utils/clock';

export interface RideServiceOptions {
  config?: DispatchConfig;
  clock?: Clock;
}

export class RideService {
  private readonly store: EntityStore;
  private readonly config: DispatchConfig;
  private readonly clock: Clock;

  constructor(store: EntityStore, options: RideServiceOptions = {}) {
    this.store = store;
    this.config = options.config ?? DEFAULT_DISPATCH_CONFIG;
    this.clock = options.clock ?? systemClock;
  }

  // ===========================================================================
  // REGISTRATION
  // ===========================================================================

  async registerRider(input: NewRider): Promise<Rider> {
    const rider = await this.store.createRider(input);
    console.log(`[RideService] Registered rider ${rider.id} (${rider.name})`);
    return rider;
  }

  async registerDriver(input: NewDriver): Promise<Driver> {
    const driver = await this.store.createDriver(input);
    console.log(`[RideService] Registered driver ${driver.id} (${driver.name})`);
    return driver;
  }

  /**
   * Create a ride in `create_ride`. The scheduler picks it up on its next pass.
   */
  async requestRide(input: NewRide): Promise<Ride> {
    const ride = await this.store.createRide(input);
    console.log(`[RideService] Ride ${ride.id} requested by rider ${ride.riderId}`);
    return ride;
  }

  // ===========================================================================
  // LIFECYCLE COMMANDS
  // ===========================================================================

  /** assigned -> driver_arrived */
  async arrive(rideId: string): Promise<Ride> {
    await this.loadForTransition(rideId, 'arrive');
    return this.apply(rideId, { type: 'arrive', at: this.clock.now() });
  }

  /** driver_arrived -> started; the driver goes on trip */
  async start(rideId: string): Promise<Ride> {
    await this.loadForTransition(rideId, 'start');
    return this.apply(rideId, { type: 'start', at: this.clock.now() });
  }

  /**
   * started -> completed, with the fare computed at the completion instant.
   * The driver becomes idle at the drop-off point.
   */
  async end(rideId: string): Promise<Ride> {
    const ride = await this.loadForTransition(rideId, 'complete');

    const pricingKey = this.config.pricingConfigKey;
    const pricing = await this.store.getPricingConfig(pricingKey);
    if (!pricing) {
      console.error(`[RideService] Cannot complete ride ${rideId}: no pricing config "${pricingKey}"`);
      throw new ConfigurationMissingError(pricingKey);
    }

    const endedAt = this.clock.now();
    const fare = calculateFare(ride, pricing, endedAt);
    console.log(
      `[RideService] Fare for ride ${rideId}: ${fare.total} ` +
      `(base ${fare.baseFare}, distance ${fare.distanceFare}, time ${fare.timeFare}, waiting ${fare.waitingFare})`
    );

    return this.apply(rideId, {
      type: 'complete',
      at: endedAt,
      expectedVersion: ride.version,
      fare
    });
  }

  /**
   * Cancel a ride that has not started. A bound driver is freed; only a
   * driver-initiated cancellation counts against the driver.
   */
  async cancel(
    rideId: string,
    cancelledBy: CancellationSource = CancellationSource.RIDER
  ): Promise<Ride> {
    await this.loadForTransition(rideId, 'cancel');
    return this.apply(rideId, { type: 'cancel', at: this.clock.now(), cancelledBy });
  }

  // ===========================================================================
  // PRICING
  // ===========================================================================

  async getPricing(key: string): Promise<PricingConfig> {
    const pricing = await this.store.getPricingConfig(key);
    if (!pricing) throw new NotFoundError('pricing', key);
    return pricing;
  }

  async savePricing(key: string, rates: PricingRates): Promise<PricingConfig> {
    const saved = await this.store.savePricingConfig(key, rates);
    console.log(`[RideService] Pricing "${key}" saved: ${JSON.stringify(rates)}`);
    return saved;
  }

  /**
   * Store `rates` under the configured key unless a config already exists.
   */
  async seedPricing(rates: PricingRates = DEFAULT_PRICING): Promise<PricingConfig> {
    const key = this.config.pricingConfigKey;
    const existing = await this.store.getPricingConfig(key);
    if (existing) return existing;
    return this.savePricing(key, rates);
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private async loadForTransition(rideId: string, action: RideTransitionType): Promise<Ride> {
    const ride = await this.store.getRide(rideId);
    if (!ride) throw new NotFoundError('ride', rideId);

    const allowedFrom = allowedFromStatuses(action);
    if (!allowedFrom.includes(ride.status)) {
      throw new InvalidTransitionError(rideId, action, ride.status, allowedFrom);
    }
    return ride;
  }

  private async apply(rideId: string, transition: RideTransition): Promise<Ride> {
    const result = await this.store.transitionRide(rideId, transition);
    if (!result.ok) {
      throw toError(rideId, transition.type, result);
    }

    console.log(`[RideService] Ride ${rideId} -> ${result.ride.status}`);
    return result.ride;
  }
}

/**
 * Translate a refused guarded write into the error a caller sees.
 */
function toError(
  rideId: string,
  action: RideTransitionType,
  result: Extract<GuardedWriteResult, { ok: false }>
): Error {
  const conflict: WriteConflict = result.conflict;

  if (conflict.kind === 'not_found' && conflict.entity === 'ride') {
    return new NotFoundError('ride', conflict.id);
  }
  if (conflict.kind === 'status_mismatch' && conflict.entity === 'ride' && isRideStatus(conflict.actual)) {
    return new InvalidTransitionError(rideId, action, conflict.actual, allowedFromStatuses(action));
  }

  return new ConflictError(
    `Could not ${action} ride ${rideId}: ${conflict.entity} ${conflict.id || '(none)'} ${conflict.kind}`,
    conflict
  );
}

function isRideStatus(value: unknown): value is RideStatus {
  return Object.values(RideStatus).some(status => status === value);
}
