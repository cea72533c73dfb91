/**
 * AllocationDispatcher - Nearest eligible driver for each pending ride
 *
 * KEY DESIGN DECISIONS:
 *
 * 1. Expanding Radius: Search the smallest ring first (1 km by default) and
 *    grow it until an eligible driver shows up or the ceiling is reached.
 *    The last ring is clamped to the ceiling, so the ceiling is always
 *    searched.
 *
 * 2. Nearest Wins: Among eligible drivers in a ring the closest one is
 *    chosen. Equal distances go to the lowest driver id.
 *
 * 3. Guarded Assignment: The choice is written with `tryAssign`, which
 *    only succeeds if the ride is still pending and the driver still idle.
 *    Other actors (riders cancelling, the API) write to the same records.
 *
 * 4. Bounded Retry: A lost race is retried once at the same radius with a
 *    fresh candidate list. A second loss moves on to the next ring; the
 *    next scheduler tick picks up whatever is left.
 *
 * 5. Abort Check: The ride is re-read at the top of every iteration; once
 *    it is no longer pending (cancelled, assigned elsewhere) the search
 *    stops.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  DriverStatus,
  RideStatus,
  type DispatchConfig,
  type DriverCandidate
} from '../models/types';
import { compareIds, type EntityStore } from '../store/EntityStore';
import { EligibilityFilter, type ExclusionStats } from './EligibilityFilter';
import { DEFAULT_DISPATCH_CONFIG } from '../config/config';
import { systemClock, type Clock } from '../utils/clock';

// =============================================================================
// RESULT TYPES
// =============================================================================

/**
 * What one iteration of the search saw.
 */
export interface RadiusReport {
  radiusKm: number;
  candidates: number;
  eligible: number;
  excluded: ExclusionStats;
}

interface OutcomeBase {
  rideId: string;
  /** tryAssign calls made */
  attempts: number;
  /** tryAssign calls lost to a concurrent writer */
  conflicts: number;
  radii: RadiusReport[];
}

export type DispatchOutcome =
  | (OutcomeBase & { status: 'assigned'; driverId: string; distanceKm: number; radiusKm: number })
  | (OutcomeBase & { status: 'exhausted'; maxRadiusKm: number })
  | (OutcomeBase & { status: 'aborted'; rideStatus: RideStatus | null });

export interface DispatchFailure {
  rideId: string;
  message: string;
}

/**
 * Summary of one dispatch pass over all pending rides.
 */
export interface DispatchPassSummary {
  passId: string;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  pendingRides: number;
  assigned: number;
  exhausted: number;
  aborted: number;
  failed: number;
  outcomes: DispatchOutcome[];
  failures: DispatchFailure[];
}

export interface AllocationDispatcherOptions {
  config?: DispatchConfig;
  clock?: Clock;
  filter?: EligibilityFilter;
}

// =============================================================================
// DISPATCHER
// =============================================================================

export class AllocationDispatcher {
  private readonly store: EntityStore;
  private readonly config: DispatchConfig;
  private readonly clock: Clock;
  private readonly filter: EligibilityFilter;

  constructor(store: EntityStore, options: AllocationDispatcherOptions = {}) {
    this.store = store;
    this.config = options.config ?? DEFAULT_DISPATCH_CONFIG;
    this.clock = options.clock ?? systemClock;
    this.filter = options.filter ?? new EligibilityFilter(this.config);
  }

  // ===========================================================================
  // DISPATCH PASS
  // ===========================================================================

  /**
   * Run the dispatcher over every pending ride, oldest first.
   *
   * One ride's failure is logged and recorded; it never stops the pass.
   */
  async dispatchPending(): Promise<DispatchPassSummary> {
    const startedAt = this.clock.now();
    const startMs = Date.now();
    const pending = await this.store.listPendingRides();

    console.log(`[AllocationDispatcher] Found ${pending.length} unassigned rides`);

    const outcomes: DispatchOutcome[] = [];
    const failures: DispatchFailure[] = [];

    for (const ride of pending) {
      try {
        outcomes.push(await this.dispatchRide(ride.id));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[AllocationDispatcher] Dispatch failed for ride ${ride.id}:`, error);
        failures.push({ rideId: ride.id, message });
      }
    }

    const summary: DispatchPassSummary = {
      passId: uuidv4(),
      startedAt,
      finishedAt: this.clock.now(),
      durationMs: Date.now() - startMs,
      pendingRides: pending.length,
      assigned: outcomes.filter(o => o.status === 'assigned').length,
      exhausted: outcomes.filter(o => o.status === 'exhausted').length,
      aborted: outcomes.filter(o => o.status === 'aborted').length,
      failed: failures.length,
      outcomes,
      failures
    };

    console.log(
      `[AllocationDispatcher] Pass complete: ${summary.assigned} assigned, ` +
      `${summary.exhausted} unmatched, ${summary.aborted} aborted, ${summary.failed} failed`
    );

    return summary;
  }

  // ===========================================================================
  // SINGLE RIDE
  // ===========================================================================

  /**
   * Expanding-radius search for one ride.
   */
  async dispatchRide(rideId: string): Promise<DispatchOutcome> {
    const radii: RadiusReport[] = [];
    let attempts = 0;
    let conflicts = 0;

    for (const radiusKm of this.searchRadii()) {
      let retriedAtRadius = false;

      for (;;) {
        const ride = await this.store.getRide(rideId);
        if (!ride || ride.status !== RideStatus.CREATE_RIDE) {
          console.log(
            `[AllocationDispatcher] Ride ${rideId} is ${ride?.status ?? 'missing'}, stopping search`
          );
          return { status: 'aborted', rideId, rideStatus: ride?.status ?? null, attempts, conflicts, radii };
        }

        const candidates = await this.store.listDriversWithin(ride.pickup, radiusKm);
        const now = this.clock.now();
        const { eligible, excluded } = this.filter.partition(ride, candidates, now);

        radii.push({ radiusKm, candidates: candidates.length, eligible: eligible.length, excluded });
        console.log(
          `[AllocationDispatcher] Ride ${rideId} - Radius ${radiusKm} km - ` +
          `${candidates.length} idle, ${eligible.length} eligible, excluded ${JSON.stringify(excluded)}`
        );

        const chosen = selectNearest(eligible);
        if (!chosen) break;

        attempts += 1;
        const result = await this.store.tryAssign(
          ride.id,
          chosen.driver.id,
          RideStatus.CREATE_RIDE,
          DriverStatus.IDLE,
          now
        );

        if (result.ok) {
          console.log(
            `[AllocationDispatcher] Assigned driver ${chosen.driver.id} to ride ${rideId} ` +
            `at ${chosen.distanceKm.toFixed(2)} km (radius ${radiusKm} km)`
          );
          return {
            status: 'assigned',
            rideId,
            driverId: chosen.driver.id,
            distanceKm: chosen.distanceKm,
            radiusKm,
            attempts,
            conflicts,
            radii
          };
        }

        conflicts += 1;
        const { conflict } = result;
        console.log(
          `[AllocationDispatcher] Lost race for ride ${rideId} on ${conflict.entity} ` +
          `${conflict.id} (${conflict.kind})`
        );

        if (retriedAtRadius) break;
        retriedAtRadius = true;
      }
    }

    console.warn(
      `[AllocationDispatcher] No eligible driver for ride ${rideId} within ${this.config.maxRadiusKm} km`
    );
    return { status: 'exhausted', rideId, maxRadiusKm: this.config.maxRadiusKm, attempts, conflicts, radii };
  }

  /**
   * Radii to search, in order: initial, initial + step, ... and finally
   * the ceiling itself.
   */
  searchRadii(): number[] {
    const { initialRadiusKm, radiusIncrementKm, maxRadiusKm } = this.config;
    const radii: number[] = [];

    for (let radius = initialRadiusKm; radius < maxRadiusKm; radius += radiusIncrementKm) {
      radii.push(radius);
    }
    radii.push(maxRadiusKm);

    return radii;
  }
}

/**
 * Closest candidate, ties broken by lowest driver id.
 */
export function selectNearest<T extends DriverCandidate>(candidates: T[]): T | null {
  let best: T | null = null;
  for (const candidate of candidates) {
    if (
      best === null ||
      candidate.distanceKm < best.distanceKm ||
      (candidate.distanceKm === best.distanceKm && compareIds(candidate.driver.id, best.driver.id) < 0)
    ) {
      best = candidate;
    }
  }
  return best;
}
