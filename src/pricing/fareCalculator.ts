import {
  minutesBetween,
  type FareBreakdown,
  type PricingConfig,
  type PricingRates,
  type Ride
} from '../models/types';
import { haversineDistanceKm } from '../utils/geo';

// =============================================================================
// FARE CALCULATION
// =============================================================================

/**
 * Measured quantities a fare is charged on.
 */
export interface TripMetrics {
  distanceKm: number;
  durationMinutes: number;
  waitMinutes: number;
}

/**
 * fare = base + km x perKm + ride minutes x perMinute + wait minutes x perWaitMinute
 *
 * Each component and the total are rounded to cents. The total is rounded
 * from the unrounded sum, so it can differ from the sum of the rounded
 * components by a cent.
 */
export function computeFare(
  metrics: TripMetrics,
  rates: PricingRates,
  pricingKey: string
): FareBreakdown {
  const distanceFare = metrics.distanceKm * rates.perKmRate;
  const timeFare = metrics.durationMinutes * rates.perMinuteRate;
  const waitingFare = metrics.waitMinutes * rates.perWaitMinuteRate;
  const total = rates.baseFare + distanceFare + timeFare + waitingFare;

  return {
    pricingKey,
    distanceKm: roundTo2(metrics.distanceKm),
    durationMinutes: roundTo2(metrics.durationMinutes),
    waitMinutes: roundTo2(metrics.waitMinutes),
    baseFare: roundTo2(rates.baseFare),
    distanceFare: roundTo2(distanceFare),
    timeFare: roundTo2(timeFare),
    waitingFare: roundTo2(waitingFare),
    total: roundTo2(total)
  };
}

/**
 * Trip metrics of a ride as recorded by its timestamps.
 * Missing timestamps count as zero minutes.
 *
 * @param endedAt - Completion instant; the ride's own endedAt is used when omitted
 */
export function measureTrip(ride: Ride, endedAt: Date | null = ride.endedAt): TripMetrics {
  return {
    distanceKm: haversineDistanceKm(ride.pickup, ride.dropoff),
    durationMinutes: minutesBetween(ride.startedAt, endedAt),
    waitMinutes: minutesBetween(ride.arrivedAt, ride.startedAt)
  };
}

/**
 * Fare of a ride ending at `endedAt` under the given pricing config.
 */
export function calculateFare(
  ride: Ride,
  pricing: PricingConfig,
  endedAt: Date | null = ride.endedAt
): FareBreakdown {
  return computeFare(measureTrip(ride, endedAt), pricing, pricing.key);
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}
