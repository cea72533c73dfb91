import { z } from 'zod';

// =============================================================================
// ENUMS & CONSTANTS
// =============================================================================

/**
 * Lifecycle states of a ride.
 *
 * create_ride → assigned → driver_arrived → started → completed
 *
 * `cancelled` is reachable from create_ride, assigned and driver_arrived.
 * Once a ride has started it must reach completed.
 */
export enum RideStatus {
  CREATE_RIDE = 'create_ride',
  ASSIGNED = 'assigned',
  DRIVER_ARRIVED = 'driver_arrived',
  STARTED = 'started',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled'
}

/**
 * Availability of a driver.
 * A driver in ASSIGNED or ON_TRIP holds exactly one active ride.
 */
export enum DriverStatus {
  IDLE = 'idle',
  ASSIGNED = 'assigned',
  ON_TRIP = 'on_trip'
}

/**
 * Outcome recorded in a driver's history once a ride leaves their hands.
 */
export enum RideOutcome {
  COMPLETED = 'completed',
  CANCELLED = 'cancelled'
}

/**
 * Who asked for a cancellation. Only DRIVER cancellations count against
 * the driver's eligibility.
 */
export enum CancellationSource {
  RIDER = 'rider',
  DRIVER = 'driver',
  SYSTEM = 'system'
}

/**
 * Reason codes reported by the eligibility filter.
 */
export enum EligibilityReason {
  ELIGIBLE = 'eligible',
  DRIVER_NOT_IDLE = 'driver_not_idle',
  RECENT_RIDE_WITH_RIDER = 'recent_ride_with_rider',
  RECENT_CANCELLATIONS = 'recent_cancellations'
}

// =============================================================================
// LOCATION TYPES
// =============================================================================

/**
 * Geographic coordinates (latitude/longitude).
 */
export interface Coordinates {
  lat: number;
  lng: number;
}

// =============================================================================
// RIDER TYPES
// =============================================================================

export interface Rider {
  id: string;
  name: string;
  home: Coordinates;
  createdAt: Date;
}

export interface NewRider {
  id?: string;
  name: string;
  home: Coordinates;
}

// =============================================================================
// DRIVER TYPES
// =============================================================================

/**
 * One entry of a driver's bounded outcome ring.
 */
export interface RideOutcomeRecord {
  rideId: string;
  riderId: string;
  outcome: RideOutcome;
  at: Date;
}

/**
 * Everything the eligibility rules need to know about a driver's past.
 *
 * recentOutcomes is capped (oldest dropped first, newest last), and
 * lastCompletionByRider only keeps completions still inside the
 * same-rider cooldown window.
 */
export interface DriverHistory {
  recentOutcomes: RideOutcomeRecord[];
  lastCompletionByRider: Record<string, Date>;
  completedRides: number;
  cancelledRides: number;
}

export interface Driver {
  id: string;
  name: string;
  location: Coordinates;
  status: DriverStatus;
  activeRideId: string | null;
  history: DriverHistory;
  createdAt: Date;
  /** Incremented on every successful write */
  version: number;
}

export interface NewDriver {
  id?: string;
  name: string;
  location: Coordinates;
}

/**
 * An idle driver returned by a radius query, with its distance to the
 * query centre.
 */
export interface DriverCandidate {
  driver: Driver;
  distanceKm: number;
}

// =============================================================================
// RIDE TYPES
// =============================================================================

/**
 * Fare components as stored on a completed ride.
 */
export interface FareBreakdown {
  pricingKey: string;
  distanceKm: number;
  durationMinutes: number;
  waitMinutes: number;
  baseFare: number;
  distanceFare: number;
  timeFare: number;
  waitingFare: number;
  total: number;
}

export interface Ride {
  id: string;
  riderId: string;
  pickup: Coordinates;
  dropoff: Coordinates;
  status: RideStatus;
  driverId: string | null;

  createdAt: Date;
  assignedAt: Date | null;
  arrivedAt: Date | null;
  startedAt: Date | null;
  endedAt: Date | null;
  cancelledAt: Date | null;
  cancelledBy: CancellationSource | null;

  /** Set exactly once, when the ride completes */
  fare: FareBreakdown | null;

  /** Incremented on every successful write */
  version: number;
}

export interface NewRide {
  id?: string;
  riderId: string;
  pickup: Coordinates;
  dropoff: Coordinates;
  createdAt?: Date;
}

// =============================================================================
// PRICING TYPES
// =============================================================================

/**
 * The four rates a fare is built from.
 */
export interface PricingRates {
  baseFare: number;
  perKmRate: number;
  perMinuteRate: number;
  perWaitMinuteRate: number;
}

/**
 * A stored pricing configuration, looked up by key at completion time.
 */
export interface PricingConfig extends PricingRates {
  key: string;
  updatedAt: Date;
}

// =============================================================================
// DISPATCH CONFIGURATION
// =============================================================================

/**
 * Tunables for the dispatcher, the scheduler and the eligibility rules.
 */
export interface DispatchConfig {
  /** Radius of the first search ring */
  initialRadiusKm: number;

  /** How much the radius grows when a ring has no eligible driver */
  radiusIncrementKm: number;

  /** Largest radius searched; the last ring is clamped to it */
  maxRadiusKm: number;

  /** Scheduler cadence */
  dispatchIntervalMs: number;

  /** A driver may not serve the same rider again within this window */
  sameRiderCooldownMinutes: number;

  /** Drivers whose last N outcomes are all cancellations are skipped */
  maxConsecutiveCancellations: number;

  /** Size of each driver's outcome ring */
  historyCapacity: number;

  /** Pricing config used when a ride completes */
  pricingConfigKey: string;
}

// =============================================================================
// API REQUEST/RESPONSE TYPES
// =============================================================================

/**
 * Error payload shared by every failed API response.
 */
export interface ApiError {
  code: string;
  message: string;
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

// =============================================================================
// ZOD VALIDATION SCHEMAS
// =============================================================================

export const CoordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180)
});

export const NewRiderSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  home: CoordinatesSchema
});

export const NewDriverSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  location: CoordinatesSchema
});

export const NewRideSchema = z.object({
  id: z.string().min(1).optional(),
  riderId: z.string().min(1),
  pickup: CoordinatesSchema,
  dropoff: CoordinatesSchema
});

export const CancelRideSchema = z.object({
  cancelledBy: z.nativeEnum(CancellationSource).default(CancellationSource.RIDER)
});

export const PricingRatesSchema = z.object({
  baseFare: z.number().min(0),
  perKmRate: z.number().min(0),
  perMinuteRate: z.number().min(0),
  perWaitMinuteRate: z.number().min(0)
});

export const RideStatusQuerySchema = z.object({
  status: z.nativeEnum(RideStatus).optional()
});

// =============================================================================
// UTILITY FUNCTIONS
// =============================================================================

/**
 * Minutes between two instants, or 0 when either is missing.
 * Negative spans (clock skew) are clamped to 0.
 */
export function minutesBetween(from: Date | null, to: Date | null): number {
  if (!from || !to) return 0;
  return Math.max(0, (to.getTime() - from.getTime()) / 60000);
}
