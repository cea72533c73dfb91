import { RideStatus, minutesBetween, type Ride } from '../models/types';
import { compareIds, type EntityStore } from '../store/EntityStore';
import type { DispatchScheduler, SchedulerStats } from '../scheduler/DispatchScheduler';

// =============================================================================
// SUMMARY TYPES
// =============================================================================

export interface DriverMetrics {
  driverId: string;
  name: string;
  status: string;
  completedRides: number;
  cancelledRides: number;
  totalFare: number;
  averageFare: number;
  averageWaitMinutes: number;
  averageDurationMinutes: number;
}

export interface MetricsSummary {
  generatedAt: Date;
  totalRides: number;
  ridesByStatus: Record<RideStatus, number>;
  unmatchedRides: number;
  completedRides: number;
  cancelledRides: number;
  /** Driver arrival to ride start, completed rides only */
  averageWaitMinutes: number;
  /** Ride start to completion, completed rides only */
  averageDurationMinutes: number;
  totalFare: number;
  averageFare: number;
  drivers: DriverMetrics[];
  dispatch: SchedulerStats | null;
}

// =============================================================================
// METRICS SERVICE
// =============================================================================

/**
 * Read-only aggregates over the store. Nothing here writes.
 */
export class MetricsService {
  constructor(
    private readonly store: EntityStore,
    private readonly scheduler: DispatchScheduler | null = null
  ) {}

  async summarize(now: Date = new Date()): Promise<MetricsSummary> {
    const [rides, drivers] = await Promise.all([
      this.store.listRides(),
      this.store.listDrivers()
    ]);

    const ridesByStatus = emptyStatusCounts();
    for (const ride of rides) {
      ridesByStatus[ride.status] += 1;
    }

    const completed = rides.filter(r => r.status === RideStatus.COMPLETED);
    const totalFare = sumFares(completed);

    const driverMetrics: DriverMetrics[] = drivers
      .map(driver => {
        const own = completed.filter(r => r.driverId === driver.id);
        const fare = sumFares(own);
        return {
          driverId: driver.id,
          name: driver.name,
          status: driver.status,
          completedRides: own.length,
          cancelledRides: driver.history.cancelledRides,
          totalFare: fare,
          averageFare: average(fare, own.length),
          averageWaitMinutes: averageOf(own, waitMinutes),
          averageDurationMinutes: averageOf(own, durationMinutes)
        };
      })
      .sort((a, b) => b.completedRides - a.completedRides || compareIds(a.driverId, b.driverId));

    return {
      generatedAt: now,
      totalRides: rides.length,
      ridesByStatus,
      unmatchedRides: ridesByStatus[RideStatus.CREATE_RIDE],
      completedRides: completed.length,
      cancelledRides: ridesByStatus[RideStatus.CANCELLED],
      averageWaitMinutes: averageOf(completed, waitMinutes),
      averageDurationMinutes: averageOf(completed, durationMinutes),
      totalFare,
      averageFare: average(totalFare, completed.length),
      drivers: driverMetrics,
      dispatch: this.scheduler ? this.scheduler.getStats() : null
    };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function emptyStatusCounts(): Record<RideStatus, number> {
  return {
    [RideStatus.CREATE_RIDE]: 0,
    [RideStatus.ASSIGNED]: 0,
    [RideStatus.DRIVER_ARRIVED]: 0,
    [RideStatus.STARTED]: 0,
    [RideStatus.COMPLETED]: 0,
    [RideStatus.CANCELLED]: 0
  };
}

function waitMinutes(ride: Ride): number {
  return minutesBetween(ride.arrivedAt, ride.startedAt);
}

function durationMinutes(ride: Ride): number {
  return minutesBetween(ride.startedAt, ride.endedAt);
}

function sumFares(rides: Ride[]): number {
  return round2(rides.reduce((sum, r) => sum + (r.fare?.total ?? 0), 0));
}

function averageOf(rides: Ride[], measure: (ride: Ride) => number): number {
  return average(rides.reduce((sum, r) => sum + measure(r), 0), rides.length);
}

function average(total: number, count: number): number {
  return count === 0 ? 0 : round2(total / count);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
