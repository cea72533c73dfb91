/**
 * Simulator - End-to-end run of the dispatch loop on simulated time
 *
 * Seeds pricing, places riders and drivers at random around a city centre
 * and plans one or two rides per rider per simulated day. The clock moves
 * forward to each request; every request is followed by a dispatch pass and
 * by walking the assigned rides through arrival, start and completion.
 * Leftover rides get further rounds until nothing more can be assigned.
 *
 * Randomness and time are injected, so a seeded random source and a
 * ManualClock give the same run every time.
 */

import { RideStatus, type Coordinates, type DispatchConfig, type PricingRates } from '../models/types';
import { InMemoryEntityStore } from '../store/InMemoryEntityStore';
import { AllocationDispatcher, type DispatchPassSummary } from '../matchers/AllocationDispatcher';
import { RideService } from '../services/RideService';
import { MetricsService, type MetricsSummary } from '../services/MetricsService';
import { DEFAULT_DISPATCH_CONFIG, DEFAULT_PRICING } from '../config/config';
import { haversineDistanceKm, randomPointWithinKm } from '../utils/geo';
import { ManualClock } from '../utils/clock';
import { compareIds } from '../store/EntityStore';

export interface SimulationOptions {
  riders: number;
  drivers: number;
  days: number;
  cityCenter: Coordinates;
  cityRadiusKm: number;
  /** Pickups fall within this distance of the rider's home */
  pickupRadiusKm: number;
  /** Drop-offs fall within this distance of the rider's home */
  dropoffRadiusKm: number;
  averageSpeedKmh: number;
  /** Upper bound on dispatch/walk rounds */
  maxRounds: number;
}

export const DEFAULT_SIMULATION_OPTIONS: SimulationOptions = {
  riders: 10,
  drivers: 15,
  days: 2,
  cityCenter: { lat: 12.9716, lng: 77.5946 },
  cityRadiusKm: 20,
  pickupRadiusKm: 5,
  dropoffRadiusKm: 10,
  averageSpeedKmh: 30,
  maxRounds: 50
};

export interface SimulationResult {
  ridesRequested: number;
  /** Rounds run after the last request */
  rounds: number;
  passes: DispatchPassSummary[];
  metrics: MetricsSummary;
}

interface PlannedRide {
  id: string;
  riderId: string;
  pickup: Coordinates;
  dropoff: Coordinates;
  requestedAt: Date;
}

export interface SimulatorDependencies {
  random?: () => number;
  clock?: ManualClock;
  config?: DispatchConfig;
  pricing?: PricingRates;
}

export class Simulator {
  private readonly options: SimulationOptions;
  private readonly random: () => number;
  private readonly clock: ManualClock;
  private readonly config: DispatchConfig;
  private readonly pricing: PricingRates;

  readonly store: InMemoryEntityStore;
  private readonly dispatcher: AllocationDispatcher;
  private readonly rides: RideService;
  private readonly metrics: MetricsService;

  constructor(options: Partial<SimulationOptions> = {}, deps: SimulatorDependencies = {}) {
    this.options = { ...DEFAULT_SIMULATION_OPTIONS, ...options };
    this.random = deps.random ?? Math.random;
    this.clock = deps.clock ?? new ManualClock();
    this.config = deps.config ?? DEFAULT_DISPATCH_CONFIG;
    this.pricing = deps.pricing ?? DEFAULT_PRICING;

    this.store = new InMemoryEntityStore({ clock: this.clock, config: this.config });
    this.dispatcher = new AllocationDispatcher(this.store, { config: this.config, clock: this.clock });
    this.rides = new RideService(this.store, { config: this.config, clock: this.clock });
    this.metrics = new MetricsService(this.store);
  }

  async run(): Promise<SimulationResult> {
    console.log('[Simulator] ========== STARTING SIMULATION ==========');

    await this.rides.seedPricing(this.pricing);
    await this.seedUsers();
    const requests = await this.planRides();

    const passes: DispatchPassSummary[] = [];

    // Each request lands when the clock reaches it, followed by a round
    for (const request of requests) {
      this.clock.advanceTo(request.requestedAt);
      await this.store.createRide({
        id: request.id,
        riderId: request.riderId,
        pickup: request.pickup,
        dropoff: request.dropoff
      });
      await this.runRound(passes);
    }

    // Drain what is still pending once the requests stop
    let rounds = 0;
    while (rounds < this.options.maxRounds) {
      rounds += 1;
      if (!(await this.runRound(passes))) break;
    }

    const metrics = await this.metrics.summarize(this.clock.now());
    console.log(
      `[Simulator] ========== SIMULATION COMPLETED: ${metrics.completedRides}/${requests.length} ` +
      `rides completed, ${metrics.unmatchedRides} unmatched, ${rounds} rounds ==========`
    );

    return { ridesRequested: requests.length, rounds, passes, metrics };
  }

  /**
   * One dispatch pass, then every assigned ride walked to completion.
   * @returns whether the pass assigned anything
   */
  private async runRound(passes: DispatchPassSummary[]): Promise<boolean> {
    const summary = await this.dispatcher.dispatchPending();
    passes.push(summary);

    if (summary.assigned === 0) return false;
    await this.walkAssignedRides();
    return true;
  }

  // ===========================================================================
  // SEEDING
  // ===========================================================================

  private async seedUsers(): Promise<void> {
    const { riders, drivers, cityCenter, cityRadiusKm } = this.options;

    for (let i = 1; i <= riders; i++) {
      await this.rides.registerRider({
        id: `rider-${pad(i)}`,
        name: `Rider${i}`,
        home: randomPointWithinKm(cityCenter, cityRadiusKm, this.random)
      });
    }
    for (let i = 1; i <= drivers; i++) {
      await this.rides.registerDriver({
        id: `driver-${pad(i)}`,
        name: `Driver${i}`,
        location: randomPointWithinKm(cityCenter, cityRadiusKm, this.random)
      });
    }

    console.log(`[Simulator] Created ${riders} riders and ${drivers} drivers`);
  }

  /**
   * One or two requests per rider per day, at a random second of that day,
   * returned in the order they happen.
   */
  private async planRides(): Promise<PlannedRide[]> {
    const riders = await this.store.listRiders();
    const dayStart = this.clock.now().getTime();
    const planned: PlannedRide[] = [];

    for (let day = 0; day < this.options.days; day++) {
      let dayRides = 0;

      for (const rider of riders) {
        const requests = this.randomInt(1, 2);
        for (let n = 0; n < requests; n++) {
          const offsetSeconds = day * 86400 + this.randomInt(0, 86400);
          planned.push({
            id: `ride-${pad(planned.length + 1)}`,
            riderId: rider.id,
            pickup: randomPointWithinKm(rider.home, this.options.pickupRadiusKm, this.random),
            dropoff: randomPointWithinKm(rider.home, this.options.dropoffRadiusKm, this.random),
            requestedAt: new Date(dayStart + offsetSeconds * 1000)
          });
          dayRides += 1;
        }
      }

      console.log(`[Simulator] Planned ${dayRides} rides for day ${day + 1}`);
    }

    return planned.sort((a, b) =>
      a.requestedAt.getTime() - b.requestedAt.getTime() || compareIds(a.id, b.id)
    );
  }

  // ===========================================================================
  // RIDE FLOW
  // ===========================================================================

  /**
   * Drive every assigned ride to completion: the driver reaches the pickup
   * after 2-5 minutes, waits 1-3 minutes, then drives the straight-line
   * distance at the average speed.
   */
  private async walkAssignedRides(): Promise<void> {
    const assigned = await this.store.listRides({ status: RideStatus.ASSIGNED });

    for (const ride of assigned) {
      this.clock.advanceMinutes(this.randomInt(2, 5));
      await this.rides.arrive(ride.id);

      this.clock.advanceMinutes(this.randomInt(1, 3));
      await this.rides.start(ride.id);

      const distanceKm = haversineDistanceKm(ride.pickup, ride.dropoff);
      this.clock.advanceMs(Math.round((distanceKm / this.options.averageSpeedKmh) * 3_600_000));
      await this.rides.end(ride.id);
    }
  }

  private randomInt(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }
}

function pad(n: number): string {
  return n.toString().padStart(4, '0');
}
