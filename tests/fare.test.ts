import { describe, it, expect } from 'vitest';
import { RideStatus, type PricingConfig, type Ride } from '../src/models/types';
import { calculateFare, computeFare, measureTrip } from '../src/pricing/fareCalculator';
import { CITY_CENTER, kmFromCenter } from './factories';

const T0 = Date.UTC(2024, 0, 1, 8, 0, 0);
const minutes = (n: number) => new Date(T0 + n * 60000);

const pricing: PricingConfig = {
  key: 'default',
  baseFare: 50,
  perKmRate: 10,
  perMinuteRate: 2,
  perWaitMinuteRate: 1,
  updatedAt: minutes(0)
};

const createRide = (overrides: Partial<Ride> = {}): Ride => ({
  id: 'ride-1',
  riderId: 'rider-1',
  pickup: CITY_CENTER,
  dropoff: kmFromCenter(10),
  status: RideStatus.STARTED,
  driverId: 'driver-1',
  createdAt: minutes(0),
  assignedAt: minutes(1),
  arrivedAt: minutes(5),
  startedAt: minutes(7),
  endedAt: minutes(27),
  cancelledAt: null,
  cancelledBy: null,
  fare: null,
  version: 4,
  ...overrides
});

describe('Fare calculator', () => {
  it('should charge base + distance + time + waiting', () => {
    const fare = computeFare({ distanceKm: 10, durationMinutes: 20, waitMinutes: 2 }, pricing, 'default');

    expect(fare).toEqual({
      pricingKey: 'default',
      distanceKm: 10,
      durationMinutes: 20,
      waitMinutes: 2,
      baseFare: 50,
      distanceFare: 100,
      timeFare: 40,
      waitingFare: 2,
      total: 192
    });
  });

  it('should measure a ride from its coordinates and timestamps', () => {
    const metrics = measureTrip(createRide());

    expect(metrics.distanceKm).toBeCloseTo(10, 6);
    expect(metrics.durationMinutes).toBe(20);
    expect(metrics.waitMinutes).toBe(2);
    expect(calculateFare(createRide(), pricing).total).toBe(192);
  });

  it('should price at the given completion instant', () => {
    const ride = createRide({ endedAt: null });
    expect(calculateFare(ride, pricing, minutes(17)).timeFare).toBe(20);
  });

  it('should count missing timestamps as zero minutes', () => {
    const ride = createRide({ arrivedAt: null, startedAt: null, endedAt: null, dropoff: CITY_CENTER });
    expect(calculateFare(ride, pricing)).toMatchObject({
      durationMinutes: 0,
      waitMinutes: 0,
      total: 50
    });
  });

  it('should clamp negative spans to zero', () => {
    const ride = createRide({ arrivedAt: minutes(10), startedAt: minutes(7), endedAt: minutes(6) });
    const metrics = measureTrip(ride);
    expect(metrics.waitMinutes).toBe(0);
    expect(metrics.durationMinutes).toBe(0);
  });

  it('should round every component to cents', () => {
    const fare = computeFare(
      { distanceKm: 3.14159, durationMinutes: 7.5, waitMinutes: 1 / 3 },
      { baseFare: 20, perKmRate: 10, perMinuteRate: 2, perWaitMinuteRate: 1 },
      'default'
    );

    expect(fare.distanceKm).toBe(3.14);
    expect(fare.distanceFare).toBe(31.42);
    expect(fare.timeFare).toBe(15);
    expect(fare.waitingFare).toBe(0.33);
    expect(fare.total).toBe(66.75);
  });
});
