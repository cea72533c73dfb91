/**
 * Test data factories shared by the suites.
 *
 * Positions are expressed as kilometre offsets from one city centre so a
 * test reads as "driver 1.5 km north of the pickup" rather than raw
 * coordinates.
 */

import type { Coordinates, Driver, Ride, Rider } from '../src/models/types';
import { InMemoryEntityStore } from '../src/store/InMemoryEntityStore';
import { offsetByKm } from '../src/utils/geo';
import { ManualClock } from '../src/utils/clock';
import { DEFAULT_DISPATCH_CONFIG } from '../src/config/config';

export const CITY_CENTER: Coordinates = { lat: 12.9716, lng: 77.5946 };

/**
 * A point `northKm` north (and optionally `eastKm` east) of the city centre.
 */
export const kmFromCenter = (northKm: number, eastKm = 0): Coordinates =>
  offsetByKm(CITY_CENTER, northKm, eastKm);

export const createTestContext = (clock: ManualClock = new ManualClock()) => ({
  clock,
  store: new InMemoryEntityStore({ clock, config: DEFAULT_DISPATCH_CONFIG })
});

export const createRider = (
  store: InMemoryEntityStore,
  id = 'rider-1',
  home: Coordinates = CITY_CENTER
): Promise<Rider> => store.createRider({ id, name: `Rider ${id}`, home });

export const createDriver = (
  store: InMemoryEntityStore,
  id: string,
  location: Coordinates = CITY_CENTER
): Promise<Driver> => store.createDriver({ id, name: `Driver ${id}`, location });

export const createRide = (
  store: InMemoryEntityStore,
  overrides: { id?: string; riderId?: string; pickup?: Coordinates; dropoff?: Coordinates; createdAt?: Date } = {}
): Promise<Ride> =>
  store.createRide({
    id: overrides.id ?? 'ride-1',
    riderId: overrides.riderId ?? 'rider-1',
    pickup: overrides.pickup ?? CITY_CENTER,
    dropoff: overrides.dropoff ?? kmFromCenter(5),
    createdAt: overrides.createdAt
  });

/**
 * Deterministic stand-in for Math.random (linear congruential generator).
 */
export const seededRandom = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
};
