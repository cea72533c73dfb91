/**
 * Distance Utilities
 *
 * Straight-line great-circle distance between two coordinates. No road
 * network, no traffic: every distance in the service comes from here.
 */

import type { Coordinates } from '../models/types';

const EARTH_RADIUS_KM = 6371;
const KM_PER_DEGREE = EARTH_RADIUS_KM * Math.PI / 180;

// =============================================================================
// HAVERSINE FORMULA
// =============================================================================

/**
 * Calculate the great-circle distance between two coordinates.
 *
 * @returns Distance in kilometres
 *
 * @example
 * haversineDistanceKm(
 *   { lat: 12.9716, lng: 77.5946 },
 *   { lat: 12.9716, lng: 77.6046 }
 * );
 * // ≈ 1.08 km
 */
export function haversineDistanceKm(coord1: Coordinates, coord2: Coordinates): number {
  const lat1Rad = toRadians(coord1.lat);
  const lat2Rad = toRadians(coord2.lat);
  const deltaLat = toRadians(coord2.lat - coord1.lat);
  const deltaLng = toRadians(coord2.lng - coord1.lng);

  const a = Math.sin(deltaLat / 2) * Math.sin(deltaLat / 2) +
            Math.cos(lat1Rad) * Math.cos(lat2Rad) *
            Math.sin(deltaLng / 2) * Math.sin(deltaLng / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_KM * c;
}

/**
 * Move a coordinate by a north/east offset in kilometres.
 * Flat-earth approximation, fine for city-scale offsets. A pure north
 * offset of d km lands exactly d km away by haversineDistanceKm.
 */
export function offsetByKm(origin: Coordinates, northKm: number, eastKm: number): Coordinates {
  return {
    lat: origin.lat + northKm / KM_PER_DEGREE,
    lng: origin.lng + eastKm / (KM_PER_DEGREE * Math.cos(toRadians(origin.lat)))
  };
}

/**
 * Pick a uniformly distributed point within `radiusKm` of `center`.
 *
 * @param random - Source of numbers in [0, 1), injectable for reproducible runs
 */
export function randomPointWithinKm(
  center: Coordinates,
  radiusKm: number,
  random: () => number = Math.random
): Coordinates {
  const r = Math.sqrt(random()) * radiusKm;
  const theta = random() * 2 * Math.PI;
  return offsetByKm(center, r * Math.sin(theta), r * Math.cos(theta));
}

function toRadians(degrees: number): number {
  return degrees * Math.PI / 180;
}
