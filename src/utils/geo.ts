/**
 * Distance helpers.
 *
 * Matching only needs a ranking of drivers by how far they are from the
 * pickup point, so the crow-flies Haversine distance is enough; no routing
 * API is involved.
 */

import type { Coordinates } from '../models/types';

const EARTH_RADIUS_MILES = 3959;

/**
 * Calculate the straight-line distance between two coordinates.
 * Uses the Haversine formula which accounts for Earth's curvature.
 *
 * @returns Distance in miles (straight line, not road distance)
 *
 * @example
 * haversineDistance({ lat: 0, lng: 0 }, { lat: 0, lng: 0.1 });
 * // ≈ 6.91 miles
 */
export function haversineDistance(coord1: Coordinates, coord2: Coordinates): number {
  const lat1Rad = coord1.lat * Math.PI / 180;
  const lat2Rad = coord2.lat * Math.PI / 180;
  const deltaLat = (coord2.lat - coord1.lat) * Math.PI / 180;
  const deltaLng = (coord2.lng - coord1.lng) * Math.PI / 180;

  const a = Math.sin(deltaLat / 2) * Math.sin(deltaLat / 2) +
            Math.cos(lat1Rad) * Math.cos(lat2Rad) *
            Math.sin(deltaLng / 2) * Math.sin(deltaLng / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_MILES * c;
}
