/**
 * =============================================================================
 * GEOSPATIAL UTILITIES - Haversine Distance Calculations
 * =============================================================================
 *
 * Pure functions, no I/O. Used by address matching (meters) and the
 * nearby-restaurant feed (kilometers, bounding box prefilter).
 * =============================================================================
 */

/**
 * Earth's radius constants
 */
export const EARTH_RADIUS = {
  KM: 6371,
  METERS: 6371000,
};

/**
 * Approximate kilometers per degree of latitude
 */
export const KM_PER_DEGREE = 111;

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

/**
 * Great-circle distance between two points using the Haversine formula
 *
 * @returns Distance in kilometers
 */
export function haversineDistanceKm(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(lat1)) *
      Math.cos(toRadians(lat2)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS.KM * c;
}

/**
 * Distance in meters (for proximity checks)
 */
export function haversineDistanceMeters(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  return haversineDistanceKm(lat1, lon1, lat2, lon2) * 1000;
}

/**
 * Square prefilter of ±radiusKm/111 degrees on both axes.
 * Longitude degrees shrink away from the equator, so callers must still
 * apply the exact distance check to the candidates.
 */
export function boundingBox(lat: number, lon: number, radiusKm: number): BoundingBox {
  const delta = radiusKm / KM_PER_DEGREE;
  return {
    minLat: lat - delta,
    maxLat: lat + delta,
    minLon: lon - delta,
    maxLon: lon + delta,
  };
}

/**
 * Point dx meters east and dy meters north of (lat, lon).
 * Flat-earth approximation, fine for a few kilometers.
 */
export function offsetByMeters(
  lat: number,
  lon: number,
  dxMeters: number,
  dyMeters: number
): { latitude: number; longitude: number } {
  const metersPerDegree = KM_PER_DEGREE * 1000;
  return {
    latitude: lat + dyMeters / metersPerDegree,
    longitude: lon + dxMeters / (metersPerDegree * Math.cos(toRadians(lat))),
  };
}

/**
 * Convert degrees to radians
 */
function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}
