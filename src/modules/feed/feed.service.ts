/**
 * =============================================================================
 * FEED MODULE - SERVICE
 * =============================================================================
 *
 * Home feed: open restaurants near a point plus the categories they use.
 *
 * COORDINATES:
 * - An explicit lat/lon pair wins; a malformed pair means "no coordinates"
 *   (the email is not consulted then)
 * - Otherwise the user's resolved location, if the email is known
 *
 * NEARBY (with coordinates):
 * - Bounding-box prefilter of ±radiusKm/111 degrees in the store
 * - Exact Haversine distance, keep distance <= radiusKm
 * - Sort by distance, then rating (highest first), cut to maxResults
 * - Categories: those of the returned restaurants, by name
 *
 * Without coordinates: open restaurants in insertion order up to
 * maxResults, and every category.
 * =============================================================================
 */

import { getStore } from '../../shared/database/db';
import type { Category, Restaurant } from '../../shared/database/entities';
import { boundingBox, haversineDistanceKm } from '../../shared/utils/geospatial.utils';
import { locationService, Coordinates } from '../location/location.service';
import { userService } from '../user/user.service';

export const DEFAULT_RADIUS_KM = 10;
export const MAX_FEED_RESTAURANTS = 40;

export interface FeedRequest {
  lat?: string;
  lon?: string;
  radiusKm?: number;
  email?: string;
  maxResults?: number;
}

export interface FeedEntry {
  restaurant: Restaurant;
  /** Present when the feed was computed around a point */
  distanceKm?: number;
}

export interface Feed {
  origin: Coordinates | null;
  categories: Category[];
  restaurants: FeedEntry[];
}

/**
 * Both values must parse as finite numbers
 */
export function parseCoordinatePair(lat: string, lon: string): Coordinates | null {
  const latitude = Number(lat.trim());
  const longitude = Number(lon.trim());
  if (!lat.trim() || !lon.trim() || !Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    return null;
  }
  return { latitude, longitude };
}

/**
 * Pure ranking step, exported for tests
 */
export function rankNearby(
  origin: Coordinates,
  candidates: Restaurant[],
  radiusKm: number,
  maxResults: number
): FeedEntry[] {
  return candidates
    .map(restaurant => ({
      restaurant,
      distanceKm: haversineDistanceKm(origin.latitude, origin.longitude, restaurant.latitude, restaurant.longitude)
    }))
    .filter(entry => entry.distanceKm <= radiusKm)
    .sort((a, b) => a.distanceKm - b.distanceKm || Number(b.restaurant.rating) - Number(a.restaurant.rating))
    .slice(0, maxResults);
}

class FeedService {
  async resolveOrigin(request: FeedRequest): Promise<Coordinates | null> {
    if (request.lat && request.lon) {
      return parseCoordinatePair(request.lat, request.lon);
    }
    if (request.email) {
      const user = await userService.findByEmail(request.email);
      return user ? locationService.resolveForUser(user) : null;
    }
    return null;
  }

  async feed(request: FeedRequest): Promise<Feed> {
    const radiusKm = request.radiusKm ?? DEFAULT_RADIUS_KM;
    const maxResults = request.maxResults ?? MAX_FEED_RESTAURANTS;
    const repos = getStore().repos;
    const origin = await this.resolveOrigin(request);

    if (!origin) {
      const [restaurants, categories] = await Promise.all([
        repos.restaurants.listOpen(maxResults),
        repos.categories.list()
      ]);
      return { origin: null, categories, restaurants: restaurants.map(restaurant => ({ restaurant })) };
    }

    const candidates = await repos.restaurants.listOpenWithin(
      boundingBox(origin.latitude, origin.longitude, radiusKm)
    );
    const restaurants = rankNearby(origin, candidates, radiusKm, maxResults);
    const categoryIds = [...new Set(restaurants.flatMap(entry => entry.restaurant.categoryIds))];
    const categories = categoryIds.length > 0 ? await repos.categories.listByIds(categoryIds) : [];

    return { origin, categories, restaurants };
  }
}

export const feedService = new FeedService();
