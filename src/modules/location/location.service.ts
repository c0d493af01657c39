/**
 * =============================================================================
 * LOCATION MODULE - SERVICE
 * =============================================================================
 *
 * The user's current coordinates: one Location row per user, overwritten on
 * each upsert. When no explicit Location exists the primary (or else the
 * earliest) address with coordinates stands in and is mirrored into
 * Location for later calls.
 * =============================================================================
 */

import { getStore } from '../../shared/database/db';
import type { Address, User, UserLocation } from '../../shared/database/entities';
import { logger } from '../../shared/services/logger.service';
import { ErrorCode, NotFoundError } from '../../shared/types/error.types';
import { haversineDistanceMeters } from '../../shared/utils/geospatial.utils';
import { userService } from '../user/user.service';

/** Saved addresses closer than this are reused instead of duplicated */
export const SAME_PLACE_METERS = 50;

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface LocationUpsertResult {
  location: UserLocation;
  /** Address switched to or created; null unless saveAddress was set */
  address: Address | null;
}

function hasCoordinates(address: Address): address is Address & Coordinates {
  return address.latitude !== null && address.longitude !== null;
}

/**
 * "12.97160, 77.59460"
 */
export function formatCoordinates(latitude: number, longitude: number): string {
  return `${latitude.toFixed(5)}, ${longitude.toFixed(5)}`;
}

class LocationService {
  async resolveUserLocation(email: string): Promise<Coordinates | null> {
    const user = await userService.requireByEmail(email);
    return this.resolveForUser(user);
  }

  async resolveForUser(user: User): Promise<Coordinates | null> {
    const repos = getStore().repos;

    const location = await repos.locations.findByUser(user.id);
    if (location) {
      return { latitude: location.latitude, longitude: location.longitude };
    }

    const located = (await repos.addresses.listByUser(user.id)).filter(hasCoordinates);
    const fallback = located.find(address => address.isPrimary)
      ?? [...located].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id)[0];
    if (!fallback) {
      return null;
    }

    await repos.locations.upsert(user.id, fallback.latitude, fallback.longitude);
    logger.info('Location mirrored from address', { userId: user.id, addressId: fallback.id });
    return { latitude: fallback.latitude, longitude: fallback.longitude };
  }

  /**
   * Overwrite the Location. With saveAddress, promote an address within
   * SAME_PLACE_METERS or create a new primary one at this point.
   */
  async upsertLocation(
    email: string,
    latitude: number,
    longitude: number,
    saveAddress: boolean = false
  ): Promise<LocationUpsertResult> {
    const user = await userService.requireByEmail(email);

    const result = await getStore().transaction(async repos => {
      const location = await repos.locations.upsert(user.id, latitude, longitude);
      if (!saveAddress) {
        return { location, address: null };
      }

      const addresses = await repos.addresses.listByUser(user.id);
      const nearby = addresses.find(address =>
        hasCoordinates(address) &&
        haversineDistanceMeters(latitude, longitude, address.latitude, address.longitude) <= SAME_PLACE_METERS
      );

      await repos.addresses.clearPrimary(user.id);

      if (nearby) {
        const promoted = await repos.addresses.update(nearby.id, { isPrimary: true });
        return { location, address: promoted };
      }

      const created = await repos.addresses.create({
        userId: user.id,
        label: addresses.length === 0 ? 'Home' : 'Other',
        address: formatCoordinates(latitude, longitude),
        latitude,
        longitude,
        isPrimary: true
      });
      return { location, address: created };
    });

    logger.info('Location saved', {
      userId: user.id,
      addressId: result.address?.id ?? null
    });
    return result;
  }

  /**
   * The explicit Location only
   */
  async getLocation(email: string): Promise<UserLocation> {
    const user = await userService.requireByEmail(email);
    const location = await getStore().repos.locations.findByUser(user.id);
    if (!location) {
      throw new NotFoundError('Location', ErrorCode.NO_LOCATION);
    }
    return location;
  }
}

export const locationService = new LocationService();
