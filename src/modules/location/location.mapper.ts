import type { UserLocation } from '../../shared/database/entities';
import { toSavedAddressPayload } from '../address/address.mapper';
import type { LocationUpsertResult } from './location.service';

export function toLocationPayload(location: UserLocation) {
  return {
    latitude: location.latitude,
    longitude: location.longitude,
    updated_at: location.updatedAt.toISOString()
  };
}

export function toLocationSavedPayload(result: LocationUpsertResult) {
  return {
    message: 'Location saved',
    latitude: result.location.latitude,
    longitude: result.location.longitude,
    address: result.address ? toSavedAddressPayload(result.address) : null
  };
}
