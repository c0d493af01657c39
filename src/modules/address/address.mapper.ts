import type { Address, AddressLabel } from '../../shared/database/entities';

export interface AddressPayload {
  id: number;
  label: AddressLabel;
  address: string;
  latitude: number | null;
  longitude: number | null;
  is_primary: boolean;
  created_at: string;
}

export function toAddressPayload(address: Address): AddressPayload {
  return {
    id: address.id,
    label: address.label,
    address: address.address,
    latitude: address.latitude,
    longitude: address.longitude,
    is_primary: address.isPrimary,
    created_at: address.createdAt.toISOString()
  };
}

/**
 * Short form returned by the location upsert
 */
export function toSavedAddressPayload(address: Address): Omit<AddressPayload, 'created_at'> {
  return {
    id: address.id,
    label: address.label,
    address: address.address,
    latitude: address.latitude,
    longitude: address.longitude,
    is_primary: address.isPrimary
  };
}
