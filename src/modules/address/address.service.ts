/**
 * =============================================================================
 * ADDRESS MODULE - SERVICE
 * =============================================================================
 *
 * Saved delivery addresses. At most one address per user is primary; every
 * write that changes the primary clears the old one in the same transaction.
 * =============================================================================
 */

import { getStore } from '../../shared/database/db';
import type { Address } from '../../shared/database/entities';
import type { AddressPatch } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { ErrorCode, NotFoundError } from '../../shared/types/error.types';
import { userService } from '../user/user.service';
import type { CreateAddressInput, UpdateAddressInput } from './address.schema';

class AddressService {
  /**
   * Primary first, then newest. Unknown users have no addresses.
   */
  async list(email: string): Promise<Address[]> {
    const user = await userService.findByEmail(email);
    if (!user) return [];
    return getStore().repos.addresses.listByUser(user.id);
  }

  async get(id: number): Promise<Address> {
    const address = await getStore().repos.addresses.findById(id);
    if (!address) {
      throw new NotFoundError('Address', ErrorCode.ADDRESS_NOT_FOUND);
    }
    return address;
  }

  /**
   * The first address defaults to "Home". It becomes primary when asked to,
   * or when the user has no primary yet.
   */
  async create(input: CreateAddressInput): Promise<Address> {
    const user = await userService.requireByEmail(input.email);

    const address = await getStore().transaction(async repos => {
      const existing = await repos.addresses.listByUser(user.id);
      const makePrimary = input.make_primary || !existing.some(row => row.isPrimary);

      if (makePrimary) {
        await repos.addresses.clearPrimary(user.id);
      }

      return repos.addresses.create({
        userId: user.id,
        label: input.label ?? 'Home',
        address: input.address,
        latitude: input.latitude ?? null,
        longitude: input.longitude ?? null,
        isPrimary: makePrimary
      });
    });

    logger.info('Address created', { userId: user.id, addressId: address.id, primary: address.isPrimary });
    return address;
  }

  async update(id: number, input: UpdateAddressInput): Promise<Address> {
    return getStore().transaction(async repos => {
      const current = await repos.addresses.findById(id);
      if (!current) {
        throw new NotFoundError('Address', ErrorCode.ADDRESS_NOT_FOUND);
      }

      const patch: AddressPatch = {
        label: input.label,
        address: input.address,
        latitude: input.latitude,
        longitude: input.longitude
      };

      if (input.make_primary && !current.isPrimary) {
        await repos.addresses.clearPrimary(current.userId);
        patch.isPrimary = true;
      }

      const updated = await repos.addresses.update(id, patch);
      if (!updated) {
        throw new NotFoundError('Address', ErrorCode.ADDRESS_NOT_FOUND);
      }
      return updated;
    });
  }

  async remove(id: number): Promise<void> {
    const deleted = await getStore().repos.addresses.delete(id);
    if (!deleted) {
      throw new NotFoundError('Address', ErrorCode.ADDRESS_NOT_FOUND);
    }
    logger.info('Address deleted', { addressId: id });
  }
}

export const addressService = new AddressService();
