/**
 * =============================================================================
 * ADDRESS TESTS
 * =============================================================================
 *
 * Saved addresses and the single-primary rule.
 * =============================================================================
 */

import { addressService } from '../modules/address/address.service';
import { createAddressSchema, updateAddressSchema } from '../modules/address/address.schema';
import { validateSchema } from '../shared/utils/validation.utils';
import { MemoryStore } from '../shared/database/memory.store';
import { createUser, installMemoryStore } from './support/fixtures';

jest.mock('../shared/services/logger.service', () => ({
  ...jest.requireActual('../shared/services/logger.service'),
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

function addAddress(body: Record<string, unknown>) {
  return addressService.create(validateSchema(createAddressSchema, { email: 'ana@example.com', ...body }));
}

describe('AddressService', () => {
  let store: MemoryStore;

  beforeEach(async () => {
    store = installMemoryStore();
    await createUser(store);
  });

  it('makes the first address a primary Home', async () => {
    const address = await addAddress({ address: '4 Lake Road' });

    expect(address).toMatchObject({ label: 'Home', address: '4 Lake Road', isPrimary: true, latitude: null });
  });

  it('keeps the existing primary unless asked to move it', async () => {
    const home = await addAddress({ address: '4 Lake Road' });
    const work = await addAddress({ address: '9 Mill Street', label: 'Work' });

    expect(work.isPrimary).toBe(false);

    const gym = await addAddress({ address: '1 Park Lane', label: 'Other', make_primary: true });

    expect(gym.isPrimary).toBe(true);
    expect((await addressService.get(home.id)).isPrimary).toBe(false);
    expect(store.tables.addresses.filter(row => row.isPrimary)).toHaveLength(1);
  });

  it('lists primary first, then newest', async () => {
    await addAddress({ address: 'A' });
    await addAddress({ address: 'B' });
    await addAddress({ address: 'C' });

    expect((await addressService.list('ANA@example.com')).map(row => row.address)).toEqual(['A', 'C', 'B']);
    await expect(addressService.list('nobody@example.com')).resolves.toEqual([]);
  });

  it('moves the primary flag on update', async () => {
    const home = await addAddress({ address: '4 Lake Road' });
    const work = await addAddress({ address: '9 Mill Street' });

    const updated = await addressService.update(
      work.id,
      validateSchema(updateAddressSchema, { make_primary: true, latitude: 12.5, longitude: 77.5 })
    );

    expect(updated).toMatchObject({ isPrimary: true, address: '9 Mill Street', latitude: 12.5, longitude: 77.5 });
    expect((await addressService.get(home.id)).isPrimary).toBe(false);
  });

  it('reports unknown users and addresses', async () => {
    await expect(addressService.create(validateSchema(createAddressSchema, {
      email: 'nobody@example.com', address: 'X',
    }))).rejects.toMatchObject({ statusCode: 404, code: 'USER_NOT_FOUND' });
    await expect(addressService.remove(42)).rejects.toMatchObject({ statusCode: 404, code: 'ADDRESS_NOT_FOUND' });
    await expect(addressService.update(42, validateSchema(updateAddressSchema, {})))
      .rejects.toMatchObject({ code: 'ADDRESS_NOT_FOUND' });
  });

  it('deletes an address', async () => {
    const home = await addAddress({ address: '4 Lake Road' });

    await addressService.remove(home.id);

    expect(store.tables.addresses).toEqual([]);
  });
});
