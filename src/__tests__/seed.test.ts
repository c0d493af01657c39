/**
 * =============================================================================
 * DEMO SEED TESTS
 * =============================================================================
 */

import { ensureStaffUser, loadDemoCatalog, seedCatalog } from '../scripts/seed-catalog';
import { MemoryStore } from '../shared/database/memory.store';
import { verifyPassword } from '../shared/utils/password.utils';
import { createRestaurant, createUser } from './support/fixtures';

jest.mock('../shared/services/logger.service', () => ({
  ...jest.requireActual('../shared/services/logger.service'),
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('seedCatalog', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it('loads the bundled demo catalog', () => {
    const catalog = loadDemoCatalog();

    expect(catalog.origin).toEqual({ latitude: 12.97194, longitude: 77.59369 });
    expect(catalog.categories).toHaveLength(10);
    expect(catalog.restaurants.map(restaurant => restaurant.name)).toEqual([
      'Corner Bean Cafe',
      'Saffron Pot',
      'Stone Oven Pizzeria',
      'Jade Wok',
    ]);
  });

  it('creates the catalog and places restaurants around the origin', async () => {
    const summary = await seedCatalog(store.repos, loadDemoCatalog());

    expect(summary).toEqual({ categories: 10, restaurantsCreated: 4, restaurantsUpdated: 0, products: 14 });

    const saffron = store.tables.restaurants.find(restaurant => restaurant.name === 'Saffron Pot');
    expect(saffron?.latitude).toBeCloseTo(12.97194 + 300 / 111000, 9);
    expect(store.tables.restaurants.find(restaurant => restaurant.name === 'Jade Wok')?.isOpen).toBe(false);

    const smash = store.tables.products.find(product => product.title === 'Classic Smash');
    expect(smash).toMatchObject({ imageUrl: 'products/classic-smash.jpg', isAvailable: true });
  });

  it('updates in place on a second run', async () => {
    const catalog = loadDemoCatalog();
    await seedCatalog(store.repos, catalog);

    const summary = await seedCatalog(store.repos, catalog);

    expect(summary).toEqual({ categories: 10, restaurantsCreated: 0, restaurantsUpdated: 4, products: 14 });
    expect(store.tables.categories).toHaveLength(10);
    expect(store.tables.restaurants).toHaveLength(4);
    expect(store.tables.products).toHaveLength(14);
  });

  it('drops other restaurants when resetting', async () => {
    await createRestaurant(store, { name: 'Leftover Diner' });

    const summary = await seedCatalog(store.repos, loadDemoCatalog(), { reset: true });

    expect(summary.restaurantsCreated).toBe(4);
    expect(store.tables.restaurants.map(restaurant => restaurant.name)).not.toContain('Leftover Diner');
  });
});

describe('ensureStaffUser', () => {
  it('creates a staff account', async () => {
    const store = new MemoryStore();

    await ensureStaffUser(store.repos, ' Admin@Example.com ', 'test-secret');

    const admin = await store.repos.users.findByEmail('admin@example.com');
    expect(admin).toMatchObject({ fullName: 'Admin', isStaff: true });
    expect(await verifyPassword('test-secret', admin?.passwordHash ?? '')).toBe(true);
  });

  it('promotes an existing user without touching the password', async () => {
    const store = new MemoryStore();
    const user = await createUser(store, { email: 'ops@example.com' });

    await ensureStaffUser(store.repos, 'ops@example.com', 'test-secret');

    expect(await store.repos.users.findByEmail('ops@example.com')).toMatchObject({
      isStaff: true,
      passwordHash: user.passwordHash,
    });
  });
});
