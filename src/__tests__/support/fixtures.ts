/**
 * =============================================================================
 * TEST FIXTURES
 * =============================================================================
 *
 * Every test gets a fresh MemoryStore installed with setStore(). Helpers
 * write through the repositories so rows look exactly like production ones.
 * =============================================================================
 */

import { setStore } from '../../shared/database/db';
import { MemoryStore } from '../../shared/database/memory.store';
import type { Category, Product, Restaurant, User } from '../../shared/database/entities';
import type { NewProduct, NewRestaurant } from '../../shared/database/repository.interface';
import { hashPassword } from '../../shared/utils/password.utils';

export const TEST_PASSWORD = 'pasta-night-42';

export function installMemoryStore(): MemoryStore {
  const store = new MemoryStore();
  setStore(store);
  return store;
}

export async function createUser(
  store: MemoryStore,
  overrides: { email?: string; fullName?: string; password?: string; isStaff?: boolean; isActive?: boolean } = {}
): Promise<User> {
  const user = await store.repos.users.create({
    email: overrides.email ?? 'ana@example.com',
    fullName: overrides.fullName ?? 'Ana Diner',
    passwordHash: await hashPassword(overrides.password ?? TEST_PASSWORD),
    isStaff: overrides.isStaff ?? false
  });
  if (!user) {
    throw new Error('fixture user already exists');
  }
  if (overrides.isActive === false) {
    const updated = await store.repos.users.update(user.id, { isActive: false });
    if (!updated) throw new Error('fixture user vanished');
    return updated;
  }
  return user;
}

export async function createCategory(store: MemoryStore, name: string, icon = ''): Promise<Category> {
  const category = await store.repos.categories.create({ name, icon });
  if (!category) {
    throw new Error(`fixture category ${name} already exists`);
  }
  return category;
}

export function createRestaurant(store: MemoryStore, overrides: Partial<NewRestaurant> = {}): Promise<Restaurant> {
  return store.repos.restaurants.create({
    name: 'Test Kitchen',
    tags: 'Test',
    rating: '4.5',
    etaMin: 15,
    etaMax: 30,
    deliveryFree: false,
    isOpen: true,
    latitude: 12.9716,
    longitude: 77.5946,
    imageUrl: '',
    categoryIds: [],
    ...overrides
  });
}

export function createProduct(
  store: MemoryStore,
  restaurantId: number,
  overrides: Partial<NewProduct> = {}
): Promise<Product> {
  return store.repos.products.create({
    restaurantId,
    title: 'Classic Smash',
    subtitle: '',
    description: '',
    price: '40.00',
    imageUrl: '',
    isAvailable: true,
    isVeg: false,
    isSpicy: false,
    categoryIds: [],
    ...overrides
  });
}
