/**
 * =============================================================================
 * CATALOG TESTS
 * =============================================================================
 *
 * Staff CRUD, product filters and wire payloads.
 * =============================================================================
 */

import { catalogService } from '../modules/catalog/catalog.service';
import {
  createProductSchema,
  createRestaurantSchema,
  productListQuerySchema,
  updateRestaurantSchema
} from '../modules/catalog/catalog.schema';
import { etaText, resolveImageSrc, toProductPayload } from '../modules/catalog/catalog.mapper';
import { validateSchema } from '../shared/utils/validation.utils';
import { MemoryStore } from '../shared/database/memory.store';
import type { Category, Restaurant } from '../shared/database/entities';
import { createCategory, createProduct, createRestaurant, installMemoryStore } from './support/fixtures';

jest.mock('../shared/services/logger.service', () => ({
  ...jest.requireActual('../shared/services/logger.service'),
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('Catalog service', () => {
  let store: MemoryStore;
  let burgers: Category;
  let drinks: Category;

  beforeEach(async () => {
    store = installMemoryStore();
    burgers = await createCategory(store, 'Burgers', 'fast-food');
    drinks = await createCategory(store, 'Drinks', 'beer-outline');
  });

  describe('categories', () => {
    it('lists by name and refuses a duplicate name', async () => {
      await catalogService.createCategory({ name: 'Biryani', icon: 'flame' });

      expect((await catalogService.listCategories()).map(category => category.name)).toEqual(['Biryani', 'Burgers', 'Drinks']);
      await expect(catalogService.createCategory({ name: 'Burgers', icon: 'x' })).rejects.toMatchObject({
        statusCode: 409,
        message: 'A category with this name already exists.',
      });
    });

    it('detaches a deleted category from restaurants and products', async () => {
      const restaurant = await createRestaurant(store, { categoryIds: [burgers.id, drinks.id] });
      const product = await createProduct(store, restaurant.id, { categoryIds: [drinks.id] });

      await catalogService.deleteCategory(drinks.id);

      expect((await catalogService.getRestaurant(restaurant.id)).categoryIds).toEqual([burgers.id]);
      expect((await catalogService.getProduct(product.id)).categoryIds).toEqual([]);
    });

    it('reports an unknown category', async () => {
      await expect(catalogService.getCategory(999)).rejects.toMatchObject({
        statusCode: 404,
        code: 'CATEGORY_NOT_FOUND',
      });
    });
  });

  describe('restaurants', () => {
    it('applies column defaults on create', async () => {
      const input = validateSchema(createRestaurantSchema, { name: 'Grill House', latitude: 1, longitude: 2 });

      const restaurant = await catalogService.createRestaurant(input);

      expect(restaurant).toMatchObject({
        name: 'Grill House',
        rating: '4.5',
        etaMin: 15,
        etaMax: 30,
        deliveryFree: true,
        isOpen: true,
        categoryIds: [],
      });
    });

    it('rejects unknown category ids', async () => {
      const input = validateSchema(createRestaurantSchema, {
        name: 'Grill House', latitude: 1, longitude: 2, categoryIds: [burgers.id, 77],
      });

      await expect(catalogService.createRestaurant(input)).rejects.toMatchObject({
        statusCode: 400,
        details: { fields: [{ field: 'categoryIds', message: 'Unknown category id(s): 77' }] },
      });
      expect(store.tables.restaurants).toHaveLength(0);
    });

    it('rejects eta_min above eta_max', () => {
      const result = updateRestaurantSchema.safeParse({ eta_min: 40, eta_max: 20 });

      expect(result.success).toBe(false);
      expect(result.success ? [] : result.error.errors.map(issue => issue.path.join('.'))).toEqual(['eta_max']);
    });

    it('deletes its products along with it', async () => {
      const restaurant = await createRestaurant(store);
      await createProduct(store, restaurant.id);

      await catalogService.deleteRestaurant(restaurant.id);

      expect(store.tables.products).toHaveLength(0);
    });
  });

  describe('products', () => {
    let grill: Restaurant;
    let cafe: Restaurant;

    beforeEach(async () => {
      grill = await createRestaurant(store, { name: 'Grill House' });
      cafe = await createRestaurant(store, { name: 'Lime Cafe' });
      await createProduct(store, grill.id, { title: 'Smash Burger', categoryIds: [burgers.id] });
      await createProduct(store, grill.id, { title: 'Cola', categoryIds: [drinks.id], isAvailable: false });
      await createProduct(store, cafe.id, { title: 'Iced Tea', subtitle: 'Lemon', categoryIds: [drinks.id] });
    });

    async function titles(query: Record<string, string>): Promise<string[]> {
      const products = await catalogService.listProducts(validateSchema(productListQuerySchema, query));
      return products.map(product => product.title).sort();
    }

    it('filters by restaurant', async () => {
      await expect(titles({ restaurant: String(grill.id) })).resolves.toEqual(['Cola', 'Smash Burger']);
    });

    it('filters by category id and by case-insensitive category name', async () => {
      await expect(titles({ category: String(drinks.id) })).resolves.toEqual(['Cola', 'Iced Tea']);
      await expect(titles({ category_name: 'drinks' })).resolves.toEqual(['Cola', 'Iced Tea']);
    });

    it('searches titles, subtitles and restaurant names', async () => {
      await expect(titles({ search: 'LEMON' })).resolves.toEqual(['Iced Tea']);
      await expect(titles({ search: 'grill' })).resolves.toEqual(['Cola', 'Smash Burger']);
    });

    it('hides unavailable products on request', async () => {
      await expect(titles({ available: 'true' })).resolves.toEqual(['Iced Tea', 'Smash Burger']);
      await expect(titles({ available: 'false' })).resolves.toEqual(['Cola', 'Iced Tea', 'Smash Burger']);
    });

    it('rejects a product for an unknown restaurant', async () => {
      const input = validateSchema(createProductSchema, { restaurant_id: 999, title: 'Ghost', price: 5 });

      await expect(catalogService.createProduct(input)).rejects.toMatchObject({
        statusCode: 400,
        code: 'RESTAURANT_NOT_FOUND',
      });
    });

    it('builds the product payload', async () => {
      const input = validateSchema(createProductSchema, {
        restaurant_id: cafe.id,
        title: 'Flat White',
        price: '4.5',
        image_url: 'products/flat-white.jpg',
        categoryIds: [drinks.id],
      });

      const payload = toProductPayload(await catalogService.createProduct(input));

      expect(payload).toMatchObject({
        restaurant_id: cafe.id,
        restaurant_name: 'Lime Cafe',
        title: 'Flat White',
        price: '4.50',
        price_text: '$4.50',
        image_url: 'products/flat-white.jpg',
        image_src: 'https://cdn.test/products/flat-white.jpg',
        is_available: true,
        categoryIds: [drinks.id],
        categoryNames: ['Drinks'],
      });
    });
  });
});

describe('catalog mapper helpers', () => {
  it('resolves image references against the media base URL', () => {
    expect(resolveImageSrc('https://img.example.com/a.jpg', 'https://cdn.test')).toBe('https://img.example.com/a.jpg');
    expect(resolveImageSrc('/dishes/a.jpg', 'https://cdn.test/')).toBe('https://cdn.test/dishes/a.jpg');
    expect(resolveImageSrc('dishes/a.jpg', '')).toBe('dishes/a.jpg');
    expect(resolveImageSrc('', 'https://cdn.test')).toBe('');
  });

  it('formats the delivery window', () => {
    expect(etaText(15, 30)).toBe('15-30 min');
    expect(etaText(20, 20)).toBe('20 min');
  });
});
