/**
 * =============================================================================
 * DEMO CATALOG SEEDING
 * =============================================================================
 *
 * Idempotent upsert of the demo catalog in data/demo-catalog.json:
 * categories by name, restaurants by name, products by (restaurant, title).
 * Restaurants are placed by meter offsets from the catalog's origin.
 * =============================================================================
 */

import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Repositories } from '../shared/database/repository.interface';
import { hashPassword } from '../shared/utils/password.utils';
import { offsetByMeters } from '../shared/utils/geospatial.utils';
import { logger, maskEmail } from '../shared/services/logger.service';

export const DEMO_CATALOG_PATH = path.resolve(__dirname, '../../src/scripts/data/demo-catalog.json');

const demoProductSchema = z.object({
  title: z.string().min(1),
  subtitle: z.string().default(''),
  description: z.string().default(''),
  price: z.string().regex(/^\d+(\.\d{1,2})?$/),
  isVeg: z.boolean().default(false),
  isSpicy: z.boolean().default(false),
  categories: z.array(z.string()).default([])
});

const demoRestaurantSchema = z.object({
  name: z.string().min(1),
  tags: z.string().default(''),
  rating: z.string().default('4.5'),
  etaMin: z.number().int().default(15),
  etaMax: z.number().int().default(30),
  deliveryFree: z.boolean().default(false),
  isOpen: z.boolean().default(true),
  offsetMeters: z.tuple([z.number(), z.number()]),
  categories: z.array(z.string()).default([]),
  imageUrl: z.string().default(''),
  products: z.array(demoProductSchema).default([])
});

export const demoCatalogSchema = z.object({
  origin: z.object({ latitude: z.number(), longitude: z.number() }),
  categories: z.array(z.object({ name: z.string().min(1), icon: z.string().default('') })),
  restaurants: z.array(demoRestaurantSchema)
});

export type DemoCatalog = z.infer<typeof demoCatalogSchema>;

export interface SeedSummary {
  categories: number;
  restaurantsCreated: number;
  restaurantsUpdated: number;
  products: number;
}

export function loadDemoCatalog(file: string = DEMO_CATALOG_PATH): DemoCatalog {
  return demoCatalogSchema.parse(JSON.parse(readFileSync(file, 'utf8')));
}

/**
 * With reset, every restaurant (and its products) is removed first.
 */
export async function seedCatalog(
  repos: Repositories,
  catalog: DemoCatalog,
  options: { reset?: boolean } = {}
): Promise<SeedSummary> {
  if (options.reset) {
    for (const restaurant of await repos.restaurants.list()) {
      await repos.restaurants.delete(restaurant.id);
    }
  }

  const categoryIds = new Map<string, number>();
  for (const entry of catalog.categories) {
    const existing = await repos.categories.findByName(entry.name);
    const category = existing
      ? await repos.categories.update(existing.id, { icon: entry.icon })
      : await repos.categories.create(entry);
    if (category) categoryIds.set(category.name.toLowerCase(), category.id);
  }

  const idsFor = (names: string[]): number[] => names.flatMap(name => {
    const id = categoryIds.get(name.toLowerCase());
    if (id === undefined) {
      logger.warn('Seed: unknown category skipped', { category: name });
      return [];
    }
    return [id];
  });

  const summary: SeedSummary = {
    categories: categoryIds.size,
    restaurantsCreated: 0,
    restaurantsUpdated: 0,
    products: 0
  };

  const existingRestaurants = await repos.restaurants.list();

  for (const entry of catalog.restaurants) {
    const [dx, dy] = entry.offsetMeters;
    const point = offsetByMeters(catalog.origin.latitude, catalog.origin.longitude, dx, dy);
    const fields = {
      name: entry.name,
      tags: entry.tags,
      rating: entry.rating,
      etaMin: entry.etaMin,
      etaMax: entry.etaMax,
      deliveryFree: entry.deliveryFree,
      isOpen: entry.isOpen,
      latitude: point.latitude,
      longitude: point.longitude,
      imageUrl: entry.imageUrl,
      categoryIds: idsFor(entry.categories)
    };

    const match = existingRestaurants.find(row => row.name.toLowerCase() === entry.name.toLowerCase());
    let restaurantId: number;
    if (match) {
      await repos.restaurants.update(match.id, fields);
      restaurantId = match.id;
      summary.restaurantsUpdated++;
    } else {
      restaurantId = (await repos.restaurants.create(fields)).id;
      summary.restaurantsCreated++;
    }

    const products = await repos.products.list({ restaurantId });
    for (const item of entry.products) {
      const productFields = {
        restaurantId,
        title: item.title,
        subtitle: item.subtitle,
        description: item.description,
        price: Number(item.price).toFixed(2),
        imageUrl: `products/${item.title.toLowerCase().replace(/[^a-z0-9]+/g, '-')}.jpg`,
        isAvailable: true,
        isVeg: item.isVeg,
        isSpicy: item.isSpicy,
        categoryIds: idsFor(item.categories)
      };
      const existing = products.find(row => row.title === item.title);
      if (existing) {
        await repos.products.update(existing.id, productFields);
      } else {
        await repos.products.create(productFields);
      }
      summary.products++;
    }
  }

  return summary;
}

/**
 * Creates the staff account, or promotes an existing user to staff.
 */
export async function ensureStaffUser(repos: Repositories, email: string, password: string): Promise<void> {
  const normalized = email.trim().toLowerCase();
  const existing = await repos.users.findByEmail(normalized);

  if (existing) {
    if (!existing.isStaff) {
      await repos.users.update(existing.id, { isStaff: true });
    }
    logger.info('Seed: staff user ready', { email: maskEmail(normalized), created: false });
    return;
  }

  await repos.users.create({
    email: normalized,
    fullName: 'Admin',
    passwordHash: await hashPassword(password),
    isStaff: true
  });
  logger.info('Seed: staff user ready', { email: maskEmail(normalized), created: true });
}
