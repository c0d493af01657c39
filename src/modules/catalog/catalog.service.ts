/**
 * =============================================================================
 * CATALOG MODULE - SERVICE
 * =============================================================================
 *
 * Categories, restaurants and products. Reads are public; writes come
 * through staff-only routes.
 *
 * - Categories list by name; names are unique
 * - Restaurants and products list newest first
 * - Referenced restaurant and category ids are checked before a write so
 *   the caller gets a field error rather than a constraint failure
 * =============================================================================
 */

import { getStore } from '../../shared/database/db';
import type { Category, ProductDetails, Restaurant } from '../../shared/database/entities';
import type { ProductFilter, ProductPatch, Repositories, RestaurantPatch } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { ConflictError, ErrorCode, NotFoundError, ValidationError } from '../../shared/types/error.types';
import type {
  CreateCategoryInput,
  CreateProductInput,
  CreateRestaurantInput,
  ProductListQuery,
  UpdateCategoryInput,
  UpdateProductInput,
  UpdateRestaurantInput
} from './catalog.schema';

async function assertCategoriesExist(repos: Repositories, ids: number[] | undefined): Promise<void> {
  if (!ids || ids.length === 0) return;
  const unique = [...new Set(ids)];
  const found = await repos.categories.listByIds(unique);
  const missing = unique.filter(id => !found.some(category => category.id === id));
  if (missing.length > 0) {
    throw ValidationError.forField('categoryIds', `Unknown category id(s): ${missing.join(', ')}`);
  }
}

async function assertRestaurantExists(repos: Repositories, id: number | undefined): Promise<void> {
  if (id === undefined) return;
  if (!(await repos.restaurants.findById(id))) {
    throw ValidationError.forField('restaurant_id', 'Restaurant not found.', ErrorCode.RESTAURANT_NOT_FOUND);
  }
}

class CatalogService {
  // ==========================================================================
  // CATEGORIES
  // ==========================================================================

  async listCategories(): Promise<Category[]> {
    return getStore().repos.categories.list();
  }

  async getCategory(id: number): Promise<Category> {
    const category = await getStore().repos.categories.findById(id);
    if (!category) {
      throw new NotFoundError('Category', ErrorCode.CATEGORY_NOT_FOUND);
    }
    return category;
  }

  async createCategory(input: CreateCategoryInput): Promise<Category> {
    const category = await getStore().repos.categories.create(input);
    if (!category) {
      throw new ConflictError('A category with this name already exists.');
    }
    logger.info('Category created', { categoryId: category.id });
    return category;
  }

  async updateCategory(id: number, input: UpdateCategoryInput): Promise<Category> {
    const category = await getStore().repos.categories.update(id, input);
    if (!category) {
      throw new NotFoundError('Category', ErrorCode.CATEGORY_NOT_FOUND);
    }
    return category;
  }

  async deleteCategory(id: number): Promise<void> {
    if (!(await getStore().repos.categories.delete(id))) {
      throw new NotFoundError('Category', ErrorCode.CATEGORY_NOT_FOUND);
    }
    logger.info('Category deleted', { categoryId: id });
  }

  // ==========================================================================
  // RESTAURANTS
  // ==========================================================================

  async listRestaurants(): Promise<Restaurant[]> {
    return getStore().repos.restaurants.list();
  }

  async getRestaurant(id: number): Promise<Restaurant> {
    const restaurant = await getStore().repos.restaurants.findById(id);
    if (!restaurant) {
      throw new NotFoundError('Restaurant', ErrorCode.RESTAURANT_NOT_FOUND);
    }
    return restaurant;
  }

  async createRestaurant(input: CreateRestaurantInput): Promise<Restaurant> {
    const restaurant = await getStore().transaction(async repos => {
      await assertCategoriesExist(repos, input.categoryIds);
      return repos.restaurants.create({
        name: input.name,
        tags: input.tags,
        rating: input.rating,
        etaMin: input.eta_min,
        etaMax: input.eta_max,
        deliveryFree: input.delivery_free,
        isOpen: input.is_open,
        latitude: input.latitude,
        longitude: input.longitude,
        imageUrl: input.image_url,
        categoryIds: input.categoryIds
      });
    });
    logger.info('Restaurant created', { restaurantId: restaurant.id });
    return restaurant;
  }

  async updateRestaurant(id: number, input: UpdateRestaurantInput): Promise<Restaurant> {
    return getStore().transaction(async repos => {
      const current = await repos.restaurants.findById(id);
      if (!current) {
        throw new NotFoundError('Restaurant', ErrorCode.RESTAURANT_NOT_FOUND);
      }

      const etaMin = input.eta_min ?? current.etaMin;
      const etaMax = input.eta_max ?? current.etaMax;
      if (etaMin > etaMax) {
        throw ValidationError.forField('eta_max', 'eta_min must not exceed eta_max');
      }

      await assertCategoriesExist(repos, input.categoryIds);

      const patch: RestaurantPatch = {
        name: input.name,
        tags: input.tags,
        rating: input.rating,
        etaMin: input.eta_min,
        etaMax: input.eta_max,
        deliveryFree: input.delivery_free,
        isOpen: input.is_open,
        latitude: input.latitude,
        longitude: input.longitude,
        imageUrl: input.image_url,
        categoryIds: input.categoryIds
      };
      const updated = await repos.restaurants.update(id, patch);
      if (!updated) {
        throw new NotFoundError('Restaurant', ErrorCode.RESTAURANT_NOT_FOUND);
      }
      return updated;
    });
  }

  async deleteRestaurant(id: number): Promise<void> {
    if (!(await getStore().repos.restaurants.delete(id))) {
      throw new NotFoundError('Restaurant', ErrorCode.RESTAURANT_NOT_FOUND);
    }
    logger.info('Restaurant deleted', { restaurantId: id });
  }

  // ==========================================================================
  // PRODUCTS
  // ==========================================================================

  async listProducts(query: ProductListQuery): Promise<ProductDetails[]> {
    const filter: ProductFilter = {
      restaurantId: query.restaurant,
      categoryId: query.category,
      categoryName: query.category_name,
      search: query.search,
      availableOnly: query.available
    };
    return getStore().repos.products.list(filter);
  }

  async getProduct(id: number): Promise<ProductDetails> {
    const product = await getStore().repos.products.findDetails(id);
    if (!product) {
      throw new NotFoundError('Product', ErrorCode.PRODUCT_NOT_FOUND);
    }
    return product;
  }

  async createProduct(input: CreateProductInput): Promise<ProductDetails> {
    const product = await getStore().transaction(async repos => {
      await assertRestaurantExists(repos, input.restaurant_id);
      await assertCategoriesExist(repos, input.categoryIds);
      const created = await repos.products.create({
        restaurantId: input.restaurant_id,
        title: input.title,
        subtitle: input.subtitle,
        description: input.description,
        price: input.price,
        imageUrl: input.image_url,
        isAvailable: input.is_available,
        isVeg: input.is_veg,
        isSpicy: input.is_spicy,
        categoryIds: input.categoryIds
      });
      return this.requireDetails(repos, created.id);
    });
    logger.info('Product created', { productId: product.id, restaurantId: product.restaurantId });
    return product;
  }

  async updateProduct(id: number, input: UpdateProductInput): Promise<ProductDetails> {
    return getStore().transaction(async repos => {
      await assertRestaurantExists(repos, input.restaurant_id);
      await assertCategoriesExist(repos, input.categoryIds);

      const patch: ProductPatch = {
        restaurantId: input.restaurant_id,
        title: input.title,
        subtitle: input.subtitle,
        description: input.description,
        price: input.price,
        imageUrl: input.image_url,
        isAvailable: input.is_available,
        isVeg: input.is_veg,
        isSpicy: input.is_spicy,
        categoryIds: input.categoryIds
      };
      if (!(await repos.products.update(id, patch))) {
        throw new NotFoundError('Product', ErrorCode.PRODUCT_NOT_FOUND);
      }
      return this.requireDetails(repos, id);
    });
  }

  async deleteProduct(id: number): Promise<void> {
    if (!(await getStore().repos.products.delete(id))) {
      throw new NotFoundError('Product', ErrorCode.PRODUCT_NOT_FOUND);
    }
    logger.info('Product deleted', { productId: id });
  }

  private async requireDetails(repos: Repositories, id: number): Promise<ProductDetails> {
    const details = await repos.products.findDetails(id);
    if (!details) {
      throw new NotFoundError('Product', ErrorCode.PRODUCT_NOT_FOUND);
    }
    return details;
  }
}

export const catalogService = new CatalogService();
