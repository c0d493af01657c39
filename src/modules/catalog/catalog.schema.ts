/**
 * =============================================================================
 * CATALOG MODULE - VALIDATION SCHEMAS
 * =============================================================================
 *
 * Create schemas carry the column defaults; update schemas are the same
 * fields made optional, without defaults, so absent keys stay untouched.
 * =============================================================================
 */

import { z } from 'zod';
import {
  idSchema,
  latitudeSchema,
  longitudeSchema,
  moneySchema,
  queryBooleanSchema
} from '../../shared/utils/validation.utils';

const imageUrlSchema = z.string().trim().max(500)
  .refine(value => value === '' || /^https?:\/\//i.test(value) || !value.includes('://'), {
    message: 'Must be an http(s) URL or a media path'
  });

const categoryIdsSchema = z.array(idSchema).max(50);

/**
 * One-decimal rating between 0 and 5, output as "4.5"
 */
const ratingSchema = z.union([z.number(), z.string().trim()])
  .transform(value => Number(value))
  .refine(value => Number.isFinite(value) && value >= 0 && value <= 5, {
    message: 'Rating must be between 0 and 5'
  })
  .transform(value => value.toFixed(1));

const etaSchema = z.number().int().min(0).max(600);

const etaOrdered = (value: { eta_min?: number; eta_max?: number }) =>
  value.eta_min === undefined || value.eta_max === undefined || value.eta_min <= value.eta_max;

const etaOrderMessage = { message: 'eta_min must not exceed eta_max', path: ['eta_max'] };

// ── Categories ───────────────────────────────────────────────────

export const createCategorySchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(80),
  icon: z.string().trim().min(1).max(40).default('fast-food')
});

export const updateCategorySchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(80).optional(),
  icon: z.string().trim().min(1).max(40).optional()
});

// ── Restaurants ──────────────────────────────────────────────────

const restaurantFields = {
  name: z.string().trim().min(1, 'Name is required').max(140),
  tags: z.string().trim().max(200),
  rating: ratingSchema,
  eta_min: etaSchema,
  eta_max: etaSchema,
  delivery_free: z.boolean(),
  is_open: z.boolean(),
  latitude: latitudeSchema,
  longitude: longitudeSchema,
  image_url: imageUrlSchema,
  categoryIds: categoryIdsSchema
};

export const createRestaurantSchema = z.object({
  ...restaurantFields,
  tags: restaurantFields.tags.default(''),
  rating: restaurantFields.rating.default('4.5'),
  eta_min: restaurantFields.eta_min.default(15),
  eta_max: restaurantFields.eta_max.default(30),
  delivery_free: restaurantFields.delivery_free.default(true),
  is_open: restaurantFields.is_open.default(true),
  image_url: restaurantFields.image_url.default(''),
  categoryIds: restaurantFields.categoryIds.default([])
}).refine(etaOrdered, etaOrderMessage);

export const updateRestaurantSchema = z.object(restaurantFields)
  .partial()
  .refine(etaOrdered, etaOrderMessage);

// ── Products ─────────────────────────────────────────────────────

const productFields = {
  restaurant_id: idSchema,
  title: z.string().trim().min(1, 'Title is required').max(140),
  subtitle: z.string().trim().max(140),
  description: z.string().trim().max(5000),
  price: moneySchema,
  image_url: imageUrlSchema,
  is_available: z.boolean(),
  is_veg: z.boolean(),
  is_spicy: z.boolean(),
  categoryIds: categoryIdsSchema
};

export const createProductSchema = z.object({
  ...productFields,
  subtitle: productFields.subtitle.default(''),
  description: productFields.description.default(''),
  price: productFields.price.default('0.00'),
  image_url: productFields.image_url.default(''),
  is_available: productFields.is_available.default(true),
  is_veg: productFields.is_veg.default(false),
  is_spicy: productFields.is_spicy.default(false),
  categoryIds: productFields.categoryIds.default([])
});

export const updateProductSchema = z.object(productFields).partial();

export const productListQuerySchema = z.object({
  restaurant: idSchema.optional(),
  category: idSchema.optional(),
  category_name: z.string().trim().min(1).optional(),
  search: z.string().trim().min(1).optional(),
  available: queryBooleanSchema.optional()
});

export const catalogIdParamsSchema = z.object({
  id: idSchema
});

export type CreateCategoryInput = z.infer<typeof createCategorySchema>;
export type UpdateCategoryInput = z.infer<typeof updateCategorySchema>;
export type CreateRestaurantInput = z.infer<typeof createRestaurantSchema>;
export type UpdateRestaurantInput = z.infer<typeof updateRestaurantSchema>;
export type CreateProductInput = z.infer<typeof createProductSchema>;
export type UpdateProductInput = z.infer<typeof updateProductSchema>;
export type ProductListQuery = z.infer<typeof productListQuerySchema>;
