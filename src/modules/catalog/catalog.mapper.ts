/**
 * =============================================================================
 * CATALOG MODULE - MAPPERS
 * =============================================================================
 *
 * Wire payloads for categories, restaurants and products. Field names
 * (including the camelCase categoryIds/categoryNames) are what the mobile
 * client reads.
 * =============================================================================
 */

import { config } from '../../config/environment';
import type { Category, ProductDetails, Restaurant } from '../../shared/database/entities';
import { priceText } from '../../shared/utils/money.utils';

export interface CategoryPayload {
  id: number;
  name: string;
  icon: string;
}

export interface RestaurantPayload {
  id: number;
  name: string;
  tags: string;
  rating: string;
  eta: string;
  free: boolean;
  is_open: boolean;
  latitude: number;
  longitude: number;
  categoryIds: number[];
  image_url: string;
  image_src: string;
  distance_km?: number;
}

export interface ProductPayload {
  id: number;
  restaurant_id: number;
  restaurant_name: string;
  title: string;
  subtitle: string;
  description: string;
  price: string;
  price_text: string;
  image_url: string;
  image_src: string;
  is_available: boolean;
  is_veg: boolean;
  is_spicy: boolean;
  categoryIds: number[];
  categoryNames: string[];
  created_at: string;
}

/**
 * Absolute http(s) URLs pass through; relative paths are joined to
 * MEDIA_BASE_URL; empty stays empty.
 */
export function resolveImageSrc(reference: string, baseUrl: string = config.media.baseUrl): string {
  if (!reference) return '';
  if (/^https?:\/\//i.test(reference)) return reference;
  if (!baseUrl) return reference;
  return `${baseUrl.replace(/\/+$/, '')}/${reference.replace(/^\/+/, '')}`;
}

/**
 * "15-30 min", or "20 min" when both bounds match
 */
export function etaText(etaMin: number, etaMax: number): string {
  return etaMin === etaMax ? `${etaMin} min` : `${etaMin}-${etaMax} min`;
}

export function toCategoryPayload(category: Category): CategoryPayload {
  return { id: category.id, name: category.name, icon: category.icon };
}

export function toRestaurantPayload(restaurant: Restaurant, distanceKm?: number): RestaurantPayload {
  const payload: RestaurantPayload = {
    id: restaurant.id,
    name: restaurant.name,
    tags: restaurant.tags,
    rating: restaurant.rating,
    eta: etaText(restaurant.etaMin, restaurant.etaMax),
    free: restaurant.deliveryFree,
    is_open: restaurant.isOpen,
    latitude: restaurant.latitude,
    longitude: restaurant.longitude,
    categoryIds: restaurant.categoryIds,
    image_url: restaurant.imageUrl,
    image_src: resolveImageSrc(restaurant.imageUrl)
  };
  if (distanceKm !== undefined) {
    payload.distance_km = Math.round(distanceKm * 100) / 100;
  }
  return payload;
}

export function toProductPayload(product: ProductDetails): ProductPayload {
  return {
    id: product.id,
    restaurant_id: product.restaurantId,
    restaurant_name: product.restaurantName,
    title: product.title,
    subtitle: product.subtitle,
    description: product.description,
    price: product.price,
    price_text: priceText(product.price),
    image_url: product.imageUrl,
    image_src: resolveImageSrc(product.imageUrl),
    is_available: product.isAvailable,
    is_veg: product.isVeg,
    is_spicy: product.isSpicy,
    categoryIds: product.categoryIds,
    categoryNames: product.categoryNames,
    created_at: product.createdAt.toISOString()
  };
}
