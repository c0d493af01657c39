/**
 * =============================================================================
 * DOMAIN ENTITIES
 * =============================================================================
 *
 * Plain records returned by every repository implementation. Foreign keys
 * are explicit id fields; many-to-many links are carried as id arrays.
 * Money fields are decimal strings with two places ("40.00").
 * =============================================================================
 */

import type { Money } from '../utils/money.utils';

// =============================================================================
// USERS & AUTH
// =============================================================================

export interface User {
  id: number;
  email: string;
  fullName: string;
  passwordHash: string;
  isActive: boolean;
  isStaff: boolean;
  /** Refresh tokens issued before this instant are rejected */
  tokensRevokedAt: Date | null;
  dateJoined: Date;
}

export const OTP_PURPOSES = ['signup', 'password_reset'] as const;
export type OtpPurpose = typeof OTP_PURPOSES[number];

export interface OtpCode {
  id: number;
  userId: number;
  code: string;
  purpose: OtpPurpose;
  createdAt: Date;
  expiresAt: Date;
  attempts: number;
  isUsed: boolean;
}

export interface RevokedToken {
  jti: string;
  userId: number;
  expiresAt: Date;
}

// =============================================================================
// LOCATION & ADDRESSES
// =============================================================================

export interface UserLocation {
  userId: number;
  latitude: number;
  longitude: number;
  updatedAt: Date;
}

export const ADDRESS_LABELS = ['Home', 'Work', 'Other'] as const;
export type AddressLabel = typeof ADDRESS_LABELS[number];

export interface Address {
  id: number;
  userId: number;
  label: AddressLabel;
  address: string;
  latitude: number | null;
  longitude: number | null;
  isPrimary: boolean;
  createdAt: Date;
}

// =============================================================================
// CATALOG
// =============================================================================

export interface Category {
  id: number;
  name: string;
  icon: string;
}

export interface Restaurant {
  id: number;
  name: string;
  tags: string;
  /** One decimal, e.g. "4.5" */
  rating: string;
  etaMin: number;
  etaMax: number;
  deliveryFree: boolean;
  isOpen: boolean;
  latitude: number;
  longitude: number;
  imageUrl: string;
  createdAt: Date;
  categoryIds: number[];
}

export interface Product {
  id: number;
  restaurantId: number;
  title: string;
  subtitle: string;
  description: string;
  price: Money;
  imageUrl: string;
  isAvailable: boolean;
  isVeg: boolean;
  isSpicy: boolean;
  createdAt: Date;
  categoryIds: number[];
}

/**
 * Product joined with the names its payload shows
 */
export interface ProductDetails extends Product {
  restaurantName: string;
  categoryNames: string[];
}

// =============================================================================
// CART / ORDER / PAYMENT
// =============================================================================

export interface Cart {
  id: number;
  userId: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Title and unit price are snapshots taken when the product was first added
 */
export interface CartItem {
  id: number;
  cartId: number;
  productId: number;
  title: string;
  unitPrice: Money;
  qty: number;
}

export const ORDER_STATUSES = ['pending', 'paid', 'preparing', 'on_the_way', 'delivered', 'canceled'] as const;
export type OrderStatus = typeof ORDER_STATUSES[number];

export interface Order {
  id: number;
  userId: number;
  status: OrderStatus;
  addressText: string;
  subtotal: Money;
  deliveryFee: Money;
  total: Money;
  createdAt: Date;
}

export interface OrderItem {
  id: number;
  orderId: number;
  /** Null once the product is removed from the catalog */
  productId: number | null;
  title: string;
  unitPrice: Money;
  qty: number;
  subtotal: Money;
}

export const PAYMENT_METHODS = ['card', 'cash'] as const;
export type PaymentMethod = typeof PAYMENT_METHODS[number];

export const PAYMENT_STATUSES = ['created', 'success', 'failed'] as const;
export type PaymentStatus = typeof PAYMENT_STATUSES[number];

export interface Payment {
  id: number;
  orderId: number;
  method: PaymentMethod;
  amount: Money;
  status: PaymentStatus;
  reference: string;
  createdAt: Date;
}
