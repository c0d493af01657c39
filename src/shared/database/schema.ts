/**
 * =============================================================================
 * DATABASE SCHEMA (drizzle-orm / PostgreSQL)
 * =============================================================================
 *
 * Table definitions used by PostgresStore. migrations/0001_init.sql creates
 * the same tables; keep both in step.
 *
 * Constraints carrying domain rules:
 * - carts_one_active_per_user: partial unique index, one active cart per user
 * - addresses_one_primary_per_user: partial unique index, one primary address
 * - cart_items (cart_id, product_id) unique: re-adding increments qty
 * - payments.order_id unique: one payment per order
 * =============================================================================
 */

import { sql } from 'drizzle-orm';
import {
  boolean,
  doublePrecision,
  index,
  integer,
  numeric,
  pgEnum,
  pgTable,
  primaryKey,
  serial,
  text,
  timestamp,
  unique,
  uniqueIndex,
  varchar,
} from 'drizzle-orm/pg-core';
import {
  ADDRESS_LABELS,
  ORDER_STATUSES,
  OTP_PURPOSES,
  PAYMENT_METHODS,
  PAYMENT_STATUSES,
} from './entities';

// ── Enums ────────────────────────────────────────────────────────

export const otpPurposeEnum = pgEnum('otp_purpose', OTP_PURPOSES);
export const addressLabelEnum = pgEnum('address_label', ADDRESS_LABELS);
export const orderStatusEnum = pgEnum('order_status', ORDER_STATUSES);
export const paymentMethodEnum = pgEnum('payment_method', PAYMENT_METHODS);
export const paymentStatusEnum = pgEnum('payment_status', PAYMENT_STATUSES);

// ── Users & auth ─────────────────────────────────────────────────

export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  email: varchar('email', { length: 254 }).notNull().unique(),
  fullName: varchar('full_name', { length: 150 }).notNull(),
  passwordHash: varchar('password_hash', { length: 255 }).notNull(),
  isActive: boolean('is_active').notNull().default(true),
  isStaff: boolean('is_staff').notNull().default(false),
  tokensRevokedAt: timestamp('tokens_revoked_at', { withTimezone: true }),
  dateJoined: timestamp('date_joined', { withTimezone: true }).defaultNow().notNull(),
});

export const otpCodes = pgTable(
  'otp_codes',
  {
    id: serial('id').primaryKey(),
    userId: integer('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
    code: varchar('code', { length: 6 }).notNull(),
    purpose: otpPurposeEnum('purpose').notNull().default('signup'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    attempts: integer('attempts').notNull().default(0),
    isUsed: boolean('is_used').notNull().default(false),
  },
  (t) => [
    index('otp_codes_lookup_idx').on(t.userId, t.purpose, t.isUsed),
  ]
);

export const revokedTokens = pgTable('revoked_tokens', {
  jti: varchar('jti', { length: 64 }).primaryKey(),
  userId: integer('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  revokedAt: timestamp('revoked_at', { withTimezone: true }).defaultNow().notNull(),
});

// ── Location & addresses ─────────────────────────────────────────

export const userLocations = pgTable('user_locations', {
  userId: integer('user_id').primaryKey().references(() => users.id, { onDelete: 'cascade' }),
  latitude: doublePrecision('latitude').notNull(),
  longitude: doublePrecision('longitude').notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

export const addresses = pgTable(
  'addresses',
  {
    id: serial('id').primaryKey(),
    userId: integer('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
    label: addressLabelEnum('label').notNull().default('Home'),
    address: varchar('address', { length: 255 }).notNull(),
    latitude: doublePrecision('latitude'),
    longitude: doublePrecision('longitude'),
    isPrimary: boolean('is_primary').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [
    index('addresses_user_id_idx').on(t.userId),
    uniqueIndex('addresses_one_primary_per_user').on(t.userId).where(sql`${t.isPrimary} = true`),
  ]
);

// ── Catalog ──────────────────────────────────────────────────────

export const categories = pgTable('categories', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 80 }).notNull().unique(),
  icon: varchar('icon', { length: 40 }).notNull().default('fast-food'),
});

export const restaurants = pgTable(
  'restaurants',
  {
    id: serial('id').primaryKey(),
    name: varchar('name', { length: 140 }).notNull(),
    tags: varchar('tags', { length: 200 }).notNull().default(''),
    rating: numeric('rating', { precision: 3, scale: 1 }).notNull().default('4.5'),
    etaMin: integer('eta_min').notNull().default(15),
    etaMax: integer('eta_max').notNull().default(30),
    deliveryFree: boolean('delivery_free').notNull().default(true),
    isOpen: boolean('is_open').notNull().default(true),
    latitude: doublePrecision('latitude').notNull(),
    longitude: doublePrecision('longitude').notNull(),
    imageUrl: varchar('image_url', { length: 500 }).notNull().default(''),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [
    index('restaurants_lat_lon_idx').on(t.latitude, t.longitude),
  ]
);

export const restaurantCategories = pgTable(
  'restaurant_categories',
  {
    restaurantId: integer('restaurant_id').notNull().references(() => restaurants.id, { onDelete: 'cascade' }),
    categoryId: integer('category_id').notNull().references(() => categories.id, { onDelete: 'cascade' }),
  },
  (t) => [
    primaryKey({ columns: [t.restaurantId, t.categoryId] }),
  ]
);

export const products = pgTable(
  'products',
  {
    id: serial('id').primaryKey(),
    restaurantId: integer('restaurant_id').notNull().references(() => restaurants.id, { onDelete: 'cascade' }),
    title: varchar('title', { length: 140 }).notNull(),
    subtitle: varchar('subtitle', { length: 140 }).notNull().default(''),
    description: text('description').notNull().default(''),
    price: numeric('price', { precision: 10, scale: 2 }).notNull().default('0'),
    imageUrl: varchar('image_url', { length: 500 }).notNull().default(''),
    isAvailable: boolean('is_available').notNull().default(true),
    isVeg: boolean('is_veg').notNull().default(false),
    isSpicy: boolean('is_spicy').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [
    index('products_restaurant_id_idx').on(t.restaurantId),
  ]
);

export const productCategories = pgTable(
  'product_categories',
  {
    productId: integer('product_id').notNull().references(() => products.id, { onDelete: 'cascade' }),
    categoryId: integer('category_id').notNull().references(() => categories.id, { onDelete: 'cascade' }),
  },
  (t) => [
    primaryKey({ columns: [t.productId, t.categoryId] }),
  ]
);

// ── Cart / order / payment ───────────────────────────────────────

export const carts = pgTable(
  'carts',
  {
    id: serial('id').primaryKey(),
    userId: integer('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [
    index('carts_user_id_idx').on(t.userId),
    uniqueIndex('carts_one_active_per_user').on(t.userId).where(sql`${t.isActive} = true`),
  ]
);

export const cartItems = pgTable(
  'cart_items',
  {
    id: serial('id').primaryKey(),
    cartId: integer('cart_id').notNull().references(() => carts.id, { onDelete: 'cascade' }),
    productId: integer('product_id').notNull().references(() => products.id, { onDelete: 'cascade' }),
    title: varchar('title', { length: 140 }).notNull(),
    unitPrice: numeric('unit_price', { precision: 10, scale: 2 }).notNull(),
    qty: integer('qty').notNull().default(1),
  },
  (t) => [
    unique('cart_items_cart_product_unique').on(t.cartId, t.productId),
  ]
);

export const orders = pgTable(
  'orders',
  {
    id: serial('id').primaryKey(),
    userId: integer('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
    status: orderStatusEnum('status').notNull().default('pending'),
    addressText: varchar('address_text', { length: 255 }).notNull().default(''),
    subtotal: numeric('subtotal', { precision: 10, scale: 2 }).notNull(),
    deliveryFee: numeric('delivery_fee', { precision: 10, scale: 2 }).notNull().default('0'),
    total: numeric('total', { precision: 10, scale: 2 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [
    index('orders_user_id_idx').on(t.userId),
  ]
);

export const orderItems = pgTable(
  'order_items',
  {
    id: serial('id').primaryKey(),
    orderId: integer('order_id').notNull().references(() => orders.id, { onDelete: 'cascade' }),
    productId: integer('product_id').references(() => products.id, { onDelete: 'set null' }),
    title: varchar('title', { length: 140 }).notNull(),
    unitPrice: numeric('unit_price', { precision: 10, scale: 2 }).notNull(),
    qty: integer('qty').notNull(),
    subtotal: numeric('subtotal', { precision: 10, scale: 2 }).notNull(),
  },
  (t) => [
    index('order_items_order_id_idx').on(t.orderId),
  ]
);

export const payments = pgTable('payments', {
  id: serial('id').primaryKey(),
  orderId: integer('order_id').notNull().unique().references(() => orders.id, { onDelete: 'cascade' }),
  method: paymentMethodEnum('method').notNull().default('card'),
  amount: numeric('amount', { precision: 10, scale: 2 }).notNull(),
  status: paymentStatusEnum('status').notNull().default('created'),
  reference: varchar('reference', { length: 64 }).notNull().default(''),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});
