/**
 * =============================================================================
 * POSTGRES STORE (drizzle-orm + node-postgres)
 * =============================================================================
 *
 * Production implementation of the repository contracts.
 *
 * - One repository bundle per executor: the pool-bound `db` for plain calls,
 *   the transaction handle inside `transaction(work)`
 * - `listActiveByUser(..., { lock: true })` issues SELECT ... FOR UPDATE
 * - Racing inserts on unique keys use ON CONFLICT DO NOTHING and report null
 * - Constraint violations that slip through surface as AppErrors
 * =============================================================================
 */

import { DatabaseError, Pool } from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgDatabase, NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { and, asc, desc, eq, gte, ilike, inArray, lte, or, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { config } from '../../config/environment';
import { logger } from '../services/logger.service';
import { ConflictError, ValidationError } from '../types/error.types';
import type { BoundingBox } from '../utils/geospatial.utils';
import type {
  Address,
  Cart,
  CartItem,
  Category,
  Order,
  OrderItem,
  OrderStatus,
  OtpCode,
  OtpPurpose,
  Payment,
  Product,
  ProductDetails,
  Restaurant,
  RevokedToken,
  User,
  UserLocation,
} from './entities';
import type {
  AddressPatch,
  AddressRepository,
  CartRepository,
  CategoryPatch,
  CategoryRepository,
  DataStore,
  LocationRepository,
  NewAddress,
  NewCartItem,
  NewCategory,
  NewOrder,
  NewOrderItem,
  NewOtpCode,
  NewPayment,
  NewProduct,
  NewRestaurant,
  NewUser,
  OrderRepository,
  OtpRepository,
  PaymentPatch,
  PaymentRepository,
  ProductFilter,
  ProductPatch,
  ProductRepository,
  Repositories,
  RestaurantPatch,
  RestaurantRepository,
  TokenRepository,
  UserPatch,
  UserRepository,
} from './repository.interface';
import {
  addresses,
  cartItems,
  carts,
  categories,
  orderItems,
  orders,
  otpCodes,
  payments,
  productCategories,
  products,
  restaurantCategories,
  restaurants,
  revokedTokens,
  userLocations,
  users,
} from './schema';

type Executor = PgDatabase<NodePgQueryResultHKT>;

// =============================================================================
// HELPERS
// =============================================================================

/**
 * drizzle skips undefined keys in .set(); an all-undefined patch is a no-op
 */
function hasValues(patch: object): boolean {
  return Object.values(patch).some(value => value !== undefined);
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}

function groupIds<T>(rows: T[], key: (row: T) => number, value: (row: T) => number): Map<number, number[]> {
  const grouped = new Map<number, number[]>();
  for (const row of rows) {
    const list = grouped.get(key(row)) ?? [];
    list.push(value(row));
    grouped.set(key(row), list);
  }
  return grouped;
}

/**
 * Map constraint violations to client errors
 */
export function translateDbError(error: unknown): unknown {
  if (error instanceof DatabaseError) {
    if (error.code === '23505') {
      return new ConflictError('A record with the same unique value already exists', undefined, {
        constraint: error.constraint ?? null,
      });
    }
    if (error.code === '23503') {
      return new ValidationError('Referenced record does not exist');
    }
  }
  return error;
}

// =============================================================================
// REPOSITORIES
// =============================================================================

class PgUserRepository implements UserRepository {
  constructor(private readonly db: Executor) {}

  async findById(id: number): Promise<User | null> {
    const [row] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return row ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const [row] = await this.db.select().from(users).where(eq(users.email, email)).limit(1);
    return row ?? null;
  }

  async create(input: NewUser): Promise<User | null> {
    const [row] = await this.db
      .insert(users)
      .values({
        email: input.email,
        fullName: input.fullName,
        passwordHash: input.passwordHash,
        isStaff: input.isStaff ?? false,
      })
      .onConflictDoNothing({ target: users.email })
      .returning();
    return row ?? null;
  }

  async update(id: number, patch: UserPatch): Promise<User | null> {
    if (!hasValues(patch)) {
      return this.findById(id);
    }
    const [row] = await this.db.update(users).set(patch).where(eq(users.id, id)).returning();
    return row ?? null;
  }
}

class PgOtpRepository implements OtpRepository {
  constructor(private readonly db: Executor) {}

  async create(input: NewOtpCode): Promise<OtpCode> {
    const [row] = await this.db.insert(otpCodes).values(input).returning();
    return row;
  }

  async findLatestUnused(userId: number, purpose: OtpPurpose): Promise<OtpCode | null> {
    const [row] = await this.db
      .select()
      .from(otpCodes)
      .where(and(eq(otpCodes.userId, userId), eq(otpCodes.purpose, purpose), eq(otpCodes.isUsed, false)))
      .orderBy(desc(otpCodes.createdAt), desc(otpCodes.id))
      .limit(1);
    return row ?? null;
  }

  async incrementAttempts(id: number): Promise<void> {
    await this.db
      .update(otpCodes)
      .set({ attempts: sql`${otpCodes.attempts} + 1` })
      .where(eq(otpCodes.id, id));
  }

  async markUsed(id: number): Promise<boolean> {
    const rows = await this.db
      .update(otpCodes)
      .set({ isUsed: true })
      .where(and(eq(otpCodes.id, id), eq(otpCodes.isUsed, false)))
      .returning({ id: otpCodes.id });
    return rows.length > 0;
  }
}

class PgLocationRepository implements LocationRepository {
  constructor(private readonly db: Executor) {}

  async findByUser(userId: number): Promise<UserLocation | null> {
    const [row] = await this.db.select().from(userLocations).where(eq(userLocations.userId, userId)).limit(1);
    return row ?? null;
  }

  async upsert(userId: number, latitude: number, longitude: number): Promise<UserLocation> {
    const now = new Date();
    const [row] = await this.db
      .insert(userLocations)
      .values({ userId, latitude, longitude, updatedAt: now })
      .onConflictDoUpdate({
        target: userLocations.userId,
        set: { latitude, longitude, updatedAt: now },
      })
      .returning();
    return row;
  }
}

class PgAddressRepository implements AddressRepository {
  constructor(private readonly db: Executor) {}

  async listByUser(userId: number): Promise<Address[]> {
    return this.db
      .select()
      .from(addresses)
      .where(eq(addresses.userId, userId))
      .orderBy(desc(addresses.isPrimary), desc(addresses.createdAt), desc(addresses.id));
  }

  async findById(id: number): Promise<Address | null> {
    const [row] = await this.db.select().from(addresses).where(eq(addresses.id, id)).limit(1);
    return row ?? null;
  }

  async create(input: NewAddress): Promise<Address> {
    const [row] = await this.db.insert(addresses).values(input).returning();
    return row;
  }

  async update(id: number, patch: AddressPatch): Promise<Address | null> {
    if (!hasValues(patch)) {
      return this.findById(id);
    }
    const [row] = await this.db.update(addresses).set(patch).where(eq(addresses.id, id)).returning();
    return row ?? null;
  }

  async delete(id: number): Promise<boolean> {
    const rows = await this.db.delete(addresses).where(eq(addresses.id, id)).returning({ id: addresses.id });
    return rows.length > 0;
  }

  async clearPrimary(userId: number): Promise<void> {
    await this.db
      .update(addresses)
      .set({ isPrimary: false })
      .where(and(eq(addresses.userId, userId), eq(addresses.isPrimary, true)));
  }
}

class PgCategoryRepository implements CategoryRepository {
  constructor(private readonly db: Executor) {}

  async list(): Promise<Category[]> {
    return this.db.select().from(categories).orderBy(asc(categories.name));
  }

  async listByIds(ids: number[]): Promise<Category[]> {
    if (ids.length === 0) return [];
    return this.db.select().from(categories).where(inArray(categories.id, ids)).orderBy(asc(categories.name));
  }

  async findById(id: number): Promise<Category | null> {
    const [row] = await this.db.select().from(categories).where(eq(categories.id, id)).limit(1);
    return row ?? null;
  }

  async findByName(name: string): Promise<Category | null> {
    const [row] = await this.db
      .select()
      .from(categories)
      .where(sql`lower(${categories.name}) = ${name.toLowerCase()}`)
      .limit(1);
    return row ?? null;
  }

  async create(input: NewCategory): Promise<Category | null> {
    const [row] = await this.db
      .insert(categories)
      .values(input)
      .onConflictDoNothing({ target: categories.name })
      .returning();
    return row ?? null;
  }

  async update(id: number, patch: CategoryPatch): Promise<Category | null> {
    if (!hasValues(patch)) {
      return this.findById(id);
    }
    const [row] = await this.db.update(categories).set(patch).where(eq(categories.id, id)).returning();
    return row ?? null;
  }

  async delete(id: number): Promise<boolean> {
    const rows = await this.db.delete(categories).where(eq(categories.id, id)).returning({ id: categories.id });
    return rows.length > 0;
  }
}

type RestaurantRow = typeof restaurants.$inferSelect;

class PgRestaurantRepository implements RestaurantRepository {
  constructor(private readonly db: Executor) {}

  private async withCategories(rows: RestaurantRow[]): Promise<Restaurant[]> {
    if (rows.length === 0) return [];
    const links = await this.db
      .select()
      .from(restaurantCategories)
      .where(inArray(restaurantCategories.restaurantId, rows.map(row => row.id)))
      .orderBy(asc(restaurantCategories.categoryId));
    const byRestaurant = groupIds(links, link => link.restaurantId, link => link.categoryId);
    return rows.map(row => ({ ...row, categoryIds: byRestaurant.get(row.id) ?? [] }));
  }

  private async replaceCategories(restaurantId: number, categoryIds: number[]): Promise<void> {
    await this.db.delete(restaurantCategories).where(eq(restaurantCategories.restaurantId, restaurantId));
    if (categoryIds.length > 0) {
      await this.db
        .insert(restaurantCategories)
        .values([...new Set(categoryIds)].map(categoryId => ({ restaurantId, categoryId })));
    }
  }

  async list(): Promise<Restaurant[]> {
    const rows = await this.db.select().from(restaurants).orderBy(desc(restaurants.createdAt), desc(restaurants.id));
    return this.withCategories(rows);
  }

  async listOpen(limit: number): Promise<Restaurant[]> {
    const rows = await this.db
      .select()
      .from(restaurants)
      .where(eq(restaurants.isOpen, true))
      .orderBy(asc(restaurants.id))
      .limit(limit);
    return this.withCategories(rows);
  }

  async listOpenWithin(box: BoundingBox): Promise<Restaurant[]> {
    const rows = await this.db
      .select()
      .from(restaurants)
      .where(and(
        eq(restaurants.isOpen, true),
        gte(restaurants.latitude, box.minLat),
        lte(restaurants.latitude, box.maxLat),
        gte(restaurants.longitude, box.minLon),
        lte(restaurants.longitude, box.maxLon),
      ))
      .orderBy(asc(restaurants.id));
    return this.withCategories(rows);
  }

  async findById(id: number): Promise<Restaurant | null> {
    const rows = await this.db.select().from(restaurants).where(eq(restaurants.id, id)).limit(1);
    const [restaurant] = await this.withCategories(rows);
    return restaurant ?? null;
  }

  async create(input: NewRestaurant): Promise<Restaurant> {
    const { categoryIds, ...fields } = input;
    const [row] = await this.db.insert(restaurants).values(fields).returning();
    await this.replaceCategories(row.id, categoryIds);
    const [restaurant] = await this.withCategories([row]);
    return restaurant;
  }

  async update(id: number, patch: RestaurantPatch): Promise<Restaurant | null> {
    const { categoryIds, ...fields } = patch;
    if (hasValues(fields)) {
      await this.db.update(restaurants).set(fields).where(eq(restaurants.id, id));
    }
    const existing = await this.findById(id);
    if (!existing) return null;
    if (categoryIds !== undefined) {
      await this.replaceCategories(id, categoryIds);
      return this.findById(id);
    }
    return existing;
  }

  async delete(id: number): Promise<boolean> {
    const rows = await this.db.delete(restaurants).where(eq(restaurants.id, id)).returning({ id: restaurants.id });
    return rows.length > 0;
  }
}

type ProductRow = typeof products.$inferSelect;

class PgProductRepository implements ProductRepository {
  constructor(private readonly db: Executor) {}

  private async categoryLinks(productIds: number[]): Promise<Map<number, { ids: number[]; names: string[] }>> {
    const grouped = new Map<number, { ids: number[]; names: string[] }>();
    if (productIds.length === 0) return grouped;
    const links = await this.db
      .select({ productId: productCategories.productId, categoryId: categories.id, name: categories.name })
      .from(productCategories)
      .innerJoin(categories, eq(categories.id, productCategories.categoryId))
      .where(inArray(productCategories.productId, productIds))
      .orderBy(asc(categories.id));
    for (const link of links) {
      const entry = grouped.get(link.productId) ?? { ids: [], names: [] };
      entry.ids.push(link.categoryId);
      entry.names.push(link.name);
      grouped.set(link.productId, entry);
    }
    return grouped;
  }

  private async toDetails(rows: { product: ProductRow; restaurantName: string }[]): Promise<ProductDetails[]> {
    const links = await this.categoryLinks(rows.map(row => row.product.id));
    return rows.map(({ product, restaurantName }) => {
      const entry = links.get(product.id);
      return {
        ...product,
        restaurantName,
        categoryIds: entry?.ids ?? [],
        categoryNames: entry?.names ?? [],
      };
    });
  }

  private async replaceCategories(productId: number, categoryIds: number[]): Promise<void> {
    await this.db.delete(productCategories).where(eq(productCategories.productId, productId));
    if (categoryIds.length > 0) {
      await this.db
        .insert(productCategories)
        .values([...new Set(categoryIds)].map(categoryId => ({ productId, categoryId })));
    }
  }

  private detailsQuery(conditions: SQL[]) {
    return this.db
      .select({ product: products, restaurantName: restaurants.name })
      .from(products)
      .innerJoin(restaurants, eq(restaurants.id, products.restaurantId))
      .where(and(...conditions))
      .orderBy(desc(products.createdAt), desc(products.id));
  }

  async list(filter: ProductFilter): Promise<ProductDetails[]> {
    const conditions: SQL[] = [];

    if (filter.restaurantId !== undefined) {
      conditions.push(eq(products.restaurantId, filter.restaurantId));
    }
    if (filter.categoryId !== undefined) {
      conditions.push(inArray(
        products.id,
        this.db
          .select({ id: productCategories.productId })
          .from(productCategories)
          .where(eq(productCategories.categoryId, filter.categoryId)),
      ));
    }
    if (filter.categoryName) {
      conditions.push(inArray(
        products.id,
        this.db
          .select({ id: productCategories.productId })
          .from(productCategories)
          .innerJoin(categories, eq(categories.id, productCategories.categoryId))
          .where(sql`lower(${categories.name}) = ${filter.categoryName.toLowerCase()}`),
      ));
    }
    if (filter.availableOnly) {
      conditions.push(eq(products.isAvailable, true));
    }
    if (filter.search) {
      const pattern = `%${escapeLike(filter.search)}%`;
      const match = or(
        ilike(products.title, pattern),
        ilike(products.subtitle, pattern),
        ilike(products.description, pattern),
        ilike(restaurants.name, pattern),
      );
      if (match) conditions.push(match);
    }

    return this.toDetails(await this.detailsQuery(conditions));
  }

  async findById(id: number): Promise<Product | null> {
    const [row] = await this.db.select().from(products).where(eq(products.id, id)).limit(1);
    if (!row) return null;
    const links = await this.categoryLinks([row.id]);
    return { ...row, categoryIds: links.get(row.id)?.ids ?? [] };
  }

  async findDetails(id: number): Promise<ProductDetails | null> {
    const [details] = await this.toDetails(await this.detailsQuery([eq(products.id, id)]));
    return details ?? null;
  }

  async create(input: NewProduct): Promise<Product> {
    const { categoryIds, ...fields } = input;
    const [row] = await this.db.insert(products).values(fields).returning();
    await this.replaceCategories(row.id, categoryIds);
    return { ...row, categoryIds: [...new Set(categoryIds)].sort((a, b) => a - b) };
  }

  async update(id: number, patch: ProductPatch): Promise<Product | null> {
    const { categoryIds, ...fields } = patch;
    if (hasValues(fields)) {
      await this.db.update(products).set(fields).where(eq(products.id, id));
    }
    const existing = await this.findById(id);
    if (!existing) return null;
    if (categoryIds !== undefined) {
      await this.replaceCategories(id, categoryIds);
      return this.findById(id);
    }
    return existing;
  }

  async delete(id: number): Promise<boolean> {
    const rows = await this.db.delete(products).where(eq(products.id, id)).returning({ id: products.id });
    return rows.length > 0;
  }
}

class PgCartRepository implements CartRepository {
  constructor(private readonly db: Executor) {}

  async listActiveByUser(userId: number, options: { lock?: boolean } = {}): Promise<Cart[]> {
    const query = this.db
      .select()
      .from(carts)
      .where(and(eq(carts.userId, userId), eq(carts.isActive, true)))
      .orderBy(desc(carts.updatedAt), desc(carts.id));
    return options.lock ? query.for('update') : query;
  }

  async findById(id: number): Promise<Cart | null> {
    const [row] = await this.db.select().from(carts).where(eq(carts.id, id)).limit(1);
    return row ?? null;
  }

  async createActive(userId: number): Promise<Cart | null> {
    const [row] = await this.db
      .insert(carts)
      .values({ userId, isActive: true })
      .onConflictDoNothing({ target: carts.userId, where: sql`${carts.isActive} = true` })
      .returning();
    return row ?? null;
  }

  async deactivate(cartIds: number[]): Promise<void> {
    if (cartIds.length === 0) return;
    await this.db.update(carts).set({ isActive: false }).where(inArray(carts.id, cartIds));
  }

  async touch(cartId: number): Promise<void> {
    await this.db.update(carts).set({ updatedAt: new Date() }).where(eq(carts.id, cartId));
  }

  async userIdsWithDuplicateActiveCarts(): Promise<number[]> {
    const rows = await this.db
      .select({ userId: carts.userId })
      .from(carts)
      .where(eq(carts.isActive, true))
      .groupBy(carts.userId)
      .having(sql`count(*) > 1`)
      .orderBy(asc(carts.userId));
    return rows.map(row => row.userId);
  }

  async listItems(cartId: number): Promise<CartItem[]> {
    return this.db.select().from(cartItems).where(eq(cartItems.cartId, cartId)).orderBy(asc(cartItems.id));
  }

  async findItemByProduct(cartId: number, productId: number): Promise<CartItem | null> {
    const [row] = await this.db
      .select()
      .from(cartItems)
      .where(and(eq(cartItems.cartId, cartId), eq(cartItems.productId, productId)))
      .limit(1);
    return row ?? null;
  }

  async findActiveItem(itemId: number): Promise<CartItem | null> {
    const [row] = await this.db
      .select({ item: cartItems })
      .from(cartItems)
      .innerJoin(carts, eq(carts.id, cartItems.cartId))
      .where(and(eq(cartItems.id, itemId), eq(carts.isActive, true)))
      .limit(1);
    return row?.item ?? null;
  }

  async insertItem(input: NewCartItem): Promise<CartItem> {
    const [row] = await this.db.insert(cartItems).values(input).returning();
    return row;
  }

  async updateItemQty(itemId: number, qty: number): Promise<CartItem | null> {
    const [row] = await this.db.update(cartItems).set({ qty }).where(eq(cartItems.id, itemId)).returning();
    return row ?? null;
  }

  async deleteItem(itemId: number): Promise<boolean> {
    const rows = await this.db.delete(cartItems).where(eq(cartItems.id, itemId)).returning({ id: cartItems.id });
    return rows.length > 0;
  }

  async deleteItems(cartId: number): Promise<number> {
    const rows = await this.db.delete(cartItems).where(eq(cartItems.cartId, cartId)).returning({ id: cartItems.id });
    return rows.length;
  }
}

class PgOrderRepository implements OrderRepository {
  constructor(private readonly db: Executor) {}

  async create(input: NewOrder): Promise<Order> {
    const [row] = await this.db.insert(orders).values(input).returning();
    return row;
  }

  async insertItems(items: NewOrderItem[]): Promise<OrderItem[]> {
    if (items.length === 0) return [];
    return this.db.insert(orderItems).values(items).returning();
  }

  async findById(id: number, options: { lock?: boolean } = {}): Promise<Order | null> {
    const query = this.db.select().from(orders).where(eq(orders.id, id)).limit(1);
    const [row] = options.lock ? await query.for('update') : await query;
    return row ?? null;
  }

  async listByUser(userId: number): Promise<Order[]> {
    return this.db
      .select()
      .from(orders)
      .where(eq(orders.userId, userId))
      .orderBy(desc(orders.createdAt), desc(orders.id));
  }

  async listItems(orderIds: number[]): Promise<OrderItem[]> {
    if (orderIds.length === 0) return [];
    return this.db.select().from(orderItems).where(inArray(orderItems.orderId, orderIds)).orderBy(asc(orderItems.id));
  }

  async updateStatus(id: number, status: OrderStatus): Promise<void> {
    await this.db.update(orders).set({ status }).where(eq(orders.id, id));
  }
}

class PgPaymentRepository implements PaymentRepository {
  constructor(private readonly db: Executor) {}

  async create(input: NewPayment): Promise<Payment> {
    const [row] = await this.db.insert(payments).values(input).returning();
    return row;
  }

  async findByOrder(orderId: number): Promise<Payment | null> {
    const [row] = await this.db.select().from(payments).where(eq(payments.orderId, orderId)).limit(1);
    return row ?? null;
  }

  async listByOrders(orderIds: number[]): Promise<Payment[]> {
    if (orderIds.length === 0) return [];
    return this.db.select().from(payments).where(inArray(payments.orderId, orderIds));
  }

  async update(id: number, patch: PaymentPatch): Promise<Payment | null> {
    if (!hasValues(patch)) {
      const [row] = await this.db.select().from(payments).where(eq(payments.id, id)).limit(1);
      return row ?? null;
    }
    const [row] = await this.db.update(payments).set(patch).where(eq(payments.id, id)).returning();
    return row ?? null;
  }
}

class PgTokenRepository implements TokenRepository {
  constructor(private readonly db: Executor) {}

  async revoke(token: RevokedToken): Promise<void> {
    await this.db.insert(revokedTokens).values(token).onConflictDoNothing({ target: revokedTokens.jti });
  }

  async isRevoked(jti: string): Promise<boolean> {
    const [row] = await this.db
      .select({ jti: revokedTokens.jti })
      .from(revokedTokens)
      .where(eq(revokedTokens.jti, jti))
      .limit(1);
    return row !== undefined;
  }
}

function createRepositories(db: Executor): Repositories {
  return {
    users: new PgUserRepository(db),
    otps: new PgOtpRepository(db),
    locations: new PgLocationRepository(db),
    addresses: new PgAddressRepository(db),
    categories: new PgCategoryRepository(db),
    restaurants: new PgRestaurantRepository(db),
    products: new PgProductRepository(db),
    carts: new PgCartRepository(db),
    orders: new PgOrderRepository(db),
    payments: new PgPaymentRepository(db),
    tokens: new PgTokenRepository(db),
  };
}

// =============================================================================
// STORE
// =============================================================================

export class PostgresStore implements DataStore {
  readonly driver = 'postgres' as const;
  readonly repos: Repositories;
  private readonly db: NodePgDatabase;

  constructor(private readonly pool: Pool) {
    this.db = drizzle(pool);
    this.repos = createRepositories(this.db);
  }

  static fromConfig(): PostgresStore {
    const pool = new Pool({
      connectionString: config.database.url,
      max: config.database.poolMax,
    });
    pool.on('error', (error) => {
      logger.error('Idle database client error', { error: error.message });
    });
    return new PostgresStore(pool);
  }

  async transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction(tx => work(createRepositories(tx)));
    } catch (error) {
      throw translateDbError(error);
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      logger.warn('Database ping failed', { error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
