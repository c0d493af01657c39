/**
 * =============================================================================
 * MEMORY STORE
 * =============================================================================
 *
 * In-process implementation of the repository contracts, selected with
 * DB_DRIVER=memory and used by the test suite.
 *
 * - Every call and every transaction runs through one promise-chain mutex,
 *   so a transaction sees no interleaved writes (the FOR UPDATE analogue)
 * - A transaction snapshots all tables first and restores them on throw
 * - Unique rules of the SQL schema are enforced here as well: one active
 *   cart per user, one primary address per user, one row per
 *   (cart, product), one payment per order, unique emails and category names
 * - Rows are cloned on the way out; callers never hold live table rows
 * =============================================================================
 */

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
import { ConflictError, ValidationError } from '../types/error.types';
import type { BoundingBox } from '../utils/geospatial.utils';

export interface Tables {
  sequences: Record<SequenceName, number>;
  users: User[];
  otps: OtpCode[];
  locations: UserLocation[];
  addresses: Address[];
  categories: Category[];
  restaurants: Restaurant[];
  products: Product[];
  carts: Cart[];
  cartItems: CartItem[];
  orders: Order[];
  orderItems: OrderItem[];
  payments: Payment[];
  revokedTokens: RevokedToken[];
}

export type SequenceName =
  | 'users'
  | 'otps'
  | 'addresses'
  | 'categories'
  | 'restaurants'
  | 'products'
  | 'carts'
  | 'cartItems'
  | 'orders'
  | 'orderItems'
  | 'payments';

function emptyTables(): Tables {
  return {
    sequences: {
      users: 0,
      otps: 0,
      addresses: 0,
      categories: 0,
      restaurants: 0,
      products: 0,
      carts: 0,
      cartItems: 0,
      orders: 0,
      orderItems: 0,
      payments: 0,
    },
    users: [],
    otps: [],
    locations: [],
    addresses: [],
    categories: [],
    restaurants: [],
    products: [],
    carts: [],
    cartItems: [],
    orders: [],
    orderItems: [],
    payments: [],
    revokedTokens: [],
  };
}

/**
 * Next serial id for a table
 */
export function nextId(tables: Tables, name: SequenceName): number {
  tables.sequences[name] += 1;
  return tables.sequences[name];
}

type Run = <T>(fn: (tables: Tables) => T) => Promise<T>;

const byNewest = <T extends { id: number; createdAt: Date }>(a: T, b: T): number =>
  b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;

function sortedIds(ids: number[]): number[] {
  return [...new Set(ids)].sort((a, b) => a - b);
}

function assignDefined<T extends object>(target: T, patch: Partial<T>): void {
  Object.assign(target, Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined)));
}

function removeWhere<T>(rows: T[], predicate: (row: T) => boolean): number {
  let removed = 0;
  for (let i = rows.length - 1; i >= 0; i -= 1) {
    if (predicate(rows[i])) {
      rows.splice(i, 1);
      removed += 1;
    }
  }
  return removed;
}

function requireCategories(tables: Tables, ids: number[]): void {
  if (ids.some(id => !tables.categories.some(category => category.id === id))) {
    throw new ValidationError('Referenced record does not exist');
  }
}

// =============================================================================
// REPOSITORIES
// =============================================================================

class MemoryUserRepository implements UserRepository {
  constructor(private readonly run: Run) {}

  findById(id: number): Promise<User | null> {
    return this.run(t => t.users.find(user => user.id === id) ?? null);
  }

  findByEmail(email: string): Promise<User | null> {
    return this.run(t => t.users.find(user => user.email === email) ?? null);
  }

  create(input: NewUser): Promise<User | null> {
    return this.run(t => {
      if (t.users.some(user => user.email === input.email)) return null;
      const user: User = {
        id: nextId(t, 'users'),
        email: input.email,
        fullName: input.fullName,
        passwordHash: input.passwordHash,
        isActive: true,
        isStaff: input.isStaff ?? false,
        tokensRevokedAt: null,
        dateJoined: new Date(),
      };
      t.users.push(user);
      return user;
    });
  }

  update(id: number, patch: UserPatch): Promise<User | null> {
    return this.run(t => {
      const user = t.users.find(row => row.id === id);
      if (!user) return null;
      assignDefined(user, patch);
      return user;
    });
  }
}

class MemoryOtpRepository implements OtpRepository {
  constructor(private readonly run: Run) {}

  create(input: NewOtpCode): Promise<OtpCode> {
    return this.run(t => {
      const otp: OtpCode = {
        id: nextId(t, 'otps'),
        ...input,
        createdAt: new Date(),
        attempts: 0,
        isUsed: false,
      };
      t.otps.push(otp);
      return otp;
    });
  }

  findLatestUnused(userId: number, purpose: OtpPurpose): Promise<OtpCode | null> {
    return this.run(t => t.otps
      .filter(otp => otp.userId === userId && otp.purpose === purpose && !otp.isUsed)
      .sort(byNewest)[0] ?? null);
  }

  incrementAttempts(id: number): Promise<void> {
    return this.run(t => {
      const otp = t.otps.find(row => row.id === id);
      if (otp) otp.attempts += 1;
    });
  }

  markUsed(id: number): Promise<boolean> {
    return this.run(t => {
      const otp = t.otps.find(row => row.id === id);
      if (!otp || otp.isUsed) return false;
      otp.isUsed = true;
      return true;
    });
  }
}

class MemoryLocationRepository implements LocationRepository {
  constructor(private readonly run: Run) {}

  findByUser(userId: number): Promise<UserLocation | null> {
    return this.run(t => t.locations.find(location => location.userId === userId) ?? null);
  }

  upsert(userId: number, latitude: number, longitude: number): Promise<UserLocation> {
    return this.run(t => {
      const existing = t.locations.find(location => location.userId === userId);
      if (existing) {
        existing.latitude = latitude;
        existing.longitude = longitude;
        existing.updatedAt = new Date();
        return existing;
      }
      const location: UserLocation = { userId, latitude, longitude, updatedAt: new Date() };
      t.locations.push(location);
      return location;
    });
  }
}

class MemoryAddressRepository implements AddressRepository {
  constructor(private readonly run: Run) {}

  private static assertSinglePrimary(t: Tables, userId: number, exceptId: number): void {
    if (t.addresses.some(row => row.userId === userId && row.isPrimary && row.id !== exceptId)) {
      throw new ConflictError('A record with the same unique value already exists', undefined, {
        constraint: 'addresses_one_primary_per_user',
      });
    }
  }

  listByUser(userId: number): Promise<Address[]> {
    return this.run(t => t.addresses
      .filter(address => address.userId === userId)
      .sort((a, b) => Number(b.isPrimary) - Number(a.isPrimary) || byNewest(a, b)));
  }

  findById(id: number): Promise<Address | null> {
    return this.run(t => t.addresses.find(address => address.id === id) ?? null);
  }

  create(input: NewAddress): Promise<Address> {
    return this.run(t => {
      if (input.isPrimary) MemoryAddressRepository.assertSinglePrimary(t, input.userId, 0);
      const address: Address = { id: nextId(t, 'addresses'), ...input, createdAt: new Date() };
      t.addresses.push(address);
      return address;
    });
  }

  update(id: number, patch: AddressPatch): Promise<Address | null> {
    return this.run(t => {
      const address = t.addresses.find(row => row.id === id);
      if (!address) return null;
      if (patch.isPrimary) MemoryAddressRepository.assertSinglePrimary(t, address.userId, id);
      assignDefined(address, patch);
      return address;
    });
  }

  delete(id: number): Promise<boolean> {
    return this.run(t => removeWhere(t.addresses, address => address.id === id) > 0);
  }

  clearPrimary(userId: number): Promise<void> {
    return this.run(t => {
      for (const address of t.addresses) {
        if (address.userId === userId) address.isPrimary = false;
      }
    });
  }
}

class MemoryCategoryRepository implements CategoryRepository {
  constructor(private readonly run: Run) {}

  list(): Promise<Category[]> {
    return this.run(t => [...t.categories].sort((a, b) => a.name.localeCompare(b.name)));
  }

  listByIds(ids: number[]): Promise<Category[]> {
    return this.run(t => t.categories
      .filter(category => ids.includes(category.id))
      .sort((a, b) => a.name.localeCompare(b.name)));
  }

  findById(id: number): Promise<Category | null> {
    return this.run(t => t.categories.find(category => category.id === id) ?? null);
  }

  findByName(name: string): Promise<Category | null> {
    const wanted = name.toLowerCase();
    return this.run(t => t.categories.find(category => category.name.toLowerCase() === wanted) ?? null);
  }

  create(input: NewCategory): Promise<Category | null> {
    return this.run(t => {
      if (t.categories.some(category => category.name === input.name)) return null;
      const category: Category = { id: nextId(t, 'categories'), ...input };
      t.categories.push(category);
      return category;
    });
  }

  update(id: number, patch: CategoryPatch): Promise<Category | null> {
    return this.run(t => {
      const category = t.categories.find(row => row.id === id);
      if (!category) return null;
      if (patch.name !== undefined && t.categories.some(row => row.name === patch.name && row.id !== id)) {
        throw new ConflictError('A record with the same unique value already exists');
      }
      assignDefined(category, patch);
      return category;
    });
  }

  delete(id: number): Promise<boolean> {
    return this.run(t => {
      const removed = removeWhere(t.categories, category => category.id === id) > 0;
      if (removed) {
        for (const restaurant of t.restaurants) {
          restaurant.categoryIds = restaurant.categoryIds.filter(categoryId => categoryId !== id);
        }
        for (const product of t.products) {
          product.categoryIds = product.categoryIds.filter(categoryId => categoryId !== id);
        }
      }
      return removed;
    });
  }
}

class MemoryRestaurantRepository implements RestaurantRepository {
  constructor(private readonly run: Run) {}

  list(): Promise<Restaurant[]> {
    return this.run(t => [...t.restaurants].sort(byNewest));
  }

  listOpen(limit: number): Promise<Restaurant[]> {
    return this.run(t => t.restaurants.filter(restaurant => restaurant.isOpen).slice(0, limit));
  }

  listOpenWithin(box: BoundingBox): Promise<Restaurant[]> {
    return this.run(t => t.restaurants.filter(restaurant =>
      restaurant.isOpen &&
      restaurant.latitude >= box.minLat &&
      restaurant.latitude <= box.maxLat &&
      restaurant.longitude >= box.minLon &&
      restaurant.longitude <= box.maxLon
    ));
  }

  findById(id: number): Promise<Restaurant | null> {
    return this.run(t => t.restaurants.find(restaurant => restaurant.id === id) ?? null);
  }

  create(input: NewRestaurant): Promise<Restaurant> {
    return this.run(t => {
      requireCategories(t, input.categoryIds);
      const restaurant: Restaurant = {
        id: nextId(t, 'restaurants'),
        ...input,
        categoryIds: sortedIds(input.categoryIds),
        createdAt: new Date(),
      };
      t.restaurants.push(restaurant);
      return restaurant;
    });
  }

  update(id: number, patch: RestaurantPatch): Promise<Restaurant | null> {
    return this.run(t => {
      const restaurant = t.restaurants.find(row => row.id === id);
      if (!restaurant) return null;
      if (patch.categoryIds !== undefined) requireCategories(t, patch.categoryIds);
      assignDefined(restaurant, patch);
      restaurant.categoryIds = sortedIds(restaurant.categoryIds);
      return restaurant;
    });
  }

  delete(id: number): Promise<boolean> {
    return this.run(t => {
      const removed = removeWhere(t.restaurants, restaurant => restaurant.id === id) > 0;
      if (removed) {
        const productIds = t.products.filter(product => product.restaurantId === id).map(product => product.id);
        deleteProducts(t, productIds);
      }
      return removed;
    });
  }
}

/**
 * Product delete cascades to cart items and detaches order items
 */
function deleteProducts(t: Tables, productIds: number[]): number {
  const removed = removeWhere(t.products, product => productIds.includes(product.id));
  removeWhere(t.cartItems, item => productIds.includes(item.productId));
  for (const item of t.orderItems) {
    if (item.productId !== null && productIds.includes(item.productId)) item.productId = null;
  }
  return removed;
}

function toDetails(t: Tables, product: Product): ProductDetails {
  const restaurant = t.restaurants.find(row => row.id === product.restaurantId);
  const names = product.categoryIds
    .map(categoryId => t.categories.find(category => category.id === categoryId)?.name)
    .filter((name): name is string => name !== undefined);
  return {
    ...product,
    restaurantName: restaurant?.name ?? '',
    categoryNames: names,
  };
}

class MemoryProductRepository implements ProductRepository {
  constructor(private readonly run: Run) {}

  list(filter: ProductFilter): Promise<ProductDetails[]> {
    return this.run(t => {
      const categoryName = filter.categoryName?.toLowerCase();
      const search = filter.search?.toLowerCase();

      return t.products
        .map(product => toDetails(t, product))
        .filter(product => {
          if (filter.restaurantId !== undefined && product.restaurantId !== filter.restaurantId) return false;
          if (filter.categoryId !== undefined && !product.categoryIds.includes(filter.categoryId)) return false;
          if (categoryName && !product.categoryNames.some(name => name.toLowerCase() === categoryName)) return false;
          if (filter.availableOnly && !product.isAvailable) return false;
          if (search) {
            const haystack = [product.title, product.subtitle, product.description, product.restaurantName];
            if (!haystack.some(text => text.toLowerCase().includes(search))) return false;
          }
          return true;
        })
        .sort(byNewest);
    });
  }

  findById(id: number): Promise<Product | null> {
    return this.run(t => t.products.find(product => product.id === id) ?? null);
  }

  findDetails(id: number): Promise<ProductDetails | null> {
    return this.run(t => {
      const product = t.products.find(row => row.id === id);
      return product ? toDetails(t, product) : null;
    });
  }

  create(input: NewProduct): Promise<Product> {
    return this.run(t => {
      if (!t.restaurants.some(restaurant => restaurant.id === input.restaurantId)) {
        throw new ValidationError('Referenced record does not exist');
      }
      requireCategories(t, input.categoryIds);
      const product: Product = {
        id: nextId(t, 'products'),
        ...input,
        categoryIds: sortedIds(input.categoryIds),
        createdAt: new Date(),
      };
      t.products.push(product);
      return product;
    });
  }

  update(id: number, patch: ProductPatch): Promise<Product | null> {
    return this.run(t => {
      const product = t.products.find(row => row.id === id);
      if (!product) return null;
      if (patch.restaurantId !== undefined && !t.restaurants.some(restaurant => restaurant.id === patch.restaurantId)) {
        throw new ValidationError('Referenced record does not exist');
      }
      if (patch.categoryIds !== undefined) requireCategories(t, patch.categoryIds);
      assignDefined(product, patch);
      product.categoryIds = sortedIds(product.categoryIds);
      return product;
    });
  }

  delete(id: number): Promise<boolean> {
    return this.run(t => deleteProducts(t, [id]) > 0);
  }
}

class MemoryCartRepository implements CartRepository {
  constructor(private readonly run: Run) {}

  listActiveByUser(userId: number): Promise<Cart[]> {
    return this.run(t => t.carts
      .filter(cart => cart.userId === userId && cart.isActive)
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime() || b.id - a.id));
  }

  findById(id: number): Promise<Cart | null> {
    return this.run(t => t.carts.find(cart => cart.id === id) ?? null);
  }

  createActive(userId: number): Promise<Cart | null> {
    return this.run(t => {
      if (t.carts.some(cart => cart.userId === userId && cart.isActive)) return null;
      const now = new Date();
      const cart: Cart = { id: nextId(t, 'carts'), userId, isActive: true, createdAt: now, updatedAt: now };
      t.carts.push(cart);
      return cart;
    });
  }

  deactivate(cartIds: number[]): Promise<void> {
    return this.run(t => {
      for (const cart of t.carts) {
        if (cartIds.includes(cart.id)) cart.isActive = false;
      }
    });
  }

  touch(cartId: number): Promise<void> {
    return this.run(t => {
      const cart = t.carts.find(row => row.id === cartId);
      if (cart) cart.updatedAt = new Date();
    });
  }

  userIdsWithDuplicateActiveCarts(): Promise<number[]> {
    return this.run(t => {
      const counts = new Map<number, number>();
      for (const cart of t.carts) {
        if (cart.isActive) counts.set(cart.userId, (counts.get(cart.userId) ?? 0) + 1);
      }
      return [...counts.entries()]
        .filter(([, total]) => total > 1)
        .map(([userId]) => userId)
        .sort((a, b) => a - b);
    });
  }

  listItems(cartId: number): Promise<CartItem[]> {
    return this.run(t => t.cartItems.filter(item => item.cartId === cartId));
  }

  findItemByProduct(cartId: number, productId: number): Promise<CartItem | null> {
    return this.run(t => t.cartItems.find(item => item.cartId === cartId && item.productId === productId) ?? null);
  }

  findActiveItem(itemId: number): Promise<CartItem | null> {
    return this.run(t => {
      const item = t.cartItems.find(row => row.id === itemId);
      if (!item) return null;
      const cart = t.carts.find(row => row.id === item.cartId);
      return cart?.isActive ? item : null;
    });
  }

  insertItem(input: NewCartItem): Promise<CartItem> {
    return this.run(t => {
      if (t.cartItems.some(item => item.cartId === input.cartId && item.productId === input.productId)) {
        throw new ConflictError('A record with the same unique value already exists', undefined, {
          constraint: 'cart_items_cart_product_unique',
        });
      }
      const item: CartItem = { id: nextId(t, 'cartItems'), ...input };
      t.cartItems.push(item);
      return item;
    });
  }

  updateItemQty(itemId: number, qty: number): Promise<CartItem | null> {
    return this.run(t => {
      const item = t.cartItems.find(row => row.id === itemId);
      if (!item) return null;
      item.qty = qty;
      return item;
    });
  }

  deleteItem(itemId: number): Promise<boolean> {
    return this.run(t => removeWhere(t.cartItems, item => item.id === itemId) > 0);
  }

  deleteItems(cartId: number): Promise<number> {
    return this.run(t => removeWhere(t.cartItems, item => item.cartId === cartId));
  }
}

class MemoryOrderRepository implements OrderRepository {
  constructor(private readonly run: Run) {}

  create(input: NewOrder): Promise<Order> {
    return this.run(t => {
      const order: Order = { id: nextId(t, 'orders'), ...input, createdAt: new Date() };
      t.orders.push(order);
      return order;
    });
  }

  insertItems(items: NewOrderItem[]): Promise<OrderItem[]> {
    return this.run(t => items.map(input => {
      const item: OrderItem = { id: nextId(t, 'orderItems'), ...input };
      t.orderItems.push(item);
      return item;
    }));
  }

  findById(id: number): Promise<Order | null> {
    return this.run(t => t.orders.find(order => order.id === id) ?? null);
  }

  listByUser(userId: number): Promise<Order[]> {
    return this.run(t => t.orders.filter(order => order.userId === userId).sort(byNewest));
  }

  listItems(orderIds: number[]): Promise<OrderItem[]> {
    return this.run(t => t.orderItems.filter(item => orderIds.includes(item.orderId)));
  }

  updateStatus(id: number, status: OrderStatus): Promise<void> {
    return this.run(t => {
      const order = t.orders.find(row => row.id === id);
      if (order) order.status = status;
    });
  }
}

class MemoryPaymentRepository implements PaymentRepository {
  constructor(private readonly run: Run) {}

  create(input: NewPayment): Promise<Payment> {
    return this.run(t => {
      if (t.payments.some(payment => payment.orderId === input.orderId)) {
        throw new ConflictError('A record with the same unique value already exists');
      }
      const payment: Payment = { id: nextId(t, 'payments'), ...input, reference: '', createdAt: new Date() };
      t.payments.push(payment);
      return payment;
    });
  }

  findByOrder(orderId: number): Promise<Payment | null> {
    return this.run(t => t.payments.find(payment => payment.orderId === orderId) ?? null);
  }

  listByOrders(orderIds: number[]): Promise<Payment[]> {
    return this.run(t => t.payments.filter(payment => orderIds.includes(payment.orderId)));
  }

  update(id: number, patch: PaymentPatch): Promise<Payment | null> {
    return this.run(t => {
      const payment = t.payments.find(row => row.id === id);
      if (!payment) return null;
      assignDefined(payment, patch);
      return payment;
    });
  }
}

class MemoryTokenRepository implements TokenRepository {
  constructor(private readonly run: Run) {}

  revoke(token: RevokedToken): Promise<void> {
    return this.run(t => {
      if (!t.revokedTokens.some(row => row.jti === token.jti)) t.revokedTokens.push({ ...token });
    });
  }

  isRevoked(jti: string): Promise<boolean> {
    return this.run(t => t.revokedTokens.some(row => row.jti === jti));
  }
}

function createRepositories(run: Run): Repositories {
  return {
    users: new MemoryUserRepository(run),
    otps: new MemoryOtpRepository(run),
    locations: new MemoryLocationRepository(run),
    addresses: new MemoryAddressRepository(run),
    categories: new MemoryCategoryRepository(run),
    restaurants: new MemoryRestaurantRepository(run),
    products: new MemoryProductRepository(run),
    carts: new MemoryCartRepository(run),
    orders: new MemoryOrderRepository(run),
    payments: new MemoryPaymentRepository(run),
    tokens: new MemoryTokenRepository(run),
  };
}

// =============================================================================
// STORE
// =============================================================================

export class MemoryStore implements DataStore {
  readonly driver = 'memory' as const;
  readonly repos: Repositories;
  /** Live tables; tests may seed rows the repositories would refuse */
  tables: Tables = emptyTables();

  private readonly transactionRepos: Repositories;
  private queue: Promise<unknown> = Promise.resolve();

  constructor() {
    this.repos = createRepositories(fn => this.exclusive(async () => structuredClone(fn(this.tables))));
    this.transactionRepos = createRepositories(async fn => structuredClone(fn(this.tables)));
  }

  /**
   * Run `work` after everything queued before it has settled
   */
  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const result = this.queue.then(work);
    this.queue = result.catch(() => undefined);
    return result;
  }

  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      const snapshot = structuredClone(this.tables);
      try {
        return await work(this.transactionRepos);
      } catch (error) {
        this.tables = snapshot;
        throw error;
      }
    });
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    await this.queue;
  }

  /**
   * Drop all rows and reset sequences
   */
  reset(): void {
    this.tables = emptyTables();
  }
}
