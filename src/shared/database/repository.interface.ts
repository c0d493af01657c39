/**
 * =============================================================================
 * REPOSITORY INTERFACE - Database Abstraction Layer
 * =============================================================================
 *
 * This file defines the contract for all data access. Implementations:
 *   - PostgresStore (drizzle-orm over a pg Pool, production)
 *   - MemoryStore   (in-process tables, development and tests)
 *
 * Services only ever see `Repositories` and `DataStore`, so a store can be
 * swapped without touching business logic.
 *
 * TRANSACTIONS:
 * - `store.repos` runs every call on its own
 * - `store.transaction(work)` hands `work` a repository bundle bound to one
 *   transaction; any throw rolls back every write made through it
 * - Never call `store.transaction` from inside `work`
 * =============================================================================
 */

import type {
  Address,
  AddressLabel,
  Cart,
  CartItem,
  Category,
  Order,
  OrderItem,
  OrderStatus,
  OtpCode,
  OtpPurpose,
  Payment,
  PaymentMethod,
  PaymentStatus,
  Product,
  ProductDetails,
  Restaurant,
  RevokedToken,
  User,
  UserLocation,
} from './entities';
import type { BoundingBox } from '../utils/geospatial.utils';

// =============================================================================
// INPUT TYPES
// =============================================================================

export interface NewUser {
  email: string;
  fullName: string;
  passwordHash: string;
  isStaff?: boolean;
}

export type UserPatch = Partial<Pick<User, 'fullName' | 'passwordHash' | 'isActive' | 'isStaff' | 'tokensRevokedAt'>>;

export interface NewOtpCode {
  userId: number;
  code: string;
  purpose: OtpPurpose;
  expiresAt: Date;
}

export interface NewAddress {
  userId: number;
  label: AddressLabel;
  address: string;
  latitude: number | null;
  longitude: number | null;
  isPrimary: boolean;
}

export type AddressPatch = Partial<Pick<Address, 'label' | 'address' | 'latitude' | 'longitude' | 'isPrimary'>>;

export interface NewCategory {
  name: string;
  icon: string;
}

export type CategoryPatch = Partial<NewCategory>;

export type NewRestaurant = Omit<Restaurant, 'id' | 'createdAt'>;
export type RestaurantPatch = Partial<NewRestaurant>;

export type NewProduct = Omit<Product, 'id' | 'createdAt'>;
export type ProductPatch = Partial<NewProduct>;

export interface ProductFilter {
  restaurantId?: number;
  categoryId?: number;
  /** Case-insensitive exact category name */
  categoryName?: string;
  /** Case-insensitive substring of title, subtitle, description or restaurant name */
  search?: string;
  availableOnly?: boolean;
}

export type NewCartItem = Omit<CartItem, 'id'>;

export type NewOrder = Omit<Order, 'id' | 'createdAt'>;
export type NewOrderItem = Omit<OrderItem, 'id'>;

export interface NewPayment {
  orderId: number;
  method: PaymentMethod;
  amount: string;
  status: PaymentStatus;
}

export type PaymentPatch = Partial<Pick<Payment, 'method' | 'status' | 'reference'>>;

// =============================================================================
// REPOSITORIES
// =============================================================================

export interface UserRepository {
  findById(id: number): Promise<User | null>;
  /** Expects an already lower-cased email */
  findByEmail(email: string): Promise<User | null>;
  /** Returns null when the email is taken */
  create(input: NewUser): Promise<User | null>;
  update(id: number, patch: UserPatch): Promise<User | null>;
}

export interface OtpRepository {
  create(input: NewOtpCode): Promise<OtpCode>;
  /** Most recently created unused code for (user, purpose) */
  findLatestUnused(userId: number, purpose: OtpPurpose): Promise<OtpCode | null>;
  incrementAttempts(id: number): Promise<void>;
  /** Flips isUsed once; false when the code was already used */
  markUsed(id: number): Promise<boolean>;
}

export interface LocationRepository {
  findByUser(userId: number): Promise<UserLocation | null>;
  upsert(userId: number, latitude: number, longitude: number): Promise<UserLocation>;
}

export interface AddressRepository {
  /** Ordered primary first, then newest first */
  listByUser(userId: number): Promise<Address[]>;
  findById(id: number): Promise<Address | null>;
  create(input: NewAddress): Promise<Address>;
  update(id: number, patch: AddressPatch): Promise<Address | null>;
  delete(id: number): Promise<boolean>;
  clearPrimary(userId: number): Promise<void>;
}

export interface CategoryRepository {
  /** Ordered by name */
  list(): Promise<Category[]>;
  /** Ordered by name */
  listByIds(ids: number[]): Promise<Category[]>;
  findById(id: number): Promise<Category | null>;
  /** Case-insensitive */
  findByName(name: string): Promise<Category | null>;
  /** Returns null when the name is taken */
  create(input: NewCategory): Promise<Category | null>;
  update(id: number, patch: CategoryPatch): Promise<Category | null>;
  delete(id: number): Promise<boolean>;
}

export interface RestaurantRepository {
  /** Newest first */
  list(): Promise<Restaurant[]>;
  /** Open restaurants in insertion order */
  listOpen(limit: number): Promise<Restaurant[]>;
  /** Open restaurants whose coordinates fall inside the box */
  listOpenWithin(box: BoundingBox): Promise<Restaurant[]>;
  findById(id: number): Promise<Restaurant | null>;
  create(input: NewRestaurant): Promise<Restaurant>;
  update(id: number, patch: RestaurantPatch): Promise<Restaurant | null>;
  delete(id: number): Promise<boolean>;
}

export interface ProductRepository {
  /** Newest first */
  list(filter: ProductFilter): Promise<ProductDetails[]>;
  findById(id: number): Promise<Product | null>;
  findDetails(id: number): Promise<ProductDetails | null>;
  create(input: NewProduct): Promise<Product>;
  update(id: number, patch: ProductPatch): Promise<Product | null>;
  delete(id: number): Promise<boolean>;
}

export interface CartRepository {
  /**
   * Active carts of a user, most recently updated first.
   * With `lock` the rows stay locked until the transaction ends.
   */
  listActiveByUser(userId: number, options?: { lock?: boolean }): Promise<Cart[]>;
  findById(id: number): Promise<Cart | null>;
  /** Returns null when the user already has an active cart */
  createActive(userId: number): Promise<Cart | null>;
  deactivate(cartIds: number[]): Promise<void>;
  touch(cartId: number): Promise<void>;
  /** Users holding more than one active cart */
  userIdsWithDuplicateActiveCarts(): Promise<number[]>;

  listItems(cartId: number): Promise<CartItem[]>;
  findItemByProduct(cartId: number, productId: number): Promise<CartItem | null>;
  /** Item that belongs to an active cart */
  findActiveItem(itemId: number): Promise<CartItem | null>;
  insertItem(input: NewCartItem): Promise<CartItem>;
  updateItemQty(itemId: number, qty: number): Promise<CartItem | null>;
  deleteItem(itemId: number): Promise<boolean>;
  deleteItems(cartId: number): Promise<number>;
}

export interface OrderRepository {
  create(input: NewOrder): Promise<Order>;
  insertItems(items: NewOrderItem[]): Promise<OrderItem[]>;
  findById(id: number, options?: { lock?: boolean }): Promise<Order | null>;
  /** Newest first */
  listByUser(userId: number): Promise<Order[]>;
  listItems(orderIds: number[]): Promise<OrderItem[]>;
  updateStatus(id: number, status: OrderStatus): Promise<void>;
}

export interface PaymentRepository {
  create(input: NewPayment): Promise<Payment>;
  findByOrder(orderId: number): Promise<Payment | null>;
  listByOrders(orderIds: number[]): Promise<Payment[]>;
  update(id: number, patch: PaymentPatch): Promise<Payment | null>;
}

export interface TokenRepository {
  revoke(token: RevokedToken): Promise<void>;
  isRevoked(jti: string): Promise<boolean>;
}

export interface Repositories {
  users: UserRepository;
  otps: OtpRepository;
  locations: LocationRepository;
  addresses: AddressRepository;
  categories: CategoryRepository;
  restaurants: RestaurantRepository;
  products: ProductRepository;
  carts: CartRepository;
  orders: OrderRepository;
  payments: PaymentRepository;
  tokens: TokenRepository;
}

export interface DataStore {
  readonly driver: 'postgres' | 'memory';
  readonly repos: Repositories;
  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
  /** Connectivity probe for the health check */
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
