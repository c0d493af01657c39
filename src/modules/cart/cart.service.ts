/**
 * =============================================================================
 * CART MODULE - SERVICE
 * =============================================================================
 *
 * One active cart per user. Every read or write goes through
 * consolidateActiveCarts, which locks the user's active carts and folds any
 * legacy duplicates into the most recently updated one:
 *
 *   - Same product in both carts  -> quantities are added
 *   - Product only in a duplicate -> copied with its title/price snapshot
 *   - Duplicates are then deactivated
 *   - No active cart at all       -> a new one is created
 *
 * Cart items keep the title and unit price the product had when it was
 * first added; later catalog edits do not touch them.
 * =============================================================================
 */

import { getStore } from '../../shared/database/db';
import type { Cart, CartItem, User } from '../../shared/database/entities';
import type { Repositories } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { AppError, ErrorCode, NotFoundError, ValidationError } from '../../shared/types/error.types';
import { userService } from '../user/user.service';
import { MAX_ITEM_QTY } from './cart.schema';

export interface CartDetails {
  cart: Cart;
  items: CartItem[];
}

/**
 * Runs inside the caller's transaction.
 */
export async function consolidateActiveCarts(repos: Repositories, userId: number): Promise<Cart> {
  const active = await repos.carts.listActiveByUser(userId, { lock: true });

  if (active.length === 0) {
    const created = await repos.carts.createActive(userId);
    if (created) return created;

    // Lost the insert race; the winner's cart is committed by now
    const [winner] = await repos.carts.listActiveByUser(userId, { lock: true });
    if (!winner) {
      throw new AppError(500, ErrorCode.INTERNAL_ERROR, 'Could not create an active cart');
    }
    return winner;
  }

  const [primary, ...duplicates] = active;
  if (duplicates.length === 0) return primary;

  let movedItems = 0;
  for (const duplicate of duplicates) {
    for (const item of await repos.carts.listItems(duplicate.id)) {
      const merged = await repos.carts.findItemByProduct(primary.id, item.productId);
      if (merged) {
        await repos.carts.updateItemQty(merged.id, merged.qty + item.qty);
      } else {
        await repos.carts.insertItem({
          cartId: primary.id,
          productId: item.productId,
          title: item.title,
          unitPrice: item.unitPrice,
          qty: item.qty
        });
      }
      movedItems++;
    }
  }

  await repos.carts.deactivate(duplicates.map(cart => cart.id));
  await repos.carts.touch(primary.id);

  logger.info('Cart consolidated', {
    userId,
    cartId: primary.id,
    mergedCarts: duplicates.length,
    movedItems
  });

  const refreshed = await repos.carts.findById(primary.id);
  return refreshed ?? primary;
}

async function loadDetails(repos: Repositories, cartId: number): Promise<CartDetails> {
  const cart = await repos.carts.findById(cartId);
  if (!cart) {
    throw new NotFoundError('Cart');
  }
  return { cart, items: await repos.carts.listItems(cartId) };
}

class CartService {
  async getOrCreateActiveCart(user: User): Promise<Cart> {
    return getStore().transaction(repos => consolidateActiveCarts(repos, user.id));
  }

  async getCart(email: string): Promise<CartDetails> {
    const user = await userService.requireByEmail(email);
    return getStore().transaction(async repos => {
      const cart = await consolidateActiveCarts(repos, user.id);
      return loadDetails(repos, cart.id);
    });
  }

  /**
   * Adds qty of an available product, snapshotting its title and price
   * on first add.
   */
  async addItem(email: string, productId: number, qty: number): Promise<CartDetails> {
    const user = await userService.requireByEmail(email);

    return getStore().transaction(async repos => {
      const product = await repos.products.findById(productId);
      if (!product || !product.isAvailable) {
        logger.warn('Add to cart rejected: product unavailable', { userId: user.id, productId });
        throw new NotFoundError('Product', ErrorCode.PRODUCT_NOT_FOUND);
      }

      const cart = await consolidateActiveCarts(repos, user.id);
      const existing = await repos.carts.findItemByProduct(cart.id, product.id);

      if (existing) {
        const total = existing.qty + qty;
        if (total > MAX_ITEM_QTY) {
          throw ValidationError.forField('qty', `Quantity must not exceed ${MAX_ITEM_QTY}`);
        }
        await repos.carts.updateItemQty(existing.id, total);
      } else {
        await repos.carts.insertItem({
          cartId: cart.id,
          productId: product.id,
          title: product.title,
          unitPrice: product.price,
          qty
        });
      }
      await repos.carts.touch(cart.id);

      return loadDetails(repos, cart.id);
    });
  }

  async updateItemQty(itemId: number, qty: number): Promise<CartDetails> {
    return getStore().transaction(async repos => {
      const item = await repos.carts.findActiveItem(itemId);
      if (!item) {
        throw new NotFoundError('Item', ErrorCode.CART_ITEM_NOT_FOUND);
      }
      await repos.carts.updateItemQty(item.id, qty);
      await repos.carts.touch(item.cartId);
      return loadDetails(repos, item.cartId);
    });
  }

  async removeItem(itemId: number): Promise<CartDetails> {
    return getStore().transaction(async repos => {
      const item = await repos.carts.findActiveItem(itemId);
      if (!item) {
        throw new NotFoundError('Item', ErrorCode.CART_ITEM_NOT_FOUND);
      }
      await repos.carts.deleteItem(item.id);
      await repos.carts.touch(item.cartId);
      return loadDetails(repos, item.cartId);
    });
  }

  /**
   * Empties the active cart; a user without one is left alone.
   * Returns the number of removed items.
   */
  async clear(email: string): Promise<number> {
    const user = await userService.requireByEmail(email);

    return getStore().transaction(async repos => {
      const [cart] = await repos.carts.listActiveByUser(user.id, { lock: true });
      if (!cart) return 0;
      const removed = await repos.carts.deleteItems(cart.id);
      await repos.carts.touch(cart.id);
      return removed;
    });
  }

  /**
   * Merges duplicate active carts left by older data, user by user.
   * Returns how many users were repaired.
   */
  async repairDuplicateCarts(): Promise<number> {
    const store = getStore();
    const userIds = await store.repos.carts.userIdsWithDuplicateActiveCarts();

    for (const userId of userIds) {
      await store.transaction(repos => consolidateActiveCarts(repos, userId));
    }
    return userIds.length;
  }
}

export const cartService = new CartService();
