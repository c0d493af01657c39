/**
 * =============================================================================
 * ORDER MODULE - SERVICE
 * =============================================================================
 *
 * Checkout turns the user's active cart into an order, all in one store
 * transaction:
 *
 *   1. Lock (and consolidate) the active cart; empty -> 409 CART_EMPTY
 *   2. subtotal = sum of item subtotals, total = subtotal + delivery fee
 *   3. Order (pending) + one OrderItem snapshot per cart item
 *   4. Payment (card, created, amount = total)
 *   5. Deactivate the cart and open a fresh empty one
 *
 * Any failure rolls back every step.
 * =============================================================================
 */

import { getStore } from '../../shared/database/db';
import type { Order, OrderItem, Payment } from '../../shared/database/entities';
import { logger } from '../../shared/services/logger.service';
import { AppError, ConflictError, ErrorCode, NotFoundError } from '../../shared/types/error.types';
import { Money, sumMoney } from '../../shared/utils/money.utils';
import { cartItemSubtotal, cartTotal } from '../cart/cart.mapper';
import { consolidateActiveCarts } from '../cart/cart.service';
import { userService } from '../user/user.service';

export interface OrderDetails {
  order: Order;
  items: OrderItem[];
  payment: Payment | null;
}

export interface CreateOrderRequest {
  email: string;
  addressText?: string;
  deliveryFee?: Money;
}

class OrderService {
  async createOrder(request: CreateOrderRequest): Promise<OrderDetails> {
    const user = await userService.requireByEmail(request.email);
    const deliveryFee = request.deliveryFee ?? '0.00';

    const details = await getStore().transaction(async repos => {
      const cart = await consolidateActiveCarts(repos, user.id);
      const cartItems = await repos.carts.listItems(cart.id);
      if (cartItems.length === 0) {
        throw new ConflictError('Cart is empty.', ErrorCode.CART_EMPTY);
      }

      const subtotal = cartTotal(cartItems);
      const order = await repos.orders.create({
        userId: user.id,
        status: 'pending',
        addressText: request.addressText ?? '',
        subtotal,
        deliveryFee,
        total: sumMoney([subtotal, deliveryFee])
      });

      const items = await repos.orders.insertItems(cartItems.map(item => ({
        orderId: order.id,
        productId: item.productId,
        title: item.title,
        unitPrice: item.unitPrice,
        qty: item.qty,
        subtotal: cartItemSubtotal(item)
      })));

      const payment = await repos.payments.create({
        orderId: order.id,
        method: 'card',
        amount: order.total,
        status: 'created'
      });

      await repos.carts.deactivate([cart.id]);
      const fresh = await repos.carts.createActive(user.id);
      if (!fresh) {
        throw new AppError(500, ErrorCode.INTERNAL_ERROR, 'Could not open a new cart');
      }

      return { order, items, payment };
    });

    logger.info('Order created', {
      orderId: details.order.id,
      userId: user.id,
      items: details.items.length,
      total: details.order.total
    });
    return details;
  }

  /**
   * Newest first; unknown users have no orders
   */
  async listForUser(email: string): Promise<OrderDetails[]> {
    const user = await userService.findByEmail(email);
    if (!user) return [];

    const repos = getStore().repos;
    const orders = await repos.orders.listByUser(user.id);
    if (orders.length === 0) return [];

    const ids = orders.map(order => order.id);
    const [items, payments] = await Promise.all([
      repos.orders.listItems(ids),
      repos.payments.listByOrders(ids)
    ]);

    return orders.map(order => ({
      order,
      items: items.filter(item => item.orderId === order.id),
      payment: payments.find(payment => payment.orderId === order.id) ?? null
    }));
  }

  async getOrder(id: number): Promise<OrderDetails> {
    const repos = getStore().repos;
    const order = await repos.orders.findById(id);
    if (!order) {
      throw new NotFoundError('Order', ErrorCode.ORDER_NOT_FOUND);
    }

    const [items, payment] = await Promise.all([
      repos.orders.listItems([order.id]),
      repos.payments.findByOrder(order.id)
    ]);
    return { order, items, payment };
  }
}

export const orderService = new OrderService();
