/**
 * =============================================================================
 * CHECKOUT TESTS
 * =============================================================================
 *
 * Cart -> Order + OrderItems + Payment + fresh cart, atomically.
 * =============================================================================
 */

import { cartService } from '../modules/cart/cart.service';
import { orderService } from '../modules/order/order.service';
import { toOrderPayload } from '../modules/order/order.mapper';
import { MemoryStore } from '../shared/database/memory.store';
import type { Product, User } from '../shared/database/entities';
import { createProduct, createRestaurant, createUser, installMemoryStore } from './support/fixtures';

jest.mock('../shared/services/logger.service', () => ({
  ...jest.requireActual('../shared/services/logger.service'),
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('Checkout', () => {
  let store: MemoryStore;
  let user: User;
  let burger: Product;
  let soda: Product;

  beforeEach(async () => {
    store = installMemoryStore();
    user = await createUser(store);
    const restaurant = await createRestaurant(store);
    burger = await createProduct(store, restaurant.id, { title: 'Classic Smash', price: '40.00' });
    soda = await createProduct(store, restaurant.id, { title: 'Lime Soda', price: '3.75' });
  });

  it('turns the cart into a pending order with a created payment', async () => {
    await cartService.addItem(user.email, burger.id, 2);
    await cartService.addItem(user.email, burger.id, 1);

    const details = await orderService.createOrder({
      email: user.email,
      addressText: '12 Market Road',
      deliveryFee: '5.00',
    });
    const payload = toOrderPayload(details);

    expect(payload).toMatchObject({
      status: 'pending',
      address_text: '12 Market Road',
      subtotal: '120.00',
      delivery_fee: '5.00',
      total: '125.00',
    });
    expect(payload.items).toEqual([
      { product: burger.id, title: 'Classic Smash', unit_price: '40.00', qty: 3, subtotal: '120.00' },
    ]);
    expect(payload.payment).toMatchObject({
      order: payload.id,
      method: 'card',
      amount: '125.00',
      status: 'created',
      reference: '',
    });
  });

  it('deactivates the source cart and opens an empty one', async () => {
    const added = await cartService.addItem(user.email, soda.id, 4);

    await orderService.createOrder({ email: user.email });

    const carts = store.tables.carts.filter(cart => cart.userId === user.id);
    expect(carts).toHaveLength(2);
    expect(carts.find(cart => cart.id === added.cart.id)?.isActive).toBe(false);

    const current = await cartService.getCart(user.email);
    expect(current.cart.id).not.toBe(added.cart.id);
    expect(current.items).toEqual([]);
  });

  it('defaults to no delivery fee and an empty address', async () => {
    await cartService.addItem(user.email, soda.id, 4);

    const { order } = await orderService.createOrder({ email: user.email });

    expect(order).toMatchObject({ subtotal: '15.00', deliveryFee: '0.00', total: '15.00', addressText: '' });
  });

  it('keeps order items unchanged when the product later changes or disappears', async () => {
    await cartService.addItem(user.email, burger.id, 1);
    const { order } = await orderService.createOrder({ email: user.email });

    await store.repos.products.update(burger.id, { price: '99.00' });
    await store.repos.products.delete(burger.id);

    const reloaded = toOrderPayload(await orderService.getOrder(order.id));
    expect(reloaded.items).toEqual([
      { product: null, title: 'Classic Smash', unit_price: '40.00', qty: 1, subtotal: '40.00' },
    ]);
  });

  it('rejects an empty cart with a conflict and writes nothing', async () => {
    await expect(orderService.createOrder({ email: user.email })).rejects.toMatchObject({
      statusCode: 409,
      code: 'CART_EMPTY',
      message: 'Cart is empty.',
    });
    expect(store.tables.orders).toHaveLength(0);
    expect(store.tables.payments).toHaveLength(0);
    expect(store.tables.carts).toHaveLength(0);
  });

  it('rolls back every write when a step fails midway', async () => {
    await cartService.addItem(user.email, burger.id, 1);
    // A stray payment for the next order id makes the payment insert fail
    store.tables.payments.push({
      id: 500,
      orderId: 1,
      method: 'card',
      amount: '0.00',
      status: 'created',
      reference: '',
      createdAt: new Date(),
    });

    await expect(orderService.createOrder({ email: user.email })).rejects.toMatchObject({ statusCode: 409 });

    expect(store.tables.orders).toHaveLength(0);
    expect(store.tables.orderItems).toHaveLength(0);
    const active = store.tables.carts.filter(cart => cart.userId === user.id && cart.isActive);
    expect(active).toHaveLength(1);
    expect(store.tables.cartItems).toHaveLength(1);
  });

  it('rejects an unknown user', async () => {
    await expect(orderService.createOrder({ email: 'nobody@example.com' })).rejects.toMatchObject({
      statusCode: 404,
      code: 'USER_NOT_FOUND',
    });
  });

  describe('queries', () => {
    it('lists orders newest first with their items and payment', async () => {
      await cartService.addItem(user.email, burger.id, 1);
      const first = await orderService.createOrder({ email: user.email });
      await cartService.addItem(user.email, soda.id, 2);
      const second = await orderService.createOrder({ email: user.email });

      const orders = await orderService.listForUser(user.email);

      expect(orders.map(entry => entry.order.id)).toEqual([second.order.id, first.order.id]);
      expect(orders[0].items.map(item => item.title)).toEqual(['Lime Soda']);
      expect(orders[1].payment?.amount).toBe('40.00');
    });

    it('returns an empty list for an unknown user', async () => {
      await expect(orderService.listForUser('nobody@example.com')).resolves.toEqual([]);
    });

    it('reports a missing order as not found', async () => {
      await expect(orderService.getOrder(42)).rejects.toMatchObject({
        statusCode: 404,
        code: 'ORDER_NOT_FOUND',
      });
    });
  });
});
