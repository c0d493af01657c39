/**
 * =============================================================================
 * PAYMENT CONFIRMATION TESTS
 * =============================================================================
 *
 * created -> success (order paid) | failed (order stays pending, retry allowed)
 * =============================================================================
 */

import { cartService } from '../modules/cart/cart.service';
import { orderService } from '../modules/order/order.service';
import { paymentService } from '../modules/payment/payment.service';
import { toPaymentPayload } from '../modules/payment/payment.mapper';
import { MemoryStore } from '../shared/database/memory.store';
import type { Order } from '../shared/database/entities';
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

describe('Payment confirmation', () => {
  let store: MemoryStore;
  let order: Order;

  beforeEach(async () => {
    store = installMemoryStore();
    const user = await createUser(store);
    const restaurant = await createRestaurant(store);
    const product = await createProduct(store, restaurant.id, { price: '20.00' });
    await cartService.addItem(user.email, product.id, 1);
    ({ order } = await orderService.createOrder({ email: user.email, deliveryFee: '2.50' }));
  });

  function orderStatus(): string | undefined {
    return store.tables.orders.find(row => row.id === order.id)?.status;
  }

  it('marks the payment successful and the order paid', async () => {
    const payment = await paymentService.confirm({
      orderId: order.id,
      method: 'cash',
      success: true,
      reference: 'REF-1',
    });

    expect(toPaymentPayload(payment)).toMatchObject({
      order: order.id,
      method: 'cash',
      amount: '22.50',
      status: 'success',
      reference: 'REF-1',
    });
    expect(orderStatus()).toBe('paid');
  });

  it('rejects a second confirmation once the order is paid', async () => {
    await paymentService.confirm({ orderId: order.id, method: 'card', success: true, reference: '' });

    await expect(
      paymentService.confirm({ orderId: order.id, method: 'card', success: false, reference: '' })
    ).rejects.toMatchObject({ statusCode: 409, code: 'ORDER_NOT_PENDING' });
    expect(store.tables.payments[0].status).toBe('success');
  });

  it('keeps the order pending after a failure and allows a retry', async () => {
    const failed = await paymentService.confirm({ orderId: order.id, method: 'card', success: false, reference: 'declined' });
    expect(failed.status).toBe('failed');
    expect(orderStatus()).toBe('pending');

    const retried = await paymentService.confirm({ orderId: order.id, method: 'card', success: true, reference: 'ok' });
    expect(retried.status).toBe('success');
    expect(orderStatus()).toBe('paid');
  });

  it('truncates the reference to 64 characters', async () => {
    const payment = await paymentService.confirm({
      orderId: order.id,
      method: 'card',
      success: true,
      reference: 'x'.repeat(80),
    });

    expect(payment.reference).toBe('x'.repeat(64));
  });

  it('never splits an emoji when truncating the reference', async () => {
    const payment = await paymentService.confirm({
      orderId: order.id,
      method: 'card',
      success: true,
      reference: `${'a'.repeat(63)}😀😀`,
    });

    expect(payment.reference).toBe(`${'a'.repeat(63)}😀`);
    expect(Array.from(payment.reference)).toHaveLength(64);
  });

  it('reports an unknown order as not found', async () => {
    await expect(
      paymentService.confirm({ orderId: 999, method: 'card', success: true, reference: '' })
    ).rejects.toMatchObject({ statusCode: 404, code: 'ORDER_NOT_FOUND' });
  });

  it('reports a pending order without a payment as not found', async () => {
    store.tables.payments = [];

    await expect(
      paymentService.confirm({ orderId: order.id, method: 'card', success: true, reference: '' })
    ).rejects.toMatchObject({ statusCode: 404, code: 'PAYMENT_NOT_FOUND' });
    expect(orderStatus()).toBe('pending');
  });
});
