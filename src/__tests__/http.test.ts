/**
 * =============================================================================
 * HTTP TESTS
 * =============================================================================
 *
 * The assembled express app on an ephemeral port, driven with fetch:
 * envelopes, error mapping, staff guard and the cart-to-payment flow.
 * =============================================================================
 */

import { Server } from 'http';
import { AddressInfo } from 'net';
import { z } from 'zod';
import { createApp } from '../app';
import { MemoryStore } from '../shared/database/memory.store';
import { createProduct, createRestaurant, createUser, installMemoryStore, TEST_PASSWORD } from './support/fixtures';

jest.mock('../shared/services/logger.service', () => ({
  ...jest.requireActual('../shared/services/logger.service'),
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const sessionSchema = z.object({
  data: z.object({ access: z.string(), refresh: z.string() })
});

let server: Server;
let baseUrl: string;
let store: MemoryStore;

interface Reply {
  status: number;
  body: unknown;
}

async function call(method: string, path: string, body?: unknown, token?: string): Promise<Reply> {
  const headers: Record<string, string> = {};
  if (body !== undefined) headers['Content-Type'] = 'application/json';
  if (token) headers.Authorization = `Bearer ${token}`;

  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body)
  });
  return { status: response.status, body: await response.json() };
}

async function loginAs(email: string): Promise<string> {
  const reply = await call('POST', '/api/v1/auth/login', { email, password: TEST_PASSWORD });
  return sessionSchema.parse(reply.body).data.access;
}

beforeAll(async () => {
  server = createApp().listen(0);
  await new Promise<void>(resolve => server.once('listening', () => resolve()));
  const address: AddressInfo | string | null = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('server has no TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
});

beforeEach(() => {
  store = installMemoryStore();
});

describe('HTTP surface', () => {
  it('reports health with the store driver', async () => {
    const reply = await call('GET', '/health');

    expect(reply.status).toBe(200);
    expect(reply.body).toMatchObject({
      status: 'healthy',
      environment: 'test',
      database: { driver: 'memory', connected: true },
    });
  });

  it('answers unknown routes with the error envelope', async () => {
    const reply = await call('GET', '/api/v1/nowhere');

    expect(reply).toEqual({
      status: 404,
      body: { success: false, error: { code: 'NOT_FOUND', message: 'Cannot GET /api/v1/nowhere' } },
    });
  });

  it('rejects a malformed JSON body', async () => {
    const response = await fetch(`${baseUrl}/api/v1/cart/add`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"email": '
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' },
    });
  });

  it('lists validation failures per field', async () => {
    const reply = await call('POST', '/api/v1/cart/add', { email: 'ana@example.com', product_id: 1, qty: 0 });

    expect(reply).toEqual({
      status: 400,
      body: {
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: { fields: [{ field: 'qty', message: 'Quantity must be at least 1' }] },
        },
      },
    });
  });

  it('keeps catalog writes behind a staff token', async () => {
    await createUser(store, { email: 'diner@example.com' });
    await createUser(store, { email: 'staff@example.com', isStaff: true });

    const anonymous = await call('POST', '/api/v1/categories', { name: 'Soups' });
    const diner = await call('POST', '/api/v1/categories', { name: 'Soups' }, await loginAs('diner@example.com'));
    const staff = await call('POST', '/api/v1/categories', { name: 'Soups' }, await loginAs('staff@example.com'));

    expect(anonymous.status).toBe(401);
    expect(diner.status).toBe(403);
    expect(staff).toEqual({
      status: 201,
      body: { success: true, data: { id: 1, name: 'Soups', icon: 'fast-food' } },
    });
  });

  it('runs the cart, checkout and payment flow', async () => {
    await createUser(store);
    const restaurant = await createRestaurant(store);
    const burger = await createProduct(store, restaurant.id);

    const added = await call('POST', '/api/v1/cart/add', { email: 'ana@example.com', product_id: burger.id, qty: 2 });
    expect(added.status).toBe(201);
    expect(added.body).toMatchObject({
      data: { is_active: true, total: '80.00', items: [{ product_id: burger.id, qty: 2, subtotal: '80.00' }] },
    });

    const order = await call('POST', '/api/v1/checkout', {
      email: 'ana@example.com',
      address_text: '4 Lake Road',
      delivery_fee: 5,
    });
    expect(order.status).toBe(201);
    expect(order.body).toMatchObject({
      data: {
        id: 1,
        status: 'pending',
        address_text: '4 Lake Road',
        subtotal: '80.00',
        delivery_fee: '5.00',
        total: '85.00',
        payment: { order: 1, method: 'card', amount: '85.00', status: 'created' },
      },
    });

    const paid = await call('POST', '/api/v1/payments/confirm', { order_id: 1, method: 'cash', reference: 'ref-1' });
    expect(paid.status).toBe(200);
    expect(paid.body).toMatchObject({
      data: { order: 1, method: 'cash', amount: '85.00', status: 'success', reference: 'ref-1' },
    });

    const placed = await call('GET', '/api/v1/orders/1');
    expect(placed.body).toMatchObject({ data: { status: 'paid' } });

    const cart = await call('GET', '/api/v1/cart?email=ana%40example.com');
    expect(cart.body).toMatchObject({ data: { items: [], total: '0.00' } });
  });
});
