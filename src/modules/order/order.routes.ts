/**
 * =============================================================================
 * ORDER ROUTES
 * =============================================================================
 *
 * - POST /api/v1/checkout      - Turn the active cart into an order
 * - GET  /api/v1/orders?email= - A user's orders, newest first
 * - GET  /api/v1/orders/:id    - One order with items and payment
 * =============================================================================
 */

import { Router } from 'express';
import { orderController } from './order.controller';

const checkout = Router();

/**
 * @route   POST /api/v1/checkout
 * @access  Public
 */
checkout.post('/', orderController.checkout);

const orders = Router();

/**
 * @route   GET /api/v1/orders?email=
 * @access  Public
 */
orders.get('/', orderController.list);

/**
 * @route   GET /api/v1/orders/:id
 * @access  Public
 */
orders.get('/:id', orderController.get);

export { checkout as checkoutRouter, orders as orderRouter };
