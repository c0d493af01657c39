/**
 * =============================================================================
 * APPLICATION
 * =============================================================================
 *
 * Builds the Express app without listening, so tests can drive it directly.
 *
 * MODULES (all under /api/v1):
 * ┌──────────────┬───────────────────────────────────────────────────────────┐
 * │ /auth        │ Password + OTP sign-up, login, JWT refresh and logout     │
 * │ /me/location │ The user's current location                              │
 * │ /addresses   │ Saved delivery addresses                                  │
 * │ /home        │ Nearby restaurant feed                                    │
 * │ /categories  │ Catalog CRUD (staff writes)                               │
 * │ /restaurants │                                                           │
 * │ /products    │                                                           │
 * │ /cart        │ Active cart                                               │
 * │ /checkout    │ Cart -> order                                             │
 * │ /orders      │ Order history                                             │
 * │ /payments    │ Mock payment confirmation                                 │
 * └──────────────┴───────────────────────────────────────────────────────────┘
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';

import { config } from './config/environment';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { rateLimiter } from './shared/middleware/rate-limiter.middleware';
import { requestIdMiddleware, securityHeaders } from './shared/middleware/security.middleware';
import { healthRoutes } from './shared/routes/health.routes';

import { authRouter } from './modules/auth/auth.routes';
import { locationRouter } from './modules/location/location.routes';
import { addressRouter } from './modules/address/address.routes';
import { feedRouter } from './modules/feed/feed.routes';
import { categoryRouter, productRouter, restaurantRouter } from './modules/catalog/catalog.routes';
import { cartRouter } from './modules/cart/cart.routes';
import { checkoutRouter, orderRouter } from './modules/order/order.routes';
import { paymentRouter } from './modules/payment/payment.routes';

export const API_PREFIX = '/api/v1';

export function createApp(): Express {
  const app = express();

  // Behind one proxy hop, so rate limits see the client IP
  app.set('trust proxy', 1);

  // Request ID for tracking (must be first)
  app.use(requestIdMiddleware);

  app.use(compression({ threshold: 1024 }));

  if (config.security.enableHeaders) {
    app.use(securityHeaders);
  }

  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    maxAge: 86400
  }));

  app.use(express.json({ limit: '1mb' }));

  if (config.security.enableRequestLogging) {
    app.use(requestLogger);
  }

  // Skips itself when ENABLE_RATE_LIMITING=false
  app.use(rateLimiter);

  app.use('/', healthRoutes);

  app.use(`${API_PREFIX}/auth`, authRouter);
  app.use(`${API_PREFIX}/me/location`, locationRouter);
  app.use(`${API_PREFIX}/addresses`, addressRouter);
  app.use(`${API_PREFIX}/home`, feedRouter);
  app.use(`${API_PREFIX}/categories`, categoryRouter);
  app.use(`${API_PREFIX}/restaurants`, restaurantRouter);
  app.use(`${API_PREFIX}/products`, productRouter);
  app.use(`${API_PREFIX}/cart`, cartRouter);
  app.use(`${API_PREFIX}/checkout`, checkoutRouter);
  app.use(`${API_PREFIX}/orders`, orderRouter);
  app.use(`${API_PREFIX}/payments`, paymentRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
