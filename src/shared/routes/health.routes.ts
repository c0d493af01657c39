/**
 * =============================================================================
 * HEALTH CHECK ROUTES
 * =============================================================================
 *
 * - GET /health       - Store connectivity (503 when the store is down)
 * - GET /health/live  - Liveness probe (is the process running?)
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { getStore } from '../database/db';
import { logger } from '../services/logger.service';
import { config } from '../../config/environment';

const router = Router();

const startTime = Date.now();

router.get('/health', async (_req: Request, res: Response) => {
  const store = getStore();
  let connected = false;
  try {
    connected = await store.ping();
  } catch (error) {
    logger.error('Health check: store ping failed', {
      error: error instanceof Error ? error.message : String(error)
    });
  }

  res.status(connected ? 200 : 503).json({
    status: connected ? 'healthy' : 'unhealthy',
    timestamp: new Date().toISOString(),
    environment: config.nodeEnv,
    database: {
      driver: store.driver,
      connected
    }
  });
});

router.get('/health/live', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'alive',
    uptime: Math.floor((Date.now() - startTime) / 1000)
  });
});

export { router as healthRoutes };
