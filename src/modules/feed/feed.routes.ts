import { Router } from 'express';
import { feedController } from './feed.controller';

const router = Router();

/**
 * @route   GET /api/v1/home/feed?email=&lat=&lon=&radius_km=
 * @desc    Open restaurants near a point (explicit or the user's), with categories
 * @access  Public
 */
router.get('/feed', feedController.home);

export { router as feedRouter };
