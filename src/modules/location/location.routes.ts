/**
 * =============================================================================
 * LOCATION MODULE - ROUTES
 * =============================================================================
 *
 * Mounted at /api/v1/me/location
 * =============================================================================
 */

import { Router } from 'express';
import { locationController } from './location.controller';

const router = Router();

/**
 * @route   POST /api/v1/me/location
 * @desc    Save current coordinates, optionally as the primary address
 * @access  Public
 */
router.post('/', locationController.upsert);

/**
 * @route   GET /api/v1/me/location/get?email=
 * @desc    Last saved coordinates
 * @access  Public
 */
router.get('/get', locationController.get);

export { router as locationRouter };
