/**
 * =============================================================================
 * ADDRESS MODULE - ROUTES
 * =============================================================================
 *
 * Addresses are keyed by the email in the query (list) or body (create);
 * detail routes use the address id.
 * =============================================================================
 */

import { Router } from 'express';
import { addressController } from './address.controller';

const router = Router();

/**
 * @route   GET /api/v1/addresses?email=
 * @desc    List a user's addresses, primary first
 * @access  Public
 */
router.get('/', addressController.list);

/**
 * @route   POST /api/v1/addresses
 * @desc    Add an address
 * @access  Public
 */
router.post('/', addressController.create);

/**
 * @route   GET /api/v1/addresses/:id
 * @access  Public
 */
router.get('/:id', addressController.get);

/**
 * @route   PUT /api/v1/addresses/:id
 * @desc    Edit an address; make_primary switches the primary
 * @access  Public
 */
router.put('/:id', addressController.update);

/**
 * @route   DELETE /api/v1/addresses/:id
 * @access  Public
 */
router.delete('/:id', addressController.remove);

export { router as addressRouter };
