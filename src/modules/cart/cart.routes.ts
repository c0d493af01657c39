import { Router } from 'express';
import { cartController } from './cart.controller';

const router = Router();

/**
 * @route   GET /api/v1/cart?email=
 * @desc    The user's active cart (created on first access)
 * @access  Public
 */
router.get('/', cartController.getCart);

/**
 * @route   POST /api/v1/cart/add
 * @desc    Add a product, or increase its quantity
 * @access  Public
 */
router.post('/add', cartController.addItem);

/**
 * @route   PATCH /api/v1/cart/item/:id
 * @desc    Set an item's quantity
 * @access  Public
 */
router.patch('/item/:id', cartController.updateItem);

/**
 * @route   DELETE /api/v1/cart/item/:id
 * @desc    Remove an item
 * @access  Public
 */
router.delete('/item/:id', cartController.removeItem);

/**
 * @route   POST /api/v1/cart/clear
 * @access  Public
 */
router.post('/clear', cartController.clear);

export { router as cartRouter };
