/**
 * =============================================================================
 * CART MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { cartService } from './cart.service';
import {
  addToCartSchema,
  cartItemParamsSchema,
  cartQuerySchema,
  clearCartSchema,
  updateCartItemSchema
} from './cart.schema';
import { toCartPayload } from './cart.mapper';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class CartController {
  getCart = asyncHandler(async (req: Request, res: Response) => {
    const { email } = validateSchema(cartQuerySchema, req.query);
    res.status(200).json(successResponse(toCartPayload(await cartService.getCart(email))));
  });

  addItem = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(addToCartSchema, req.body);
    const cart = await cartService.addItem(data.email, data.product_id, data.qty);
    res.status(201).json(successResponse(toCartPayload(cart)));
  });

  updateItem = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(cartItemParamsSchema, req.params);
    const { qty } = validateSchema(updateCartItemSchema, req.body);
    res.status(200).json(successResponse(toCartPayload(await cartService.updateItemQty(id, qty))));
  });

  removeItem = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(cartItemParamsSchema, req.params);
    res.status(200).json(successResponse(toCartPayload(await cartService.removeItem(id))));
  });

  clear = asyncHandler(async (req: Request, res: Response) => {
    const { email } = validateSchema(clearCartSchema, req.body);
    await cartService.clear(email);
    res.status(200).json(successResponse({ message: 'Cleared.' }));
  });
}

export const cartController = new CartController();
