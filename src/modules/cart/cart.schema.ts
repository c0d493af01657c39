/**
 * =============================================================================
 * CART MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { emailSchema, idSchema } from '../../shared/utils/validation.utils';

/** Upper bound for a cart line, also applied to the summed qty of repeated adds */
export const MAX_ITEM_QTY = 999;

const qtySchema = z.coerce.number().int()
  .min(1, 'Quantity must be at least 1')
  .max(MAX_ITEM_QTY, `Quantity must not exceed ${MAX_ITEM_QTY}`);

export const cartQuerySchema = z.object({
  email: emailSchema
});

export const addToCartSchema = z.object({
  email: emailSchema,
  product_id: idSchema,
  qty: qtySchema.default(1)
});

export const updateCartItemSchema = z.object({
  qty: qtySchema
});

export const clearCartSchema = z.object({
  email: emailSchema
});

export const cartItemParamsSchema = z.object({
  id: idSchema
});

export type AddToCartInput = z.infer<typeof addToCartSchema>;
