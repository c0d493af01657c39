import { z } from 'zod';
import { emailSchema, idSchema, moneySchema } from '../../shared/utils/validation.utils';

export const checkoutSchema = z.object({
  email: emailSchema,
  address_text: z.string().trim().max(255).optional(),
  delivery_fee: moneySchema.optional()
});

export const listOrdersQuerySchema = z.object({
  email: emailSchema
});

export const orderIdParamsSchema = z.object({
  id: idSchema
});

export type CheckoutInput = z.infer<typeof checkoutSchema>;
