import { z } from 'zod';
import { PAYMENT_METHODS } from '../../shared/database/entities';
import { idSchema } from '../../shared/utils/validation.utils';

export const confirmPaymentSchema = z.object({
  order_id: idSchema,
  method: z.enum(PAYMENT_METHODS).default('card'),
  success: z.boolean().default(true),
  reference: z.string().trim().default('')
});

export type ConfirmPaymentInput = z.infer<typeof confirmPaymentSchema>;
