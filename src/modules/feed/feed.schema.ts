import { z } from 'zod';
import { emailSchema } from '../../shared/utils/validation.utils';

/**
 * lat/lon stay raw strings: a malformed pair is "no coordinates", not a 400
 */
export const feedQuerySchema = z.object({
  email: z.union([emailSchema, z.literal('')]).optional(),
  lat: z.string().optional(),
  lon: z.string().optional(),
  radius_km: z.coerce.number().positive().max(100).optional()
});

export type FeedQuery = z.infer<typeof feedQuerySchema>;
