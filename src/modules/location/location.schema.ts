import { z } from 'zod';
import { emailSchema, latitudeSchema, longitudeSchema } from '../../shared/utils/validation.utils';

export const upsertLocationSchema = z.object({
  email: emailSchema,
  latitude: latitudeSchema,
  longitude: longitudeSchema,
  save_address: z.boolean().default(false)
});

export const getLocationQuerySchema = z.object({
  email: emailSchema
});

export type UpsertLocationInput = z.infer<typeof upsertLocationSchema>;
