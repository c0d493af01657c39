/**
 * =============================================================================
 * ADDRESS MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { ADDRESS_LABELS } from '../../shared/database/entities';
import { emailSchema, idSchema, latitudeSchema, longitudeSchema } from '../../shared/utils/validation.utils';

const coordinates = {
  latitude: latitudeSchema.nullable().optional(),
  longitude: longitudeSchema.nullable().optional()
};

export const listAddressesQuerySchema = z.object({
  email: emailSchema
});

export const createAddressSchema = z.object({
  email: emailSchema,
  label: z.enum(ADDRESS_LABELS).optional(),
  address: z.string().trim().min(1, 'Address is required').max(255),
  ...coordinates,
  make_primary: z.boolean().default(false)
});

export const updateAddressSchema = z.object({
  label: z.enum(ADDRESS_LABELS).optional(),
  address: z.string().trim().min(1, 'Address is required').max(255).optional(),
  ...coordinates,
  make_primary: z.boolean().default(false)
});

export const addressIdParamsSchema = z.object({
  id: idSchema
});

export type CreateAddressInput = z.infer<typeof createAddressSchema>;
export type UpdateAddressInput = z.infer<typeof updateAddressSchema>;
