/**
 * =============================================================================
 * ADDRESS MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { addressService } from './address.service';
import {
  addressIdParamsSchema,
  createAddressSchema,
  listAddressesQuerySchema,
  updateAddressSchema
} from './address.schema';
import { toAddressPayload } from './address.mapper';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class AddressController {
  list = asyncHandler(async (req: Request, res: Response) => {
    const { email } = validateSchema(listAddressesQuerySchema, req.query);
    const addresses = await addressService.list(email);
    res.status(200).json(successResponse(addresses.map(toAddressPayload)));
  });

  create = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(createAddressSchema, req.body);
    const address = await addressService.create(data);
    res.status(201).json(successResponse(toAddressPayload(address)));
  });

  get = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(addressIdParamsSchema, req.params);
    res.status(200).json(successResponse(toAddressPayload(await addressService.get(id))));
  });

  update = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(addressIdParamsSchema, req.params);
    const data = validateSchema(updateAddressSchema, req.body);
    res.status(200).json(successResponse(toAddressPayload(await addressService.update(id, data))));
  });

  remove = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(addressIdParamsSchema, req.params);
    await addressService.remove(id);
    res.status(204).send();
  });
}

export const addressController = new AddressController();
