/**
 * =============================================================================
 * LOCATION MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { locationService } from './location.service';
import { getLocationQuerySchema, upsertLocationSchema } from './location.schema';
import { toLocationPayload, toLocationSavedPayload } from './location.mapper';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class LocationController {
  upsert = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(upsertLocationSchema, req.body);
    const result = await locationService.upsertLocation(data.email, data.latitude, data.longitude, data.save_address);
    res.status(200).json(successResponse(toLocationSavedPayload(result)));
  });

  get = asyncHandler(async (req: Request, res: Response) => {
    const { email } = validateSchema(getLocationQuerySchema, req.query);
    const location = await locationService.getLocation(email);
    res.status(200).json(successResponse(toLocationPayload(location)));
  });
}

export const locationController = new LocationController();
