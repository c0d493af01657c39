import { Request, Response } from 'express';
import { feedService } from './feed.service';
import { feedQuerySchema } from './feed.schema';
import { toCategoryPayload, toRestaurantPayload } from '../catalog/catalog.mapper';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class FeedController {
  /**
   * Nearby restaurants and their categories
   */
  home = asyncHandler(async (req: Request, res: Response) => {
    const query = validateSchema(feedQuerySchema, req.query);
    const feed = await feedService.feed({
      email: query.email || undefined,
      lat: query.lat,
      lon: query.lon,
      radiusKm: query.radius_km
    });

    res.status(200).json(successResponse({
      categories: feed.categories.map(toCategoryPayload),
      restaurants: feed.restaurants.map(entry => toRestaurantPayload(entry.restaurant, entry.distanceKm))
    }));
  });
}

export const feedController = new FeedController();
