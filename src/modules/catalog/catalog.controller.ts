/**
 * =============================================================================
 * CATALOG MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { catalogService } from './catalog.service';
import {
  catalogIdParamsSchema,
  createCategorySchema,
  createProductSchema,
  createRestaurantSchema,
  productListQuerySchema,
  updateCategorySchema,
  updateProductSchema,
  updateRestaurantSchema
} from './catalog.schema';
import { toCategoryPayload, toProductPayload, toRestaurantPayload } from './catalog.mapper';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class CatalogController {
  // ── Categories ─────────────────────────────────────────────────

  listCategories = asyncHandler(async (_req: Request, res: Response) => {
    const categories = await catalogService.listCategories();
    res.status(200).json(successResponse(categories.map(toCategoryPayload)));
  });

  getCategory = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(catalogIdParamsSchema, req.params);
    res.status(200).json(successResponse(toCategoryPayload(await catalogService.getCategory(id))));
  });

  createCategory = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(createCategorySchema, req.body);
    res.status(201).json(successResponse(toCategoryPayload(await catalogService.createCategory(data))));
  });

  updateCategory = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(catalogIdParamsSchema, req.params);
    const data = validateSchema(updateCategorySchema, req.body);
    res.status(200).json(successResponse(toCategoryPayload(await catalogService.updateCategory(id, data))));
  });

  deleteCategory = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(catalogIdParamsSchema, req.params);
    await catalogService.deleteCategory(id);
    res.status(204).send();
  });

  // ── Restaurants ────────────────────────────────────────────────

  listRestaurants = asyncHandler(async (_req: Request, res: Response) => {
    const restaurants = await catalogService.listRestaurants();
    res.status(200).json(successResponse(restaurants.map(restaurant => toRestaurantPayload(restaurant))));
  });

  getRestaurant = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(catalogIdParamsSchema, req.params);
    res.status(200).json(successResponse(toRestaurantPayload(await catalogService.getRestaurant(id))));
  });

  createRestaurant = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(createRestaurantSchema, req.body);
    res.status(201).json(successResponse(toRestaurantPayload(await catalogService.createRestaurant(data))));
  });

  updateRestaurant = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(catalogIdParamsSchema, req.params);
    const data = validateSchema(updateRestaurantSchema, req.body);
    res.status(200).json(successResponse(toRestaurantPayload(await catalogService.updateRestaurant(id, data))));
  });

  deleteRestaurant = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(catalogIdParamsSchema, req.params);
    await catalogService.deleteRestaurant(id);
    res.status(204).send();
  });

  // ── Products ───────────────────────────────────────────────────

  listProducts = asyncHandler(async (req: Request, res: Response) => {
    const query = validateSchema(productListQuerySchema, req.query);
    const products = await catalogService.listProducts(query);
    res.status(200).json(successResponse(products.map(toProductPayload)));
  });

  getProduct = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(catalogIdParamsSchema, req.params);
    res.status(200).json(successResponse(toProductPayload(await catalogService.getProduct(id))));
  });

  createProduct = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(createProductSchema, req.body);
    res.status(201).json(successResponse(toProductPayload(await catalogService.createProduct(data))));
  });

  updateProduct = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(catalogIdParamsSchema, req.params);
    const data = validateSchema(updateProductSchema, req.body);
    res.status(200).json(successResponse(toProductPayload(await catalogService.updateProduct(id, data))));
  });

  deleteProduct = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(catalogIdParamsSchema, req.params);
    await catalogService.deleteProduct(id);
    res.status(204).send();
  });
}

export const catalogController = new CatalogController();
