/**
 * =============================================================================
 * CATALOG MODULE - ROUTES
 * =============================================================================
 *
 * Three routers, mounted at /categories, /restaurants and /products.
 * GET is public; POST, PUT, PATCH and DELETE need a staff bearer token.
 * =============================================================================
 */

import { Router, RequestHandler } from 'express';
import { catalogController } from './catalog.controller';
import { authenticate, staffGuard } from '../../shared/middleware/auth.middleware';

const staffOnly: RequestHandler[] = [authenticate, staffGuard];

interface CrudHandlers {
  list: RequestHandler;
  get: RequestHandler;
  create: RequestHandler;
  update: RequestHandler;
  remove: RequestHandler;
}

function crudRouter(handlers: CrudHandlers): Router {
  const router = Router();
  router.get('/', handlers.list);
  router.get('/:id', handlers.get);
  router.post('/', ...staffOnly, handlers.create);
  router.put('/:id', ...staffOnly, handlers.update);
  router.patch('/:id', ...staffOnly, handlers.update);
  router.delete('/:id', ...staffOnly, handlers.remove);
  return router;
}

/**
 * @route   /api/v1/categories
 * @desc    Categories ordered by name
 * @access  Public read, staff write
 */
export const categoryRouter = crudRouter({
  list: catalogController.listCategories,
  get: catalogController.getCategory,
  create: catalogController.createCategory,
  update: catalogController.updateCategory,
  remove: catalogController.deleteCategory
});

/**
 * @route   /api/v1/restaurants
 * @desc    Restaurants, newest first
 * @access  Public read, staff write
 */
export const restaurantRouter = crudRouter({
  list: catalogController.listRestaurants,
  get: catalogController.getRestaurant,
  create: catalogController.createRestaurant,
  update: catalogController.updateRestaurant,
  remove: catalogController.deleteRestaurant
});

/**
 * @route   /api/v1/products
 * @desc    Products, newest first
 *          ?restaurant= ?category= ?category_name= ?search= ?available=true
 * @access  Public read, staff write
 */
export const productRouter = crudRouter({
  list: catalogController.listProducts,
  get: catalogController.getProduct,
  create: catalogController.createProduct,
  update: catalogController.updateProduct,
  remove: catalogController.deleteProduct
});
