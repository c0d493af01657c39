/**
 * =============================================================================
 * ORDER MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { orderService } from './order.service';
import { checkoutSchema, listOrdersQuerySchema, orderIdParamsSchema } from './order.schema';
import { toOrderPayload } from './order.mapper';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class OrderController {
  /**
   * Active cart -> pending order with a created payment
   */
  checkout = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(checkoutSchema, req.body);
    const details = await orderService.createOrder({
      email: data.email,
      addressText: data.address_text,
      deliveryFee: data.delivery_fee
    });
    res.status(201).json(successResponse(toOrderPayload(details)));
  });

  list = asyncHandler(async (req: Request, res: Response) => {
    const { email } = validateSchema(listOrdersQuerySchema, req.query);
    const orders = await orderService.listForUser(email);
    res.status(200).json(successResponse(orders.map(toOrderPayload)));
  });

  get = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(orderIdParamsSchema, req.params);
    res.status(200).json(successResponse(toOrderPayload(await orderService.getOrder(id))));
  });
}

export const orderController = new OrderController();
