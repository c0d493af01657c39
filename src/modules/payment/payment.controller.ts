import { Request, Response } from 'express';
import { paymentService } from './payment.service';
import { confirmPaymentSchema } from './payment.schema';
import { toPaymentPayload } from './payment.mapper';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class PaymentController {
  confirm = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(confirmPaymentSchema, req.body);
    const payment = await paymentService.confirm({
      orderId: data.order_id,
      method: data.method,
      success: data.success,
      reference: data.reference
    });
    res.status(200).json(successResponse(toPaymentPayload(payment)));
  });
}

export const paymentController = new PaymentController();
