import { Router } from 'express';
import { paymentController } from './payment.controller';

const router = Router();

/**
 * @route   POST /api/v1/payments/confirm
 * @desc    Mark the payment of a pending order as succeeded or failed
 * @access  Public
 */
router.post('/confirm', paymentController.confirm);

export { router as paymentRouter };
