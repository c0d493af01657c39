/**
 * =============================================================================
 * PAYMENT MODULE - SERVICE
 * =============================================================================
 *
 * Mock payment confirmation. Only a pending order can be confirmed:
 *
 *   created --success--> success   (order: pending -> paid)
 *   created --failure--> failed    (order stays pending)
 *   failed  --success--> success   (retry while the order is pending)
 *
 * Once an order is paid every further confirm is a Conflict.
 * =============================================================================
 */

import { getStore } from '../../shared/database/db';
import type { Payment, PaymentMethod } from '../../shared/database/entities';
import { logger } from '../../shared/services/logger.service';
import { ConflictError, ErrorCode, NotFoundError } from '../../shared/types/error.types';

export const MAX_REFERENCE_LENGTH = 64;

export interface ConfirmPaymentRequest {
  orderId: number;
  method: PaymentMethod;
  success: boolean;
  reference: string;
}

/**
 * Cut by code points so a surrogate pair is never split
 */
export function truncateReference(reference: string): string {
  return Array.from(reference).slice(0, MAX_REFERENCE_LENGTH).join('');
}

class PaymentService {
  async confirm(request: ConfirmPaymentRequest): Promise<Payment> {
    const payment = await getStore().transaction(async repos => {
      const order = await repos.orders.findById(request.orderId, { lock: true });
      if (!order) {
        throw new NotFoundError('Order', ErrorCode.ORDER_NOT_FOUND);
      }
      if (order.status !== 'pending') {
        logger.warn('Payment confirm rejected: order not pending', { orderId: order.id, status: order.status });
        throw new ConflictError('Order is not pending.', ErrorCode.ORDER_NOT_PENDING, { status: order.status });
      }

      const current = await repos.payments.findByOrder(order.id);
      if (!current) {
        throw new NotFoundError('Payment', ErrorCode.PAYMENT_NOT_FOUND);
      }

      const updated = await repos.payments.update(current.id, {
        method: request.method,
        status: request.success ? 'success' : 'failed',
        reference: truncateReference(request.reference)
      });
      if (!updated) {
        throw new NotFoundError('Payment', ErrorCode.PAYMENT_NOT_FOUND);
      }

      if (request.success) {
        await repos.orders.updateStatus(order.id, 'paid');
      }
      return updated;
    });

    logger.info('Payment confirmed', {
      orderId: payment.orderId,
      paymentId: payment.id,
      method: payment.method,
      status: payment.status
    });
    return payment;
  }
}

export const paymentService = new PaymentService();
