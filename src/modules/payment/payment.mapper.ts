import type { Payment } from '../../shared/database/entities';

export interface PaymentPayload {
  order: number;
  method: string;
  amount: string;
  status: string;
  reference: string;
  created_at: string;
}

export function toPaymentPayload(payment: Payment): PaymentPayload {
  return {
    order: payment.orderId,
    method: payment.method,
    amount: payment.amount,
    status: payment.status,
    reference: payment.reference,
    created_at: payment.createdAt.toISOString()
  };
}
