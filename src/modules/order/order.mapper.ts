import { toPaymentPayload, PaymentPayload } from '../payment/payment.mapper';
import type { OrderDetails } from './order.service';

export interface OrderItemPayload {
  /** Null once the product has been deleted */
  product: number | null;
  title: string;
  unit_price: string;
  qty: number;
  subtotal: string;
}

export interface OrderPayload {
  id: number;
  status: string;
  address_text: string;
  subtotal: string;
  delivery_fee: string;
  total: string;
  created_at: string;
  items: OrderItemPayload[];
  payment: PaymentPayload | null;
}

export function toOrderPayload({ order, items, payment }: OrderDetails): OrderPayload {
  return {
    id: order.id,
    status: order.status,
    address_text: order.addressText,
    subtotal: order.subtotal,
    delivery_fee: order.deliveryFee,
    total: order.total,
    created_at: order.createdAt.toISOString(),
    items: items.map(item => ({
      product: item.productId,
      title: item.title,
      unit_price: item.unitPrice,
      qty: item.qty,
      subtotal: item.subtotal
    })),
    payment: payment ? toPaymentPayload(payment) : null
  };
}
