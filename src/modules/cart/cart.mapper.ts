import type { CartItem } from '../../shared/database/entities';
import { multiplyMoney, sumMoney } from '../../shared/utils/money.utils';
import type { CartDetails } from './cart.service';

export interface CartItemPayload {
  id: number;
  product_id: number;
  title: string;
  unit_price: string;
  qty: number;
  subtotal: string;
}

export interface CartPayload {
  id: number;
  is_active: boolean;
  items: CartItemPayload[];
  total: string;
  created_at: string;
  updated_at: string;
}

export function cartItemSubtotal(item: CartItem): string {
  return multiplyMoney(item.unitPrice, item.qty);
}

export function cartTotal(items: CartItem[]): string {
  return sumMoney(items.map(cartItemSubtotal));
}

export function toCartPayload({ cart, items }: CartDetails): CartPayload {
  return {
    id: cart.id,
    is_active: cart.isActive,
    items: items.map(item => ({
      id: item.id,
      product_id: item.productId,
      title: item.title,
      unit_price: item.unitPrice,
      qty: item.qty,
      subtotal: cartItemSubtotal(item)
    })),
    total: cartTotal(items),
    created_at: cart.createdAt.toISOString(),
    updated_at: cart.updatedAt.toISOString()
  };
}
