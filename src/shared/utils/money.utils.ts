/**
 * Money helpers.
 *
 * Amounts travel as decimal strings ("40.00") exactly as numeric(10,2)
 * columns return them; arithmetic happens in integer cents.
 */

export type Money = string;

/**
 * "40.5" -> 4050
 */
export function toCents(amount: Money | number): number {
  return Math.round(Number(amount) * 100);
}

/**
 * 4050 -> "40.50"
 */
export function formatCents(cents: number): Money {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(Math.round(cents));
  const whole = Math.floor(abs / 100);
  const fraction = (abs % 100).toString().padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

/**
 * Normalise any accepted amount to two decimals
 */
export function normalizeMoney(amount: Money | number): Money {
  return formatCents(toCents(amount));
}

export function multiplyMoney(unitPrice: Money, qty: number): Money {
  return formatCents(toCents(unitPrice) * qty);
}

export function sumMoney(amounts: Money[]): Money {
  return formatCents(amounts.reduce((total, amount) => total + toCents(amount), 0));
}

/**
 * Display text: "$40" for whole amounts, "$40.50" otherwise
 */
export function priceText(amount: Money): string {
  const cents = toCents(amount);
  return cents % 100 === 0 ? `$${cents / 100}` : `$${formatCents(cents)}`;
}
