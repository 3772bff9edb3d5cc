/**
 * Rounds to two decimals, half to even.
 *
 * The value is first cleaned to 15 significant digits so that binary noise
 * (2.675 stored as 2.67499999...) does not decide the tie.
 */
export function roundMoney(value: number): number {
  const scaled = Number((value * 100).toPrecision(15));
  const floor = Math.floor(scaled);
  const fraction = Number((scaled - floor).toPrecision(15));

  let cents: number;
  if (fraction > 0.5) {
    cents = floor + 1;
  } else if (fraction < 0.5) {
    cents = floor;
  } else {
    cents = floor % 2 === 0 ? floor : floor + 1;
  }
  // avoid -0
  return cents === 0 ? 0 : cents / 100;
}

export function lineTotal(quantity: number, unitPrice: number): number {
  return roundMoney(quantity * unitPrice);
}

export function formatMoney(value: number): string {
  return roundMoney(value).toFixed(2);
}

// Quantities and percentages: shortest form, without float noise
export function formatQuantity(value: number): string {
  return String(Number(value.toPrecision(12)));
}

const CURRENCY_SYMBOLS: Record<string, string> = {
  INR: '₹',
  USD: '$',
  EUR: '€',
  GBP: '£',
};

export function currencyLabel(currency: string): string {
  return CURRENCY_SYMBOLS[currency] ?? `${currency} `;
}
