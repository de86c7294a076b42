import Decimal from 'decimal.js';

/**
 * Decimal constructor for currency math. Precision is high enough that a
 * leg's arithmetic never rounds; rounding happens only when encoding.
 */
export const Money = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });

/** Rounds half-up to `places` and converts to a JSON number. */
export function roundTo(value: Decimal, places: number): number {
  return value.toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toNumber();
}

export const roundCurrency = (value: Decimal) => roundTo(value, 2);
