import DecimalJs from 'decimal.js';

/**
 * Decimal constructor used for every amount and price in the solver.
 *
 * 64 significant digits hold an 18-decimal token amount up to 1e45 exactly, so
 * sums of rounded amounts never lose precision and conservation checks can use
 * zero tolerance.
 */
export const Decimal = DecimalJs.clone({
  precision: 64,
  rounding: DecimalJs.ROUND_HALF_EVEN,
  toExpNeg: -64,
  toExpPos: 64
});
export type Decimal = DecimalJs;
export type DecimalValue = DecimalJs.Value;

// Products of factors with up to 128 significant digits each are never rounded
const ExactProduct = DecimalJs.clone({ precision: 256, rounding: DecimalJs.ROUND_HALF_EVEN });

export const ZERO = new Decimal(0);
export const ONE = new Decimal(1);
export const BPS_DENOMINATOR = new Decimal(10000);

export function toDecimal(value: DecimalValue): Decimal {
  return new Decimal(value);
}

export function isDecimal(value: unknown): value is Decimal {
  return DecimalJs.isDecimal(value);
}

/** Pool outputs are rounded towards the pool. */
export function roundDown(value: Decimal, decimals: number): Decimal {
  return value.toDecimalPlaces(decimals, DecimalJs.ROUND_DOWN);
}

/** Required inputs are rounded towards the pool. */
export function roundUp(value: Decimal, decimals: number): Decimal {
  return value.toDecimalPlaces(decimals, DecimalJs.ROUND_UP);
}

export function roundNearest(value: Decimal, decimals: number): Decimal {
  return value.toDecimalPlaces(decimals, DecimalJs.ROUND_HALF_EVEN);
}

/** Sign of `a * b - c * d`, with both products computed exactly. */
export function compareProducts(a: Decimal, b: Decimal, c: Decimal, d: Decimal): number {
  return new ExactProduct(a).mul(b).cmp(new ExactProduct(c).mul(d));
}

export function minDecimal(a: Decimal, b: Decimal): Decimal {
  return a.lte(b) ? a : b;
}

export function maxDecimal(a: Decimal, b: Decimal): Decimal {
  return a.gte(b) ? a : b;
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = total.add(value);
  }
  return total;
}

export function feeFraction(feeBps: number): Decimal {
  return new Decimal(feeBps).div(BPS_DENOMINATOR);
}
