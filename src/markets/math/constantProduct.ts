import { Decimal, ONE } from '../../utils/decimal';

/**
 * x * y = k with the fee taken from the input amount.
 */
export function getAmountOut(
  reserveIn: Decimal,
  reserveOut: Decimal,
  amountIn: Decimal,
  fee: Decimal
): Decimal {
  const amountInWithFee = amountIn.mul(ONE.sub(fee));
  const numerator = amountInWithFee.mul(reserveOut);
  const denominator = reserveIn.add(amountInWithFee);
  return numerator.div(denominator);
}

/** Returns null when the requested output would drain the pool. */
export function getAmountIn(
  reserveIn: Decimal,
  reserveOut: Decimal,
  amountOut: Decimal,
  fee: Decimal
): Decimal | null {
  if (amountOut.gte(reserveOut)) {
    return null;
  }
  const numerator = reserveIn.mul(amountOut);
  const denominator = reserveOut.sub(amountOut).mul(ONE.sub(fee));
  return numerator.div(denominator);
}

export function getSpotPrice(reserveIn: Decimal, reserveOut: Decimal, fee: Decimal): Decimal {
  return reserveOut.div(reserveIn).mul(ONE.sub(fee));
}
