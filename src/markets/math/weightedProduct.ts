import { Decimal, ONE } from '../../utils/decimal';

// Balancer caps a single swap at 30% of the touched balance
export const MAX_IN_RATIO = new Decimal('0.3');
export const MAX_OUT_RATIO = new Decimal('0.3');

/**
 * outGivenIn = bOut * (1 - (bIn / (bIn + aIn)) ^ (wIn / wOut))
 */
export function calcOutGivenIn(
  balanceIn: Decimal,
  weightIn: Decimal,
  balanceOut: Decimal,
  weightOut: Decimal,
  amountIn: Decimal,
  fee: Decimal
): Decimal | null {
  if (amountIn.gt(balanceIn.mul(MAX_IN_RATIO))) {
    return null;
  }
  const adjustedIn = amountIn.mul(ONE.sub(fee));
  const base = balanceIn.div(balanceIn.add(adjustedIn));
  const power = base.pow(weightIn.div(weightOut));
  return balanceOut.mul(ONE.sub(power));
}

/**
 * inGivenOut = bIn * ((bOut / (bOut - aOut)) ^ (wOut / wIn) - 1) / (1 - fee)
 */
export function calcInGivenOut(
  balanceIn: Decimal,
  weightIn: Decimal,
  balanceOut: Decimal,
  weightOut: Decimal,
  amountOut: Decimal,
  fee: Decimal
): Decimal | null {
  if (amountOut.gt(balanceOut.mul(MAX_OUT_RATIO))) {
    return null;
  }
  const base = balanceOut.div(balanceOut.sub(amountOut));
  const power = base.pow(weightOut.div(weightIn));
  return balanceIn.mul(power.sub(ONE)).div(ONE.sub(fee));
}

export function calcSpotPrice(
  balanceIn: Decimal,
  weightIn: Decimal,
  balanceOut: Decimal,
  weightOut: Decimal,
  fee: Decimal
): Decimal {
  return balanceOut.div(weightOut).div(balanceIn.div(weightIn)).mul(ONE.sub(fee));
}
