import { Decimal, ONE, ZERO } from '../../utils/decimal';

const MAX_ITERATIONS = 255;
const CONVERGENCE = new Decimal('1e-40');
// Relative trade size used to measure the marginal price
const SPOT_PROBE = new Decimal('1e-12');

/**
 * StableSwap invariant D for `A·nⁿ·Σx + D = A·D·nⁿ + Dⁿ⁺¹ / (nⁿ·Πx)`,
 * solved with Newton's method.
 */
export function calculateInvariant(balances: readonly Decimal[], amplification: Decimal): Decimal {
  const n = balances.length;
  const sum = balances.reduce((acc, balance) => acc.add(balance), ZERO);
  if (sum.isZero()) {
    return ZERO;
  }

  const ann = amplification.mul(new Decimal(n).pow(n));
  let invariant = sum;

  for (let i = 0; i < MAX_ITERATIONS; i++) {
    let dP = invariant;
    for (const balance of balances) {
      dP = dP.mul(invariant).div(balance.mul(n));
    }
    const previous = invariant;
    const numerator = ann.mul(sum).add(dP.mul(n)).mul(invariant);
    const denominator = ann.sub(ONE).mul(invariant).add(dP.mul(n + 1));
    invariant = numerator.div(denominator);
    if (invariant.sub(previous).abs().lte(invariant.mul(CONVERGENCE))) {
      break;
    }
  }

  return invariant;
}

/**
 * Balance of token `index` that keeps the invariant, all other balances fixed.
 */
export function calculateBalanceGivenInvariant(
  balances: readonly Decimal[],
  amplification: Decimal,
  invariant: Decimal,
  index: number
): Decimal {
  const n = balances.length;
  const ann = amplification.mul(new Decimal(n).pow(n));

  let c = invariant;
  let sum = ZERO;
  balances.forEach((balance, k) => {
    if (k === index) return;
    sum = sum.add(balance);
    c = c.mul(invariant).div(balance.mul(n));
  });
  c = c.mul(invariant).div(ann.mul(n));
  const b = sum.add(invariant.div(ann));

  let y = invariant;
  for (let i = 0; i < MAX_ITERATIONS; i++) {
    const previous = y;
    y = y.mul(y).add(c).div(y.mul(2).add(b).sub(invariant));
    if (y.sub(previous).abs().lte(invariant.mul(CONVERGENCE))) {
      break;
    }
  }

  return y;
}

export function calcOutGivenIn(
  balances: readonly Decimal[],
  amplification: Decimal,
  indexIn: number,
  indexOut: number,
  amountIn: Decimal,
  fee: Decimal
): Decimal | null {
  const invariant = calculateInvariant(balances, amplification);
  const updated = [...balances];
  updated[indexIn] = balances[indexIn].add(amountIn.mul(ONE.sub(fee)));
  const newBalanceOut = calculateBalanceGivenInvariant(updated, amplification, invariant, indexOut);
  const amountOut = balances[indexOut].sub(newBalanceOut);
  return amountOut.gt(0) ? amountOut : null;
}

export function calcInGivenOut(
  balances: readonly Decimal[],
  amplification: Decimal,
  indexIn: number,
  indexOut: number,
  amountOut: Decimal,
  fee: Decimal
): Decimal | null {
  if (amountOut.gte(balances[indexOut])) {
    return null;
  }
  const invariant = calculateInvariant(balances, amplification);
  const updated = [...balances];
  updated[indexOut] = balances[indexOut].sub(amountOut);
  const newBalanceIn = calculateBalanceGivenInvariant(updated, amplification, invariant, indexIn);
  const amountInAfterFee = newBalanceIn.sub(balances[indexIn]);
  if (amountInAfterFee.lte(0)) {
    return null;
  }
  return amountInAfterFee.div(ONE.sub(fee));
}

export function calcSpotPrice(
  balances: readonly Decimal[],
  amplification: Decimal,
  indexIn: number,
  indexOut: number,
  fee: Decimal
): Decimal {
  const probe = balances[indexIn].mul(SPOT_PROBE);
  const amountOut = calcOutGivenIn(balances, amplification, indexIn, indexOut, probe, fee);
  return amountOut ? amountOut.div(probe) : ZERO;
}
