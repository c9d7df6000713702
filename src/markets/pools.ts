import { Decimal, ZERO, feeFraction } from '../utils/decimal';
import * as constantProduct from './math/constantProduct';
import * as weightedProduct from './math/weightedProduct';
import * as stableSwap from './math/stableSwap';
import type { LiquidityPool, Reserves } from './types';

function reserveOf(reserves: Reserves, token: string): Decimal {
  return reserves.get(token) ?? ZERO;
}

function weightOf(weights: ReadonlyMap<string, Decimal>, token: string): Decimal {
  return weights.get(token) ?? ZERO;
}

function orderedBalances(pool: LiquidityPool, reserves: Reserves): Decimal[] {
  return pool.tokens.map(token => reserveOf(reserves, token));
}

function assertNever(pool: never): never {
  throw new Error(`Unhandled pool kind: ${JSON.stringify(pool)}`);
}

/**
 * Whether the pool can trade `tokenIn` for `tokenOut` at the given reserves.
 */
export function canTrade(pool: LiquidityPool, reserves: Reserves, tokenIn: string, tokenOut: string): boolean {
  if (tokenIn === tokenOut) return false;
  if (!pool.tokens.includes(tokenIn) || !pool.tokens.includes(tokenOut)) return false;
  if (pool.kind === 'stableSwap') {
    return pool.tokens.every(token => reserveOf(reserves, token).gt(0));
  }
  return reserveOf(reserves, tokenIn).gt(0) && reserveOf(reserves, tokenOut).gt(0);
}

/**
 * Exact-in quote: how much `tokenOut` the pool pays for `amountIn` of `tokenIn`.
 * Unrounded; null when the pool cannot execute the trade.
 */
export function quote(
  pool: LiquidityPool,
  reserves: Reserves,
  tokenIn: string,
  tokenOut: string,
  amountIn: Decimal
): Decimal | null {
  if (amountIn.lte(0) || !canTrade(pool, reserves, tokenIn, tokenOut)) {
    return null;
  }
  const fee = feeFraction(pool.feeBps);

  switch (pool.kind) {
    case 'constantProduct':
      return constantProduct.getAmountOut(
        reserveOf(reserves, tokenIn),
        reserveOf(reserves, tokenOut),
        amountIn,
        fee
      );
    case 'weightedProduct':
      return weightedProduct.calcOutGivenIn(
        reserveOf(reserves, tokenIn),
        weightOf(pool.weights, tokenIn),
        reserveOf(reserves, tokenOut),
        weightOf(pool.weights, tokenOut),
        amountIn,
        fee
      );
    case 'stableSwap':
      return stableSwap.calcOutGivenIn(
        orderedBalances(pool, reserves),
        pool.amplification,
        pool.tokens.indexOf(tokenIn),
        pool.tokens.indexOf(tokenOut),
        amountIn,
        fee
      );
    default:
      return assertNever(pool);
  }
}

/**
 * Exact-out quote: how much `tokenIn` the pool needs to pay out `amountOut` of `tokenOut`.
 */
export function quoteInverse(
  pool: LiquidityPool,
  reserves: Reserves,
  tokenIn: string,
  tokenOut: string,
  amountOut: Decimal
): Decimal | null {
  if (amountOut.lte(0) || !canTrade(pool, reserves, tokenIn, tokenOut)) {
    return null;
  }
  const fee = feeFraction(pool.feeBps);

  switch (pool.kind) {
    case 'constantProduct':
      return constantProduct.getAmountIn(
        reserveOf(reserves, tokenIn),
        reserveOf(reserves, tokenOut),
        amountOut,
        fee
      );
    case 'weightedProduct':
      return weightedProduct.calcInGivenOut(
        reserveOf(reserves, tokenIn),
        weightOf(pool.weights, tokenIn),
        reserveOf(reserves, tokenOut),
        weightOf(pool.weights, tokenOut),
        amountOut,
        fee
      );
    case 'stableSwap':
      return stableSwap.calcInGivenOut(
        orderedBalances(pool, reserves),
        pool.amplification,
        pool.tokens.indexOf(tokenIn),
        pool.tokens.indexOf(tokenOut),
        amountOut,
        fee
      );
    default:
      return assertNever(pool);
  }
}

/**
 * Marginal price in `tokenOut` per `tokenIn` for an infinitesimal trade, after fees.
 * Realized rates never exceed it, which makes it a safe search bound.
 */
export function marginalPrice(
  pool: LiquidityPool,
  reserves: Reserves,
  tokenIn: string,
  tokenOut: string
): Decimal {
  if (!canTrade(pool, reserves, tokenIn, tokenOut)) {
    return ZERO;
  }
  const fee = feeFraction(pool.feeBps);

  switch (pool.kind) {
    case 'constantProduct':
      return constantProduct.getSpotPrice(reserveOf(reserves, tokenIn), reserveOf(reserves, tokenOut), fee);
    case 'weightedProduct':
      return weightedProduct.calcSpotPrice(
        reserveOf(reserves, tokenIn),
        weightOf(pool.weights, tokenIn),
        reserveOf(reserves, tokenOut),
        weightOf(pool.weights, tokenOut),
        fee
      );
    case 'stableSwap':
      return stableSwap.calcSpotPrice(
        orderedBalances(pool, reserves),
        pool.amplification,
        pool.tokens.indexOf(tokenIn),
        pool.tokens.indexOf(tokenOut),
        fee
      );
    default:
      return assertNever(pool);
  }
}
