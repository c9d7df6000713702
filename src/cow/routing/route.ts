import { Decimal, roundDown, sumDecimals } from '../../utils/decimal';
import { quote } from '../../markets/pools';
import { ReserveOverlay } from '../../markets/ReserveOverlay';
import type { LiquidityPool } from '../../markets/types';
import type { Edge } from '../graph/LiquidityGraph';
import { Interaction, Token, decimalsOf } from '../model';

export interface RoutePart {
  readonly pool: LiquidityPool;
  readonly amountIn: Decimal;
  readonly amountOut: Decimal;
}

/** One hop; more than one part means the hop is split across parallel pools. */
export interface RouteLeg {
  readonly tokenIn: string;
  readonly tokenOut: string;
  readonly parts: readonly RoutePart[];
}

export interface Route {
  readonly legs: readonly RouteLeg[];
  readonly amountIn: Decimal;
  readonly amountOut: Decimal;
}

export function legAmountIn(leg: RouteLeg): Decimal {
  return sumDecimals(leg.parts.map(part => part.amountIn));
}

export function legAmountOut(leg: RouteLeg): Decimal {
  return sumDecimals(leg.parts.map(part => part.amountOut));
}

export function interactionCount(route: Route): number {
  return route.legs.reduce((count, leg) => count + leg.parts.length, 0);
}

export function routePools(route: Route): Set<string> {
  const ids = new Set<string>();
  for (const leg of route.legs) {
    for (const part of leg.parts) ids.add(part.pool.id);
  }
  return ids;
}

/**
 * Walks `path` forward from `amountIn`, rounding every hop's output down to
 * the output token's decimals. Null when any hop cannot execute.
 */
export function simulateExactIn(
  path: readonly Edge[],
  amountIn: Decimal,
  overlay: ReserveOverlay,
  tokens: ReadonlyMap<string, Token>
): Route | null {
  const legs: RouteLeg[] = [];
  let amount = amountIn;

  for (const edge of path) {
    const raw = quote(edge.pool, overlay.reservesOf(edge.pool), edge.tokenIn, edge.tokenOut, amount);
    if (!raw) return null;
    const out = roundDown(raw, decimalsOf(tokens, edge.tokenOut));
    if (out.lte(0)) return null;
    legs.push({
      tokenIn: edge.tokenIn,
      tokenOut: edge.tokenOut,
      parts: [{ pool: edge.pool, amountIn: amount, amountOut: out }]
    });
    amount = out;
  }

  return { legs, amountIn, amountOut: amount };
}

/**
 * Applies a route to the overlay in leg order. Interactions come out in the
 * same order, which is the order the pools are consumed.
 */
export function commitRoute(
  route: Route,
  overlay: ReserveOverlay
): { overlay: ReserveOverlay; interactions: Interaction[] } {
  const interactions: Interaction[] = [];
  let next = overlay;

  for (const leg of route.legs) {
    for (const part of leg.parts) {
      next = next.withSwap(part.pool, leg.tokenIn, part.amountIn, leg.tokenOut, part.amountOut);
      interactions.push(
        Object.freeze({
          poolId: part.pool.id,
          tokenIn: leg.tokenIn,
          tokenOut: leg.tokenOut,
          amountIn: part.amountIn,
          amountOut: part.amountOut
        })
      );
    }
  }

  return { overlay: next, interactions };
}
