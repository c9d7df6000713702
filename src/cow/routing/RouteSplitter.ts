import { Decimal, ZERO, minDecimal, roundDown, sumDecimals } from '../../utils/decimal';
import { marginalPrice, quote } from '../../markets/pools';
import { ReserveOverlay } from '../../markets/ReserveOverlay';
import logger from '../../utils/logger';
import type { Edge, LiquidityGraph } from '../graph/LiquidityGraph';
import { Token, decimalsOf } from '../model';
import { Route, RouteLeg, RoutePart, routePools } from './route';

interface Allocation {
  edge: Edge;
  amountIn: Decimal;
  /** Marginal rate after the current allocation */
  rate: Decimal;
}

/**
 * Route Splitter - spreads each hop of an exact-in route across parallel pools
 *
 * The hop input is cut into equal chunks and each chunk goes to the pool
 * with the best marginal rate at its current allocation, so marginal rates
 * across the used pools converge as chunks are placed.
 */
export class RouteSplitter {
  constructor(
    private readonly tokens: ReadonlyMap<string, Token>,
    private readonly chunks: number
  ) {}

  /**
   * Returns the split version of `route`, or null when splitting does not
   * strictly improve the output.
   */
  findOptimalSplit(route: Route, graph: LiquidityGraph, overlay: ReserveOverlay): Route | null {
    if (this.chunks < 2) return null;

    const pathPools = routePools(route);
    const assigned = new Set<string>();
    const legs: RouteLeg[] = [];
    let amount = route.amountIn;
    let split = false;

    for (const leg of route.legs) {
      const pathPool = leg.parts[0].pool;
      const candidates = graph
        .parallelEdges(leg.tokenIn, leg.tokenOut)
        .filter(edge => edge.pool.id === pathPool.id || (!pathPools.has(edge.pool.id) && !assigned.has(edge.pool.id)));

      const parts = candidates.length > 1
        ? this.splitLeg(candidates, leg.tokenOut, amount, overlay)
        : this.singlePart(candidates, leg.tokenOut, amount, overlay);
      if (!parts) return null;

      split = split || parts.length > 1;
      parts.forEach(part => assigned.add(part.pool.id));
      legs.push({ tokenIn: leg.tokenIn, tokenOut: leg.tokenOut, parts });
      amount = sumDecimals(parts.map(part => part.amountOut));
    }

    if (!split || amount.lte(route.amountOut)) {
      return null;
    }

    logger.debug('Split route improves output', {
      single: route.amountOut.toString(),
      split: amount.toString(),
      legs: legs.map(leg => leg.parts.length)
    });

    return { legs, amountIn: route.amountIn, amountOut: amount };
  }

  /**
   * Water-fills `amountIn` across `candidates`. Ties go to the earlier edge.
   */
  splitLeg(
    candidates: readonly Edge[],
    tokenOut: string,
    amountIn: Decimal,
    overlay: ReserveOverlay
  ): RoutePart[] | null {
    const tokenIn = candidates[0].tokenIn;
    const chunk = roundDown(amountIn.div(this.chunks), decimalsOf(this.tokens, tokenIn));
    const allocations: Allocation[] = candidates.map(edge => ({
      edge,
      amountIn: ZERO,
      rate: marginalPrice(edge.pool, overlay.reservesOf(edge.pool), tokenIn, tokenOut)
    }));

    let remaining = amountIn;
    for (let i = 0; i < this.chunks && remaining.gt(0); i++) {
      const size = i === this.chunks - 1 || chunk.lte(0) ? remaining : minDecimal(chunk, remaining);

      let best = allocations[0];
      for (const allocation of allocations) {
        if (allocation.rate.gt(best.rate)) best = allocation;
      }
      if (best.rate.lte(0)) return null;

      best.amountIn = best.amountIn.add(size);
      best.rate = this.rateAfter(best.edge, best.amountIn, overlay);
      remaining = remaining.sub(size);
    }

    const parts: RoutePart[] = [];
    for (const allocation of allocations) {
      if (allocation.amountIn.lte(0)) continue;
      const { pool } = allocation.edge;
      const raw = quote(pool, overlay.reservesOf(pool), tokenIn, tokenOut, allocation.amountIn);
      if (!raw) return null;
      const amountOut = roundDown(raw, decimalsOf(this.tokens, tokenOut));
      if (amountOut.lte(0)) return null;
      parts.push({ pool, amountIn: allocation.amountIn, amountOut });
    }
    return parts;
  }

  private singlePart(
    candidates: readonly Edge[],
    tokenOut: string,
    amountIn: Decimal,
    overlay: ReserveOverlay
  ): RoutePart[] | null {
    if (candidates.length === 0) return null;
    const { pool, tokenIn } = candidates[0];
    const raw = quote(pool, overlay.reservesOf(pool), tokenIn, tokenOut, amountIn);
    if (!raw) return null;
    const amountOut = roundDown(raw, decimalsOf(this.tokens, tokenOut));
    return amountOut.gt(0) ? [{ pool, amountIn, amountOut }] : null;
  }

  private rateAfter(edge: Edge, allocated: Decimal, overlay: ReserveOverlay): Decimal {
    const reserves = overlay.reservesOf(edge.pool);
    const out = quote(edge.pool, reserves, edge.tokenIn, edge.tokenOut, allocated);
    if (!out) return ZERO;
    const shifted = overlay.withSwap(edge.pool, edge.tokenIn, allocated, edge.tokenOut, out);
    return marginalPrice(edge.pool, shifted.reservesOf(edge.pool), edge.tokenIn, edge.tokenOut);
  }
}
