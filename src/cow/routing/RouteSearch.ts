import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { Decimal, ONE, ZERO, roundDown, roundUp } from '../../utils/decimal';
import { quote, quoteInverse } from '../../markets/pools';
import { ReserveOverlay } from '../../markets/ReserveOverlay';
import { MinHeap } from '../../utils/MinHeap';
import { logDebug } from '../../utils/logger';
import { CancelledError } from '../errors';
import type { Edge, LiquidityGraph } from '../graph/LiquidityGraph';
import type { OrderResidual } from '../matching/PeerMatcher';
import { Token, decimalsOf, respectsLimit } from '../model';
import { Route, RouteLeg, simulateExactIn } from './route';
import { RouteSplitter } from './RouteSplitter';

export interface RouteSearchOptions {
  maxHops: number;
  /** Chunks per hop when splitting; below 2 disables splitting */
  splitChunks: number;
  /** Bisection steps when looking for the largest fillable fraction */
  bisectionSteps?: number;
}

export const DEFAULT_BISECTION_STEPS = 8;

/** A route that satisfies the order's limit, with the amounts it executes. */
export interface RoutedFill {
  readonly route: Route;
  readonly executedSell: Decimal;
  readonly executedBuy: Decimal;
}

interface SearchState {
  readonly token: string;
  readonly amount: Decimal;
  /** Optimistic final amount used as the heap key */
  readonly priority: Decimal;
  /** Exact-in: edges in travel order. Exact-out: edges from the target backwards. */
  readonly path: readonly Edge[];
  readonly tokens: ReadonlySet<string>;
  readonly pools: ReadonlySet<string>;
  readonly seq: number;
}

/**
 * Route Search - best-first search over bounded-hop paths of the liquidity graph
 *
 * The heap key is an admissible bound on the final amount: the running amount
 * times the best marginal-rate product still reachable in the remaining hops.
 * Once the best remaining key cannot beat the best complete path the search
 * stops.
 */
export class RouteSearch {
  private readonly splitter: RouteSplitter;
  private seq = 0;

  constructor(
    private readonly graph: LiquidityGraph,
    private readonly tokens: ReadonlyMap<string, Token>,
    private readonly options: RouteSearchOptions
  ) {
    this.splitter = new RouteSplitter(tokens, options.splitChunks);
  }

  /** Whether the graph connects the pair at all. */
  hasLiquidity(sellToken: string, buyToken: string): boolean {
    return this.graph.edgesFrom(sellToken).length > 0 && this.graph.edgesInto(buyToken).length > 0;
  }

  /**
   * Finds a route for what the order still carries, honouring its limit.
   * Partially fillable orders fall back to the largest fraction that still
   * meets the limit, yielding between bisection rounds.
   * @throws CancelledError when `signal` aborts at one of those yields
   */
  async findRoute(residual: OrderResidual, overlay: ReserveOverlay, signal?: AbortSignal): Promise<RoutedFill | null> {
    const { order } = residual;
    const remaining = order.kind === 'sell' ? residual.remainingSell : residual.remainingBuy;
    if (remaining.lte(0) || !this.hasLiquidity(order.sellToken, order.buyToken)) {
      return null;
    }

    const full = this.routeAmount(residual, remaining, overlay);
    if (full || !order.partiallyFillable) {
      return full;
    }

    const fixedToken = order.kind === 'sell' ? order.sellToken : order.buyToken;
    const decimals = decimalsOf(this.tokens, fixedToken);
    const steps = this.options.bisectionSteps ?? DEFAULT_BISECTION_STEPS;
    let low = ZERO;
    let high = ONE;
    let best: RoutedFill | null = null;

    for (let i = 0; i < steps; i++) {
      await yieldToEventLoop();
      if (signal?.aborted) throw new CancelledError('route-search');

      const fraction = low.add(high).div(2);
      const amount = roundDown(remaining.mul(fraction), decimals);
      const routed = amount.gt(0) ? this.routeAmount(residual, amount, overlay) : null;
      if (routed) {
        best = routed;
        low = fraction;
      } else {
        high = fraction;
      }
    }

    if (best) {
      logDebug('Partial route found', {
        orderId: order.id,
        executedSell: best.executedSell,
        executedBuy: best.executedBuy
      });
    }
    return best;
  }

  private routeAmount(
    residual: OrderResidual,
    amount: Decimal,
    overlay: ReserveOverlay
  ): RoutedFill | null {
    const { order } = residual;
    if (order.kind === 'sell') {
      const route = this.findExactIn(order.sellToken, order.buyToken, amount, overlay);
      if (!route || !respectsLimit(order, route.amountIn, route.amountOut)) return null;
      return { route, executedSell: route.amountIn, executedBuy: route.amountOut };
    }

    const route = this.findExactOut(order.sellToken, order.buyToken, amount, overlay);
    if (!route || !respectsLimit(order, route.amountIn, route.amountOut)) return null;
    return { route, executedSell: route.amountIn, executedBuy: route.amountOut };
  }

  /**
   * Best route selling exactly `amountIn`, split across parallel pools when
   * that strictly improves the output.
   */
  findExactIn(
    sellToken: string,
    buyToken: string,
    amountIn: Decimal,
    overlay: ReserveOverlay
  ): Route | null {
    const { maxHops } = this.options;
    const bounds = this.graph.rateBoundsTo(buyToken, maxHops, overlay);
    const startBound = bounds[maxHops].get(sellToken);
    if (!startBound || sellToken === buyToken) return null;

    const heap = new MinHeap<SearchState>(byPriorityDescending);
    heap.push(this.state(sellToken, amountIn, amountIn.mul(startBound), [], new Set([sellToken]), new Set()));

    let best: Route | null = null;

    for (let current = heap.pop(); current !== undefined; current = heap.pop()) {
      if (best && current.priority.lte(best.amountOut)) break;

      const hopsLeft = maxHops - current.path.length - 1;
      for (const edge of this.graph.edgesFrom(current.token)) {
        if (current.pools.has(edge.pool.id) || current.tokens.has(edge.tokenOut)) continue;

        const raw = quote(edge.pool, overlay.reservesOf(edge.pool), edge.tokenIn, edge.tokenOut, current.amount);
        if (!raw) continue;
        const out = roundDown(raw, decimalsOf(this.tokens, edge.tokenOut));
        if (out.lte(0)) continue;

        const path = [...current.path, edge];
        if (edge.tokenOut === buyToken) {
          if (!best || out.gt(best.amountOut)) {
            best = simulateExactIn(path, amountIn, overlay, this.tokens);
          }
          continue;
        }
        if (hopsLeft <= 0) continue;

        const bound = bounds[hopsLeft].get(edge.tokenOut);
        if (!bound) continue;
        const priority = out.mul(bound);
        if (best && priority.lte(best.amountOut)) continue;

        heap.push(this.state(
          edge.tokenOut,
          out,
          priority,
          path,
          new Set([...current.tokens, edge.tokenOut]),
          new Set([...current.pools, edge.pool.id])
        ));
      }
    }

    if (!best) return null;
    return this.splitter.findOptimalSplit(best, this.graph, overlay) ?? best;
  }

  /**
   * Cheapest route buying exactly `amountOut`. Searched backwards from the
   * buy token; every required input is rounded up.
   */
  findExactOut(
    sellToken: string,
    buyToken: string,
    amountOut: Decimal,
    overlay: ReserveOverlay
  ): Route | null {
    const { maxHops } = this.options;
    const bounds = this.graph.rateBoundsFrom(sellToken, maxHops, overlay);
    const endBound = bounds[maxHops].get(buyToken);
    if (!endBound || sellToken === buyToken) return null;

    // Smallest optimistic input first
    const heap = new MinHeap<SearchState>(byPriorityAscending);
    heap.push(this.state(buyToken, amountOut, amountOut.div(endBound), [], new Set([buyToken]), new Set()));

    let best: { path: Edge[]; amounts: Decimal[]; amountIn: Decimal } | null = null;

    for (let current = heap.pop(); current !== undefined; current = heap.pop()) {
      if (best && current.priority.gte(best.amountIn)) break;

      const hopsLeft = maxHops - current.path.length - 1;
      for (const edge of this.graph.edgesInto(current.token)) {
        if (current.pools.has(edge.pool.id) || current.tokens.has(edge.tokenIn)) continue;

        const raw = quoteInverse(edge.pool, overlay.reservesOf(edge.pool), edge.tokenIn, edge.tokenOut, current.amount);
        if (!raw) continue;
        const required = roundUp(raw, decimalsOf(this.tokens, edge.tokenIn));
        if (required.lte(0)) continue;

        const path = [...current.path, edge];
        if (edge.tokenIn === sellToken) {
          if (!best || required.lt(best.amountIn)) {
            best = { path, amounts: this.backwardAmounts(path, amountOut, overlay), amountIn: required };
          }
          continue;
        }
        if (hopsLeft <= 0) continue;

        const bound = bounds[hopsLeft].get(edge.tokenIn);
        if (!bound) continue;
        const priority = required.div(bound);
        if (best && priority.gte(best.amountIn)) continue;

        heap.push(this.state(
          edge.tokenIn,
          required,
          priority,
          path,
          new Set([...current.tokens, edge.tokenIn]),
          new Set([...current.pools, edge.pool.id])
        ));
      }
    }

    const found = best;
    if (!found) return null;

    // Reverse into travel order; outputs[i] is what flows out of hop i
    const travel = [...found.path].reverse();
    const outputs = [...found.amounts].reverse();
    const legs: RouteLeg[] = travel.map((edge, i) => ({
      tokenIn: edge.tokenIn,
      tokenOut: edge.tokenOut,
      parts: [{
        pool: edge.pool,
        amountIn: i === 0 ? found.amountIn : outputs[i - 1],
        amountOut: outputs[i]
      }]
    }));

    return { legs, amountIn: found.amountIn, amountOut };
  }

  /** Amount each hop of a backward path must deliver, starting with `amountOut`. */
  private backwardAmounts(path: readonly Edge[], amountOut: Decimal, overlay: ReserveOverlay): Decimal[] {
    const amounts: Decimal[] = [amountOut];
    let need = amountOut;
    for (const edge of path.slice(0, -1)) {
      const raw = quoteInverse(edge.pool, overlay.reservesOf(edge.pool), edge.tokenIn, edge.tokenOut, need);
      if (!raw) return amounts;
      need = roundUp(raw, decimalsOf(this.tokens, edge.tokenIn));
      amounts.push(need);
    }
    return amounts;
  }

  private state(
    token: string,
    amount: Decimal,
    priority: Decimal,
    path: readonly Edge[],
    tokens: ReadonlySet<string>,
    pools: ReadonlySet<string>
  ): SearchState {
    return { token, amount, priority, path, tokens, pools, seq: this.seq++ };
  }
}

function byPriorityDescending(a: SearchState, b: SearchState): number {
  const cmp = b.priority.cmp(a.priority);
  return cmp !== 0 ? cmp : a.seq - b.seq;
}

function byPriorityAscending(a: SearchState, b: SearchState): number {
  const cmp = a.priority.cmp(b.priority);
  return cmp !== 0 ? cmp : a.seq - b.seq;
}
