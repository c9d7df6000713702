import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { Decimal, roundDown } from '../utils/decimal';
import { Clock, systemClock } from '../utils/clock';
import { logInfo } from '../utils/logger';
import { DEFAULT_SOLVER_CONFIG } from '../config/solver-config';
import { NoLiquidityError, QuoteTimeoutError, SolverError, UnknownTokenError } from './errors';
import { LiquidityGraph } from './graph/LiquidityGraph';
import { Auction, Interaction, OrderKind, decimalsOf } from './model';
import { ReserveOverlay } from '../markets/ReserveOverlay';
import { commitRoute } from './routing/route';
import { RouteSearch } from './routing/RouteSearch';

export interface QuoteRequest {
  sellToken: string;
  buyToken: string;
  /** Sell amount for `sell`, buy amount for `buy` */
  amount: Decimal;
  side: OrderKind;
}

export interface QuoteResult {
  readonly sellToken: string;
  readonly buyToken: string;
  readonly side: OrderKind;
  readonly sellAmount: Decimal;
  readonly buyAmount: Decimal;
  /** Buy amount received for `sell`, sell amount required for `buy` */
  readonly amount: Decimal;
  readonly interactions: readonly Interaction[];
  /** Prices that clear the quoted trade: sellToken -> buy amount, buyToken -> sell amount */
  readonly clearingPrices: ReadonlyMap<string, Decimal>;
}

export interface QuoterOptions {
  maxHops?: number;
  splitChunks?: number;
  clock?: Clock;
}

/**
 * Prices a single trade against the auction's liquidity, without a limit.
 */
export class Quoter {
  private readonly clock: Clock;
  private readonly maxHops: number;
  private readonly splitChunks: number;

  constructor(options: QuoterOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.maxHops = options.maxHops ?? DEFAULT_SOLVER_CONFIG.maxHops;
    this.splitChunks = options.splitChunks ?? DEFAULT_SOLVER_CONFIG.splitChunks;
  }

  /**
   * @throws NoLiquidityError when no route connects the pair
   * @throws QuoteTimeoutError when the deadline passes first
   */
  async quote(auction: Auction, request: QuoteRequest, deadline: Date): Promise<QuoteResult> {
    const startedAt = this.clock.now();
    const budgetMs = deadline.getTime() - startedAt.getTime();
    if (budgetMs <= 0) {
      throw new QuoteTimeoutError(0);
    }
    if (request.amount.lte(0)) {
      throw new SolverError(`Quote amount must be positive, got ${request.amount.toString()}`, 'INVALID_QUOTE');
    }

    const sellToken = request.sellToken.toLowerCase();
    const buyToken = request.buyToken.toLowerCase();
    for (const token of [sellToken, buyToken]) {
      if (!auction.tokens.has(token)) throw new UnknownTokenError(token, 'quote');
    }
    if (sellToken === buyToken) {
      throw new SolverError('Quote sell and buy token are identical', 'INVALID_QUOTE');
    }
    const fixedToken = request.side === 'sell' ? sellToken : buyToken;
    const amount = roundDown(request.amount, decimalsOf(auction.tokens, fixedToken));
    if (amount.lte(0)) {
      throw new SolverError(`Quote amount ${request.amount.toString()} rounds to zero`, 'INVALID_QUOTE');
    }

    await yieldToEventLoop();
    this.checkDeadline(deadline, budgetMs);

    const graph = LiquidityGraph.build(auction.liquidity);
    const search = new RouteSearch(graph, auction.tokens, {
      maxHops: this.maxHops,
      splitChunks: this.splitChunks
    });
    const overlay = ReserveOverlay.empty();
    const route = request.side === 'sell'
      ? search.findExactIn(sellToken, buyToken, amount, overlay)
      : search.findExactOut(sellToken, buyToken, amount, overlay);

    this.checkDeadline(deadline, budgetMs);
    if (!route) {
      throw new NoLiquidityError(sellToken, buyToken);
    }

    const { interactions } = commitRoute(route, overlay);
    const quoted = request.side === 'sell' ? route.amountOut : route.amountIn;

    logInfo('Quote computed', {
      auctionId: auction.id,
      sellToken,
      buyToken,
      side: request.side,
      amount,
      quoted,
      interactionCount: interactions.length,
      elapsedMs: this.clock.now().getTime() - startedAt.getTime()
    });

    return {
      sellToken,
      buyToken,
      side: request.side,
      sellAmount: route.amountIn,
      buyAmount: route.amountOut,
      amount: quoted,
      interactions,
      clearingPrices: new Map([
        [sellToken, route.amountOut],
        [buyToken, route.amountIn]
      ])
    };
  }

  private checkDeadline(deadline: Date, budgetMs: number): void {
    if (this.clock.now().getTime() >= deadline.getTime()) {
      throw new QuoteTimeoutError(budgetMs);
    }
  }
}
