import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { Decimal } from '../utils/decimal';
import { ReserveOverlay } from '../markets/ReserveOverlay';
import { logDebug } from '../utils/logger';
import { CancelledError, ConfigError } from './errors';
import type { LiquidityGraph } from './graph/LiquidityGraph';
import { MatchResult, PeerMatcher, initialResidual, isExhausted } from './matching/PeerMatcher';
import { Auction, Fill, Interaction, Order, Solution, createFill } from './model';
import { commitRoute } from './routing/route';
import { RouteSearch } from './routing/RouteSearch';
import { Scorer } from './scoring/Scorer';
import { SettlementEncoder } from './settlement/SettlementEncoder';
import {
  SortingStrategy,
  creationTimestamp,
  externalPrice,
  ownQuotes,
  sortAndFilterOrders
} from './sorting';

/** Read-only inputs shared by every candidate of one solve. */
export interface StrategyContext {
  readonly graph: LiquidityGraph;
  readonly priceBasis: ReadonlyMap<string, Decimal>;
  readonly interactionPenalty: Decimal;
  readonly solverAddress: string;
  readonly maxOrders: number;
}

/**
 * One candidate: an independent async task that resolves with its Solution.
 * It owns its overlay and intermediate results and must give up once
 * `signal` aborts.
 */
export interface CandidateStrategy {
  readonly name: string;
  run(auction: Auction, context: StrategyContext, signal: AbortSignal): Promise<Solution>;
}

export interface PipelineOptions {
  name: string;
  /** Peer-match before routing */
  matching: boolean;
  maxHops: number;
  /** Chunks per split hop; 1 disables splitting */
  splitChunks: number;
  /** Order comparators applied before matching; none keeps input order */
  prioritization?: readonly SortingStrategy[];
}

/**
 * Match, then route residuals one order at a time against the candidate's own
 * reserve overlay, then encode and score. Yields to the event loop between
 * orders so the governor's deadline can fire.
 */
export class PipelineStrategy implements CandidateStrategy {
  constructor(private readonly options: PipelineOptions) {}

  get name(): string {
    return this.options.name;
  }

  async run(auction: Auction, context: StrategyContext, signal: AbortSignal): Promise<Solution> {
    const { name } = this.options;
    await this.checkpoint(signal);

    const orders = this.selectOrders(auction, context);
    const matched: MatchResult = this.options.matching
      ? new PeerMatcher().match(orders, auction.tokens)
      : { fills: [], residuals: orders.map(initialResidual) };
    await this.checkpoint(signal);

    const search = new RouteSearch(context.graph, auction.tokens, {
      maxHops: this.options.maxHops,
      splitChunks: this.options.splitChunks
    });
    let overlay = ReserveOverlay.empty();
    const routeFills: Fill[] = [];
    const interactions: Interaction[] = [];

    for (const residual of matched.residuals) {
      await this.checkpoint(signal);
      const { order } = residual;
      if (isExhausted(residual) || !search.hasLiquidity(order.sellToken, order.buyToken)) {
        continue;
      }

      const routed = await search.findRoute(residual, overlay, signal);
      if (!routed) continue;

      const committed = commitRoute(routed.route, overlay);
      overlay = committed.overlay;
      interactions.push(...committed.interactions);
      routeFills.push(createFill(order, routed.executedSell, routed.executedBuy, auction.tokens));
    }
    await this.checkpoint(signal);

    const encoded = new SettlementEncoder(auction, context.priceBasis).encode(
      [...matched.fills, ...routeFills],
      interactions
    );
    const score = new Scorer(auction.orders, context.interactionPenalty).score(encoded);

    logDebug('Candidate finished', {
      auctionId: auction.id,
      strategy: name,
      fillCount: encoded.fills.length,
      interactionCount: encoded.interactions.length,
      score: score.toString()
    });

    return Object.freeze({ auctionId: auction.id, strategy: name, ...encoded, score });
  }

  private selectOrders(auction: Auction, context: StrategyContext): readonly Order[] {
    const comparators = this.options.prioritization;
    if (!comparators || comparators.length === 0) {
      return auction.orders;
    }
    return sortAndFilterOrders(auction.orders, auction.tokens, context.solverAddress, comparators, context.maxOrders);
  }

  private async checkpoint(signal: AbortSignal): Promise<void> {
    if (signal.aborted) throw new CancelledError(this.options.name);
    await yieldToEventLoop();
    if (signal.aborted) throw new CancelledError(this.options.name);
  }
}

export function defaultStrategies(maxHops: number, splitChunks: number): CandidateStrategy[] {
  return [
    new PipelineStrategy({ name: 'matching-first', matching: true, maxHops, splitChunks }),
    new PipelineStrategy({ name: 'routing-only', matching: false, maxHops, splitChunks }),
    new PipelineStrategy({ name: 'direct-only', matching: true, maxHops: 1, splitChunks }),
    new PipelineStrategy({
      name: 'prioritized',
      matching: true,
      maxHops,
      splitChunks,
      prioritization: [ownQuotes(0.1), externalPrice(0.5), creationTimestamp()]
    })
  ];
}

/**
 * Keeps the named default strategies, in the order given.
 * @throws ConfigError for an unknown name
 */
export function selectStrategies(
  names: readonly string[],
  maxHops: number,
  splitChunks: number
): CandidateStrategy[] {
  const available = defaultStrategies(maxHops, splitChunks);
  if (names.length === 0) return available;
  return names.map(name => {
    const strategy = available.find(candidate => candidate.name === name);
    if (!strategy) {
      throw new ConfigError('SOLVER_STRATEGIES', `unknown strategy "${name}"`);
    }
    return strategy;
  });
}
