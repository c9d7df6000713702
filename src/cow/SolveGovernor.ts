import { Decimal } from '../utils/decimal';
import { Clock, systemClock } from '../utils/clock';
import { logCandidateFailure, logDebug, logSolveOutcome } from '../utils/logger';
import { DEFAULT_SOLVER_CONFIG } from '../config/solver-config';
import { CancelledError, SolverError } from './errors';
import { LiquidityGraph } from './graph/LiquidityGraph';
import { Auction, BASELINE_STRATEGY, Solution, zeroFillSolution } from './model';
import { compareSolutions } from './scoring/Scorer';
import { computePriceBasis } from './settlement/prices';
import { CandidateStrategy, StrategyContext, defaultStrategies } from './strategies';

export type GovernorState = 'idle' | 'running' | 'completed' | 'timedOut';

export interface GovernorSettings {
  maxHops: number;
  interactionPenalty: Decimal;
  solverAddress: string;
  maxOrders: number;
}

export interface SolveOutcome {
  readonly solution: Solution;
  readonly state: 'completed' | 'timedOut';
  /** Strategies whose solution made it in before the deadline */
  readonly completed: readonly string[];
  readonly failed: readonly string[];
}

/**
 * Solve Governor - runs every candidate strategy against one auction and
 * answers before the deadline.
 *
 * One-shot: idle -> running -> completed | timedOut. The zero-fill baseline
 * is always among the candidates, so there is always an answer.
 */
export class SolveGovernor {
  private state: GovernorState = 'idle';

  constructor(
    private readonly strategies: readonly CandidateStrategy[],
    private readonly settings: GovernorSettings,
    private readonly clock: Clock = systemClock
  ) {}

  get currentState(): GovernorState {
    return this.state;
  }

  async run(auction: Auction, deadline: Date): Promise<SolveOutcome> {
    if (this.state !== 'idle') {
      throw new SolverError(`Governor already ${this.state}`, 'GOVERNOR_REUSED');
    }
    this.state = 'running';
    const startedAt = this.clock.now();
    const baseline = zeroFillSolution(auction.id);

    if (deadline.getTime() <= startedAt.getTime()) {
      return this.finish(auction, 'timedOut', baseline, [], [], startedAt);
    }

    const context = this.buildContext(auction);
    const cancel = new AbortController();
    const solutions: Solution[] = [];
    const completed: string[] = [];
    const failed: string[] = [];

    const tasks = this.strategies.map(strategy =>
      this.startCandidate(strategy, auction, context, cancel.signal).then(
        solution => {
          if (cancel.signal.aborted) return;
          solutions.push(solution);
          completed.push(strategy.name);
        },
        (error: unknown) => {
          if (error instanceof CancelledError) {
            logDebug('Candidate cancelled', { auctionId: auction.id, strategy: strategy.name });
            return;
          }
          failed.push(strategy.name);
          logCandidateFailure(strategy.name, error, { auctionId: auction.id });
        }
      )
    );

    const deadlineWait = new AbortController();
    const state = await Promise.race([
      Promise.all(tasks).then(() => 'completed' as const),
      this.clock.waitUntil(deadline, deadlineWait.signal).then(() => 'timedOut' as const)
    ]);
    deadlineWait.abort();
    if (state === 'timedOut') {
      cancel.abort();
    }

    const order = [BASELINE_STRATEGY, ...this.strategies.map(strategy => strategy.name)];
    const best = [baseline, ...solutions].sort((a, b) => compareSolutions(a, b, order))[0];
    return this.finish(auction, state, best, completed, failed, startedAt);
  }

  private buildContext(auction: Auction): StrategyContext {
    const graph = LiquidityGraph.build(auction.liquidity);
    return {
      graph,
      priceBasis: computePriceBasis(auction, graph, this.settings.maxHops),
      interactionPenalty: this.settings.interactionPenalty,
      solverAddress: this.settings.solverAddress,
      maxOrders: this.settings.maxOrders
    };
  }

  /** Failures thrown before the task's first await still arrive as a rejection. */
  private async startCandidate(
    strategy: CandidateStrategy,
    auction: Auction,
    context: StrategyContext,
    signal: AbortSignal
  ): Promise<Solution> {
    return strategy.run(auction, context, signal);
  }

  private finish(
    auction: Auction,
    state: 'completed' | 'timedOut',
    solution: Solution,
    completed: readonly string[],
    failed: readonly string[],
    startedAt: Date
  ): SolveOutcome {
    this.state = state;
    logSolveOutcome({
      auctionId: auction.id,
      state,
      strategy: solution.strategy,
      score: solution.score.toString(),
      completedCandidates: completed.length,
      failedCandidates: failed.length,
      elapsedMs: this.clock.now().getTime() - startedAt.getTime()
    });
    return { solution, state, completed: [...completed], failed: [...failed] };
  }
}

export interface SolveOptions {
  strategies?: readonly CandidateStrategy[];
  settings?: Partial<GovernorSettings>;
  clock?: Clock;
}

/**
 * Solves one auction before `deadline`. Never rejects: candidate failures and
 * timeouts degrade to the zero-fill solution.
 */
export async function solve(auction: Auction, deadline: Date, options: SolveOptions = {}): Promise<Solution> {
  const settings: GovernorSettings = {
    maxHops: DEFAULT_SOLVER_CONFIG.maxHops,
    interactionPenalty: DEFAULT_SOLVER_CONFIG.interactionPenalty,
    solverAddress: DEFAULT_SOLVER_CONFIG.solverAddress,
    maxOrders: DEFAULT_SOLVER_CONFIG.maxOrders,
    ...options.settings
  };
  const strategies = options.strategies ?? defaultStrategies(settings.maxHops, DEFAULT_SOLVER_CONFIG.splitChunks);

  try {
    const outcome = await new SolveGovernor(strategies, settings, options.clock).run(auction, deadline);
    return outcome.solution;
  } catch (error) {
    logCandidateFailure('governor', error, { auctionId: auction.id });
    return zeroFillSolution(auction.id);
  }
}
