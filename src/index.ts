export * from './cow/errors';
export * from './cow/model';
export * from './markets/types';
export { canTrade, quote, quoteInverse, marginalPrice } from './markets/pools';
export { ReserveOverlay } from './markets/ReserveOverlay';
export { LiquidityGraph } from './cow/graph/LiquidityGraph';
export type { Edge } from './cow/graph/LiquidityGraph';
export { PeerMatcher } from './cow/matching/PeerMatcher';
export type { MatchResult, OrderResidual, PeerMatch } from './cow/matching/PeerMatcher';
export { RouteSearch } from './cow/routing/RouteSearch';
export type { RouteSearchOptions, RoutedFill } from './cow/routing/RouteSearch';
export { RouteSplitter } from './cow/routing/RouteSplitter';
export { commitRoute } from './cow/routing/route';
export type { Route, RouteLeg, RoutePart } from './cow/routing/route';
export { SettlementEncoder } from './cow/settlement/SettlementEncoder';
export { computePriceBasis, clearingPrices } from './cow/settlement/prices';
export { Scorer, fillSurplus, compareSolutions } from './cow/scoring/Scorer';
export { PipelineStrategy, defaultStrategies, selectStrategies } from './cow/strategies';
export type { CandidateStrategy, StrategyContext, PipelineOptions } from './cow/strategies';
export { SolveGovernor, solve } from './cow/SolveGovernor';
export type { GovernorState, GovernorSettings, SolveOutcome, SolveOptions } from './cow/SolveGovernor';
export * from './cow/sorting';
export { Quoter } from './cow/Quoter';
export type { QuoteRequest, QuoteResult, QuoterOptions } from './cow/Quoter';
export { auctionFromWire, solutionToWire, quoteToWire } from './cow/dto';
export type * from './cow/types';
export { loadSolverConfig, DEFAULT_SOLVER_CONFIG } from './config/solver-config';
export type { SolverConfig } from './config/solver-config';
export { SystemClock, systemClock } from './utils/clock';
export type { Clock } from './utils/clock';
export { Decimal } from './utils/decimal';
