/**
 * Solver error taxonomy.
 *
 * Construction errors (`InvalidOrderError`, `UnknownTokenError`) are collected
 * into an `InvalidAuctionError`, the only error `solve` callers ever see.
 * `InfeasibleError` stays inside the candidate that raised it.
 */
export class SolverError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'SolverError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidOrderError extends SolverError {
  constructor(public readonly orderId: string, reason: string) {
    super(`Invalid order ${orderId}: ${reason}`, 'INVALID_ORDER');
    this.name = 'InvalidOrderError';
  }
}

export class UnknownTokenError extends SolverError {
  constructor(public readonly token: string, public readonly referencedBy: string) {
    super(`Unknown token ${token} referenced by ${referencedBy}`, 'UNKNOWN_TOKEN');
    this.name = 'UnknownTokenError';
  }
}

export class InvalidAuctionError extends SolverError {
  constructor(
    public readonly auctionId: string,
    public readonly causes: readonly Error[]
  ) {
    super(
      `Invalid auction ${auctionId}: ${causes.map(cause => cause.message).join('; ')}`,
      'INVALID_AUCTION'
    );
    this.name = 'InvalidAuctionError';
  }
}

export class InfeasibleError extends SolverError {
  constructor(reason: string) {
    super(`Infeasible solution: ${reason}`, 'INFEASIBLE');
    this.name = 'InfeasibleError';
  }
}

export class NoLiquidityError extends SolverError {
  constructor(sellToken: string, buyToken: string) {
    super(`No liquidity route from ${sellToken} to ${buyToken}`, 'NO_LIQUIDITY');
    this.name = 'NoLiquidityError';
  }
}

export class QuoteTimeoutError extends SolverError {
  constructor(public readonly timeoutMs: number) {
    super(`Quote exceeded its deadline of ${timeoutMs}ms`, 'QUOTE_TIMEOUT');
    this.name = 'QuoteTimeoutError';
  }
}

export class ConfigError extends SolverError {
  constructor(public readonly variable: string, reason: string) {
    super(`Invalid configuration ${variable}: ${reason}`, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/** Raised inside a candidate task when the governor cancels it. */
export class CancelledError extends SolverError {
  constructor(strategy: string) {
    super(`Candidate ${strategy} cancelled`, 'CANCELLED');
    this.name = 'CancelledError';
  }
}
