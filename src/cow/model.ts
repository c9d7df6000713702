import { utils } from 'ethers';
import { Decimal, ZERO, DecimalValue, compareProducts, roundDown } from '../utils/decimal';
import type { LiquidityPool, PoolKind } from '../markets/types';
import { POOL_KINDS } from '../markets/types';
import {
  InvalidAuctionError,
  InvalidOrderError,
  SolverError,
  UnknownTokenError
} from './errors';

export interface Token {
  readonly address: string;
  readonly decimals: number;
  /** Value of one whole token in the numeraire, when the coordinator supplies one */
  readonly referencePrice?: Decimal;
}

export type OrderKind = 'sell' | 'buy';

export interface Order {
  readonly id: string;
  readonly sellToken: string;
  readonly buyToken: string;
  readonly sellAmount: Decimal;
  readonly buyAmount: Decimal;
  readonly kind: OrderKind;
  readonly partiallyFillable: boolean;
  readonly feeAmount: Decimal;
  /** Unix seconds */
  readonly validTo: number;
  /** Unix seconds */
  readonly createdAt?: number;
  /** Solver that provided the winning quote for this order */
  readonly quoteSolver?: string;
}

export interface Auction {
  readonly id: string;
  readonly tokens: ReadonlyMap<string, Token>;
  readonly orders: readonly Order[];
  readonly liquidity: readonly LiquidityPool[];
  readonly deadline: Date;
  readonly numeraire?: string;
}

export interface Fill {
  readonly orderId: string;
  readonly executedSell: Decimal;
  readonly executedBuy: Decimal;
  readonly executedFee: Decimal;
}

export interface Interaction {
  readonly poolId: string;
  readonly tokenIn: string;
  readonly tokenOut: string;
  readonly amountIn: Decimal;
  readonly amountOut: Decimal;
}

export interface Solution {
  readonly auctionId: string;
  readonly strategy: string;
  readonly fills: readonly Fill[];
  readonly interactions: readonly Interaction[];
  readonly clearingPrices: ReadonlyMap<string, Decimal>;
  readonly score: Decimal;
}

export const BASELINE_STRATEGY = 'baseline';

/** The "do nothing" settlement: always valid, scores exactly zero. */
export function zeroFillSolution(auctionId: string): Solution {
  return Object.freeze({
    auctionId,
    strategy: BASELINE_STRATEGY,
    fills: Object.freeze([]),
    interactions: Object.freeze([]),
    clearingPrices: new Map<string, Decimal>(),
    score: ZERO
  });
}

/** Minimum acceptable buy units per sell unit. */
export function limitPrice(order: Order): Decimal {
  return order.buyAmount.div(order.sellAmount);
}

/** `executedBuy / executedSell >= buyAmount / sellAmount`, cross-multiplied to stay exact. */
export function respectsLimit(order: Order, executedSell: Decimal, executedBuy: Decimal): boolean {
  return compareProducts(executedBuy, order.sellAmount, executedSell, order.buyAmount) >= 0;
}

export function decimalsOf(tokens: ReadonlyMap<string, Token>, address: string): number {
  const token = tokens.get(address);
  if (!token) {
    throw new UnknownTokenError(address, 'lookup');
  }
  return token.decimals;
}

/** Fraction of the order executed, measured on its fixed side. */
export function executedFraction(order: Order, executedSell: Decimal, executedBuy: Decimal): Decimal {
  return order.kind === 'sell'
    ? executedSell.div(order.sellAmount)
    : executedBuy.div(order.buyAmount);
}

/** Builds a fill whose fee is the order fee pro-rated by the executed fraction. */
export function createFill(
  order: Order,
  executedSell: Decimal,
  executedBuy: Decimal,
  tokens: ReadonlyMap<string, Token>
): Fill {
  const fraction = executedFraction(order, executedSell, executedBuy);
  return Object.freeze({
    orderId: order.id,
    executedSell,
    executedBuy,
    executedFee: roundDown(order.feeAmount.mul(fraction), decimalsOf(tokens, order.sellToken))
  });
}

// ---------------------------------------------------------------------------
// Snapshot construction
// ---------------------------------------------------------------------------

export interface RawToken {
  address: string;
  decimals: number;
  referencePrice?: string;
}

export interface RawOrder {
  id: string;
  sellToken: string;
  buyToken: string;
  sellAmount: string;
  buyAmount: string;
  kind: OrderKind;
  partiallyFillable: boolean;
  feeAmount?: string;
  validTo: number;
  createdAt?: number;
  quoteSolver?: string;
}

export interface RawPool {
  id: string;
  kind: PoolKind;
  tokens: string[];
  reserves: string[];
  feeBps: number;
  weights?: string[];
  amplification?: string;
}

export interface RawAuction {
  id: string;
  tokens: RawToken[];
  orders: RawOrder[];
  liquidity: RawPool[];
  deadline: string | number | Date;
  numeraire?: string;
}

const MAX_DECIMALS = 36;

export function normalizeAddress(address: string): string | null {
  return utils.isAddress(address) ? address.toLowerCase() : null;
}

function parseDecimal(value: DecimalValue): Decimal | null {
  try {
    const parsed = new Decimal(value);
    return parsed.isFinite() ? parsed : null;
  } catch (error) {
    return null;
  }
}

export function createToken(raw: RawToken): Token {
  const address = normalizeAddress(raw.address);
  if (!address) {
    throw new SolverError(`Malformed token address ${raw.address}`, 'INVALID_TOKEN');
  }
  if (!Number.isInteger(raw.decimals) || raw.decimals < 0 || raw.decimals > MAX_DECIMALS) {
    throw new SolverError(`Token ${address} has invalid decimals ${raw.decimals}`, 'INVALID_TOKEN');
  }

  let referencePrice: Decimal | undefined;
  if (raw.referencePrice !== undefined) {
    const parsed = parseDecimal(raw.referencePrice);
    if (!parsed || parsed.lte(0)) {
      throw new SolverError(`Token ${address} has invalid reference price ${raw.referencePrice}`, 'INVALID_TOKEN');
    }
    referencePrice = parsed;
  }

  return Object.freeze({ address, decimals: raw.decimals, referencePrice });
}

function resolveToken(
  tokens: ReadonlyMap<string, Token>,
  address: string,
  referencedBy: string
): Token {
  const normalized = normalizeAddress(address) ?? address.toLowerCase();
  const token = tokens.get(normalized);
  if (!token) {
    throw new UnknownTokenError(normalized, referencedBy);
  }
  return token;
}

/**
 * Validates one order against the snapshot's token set.
 * Amounts are whole-token decimals and may not carry more places than the token has.
 */
export function createOrder(
  raw: RawOrder,
  tokens: ReadonlyMap<string, Token>,
  nowSeconds: number
): Order {
  const sellToken = resolveToken(tokens, raw.sellToken, `order ${raw.id}`);
  const buyToken = resolveToken(tokens, raw.buyToken, `order ${raw.id}`);

  if (sellToken.address === buyToken.address) {
    throw new InvalidOrderError(raw.id, 'sell and buy token are identical');
  }
  if (raw.kind !== 'sell' && raw.kind !== 'buy') {
    throw new InvalidOrderError(raw.id, `unknown kind ${String(raw.kind)}`);
  }

  const sellAmount = parseDecimal(raw.sellAmount);
  const buyAmount = parseDecimal(raw.buyAmount);
  const feeAmount = parseDecimal(raw.feeAmount ?? '0');
  if (!sellAmount || sellAmount.lte(0)) {
    throw new InvalidOrderError(raw.id, `sell amount must be positive, got ${raw.sellAmount}`);
  }
  if (!buyAmount || buyAmount.lte(0)) {
    throw new InvalidOrderError(raw.id, `buy amount must be positive, got ${raw.buyAmount}`);
  }
  if (!feeAmount || feeAmount.lt(0)) {
    throw new InvalidOrderError(raw.id, `fee amount must not be negative, got ${String(raw.feeAmount)}`);
  }
  if (sellAmount.decimalPlaces() > sellToken.decimals || feeAmount.decimalPlaces() > sellToken.decimals) {
    throw new InvalidOrderError(raw.id, `sell amount exceeds ${sellToken.decimals} decimals`);
  }
  if (buyAmount.decimalPlaces() > buyToken.decimals) {
    throw new InvalidOrderError(raw.id, `buy amount exceeds ${buyToken.decimals} decimals`);
  }
  if (!Number.isFinite(raw.validTo) || raw.validTo < nowSeconds) {
    throw new InvalidOrderError(raw.id, `expired at ${raw.validTo}`);
  }

  return Object.freeze({
    id: raw.id,
    sellToken: sellToken.address,
    buyToken: buyToken.address,
    sellAmount,
    buyAmount,
    kind: raw.kind,
    partiallyFillable: raw.partiallyFillable,
    feeAmount,
    validTo: raw.validTo,
    createdAt: raw.createdAt,
    quoteSolver: raw.quoteSolver ? raw.quoteSolver.toLowerCase() : undefined
  });
}

function parsePositiveList(values: string[] | undefined, expected: number, label: string, poolId: string): Decimal[] {
  if (!values || values.length !== expected) {
    throw new SolverError(`Pool ${poolId} needs ${expected} ${label}`, 'INVALID_POOL');
  }
  return values.map(value => {
    const parsed = parseDecimal(value);
    if (!parsed || parsed.lt(0)) {
      throw new SolverError(`Pool ${poolId} has invalid ${label} entry ${value}`, 'INVALID_POOL');
    }
    return parsed;
  });
}

export function createPool(raw: RawPool, tokens: ReadonlyMap<string, Token>): LiquidityPool {
  if (!POOL_KINDS.includes(raw.kind)) {
    throw new SolverError(`Pool ${raw.id} has unsupported kind ${String(raw.kind)}`, 'INVALID_POOL');
  }
  if (!Number.isFinite(raw.feeBps) || raw.feeBps < 0 || raw.feeBps >= 10000) {
    throw new SolverError(`Pool ${raw.id} has invalid fee ${raw.feeBps}bps`, 'INVALID_POOL');
  }

  const poolTokens = raw.tokens.map(address => resolveToken(tokens, address, `pool ${raw.id}`).address);
  if (poolTokens.length < 2 || new Set(poolTokens).size !== poolTokens.length) {
    throw new SolverError(`Pool ${raw.id} needs at least two distinct tokens`, 'INVALID_POOL');
  }
  if (raw.kind === 'constantProduct' && poolTokens.length !== 2) {
    throw new SolverError(`Constant product pool ${raw.id} must have exactly 2 tokens`, 'INVALID_POOL');
  }

  const reserveValues = parsePositiveList(raw.reserves, poolTokens.length, 'reserves', raw.id);
  const reserves = new Map(poolTokens.map((token, i) => [token, reserveValues[i]] as const));
  const base = { id: raw.id.toLowerCase(), tokens: Object.freeze(poolTokens), reserves, feeBps: raw.feeBps };

  switch (raw.kind) {
    case 'constantProduct':
      return Object.freeze({ ...base, kind: 'constantProduct' as const });
    case 'weightedProduct': {
      const weightValues = parsePositiveList(raw.weights, poolTokens.length, 'weights', raw.id);
      if (weightValues.some(weight => weight.isZero())) {
        throw new SolverError(`Pool ${raw.id} has a zero weight`, 'INVALID_POOL');
      }
      const weights = new Map(poolTokens.map((token, i) => [token, weightValues[i]] as const));
      return Object.freeze({ ...base, kind: 'weightedProduct' as const, weights });
    }
    case 'stableSwap': {
      const amplification = parseDecimal(raw.amplification ?? '');
      if (!amplification || amplification.lte(0)) {
        throw new SolverError(`Pool ${raw.id} has invalid amplification ${String(raw.amplification)}`, 'INVALID_POOL');
      }
      return Object.freeze({ ...base, kind: 'stableSwap' as const, amplification });
    }
  }
}

function parseDeadline(value: string | number | Date): Date | null {
  const deadline = value instanceof Date ? new Date(value.getTime()) : new Date(value);
  return Number.isNaN(deadline.getTime()) ? null : deadline;
}

/**
 * Builds the immutable auction snapshot. Every validation failure is collected
 * and raised together as one `InvalidAuctionError`.
 */
export function createAuction(raw: RawAuction, now: Date = new Date()): Auction {
  const errors: Error[] = [];
  const nowSeconds = Math.floor(now.getTime() / 1000);

  const tokens = new Map<string, Token>();
  for (const rawToken of raw.tokens) {
    try {
      const token = createToken(rawToken);
      tokens.set(token.address, token);
    } catch (error) {
      errors.push(error instanceof Error ? error : new Error(String(error)));
    }
  }

  const orders: Order[] = [];
  const seen = new Set<string>();
  for (const rawOrder of raw.orders) {
    try {
      if (seen.has(rawOrder.id)) {
        throw new InvalidOrderError(rawOrder.id, 'duplicate order id');
      }
      seen.add(rawOrder.id);
      orders.push(createOrder(rawOrder, tokens, nowSeconds));
    } catch (error) {
      errors.push(error instanceof Error ? error : new Error(String(error)));
    }
  }

  const liquidity: LiquidityPool[] = [];
  const poolIds = new Set<string>();
  for (const rawPool of raw.liquidity) {
    try {
      const pool = createPool(rawPool, tokens);
      if (poolIds.has(pool.id)) {
        throw new SolverError(`Duplicate pool id ${pool.id}`, 'INVALID_POOL');
      }
      poolIds.add(pool.id);
      liquidity.push(pool);
    } catch (error) {
      errors.push(error instanceof Error ? error : new Error(String(error)));
    }
  }

  const deadline = parseDeadline(raw.deadline);
  if (!deadline) {
    errors.push(new SolverError(`Malformed deadline ${String(raw.deadline)}`, 'INVALID_DEADLINE'));
  }

  let numeraire: string | undefined;
  if (raw.numeraire !== undefined) {
    try {
      numeraire = resolveToken(tokens, raw.numeraire, 'numeraire').address;
    } catch (error) {
      errors.push(error instanceof Error ? error : new Error(String(error)));
    }
  }

  if (errors.length > 0 || !deadline) {
    throw new InvalidAuctionError(raw.id, errors);
  }

  return Object.freeze({
    id: raw.id,
    tokens,
    orders: Object.freeze(orders),
    liquidity: Object.freeze(liquidity),
    deadline,
    numeraire
  });
}
