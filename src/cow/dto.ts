import { BigNumber, utils } from 'ethers';
import { Decimal, roundDown } from '../utils/decimal';
import { logWarn } from '../utils/logger';
import type { PoolKind } from '../markets/types';
import { InvalidAuctionError, SolverError, UnknownTokenError } from './errors';
import {
  Auction,
  Interaction,
  RawAuction,
  RawOrder,
  RawPool,
  Solution,
  createAuction,
  decimalsOf
} from './model';
import type { QuoteResult } from './Quoter';
import {
  SolverResponse,
  WireAuction,
  WireInteraction,
  WireLiquidity,
  WireOrder,
  WireQuote,
  WireSolution
} from './types';

const PRICE_SCALE_DECIMALS = 36;

const LIQUIDITY_KINDS = new Map<string, PoolKind>([
  ['constantproduct', 'constantProduct'],
  ['uniswapv2', 'constantProduct'],
  ['weightedproduct', 'weightedProduct'],
  ['stable', 'stableSwap'],
  ['stableswap', 'stableSwap']
]);

/** Integer atoms to whole-token units. */
export function fromAtoms(atoms: string, decimals: number): string {
  return utils.formatUnits(BigNumber.from(atoms), decimals);
}

/** Whole-token units to integer atoms, truncating anything below one atom. */
export function toAtoms(amount: Decimal, decimals: number): string {
  return utils.parseUnits(roundDown(amount, decimals).toFixed(decimals), decimals).toString();
}

/** Numeraire per whole token to a per-atom price scaled by 1e36, so 18-decimal tokens keep 18 places. */
export function toWirePrice(price: Decimal, decimals: number): string {
  return roundDown(price.mul(new Decimal(10).pow(PRICE_SCALE_DECIMALS - decimals)), 0).toFixed(0);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shape check for a `/solve` body. Field-level validation happens when the
 * domain auction is built.
 */
export function isWireAuction(body: unknown): body is WireAuction {
  return (
    isRecord(body) &&
    typeof body.id === 'string' &&
    isRecord(body.tokens) &&
    Array.isArray(body.orders) &&
    Array.isArray(body.liquidity) &&
    (typeof body.deadline === 'string' || typeof body.deadline === 'number')
  );
}

function orderToRaw(order: WireOrder, decimals: (token: string) => number): RawOrder {
  const sellDecimals = decimals(order.sellToken);
  return {
    id: order.uid,
    sellToken: order.sellToken,
    buyToken: order.buyToken,
    sellAmount: fromAtoms(order.sellAmount, sellDecimals),
    buyAmount: fromAtoms(order.buyAmount, decimals(order.buyToken)),
    kind: order.kind,
    partiallyFillable: order.partiallyFillable,
    feeAmount: fromAtoms(order.feeAmount ?? '0', sellDecimals),
    validTo: order.validTo,
    createdAt: order.createdAt,
    quoteSolver: order.quoteSolver
  };
}

function liquidityToRaw(liquidity: WireLiquidity, decimals: (token: string) => number): RawPool | null {
  const kind = LIQUIDITY_KINDS.get(liquidity.kind.toLowerCase());
  if (!kind) {
    logWarn('Skipping unsupported liquidity', { poolId: liquidity.id, kind: liquidity.kind });
    return null;
  }
  if (liquidity.tokens.length !== liquidity.reserves.length) {
    throw new SolverError(`Pool ${liquidity.id} has ${liquidity.tokens.length} tokens but ${liquidity.reserves.length} reserves`, 'INVALID_POOL');
  }
  return {
    id: liquidity.id,
    kind,
    tokens: liquidity.tokens,
    reserves: liquidity.tokens.map((token, i) => fromAtoms(liquidity.reserves[i], decimals(token))),
    feeBps: new Decimal(liquidity.fee).mul(10000).toNumber(),
    weights: liquidity.weights,
    amplification: liquidity.amplificationParameter
  };
}

/**
 * Converts the coordinator's auction into the domain snapshot. Conversion and
 * validation failures are reported together.
 * @throws InvalidAuctionError
 */
export function auctionFromWire(wire: WireAuction, now: Date = new Date()): Auction {
  const errors: Error[] = [];
  const tokenDecimals = new Map<string, number>();
  for (const [address, token] of Object.entries(wire.tokens)) {
    tokenDecimals.set(address.toLowerCase(), token.decimals);
  }
  const decimals = (referencedBy: string) => (token: string): number => {
    const value = tokenDecimals.get(token.toLowerCase());
    if (value === undefined) throw new UnknownTokenError(token.toLowerCase(), referencedBy);
    return value;
  };

  const orders: RawOrder[] = [];
  for (const order of wire.orders) {
    try {
      orders.push(orderToRaw(order, decimals(`order ${order.uid}`)));
    } catch (error) {
      errors.push(error instanceof Error ? error : new Error(String(error)));
    }
  }

  const liquidity: RawPool[] = [];
  for (const pool of wire.liquidity) {
    try {
      const raw = liquidityToRaw(pool, decimals(`pool ${pool.id}`));
      if (raw) liquidity.push(raw);
    } catch (error) {
      errors.push(error instanceof Error ? error : new Error(String(error)));
    }
  }

  const raw: RawAuction = {
    id: wire.id,
    tokens: Object.entries(wire.tokens).map(([address, token]) => ({
      address,
      decimals: token.decimals,
      referencePrice: token.referencePrice ?? undefined
    })),
    orders,
    liquidity,
    deadline: wire.deadline,
    numeraire: wire.numeraire
  };

  let auction: Auction;
  try {
    auction = createAuction(raw, now);
  } catch (error) {
    if (error instanceof InvalidAuctionError) {
      throw new InvalidAuctionError(wire.id, [...errors, ...error.causes]);
    }
    throw error;
  }
  if (errors.length > 0) {
    throw new InvalidAuctionError(wire.id, errors);
  }
  return auction;
}

function interactionToWire(interaction: Interaction, auction: Auction): WireInteraction {
  return {
    kind: 'liquidity',
    internalize: false,
    id: interaction.poolId,
    inputToken: interaction.tokenIn,
    outputToken: interaction.tokenOut,
    inputAmount: toAtoms(interaction.amountIn, decimalsOf(auction.tokens, interaction.tokenIn)),
    outputAmount: toAtoms(interaction.amountOut, decimalsOf(auction.tokens, interaction.tokenOut))
  };
}

function pricesToWire(prices: ReadonlyMap<string, Decimal>, auction: Auction): { [token: string]: string } {
  const wire: { [token: string]: string } = {};
  for (const [token, price] of prices) {
    wire[token] = toWirePrice(price, decimalsOf(auction.tokens, token));
  }
  return wire;
}

/** A zero-fill solution is not reported at all. */
export function solutionToWire(solution: Solution, auction: Auction): SolverResponse {
  if (solution.fills.length === 0) {
    return { solutions: [] };
  }

  const orders = new Map(auction.orders.map(order => [order.id, order]));
  const wire: WireSolution = {
    id: 0,
    prices: pricesToWire(solution.clearingPrices, auction),
    trades: solution.fills.flatMap(fill => {
      const order = orders.get(fill.orderId);
      if (!order) return [];
      const executed = order.kind === 'sell' ? fill.executedSell : fill.executedBuy;
      const token = order.kind === 'sell' ? order.sellToken : order.buyToken;
      return [{
        kind: 'fulfillment' as const,
        order: order.id,
        executedAmount: toAtoms(executed, decimalsOf(auction.tokens, token)),
        fee: toAtoms(fill.executedFee, decimalsOf(auction.tokens, order.sellToken))
      }];
    }),
    interactions: solution.interactions.map(interaction => interactionToWire(interaction, auction)),
    score: solution.score.toString()
  };

  return { solutions: [wire] };
}

/** Quote amounts in atoms; each token's clearing price is the counter amount. */
export function quoteToWire(result: QuoteResult, auction: Auction): WireQuote {
  const sellDecimals = decimalsOf(auction.tokens, result.sellToken);
  const buyDecimals = decimalsOf(auction.tokens, result.buyToken);
  return {
    amount: toAtoms(result.amount, result.side === 'sell' ? buyDecimals : sellDecimals),
    interactions: result.interactions.map(interaction => interactionToWire(interaction, auction)),
    clearingPrices: {
      [result.sellToken]: toAtoms(result.buyAmount, buyDecimals),
      [result.buyToken]: toAtoms(result.sellAmount, sellDecimals)
    }
  };
}
