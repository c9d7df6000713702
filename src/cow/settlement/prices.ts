import { Decimal, ONE } from '../../utils/decimal';
import { logDebug } from '../../utils/logger';
import type { LiquidityGraph } from '../graph/LiquidityGraph';
import type { Auction, Fill, Order } from '../model';

/**
 * Token whose price anchors an auction without reference prices: the
 * configured numeraire, or else the lexicographically smallest order token.
 */
export function pickNumeraire(auction: Auction): string | undefined {
  if (auction.numeraire) return auction.numeraire;
  const tokens = auction.orders.flatMap(order => [order.sellToken, order.buyToken]);
  return tokens.length > 0 ? [...tokens].sort()[0] : undefined;
}

/**
 * Per-auction price basis (numeraire per whole token).
 *
 * Reference prices are taken as given. Tokens without one are priced from
 * already priced neighbours over the graph's marginal rates, relaxing up to
 * `maxHops` times and keeping the lowest price found.
 */
export function computePriceBasis(
  auction: Auction,
  graph: LiquidityGraph,
  maxHops: number
): Map<string, Decimal> {
  const prices = new Map<string, Decimal>();
  for (const token of auction.tokens.values()) {
    if (token.referencePrice) prices.set(token.address, token.referencePrice);
  }

  if (prices.size === 0) {
    const numeraire = pickNumeraire(auction);
    if (!numeraire) return prices;
    prices.set(numeraire, ONE);
  }

  const anchored = new Set(prices.keys());
  const edges = graph.allEdges();
  for (let round = 0; round < maxHops; round++) {
    let changed = false;
    for (const edge of edges) {
      const priceIn = prices.get(edge.tokenIn);
      if (!priceIn || anchored.has(edge.tokenOut)) continue;
      // One tokenIn buys `marginalPrice` tokenOut
      const candidate = priceIn.div(edge.marginalPrice);
      const current = prices.get(edge.tokenOut);
      if (!current || candidate.lt(current)) {
        prices.set(edge.tokenOut, candidate);
        changed = true;
      }
    }
    if (!changed) break;
  }

  logDebug('Price basis computed', {
    auctionId: auction.id,
    tokenCount: prices.size,
    anchored: anchored.size
  });

  return prices;
}

/**
 * Clearing prices reported for one solution: the basis for every traded
 * token, then realized fill rates for tokens the basis leaves unpriced, then
 * 1 for whatever is still disconnected.
 */
export function clearingPrices(
  traded: readonly string[],
  basis: ReadonlyMap<string, Decimal>,
  fills: readonly Fill[],
  orders: ReadonlyMap<string, Order>
): Map<string, Decimal> {
  const prices = new Map<string, Decimal>();
  for (const token of traded) {
    const price = basis.get(token);
    if (price) prices.set(token, price);
  }

  let changed = true;
  while (changed) {
    changed = false;
    for (const fill of fills) {
      const order = orders.get(fill.orderId);
      if (!order) continue;
      const sellPrice = prices.get(order.sellToken);
      const buyPrice = prices.get(order.buyToken);
      if (sellPrice && !buyPrice) {
        prices.set(order.buyToken, sellPrice.mul(fill.executedSell).div(fill.executedBuy));
        changed = true;
      } else if (buyPrice && !sellPrice) {
        prices.set(order.sellToken, buyPrice.mul(fill.executedBuy).div(fill.executedSell));
        changed = true;
      }
    }
  }

  for (const token of traded) {
    if (!prices.has(token)) {
      prices.set(token, ONE);
      // Fill rates may now price the rest of this component
      return clearingPrices(traded, prices, fills, orders);
    }
  }

  return new Map(traded.flatMap(token => {
    const price = prices.get(token);
    return price ? [[token, price] as const] : [];
  }));
}
