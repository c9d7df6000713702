import { Decimal, ZERO } from '../../utils/decimal';
import { InfeasibleError } from '../errors';
import type { Fill, Order, Solution } from '../model';

/**
 * Surplus of one fill in the numeraire.
 *
 * Sell orders earn surplus in the buy token (`executedBuy - executedSell * limit`),
 * buy orders in the sell token (`executedBuy / limit - executedSell`).
 */
export function fillSurplus(order: Order, fill: Fill, prices: ReadonlyMap<string, Decimal>): Decimal {
  if (order.kind === 'sell') {
    const surplus = fill.executedBuy.sub(fill.executedSell.mul(order.buyAmount).div(order.sellAmount));
    return surplus.mul(priceOf(prices, order.buyToken));
  }
  const surplus = fill.executedBuy.mul(order.sellAmount).div(order.buyAmount).sub(fill.executedSell);
  return surplus.mul(priceOf(prices, order.sellToken));
}

function priceOf(prices: ReadonlyMap<string, Decimal>, token: string): Decimal {
  const price = prices.get(token);
  if (!price) {
    throw new InfeasibleError(`no clearing price for traded token ${token}`);
  }
  return price;
}

export class Scorer {
  private readonly orders: ReadonlyMap<string, Order>;

  constructor(
    orders: readonly Order[],
    private readonly interactionPenalty: Decimal
  ) {
    this.orders = new Map(orders.map(order => [order.id, order]));
  }

  score(settlement: Pick<Solution, 'fills' | 'interactions' | 'clearingPrices'>): Decimal {
    if (settlement.fills.length === 0) {
      return ZERO;
    }

    let total = ZERO;
    for (const fill of settlement.fills) {
      const order = this.orders.get(fill.orderId);
      if (!order) {
        throw new InfeasibleError(`fill for unknown order ${fill.orderId}`);
      }
      total = total.add(fillSurplus(order, fill, settlement.clearingPrices));
    }
    return total.sub(this.interactionPenalty.mul(settlement.interactions.length));
  }
}

/** Descending score; equal scores keep strategy order. */
export function compareSolutions(
  a: Solution,
  b: Solution,
  strategyOrder: readonly string[]
): number {
  const byScore = b.score.cmp(a.score);
  if (byScore !== 0) return byScore;
  return rank(strategyOrder, a.strategy) - rank(strategyOrder, b.strategy);
}

function rank(order: readonly string[], strategy: string): number {
  const index = order.indexOf(strategy);
  return index === -1 ? order.length : index;
}
