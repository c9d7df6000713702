import { Decimal, ZERO } from '../../utils/decimal';
import { InfeasibleError } from '../errors';
import {
  Auction,
  Fill,
  Interaction,
  Order,
  createFill,
  respectsLimit
} from '../model';
import { clearingPrices } from './prices';

export interface EncodedSettlement {
  readonly fills: readonly Fill[];
  readonly interactions: readonly Interaction[];
  readonly clearingPrices: ReadonlyMap<string, Decimal>;
}

/**
 * Settlement Encoder - turns a candidate's matched and routed fills into one
 * settlement and checks it before it can be scored.
 */
export class SettlementEncoder {
  private readonly orders: ReadonlyMap<string, Order>;

  constructor(
    private readonly auction: Auction,
    private readonly priceBasis: ReadonlyMap<string, Decimal>
  ) {
    this.orders = new Map(auction.orders.map(order => [order.id, order]));
  }

  /**
   * @param fills - matcher fills followed by route fills; several per order are summed
   * @param interactions - in commit order, which is kept as-is
   * @throws InfeasibleError when a limit, a fill bound or token conservation is violated
   */
  encode(fills: readonly Fill[], interactions: readonly Interaction[]): EncodedSettlement {
    const merged = this.mergeFills(fills);
    merged.forEach(fill => this.checkFill(fill));
    this.checkConservation(merged, interactions);

    const traded = this.tradedTokens(merged, interactions);
    return {
      fills: Object.freeze(merged),
      interactions: Object.freeze([...interactions]),
      clearingPrices: clearingPrices(traded, this.priceBasis, merged, this.orders)
    };
  }

  /** One fill per order, in auction order. */
  mergeFills(fills: readonly Fill[]): Fill[] {
    const totals = new Map<string, { sell: Decimal; buy: Decimal }>();
    for (const fill of fills) {
      const total = totals.get(fill.orderId) ?? { sell: ZERO, buy: ZERO };
      totals.set(fill.orderId, {
        sell: total.sell.add(fill.executedSell),
        buy: total.buy.add(fill.executedBuy)
      });
    }

    for (const orderId of totals.keys()) {
      if (!this.orders.has(orderId)) {
        throw new InfeasibleError(`fill for unknown order ${orderId}`);
      }
    }

    return this.auction.orders.flatMap(order => {
      const total = totals.get(order.id);
      return total ? [createFill(order, total.sell, total.buy, this.auction.tokens)] : [];
    });
  }

  private checkFill(fill: Fill): void {
    const order = this.orders.get(fill.orderId);
    if (!order) {
      throw new InfeasibleError(`fill for unknown order ${fill.orderId}`);
    }
    if (fill.executedSell.lte(0) || fill.executedBuy.lte(0)) {
      throw new InfeasibleError(`order ${order.id} has a non-positive fill`);
    }
    if (!respectsLimit(order, fill.executedSell, fill.executedBuy)) {
      throw new InfeasibleError(
        `order ${order.id} filled at ${fill.executedBuy.div(fill.executedSell).toString()} below its limit`
      );
    }

    const [executed, total] = order.kind === 'sell'
      ? [fill.executedSell, order.sellAmount]
      : [fill.executedBuy, order.buyAmount];
    if (executed.gt(total)) {
      throw new InfeasibleError(`order ${order.id} overfilled: ${executed.toString()} > ${total.toString()}`);
    }
    if (!order.partiallyFillable && !executed.eq(total)) {
      throw new InfeasibleError(`fill-or-kill order ${order.id} only partially filled`);
    }
  }

  /** Per token: trader sells and pool outputs in, trader buys and pool inputs out, netting to zero. */
  private checkConservation(fills: readonly Fill[], interactions: readonly Interaction[]): void {
    const net = new Map<string, Decimal>();
    const add = (token: string, amount: Decimal): void => {
      net.set(token, (net.get(token) ?? ZERO).add(amount));
    };

    for (const fill of fills) {
      const order = this.orders.get(fill.orderId);
      if (!order) continue;
      add(order.sellToken, fill.executedSell);
      add(order.buyToken, fill.executedBuy.neg());
    }
    for (const interaction of interactions) {
      add(interaction.tokenOut, interaction.amountOut);
      add(interaction.tokenIn, interaction.amountIn.neg());
    }

    for (const [token, balance] of net) {
      if (!balance.isZero()) {
        throw new InfeasibleError(`token ${token} does not balance (net ${balance.toString()})`);
      }
    }
  }

  private tradedTokens(fills: readonly Fill[], interactions: readonly Interaction[]): string[] {
    const tokens = new Set<string>();
    for (const fill of fills) {
      const order = this.orders.get(fill.orderId);
      if (!order) continue;
      tokens.add(order.sellToken);
      tokens.add(order.buyToken);
    }
    for (const interaction of interactions) {
      tokens.add(interaction.tokenIn);
      tokens.add(interaction.tokenOut);
    }
    return Array.from(tokens);
  }
}
