import { Decimal, ZERO, maxDecimal, roundNearest } from '../../utils/decimal';
import { logDebug } from '../../utils/logger';
import { Fill, Order, Token, createFill, decimalsOf, respectsLimit } from '../model';

/** What an order still carries forward after matching. */
export interface OrderResidual {
  readonly order: Order;
  readonly remainingSell: Decimal;
  readonly remainingBuy: Decimal;
}

export interface MatchResult {
  readonly fills: Fill[];
  readonly residuals: OrderResidual[];
}

/** One settled pairing, amounts in the first order's sell (A) and buy (B) tokens. */
export interface PeerMatch {
  readonly orderId: string;
  readonly counterpartyId: string;
  readonly amountA: Decimal;
  readonly amountB: Decimal;
  /** B per A */
  readonly price: Decimal;
}

interface Pairing {
  readonly amountA: Decimal;
  readonly amountB: Decimal;
  /** B per A */
  readonly price: Decimal;
}

interface MutableResidual {
  order: Order;
  remainingSell: Decimal;
  remainingBuy: Decimal;
  executedSell: Decimal;
  executedBuy: Decimal;
}

export function isExhausted(residual: OrderResidual): boolean {
  return residual.order.kind === 'sell'
    ? residual.remainingSell.lte(0)
    : residual.remainingBuy.lte(0);
}

export function initialResidual(order: Order): OrderResidual {
  return { order, remainingSell: order.sellAmount, remainingBuy: order.buyAmount };
}

/**
 * Peer Matcher - settles opposing orders directly against each other.
 *
 * Orders are visited in input order; each keeps matching the first eligible
 * counterparty (again in input order) while it has something left. When one
 * price inside the overlap fills both sides completely the pairing clears
 * there; otherwise it clears at the midpoint between the order's minimum price
 * and the counterparty's maximum price, and the smaller capacity binds.
 */
export class PeerMatcher {
  private readonly matches: PeerMatch[] = [];

  match(orders: readonly Order[], tokens: ReadonlyMap<string, Token>): MatchResult {
    this.matches.length = 0;
    const state: MutableResidual[] = orders.map(order => ({
      order,
      remainingSell: order.sellAmount,
      remainingBuy: order.buyAmount,
      executedSell: ZERO,
      executedBuy: ZERO
    }));

    for (const current of state) {
      for (const counterparty of state) {
        if (this.exhausted(current)) break;
        if (counterparty === current || this.exhausted(counterparty)) continue;
        if (
          counterparty.order.sellToken !== current.order.buyToken ||
          counterparty.order.buyToken !== current.order.sellToken
        ) {
          continue;
        }
        this.tryMatch(current, counterparty, tokens);
      }
    }

    const fills = state
      .filter(entry => entry.executedSell.gt(0))
      .map(entry => createFill(entry.order, entry.executedSell, entry.executedBuy, tokens));

    if (this.matches.length > 0) {
      logDebug('Peer matching complete', {
        matches: this.matches.length,
        filledOrders: fills.length
      });
    }

    return {
      fills,
      residuals: state.map(entry => ({
        order: entry.order,
        remainingSell: entry.remainingSell,
        remainingBuy: entry.remainingBuy
      }))
    };
  }

  /** Pairings settled by the last `match` call, in settlement order. */
  get lastMatches(): readonly PeerMatch[] {
    return this.matches;
  }

  private exhausted(entry: MutableResidual): boolean {
    return entry.order.kind === 'sell' ? entry.remainingSell.lte(0) : entry.remainingBuy.lte(0);
  }

  /**
   * Attempts one pairing. `o` sells A for B, `c` sells B for A.
   * Returns false when the limits do not overlap or the pairing is rejected.
   */
  private tryMatch(o: MutableResidual, c: MutableResidual, tokens: ReadonlyMap<string, Token>): boolean {
    // B per A
    const minPrice = o.order.buyAmount.div(o.order.sellAmount);
    const maxPrice = c.order.sellAmount.div(c.order.buyAmount);
    if (minPrice.gt(maxPrice)) {
      return false;
    }
    const midpoint = minPrice.add(maxPrice).div(2);

    const decimalsA = decimalsOf(tokens, o.order.sellToken);
    const decimalsB = decimalsOf(tokens, o.order.buyToken);

    for (const candidate of [this.exhaustingBoth(o, c), this.atPrice(o, c, midpoint, decimalsA, decimalsB)]) {
      if (candidate && this.acceptable(o, c, candidate)) {
        this.apply(o, candidate.amountA, candidate.amountB);
        this.apply(c, candidate.amountB, candidate.amountA);
        this.matches.push({ orderId: o.order.id, counterpartyId: c.order.id, ...candidate });
        return true;
      }
    }
    return false;
  }

  /**
   * The single pairing that fills both residuals completely. Orders of
   * different kinds fix the same token, so the midpoint already covers them.
   */
  private exhaustingBoth(o: MutableResidual, c: MutableResidual): Pairing | null {
    if (o.order.kind !== c.order.kind) {
      return null;
    }
    const amountA = o.order.kind === 'sell' ? o.remainingSell : c.remainingBuy;
    const amountB = o.order.kind === 'sell' ? c.remainingSell : o.remainingBuy;
    if (amountA.lte(0) || amountB.lte(0)) {
      return null;
    }
    return { amountA, amountB, price: amountB.div(amountA) };
  }

  /** Clears at `price` with the smaller capacity binding. */
  private atPrice(
    o: MutableResidual,
    c: MutableResidual,
    price: Decimal,
    decimalsA: number,
    decimalsB: number
  ): Pairing {
    // Capacities measured in A
    const capacityO = o.order.kind === 'sell' ? o.remainingSell : o.remainingBuy.div(price);
    const capacityC = c.order.kind === 'sell' ? c.remainingSell.div(price) : c.remainingBuy;

    if (capacityO.lte(capacityC)) {
      if (o.order.kind === 'sell') {
        return { amountA: o.remainingSell, amountB: roundNearest(o.remainingSell.mul(price), decimalsB), price };
      }
      return { amountA: roundNearest(o.remainingBuy.div(price), decimalsA), amountB: o.remainingBuy, price };
    }
    if (c.order.kind === 'sell') {
      return { amountA: roundNearest(c.remainingSell.div(price), decimalsA), amountB: c.remainingSell, price };
    }
    return { amountA: c.remainingBuy, amountB: roundNearest(c.remainingBuy.mul(price), decimalsB), price };
  }

  private acceptable(o: MutableResidual, c: MutableResidual, { amountA, amountB }: Pairing): boolean {
    if (amountA.lte(0) || amountB.lte(0)) {
      return false;
    }

    // o sells A and buys B; c sells B and buys A
    const fitsO = o.order.kind === 'sell' ? amountA.lte(o.remainingSell) : amountB.lte(o.remainingBuy);
    const fitsC = c.order.kind === 'sell' ? amountB.lte(c.remainingSell) : amountA.lte(c.remainingBuy);
    if (!fitsO || !fitsC) {
      return false;
    }

    const fullO = o.order.kind === 'sell' ? amountA.eq(o.remainingSell) : amountB.eq(o.remainingBuy);
    const fullC = c.order.kind === 'sell' ? amountB.eq(c.remainingSell) : amountA.eq(c.remainingBuy);
    if ((!fullO && !o.order.partiallyFillable) || (!fullC && !c.order.partiallyFillable)) {
      return false;
    }

    return respectsLimit(o.order, amountA, amountB) && respectsLimit(c.order, amountB, amountA);
  }

  private apply(entry: MutableResidual, sold: Decimal, bought: Decimal): void {
    entry.executedSell = entry.executedSell.add(sold);
    entry.executedBuy = entry.executedBuy.add(bought);
    entry.remainingSell = maxDecimal(ZERO, entry.remainingSell.sub(sold));
    entry.remainingBuy = maxDecimal(ZERO, entry.remainingBuy.sub(bought));
  }
}
