import { Decimal, ZERO } from '../utils/decimal';
import type { Order, Token } from './model';

/**
 * Sorting keys compare within their own kind. A missing timestamp sorts below
 * any present one.
 */
export type SortingKey =
  | { readonly kind: 'ratio'; readonly value: Decimal }
  | { readonly kind: 'timestamp'; readonly value: number | null }
  | { readonly kind: 'bool'; readonly value: boolean };

export interface SortingStrategy {
  readonly name: string;
  /** Share of `maxOrders` reserved for this comparator's top orders */
  readonly minFraction: number;
  key(order: Order, tokens: ReadonlyMap<string, Token>, solver: string): SortingKey;
}

const KIND_RANK: Record<SortingKey['kind'], number> = { ratio: 0, timestamp: 1, bool: 2 };

export function compareKeys(a: SortingKey, b: SortingKey): number {
  if (a.kind === 'ratio' && b.kind === 'ratio') {
    return a.value.cmp(b.value);
  }
  if (a.kind === 'timestamp' && b.kind === 'timestamp') {
    if (a.value === b.value) return 0;
    if (a.value === null) return -1;
    if (b.value === null) return 1;
    return a.value - b.value;
  }
  if (a.kind === 'bool' && b.kind === 'bool') {
    return Number(a.value) - Number(b.value);
  }
  return KIND_RANK[a.kind] - KIND_RANK[b.kind];
}

function valueOf(tokens: ReadonlyMap<string, Token>, token: string, amount: Decimal): Decimal | null {
  const price = tokens.get(token)?.referencePrice;
  return price ? amount.mul(price) : null;
}

/**
 * How likely the order is to be filled: the value it offers over the value
 * it asks for, at reference prices. Zero when either price is unknown.
 */
export function likelihood(order: Order, tokens: ReadonlyMap<string, Token>): Decimal {
  const sellValue = valueOf(tokens, order.sellToken, order.sellAmount);
  const buyValue = valueOf(tokens, order.buyToken, order.buyAmount);
  if (!sellValue || !buyValue || buyValue.isZero()) return ZERO;
  return sellValue.div(buyValue);
}

/** Value offered minus value asked, at reference prices. */
export function likelihoodSurplus(order: Order, tokens: ReadonlyMap<string, Token>): Decimal {
  const sellValue = valueOf(tokens, order.sellToken, order.sellAmount);
  const buyValue = valueOf(tokens, order.buyToken, order.buyAmount);
  if (!sellValue || !buyValue) return ZERO;
  return sellValue.sub(buyValue);
}

function earliestAllowed(maxOrderAgeSeconds: number | undefined, now: () => number): number | null {
  return maxOrderAgeSeconds === undefined ? null : Math.floor(now() / 1000) - maxOrderAgeSeconds;
}

export function externalPrice(minFraction = 0): SortingStrategy {
  return {
    name: 'external-price',
    minFraction,
    key: (order, tokens) => ({ kind: 'ratio', value: likelihood(order, tokens) })
  };
}

export function externalSurplus(minFraction = 0): SortingStrategy {
  return {
    name: 'external-surplus',
    minFraction,
    key: (order, tokens) => ({ kind: 'ratio', value: likelihoodSurplus(order, tokens) })
  };
}

/** Newest first. Orders older than `maxOrderAgeSeconds` (or without a creation time) sort last. */
export function creationTimestamp(
  minFraction = 0,
  maxOrderAgeSeconds?: number,
  now: () => number = Date.now
): SortingStrategy {
  return {
    name: 'creation-timestamp',
    minFraction,
    key: order => {
      const earliest = earliestAllowed(maxOrderAgeSeconds, now);
      const created = order.createdAt ?? null;
      const eligible = created !== null && (earliest === null || created >= earliest);
      return { kind: 'timestamp', value: eligible ? created : null };
    }
  };
}

/** Orders whose winning quote came from `solver` first, unless they are outdated. */
export function ownQuotes(
  minFraction = 0,
  maxOrderAgeSeconds?: number,
  now: () => number = Date.now
): SortingStrategy {
  return {
    name: 'own-quotes',
    minFraction,
    key: (order, _tokens, solver) => {
      const earliest = earliestAllowed(maxOrderAgeSeconds, now);
      const outdated = earliest !== null && (order.createdAt ?? 0) < earliest;
      const isOwnQuote = order.quoteSolver !== undefined && order.quoteSolver === solver.toLowerCase();
      return { kind: 'bool', value: !outdated && isOwnQuote };
    }
  };
}

/**
 * Stable sort, most important first: keys of all comparators compared
 * lexicographically, descending.
 */
export function sortOrders(
  orders: readonly Order[],
  tokens: ReadonlyMap<string, Token>,
  solver: string,
  comparators: readonly SortingStrategy[]
): Order[] {
  const keyed = orders.map((order, index) => ({
    order,
    index,
    keys: comparators.map(cmp => cmp.key(order, tokens, solver))
  }));

  keyed.sort((a, b) => {
    for (let i = 0; i < comparators.length; i++) {
      const cmp = compareKeys(b.keys[i], a.keys[i]);
      if (cmp !== 0) return cmp;
    }
    return a.index - b.index;
  });

  return keyed.map(entry => entry.order);
}

/**
 * Each comparator with a positive `minFraction` first contributes its own top
 * `ceil(minFraction * maxOrders)` orders; the rest of the slots are filled by
 * the combined ordering up to `maxOrders`. No order appears twice.
 */
export function sortAndFilterOrders(
  orders: readonly Order[],
  tokens: ReadonlyMap<string, Token>,
  solver: string,
  comparators: readonly SortingStrategy[],
  maxOrders: number
): Order[] {
  const selected: Order[] = [];
  const selectedIds = new Set<string>();

  for (const cmp of comparators) {
    if (cmp.minFraction <= 0) continue;
    const quota = Math.ceil(cmp.minFraction * maxOrders);
    for (const order of sortOrders(orders, tokens, solver, [cmp]).slice(0, quota)) {
      if (!selectedIds.has(order.id)) {
        selectedIds.add(order.id);
        selected.push(order);
      }
    }
  }

  if (selected.length < maxOrders) {
    for (const order of sortOrders(orders, tokens, solver, comparators)) {
      if (selected.length >= maxOrders) break;
      if (!selectedIds.has(order.id)) {
        selectedIds.add(order.id);
        selected.push(order);
      }
    }
  }

  return selected;
}
