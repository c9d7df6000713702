import { Auction, RawAuction, RawOrder, RawPool, RawToken, createAuction } from '../../src/cow/model';

export const TOKEN_A = '0x1111111111111111111111111111111111111111';
export const TOKEN_B = '0x2222222222222222222222222222222222222222';
export const TOKEN_C = '0x3333333333333333333333333333333333333333';
export const TOKEN_D = '0x4444444444444444444444444444444444444444';

export const NOW = new Date('2026-01-01T00:00:00Z');
/** 2100-01-01 */
export const FAR_FUTURE = 4102444800;

export function rawToken(address: string, decimals = 18, referencePrice?: string): RawToken {
  return { address, decimals, referencePrice };
}

export function sellOrder(
  id: string,
  sellToken: string,
  buyToken: string,
  sellAmount: string,
  buyAmount: string,
  partiallyFillable = false
): RawOrder {
  return { id, sellToken, buyToken, sellAmount, buyAmount, kind: 'sell', partiallyFillable, validTo: FAR_FUTURE };
}

export function buyOrder(
  id: string,
  sellToken: string,
  buyToken: string,
  sellAmount: string,
  buyAmount: string,
  partiallyFillable = false
): RawOrder {
  return { id, sellToken, buyToken, sellAmount, buyAmount, kind: 'buy', partiallyFillable, validTo: FAR_FUTURE };
}

export function constantProductPool(
  id: string,
  token0: string,
  token1: string,
  reserve0: string,
  reserve1: string,
  feeBps = 0
): RawPool {
  return { id, kind: 'constantProduct', tokens: [token0, token1], reserves: [reserve0, reserve1], feeBps };
}

export interface AuctionFixture {
  id?: string;
  tokens?: RawToken[];
  orders?: RawOrder[];
  liquidity?: RawPool[];
  deadline?: string | number | Date;
  numeraire?: string;
}

export function rawAuction(fixture: AuctionFixture = {}): RawAuction {
  return {
    id: fixture.id ?? 'auction-1',
    tokens: fixture.tokens ?? [TOKEN_A, TOKEN_B, TOKEN_C, TOKEN_D].map(address => rawToken(address)),
    orders: fixture.orders ?? [],
    liquidity: fixture.liquidity ?? [],
    deadline: fixture.deadline ?? new Date(NOW.getTime() + 60_000),
    numeraire: fixture.numeraire
  };
}

export function buildAuction(fixture: AuctionFixture = {}): Auction {
  return createAuction(rawAuction(fixture), NOW);
}

/** Deterministic PRNG (mulberry32) for generated auctions. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function inFuture(ms: number): Date {
  return new Date(Date.now() + ms);
}
