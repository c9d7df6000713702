import type { Decimal } from '../utils/decimal';

export type Reserves = ReadonlyMap<string, Decimal>;

interface PoolBase {
  /** Pool address or coordinator-assigned liquidity id */
  readonly id: string;
  readonly tokens: readonly string[];
  readonly reserves: Reserves;
  readonly feeBps: number;
}

export interface ConstantProductPool extends PoolBase {
  readonly kind: 'constantProduct';
}

export interface WeightedProductPool extends PoolBase {
  readonly kind: 'weightedProduct';
  readonly weights: ReadonlyMap<string, Decimal>;
}

export interface StableSwapPool extends PoolBase {
  readonly kind: 'stableSwap';
  readonly amplification: Decimal;
}

/** Closed set of pool kinds; every pricing site switches over `kind` exhaustively. */
export type LiquidityPool = ConstantProductPool | WeightedProductPool | StableSwapPool;

export type PoolKind = LiquidityPool['kind'];

export const POOL_KINDS: readonly PoolKind[] = ['constantProduct', 'weightedProduct', 'stableSwap'];
