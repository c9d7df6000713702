import { Decimal, ZERO } from '../utils/decimal';
import type { LiquidityPool, Reserves } from './types';

type Deltas = ReadonlyMap<string, ReadonlyMap<string, Decimal>>;

/**
 * Copy-on-write view of pool reserves for one candidate.
 *
 * The snapshot pools are never touched; simulated consumption lives in a map
 * of per-pool token deltas, and `withSwap` returns a new overlay that shares
 * every untouched entry with its parent.
 */
export class ReserveOverlay {
  private readonly cache = new Map<string, Reserves>();

  private constructor(private readonly deltas: Deltas) {}

  static empty(): ReserveOverlay {
    return new ReserveOverlay(new Map());
  }

  reservesOf(pool: LiquidityPool): Reserves {
    const poolDeltas = this.deltas.get(pool.id);
    if (!poolDeltas) {
      return pool.reserves;
    }

    const cached = this.cache.get(pool.id);
    if (cached) {
      return cached;
    }

    const merged = new Map<string, Decimal>();
    for (const token of pool.tokens) {
      const base = pool.reserves.get(token) ?? ZERO;
      merged.set(token, base.add(poolDeltas.get(token) ?? ZERO));
    }
    this.cache.set(pool.id, merged);
    return merged;
  }

  deltaOf(poolId: string, token: string): Decimal {
    return this.deltas.get(poolId)?.get(token) ?? ZERO;
  }

  /** Pools this overlay has consumed from. */
  touchedPools(): string[] {
    return Array.from(this.deltas.keys());
  }

  withSwap(
    pool: LiquidityPool,
    tokenIn: string,
    amountIn: Decimal,
    tokenOut: string,
    amountOut: Decimal
  ): ReserveOverlay {
    const current = this.deltas.get(pool.id);
    const poolDeltas = new Map<string, Decimal>(current ?? []);
    poolDeltas.set(tokenIn, (poolDeltas.get(tokenIn) ?? ZERO).add(amountIn));
    poolDeltas.set(tokenOut, (poolDeltas.get(tokenOut) ?? ZERO).sub(amountOut));

    const deltas = new Map(this.deltas);
    deltas.set(pool.id, poolDeltas);
    return new ReserveOverlay(deltas);
  }
}
