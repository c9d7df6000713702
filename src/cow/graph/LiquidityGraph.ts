import { Decimal, ONE } from '../../utils/decimal';
import { marginalPrice } from '../../markets/pools';
import { ReserveOverlay } from '../../markets/ReserveOverlay';
import type { LiquidityPool } from '../../markets/types';
import { logDebug } from '../../utils/logger';

/** One trading direction through one pool. */
export interface Edge {
  readonly pool: LiquidityPool;
  readonly tokenIn: string;
  readonly tokenOut: string;
  /** tokenOut per tokenIn at snapshot reserves, after fees */
  readonly marginalPrice: Decimal;
}

/**
 * Directed multigraph over tokens. Parallel pools between the same pair stay
 * separate edges; multi-hop paths are explicit edge sequences.
 */
export class LiquidityGraph {
  private readonly outgoing = new Map<string, Edge[]>();
  private readonly incoming = new Map<string, Edge[]>();
  private readonly edges: Edge[] = [];

  private constructor() {}

  static build(pools: readonly LiquidityPool[], overlay: ReserveOverlay = ReserveOverlay.empty()): LiquidityGraph {
    const graph = new LiquidityGraph();

    for (const pool of pools) {
      const reserves = overlay.reservesOf(pool);
      for (const tokenIn of pool.tokens) {
        for (const tokenOut of pool.tokens) {
          if (tokenIn === tokenOut) continue;
          const price = marginalPrice(pool, reserves, tokenIn, tokenOut);
          if (price.lte(0)) continue;
          graph.addEdge({ pool, tokenIn, tokenOut, marginalPrice: price });
        }
      }
    }

    logDebug('Liquidity graph built', {
      poolCount: pools.length,
      tokenCount: graph.tokens.length,
      edgeCount: graph.edgeCount
    });

    return graph;
  }

  private addEdge(edge: Edge): void {
    this.edges.push(edge);
    const out = this.outgoing.get(edge.tokenIn) ?? [];
    out.push(edge);
    this.outgoing.set(edge.tokenIn, out);
    const into = this.incoming.get(edge.tokenOut) ?? [];
    into.push(edge);
    this.incoming.set(edge.tokenOut, into);
  }

  get tokens(): string[] {
    return Array.from(new Set([...this.outgoing.keys(), ...this.incoming.keys()]));
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  allEdges(): readonly Edge[] {
    return this.edges;
  }

  edgesFrom(token: string): readonly Edge[] {
    return this.outgoing.get(token) ?? [];
  }

  edgesInto(token: string): readonly Edge[] {
    return this.incoming.get(token) ?? [];
  }

  parallelEdges(tokenIn: string, tokenOut: string): Edge[] {
    return this.edgesFrom(tokenIn).filter(edge => edge.tokenOut === tokenOut);
  }

  /**
   * `bounds[k].get(t)`: the best product of marginal prices from `t` to `target`
   * over at most `k` hops, measured at the overlay's reserves. Realized rates
   * never exceed marginal ones, so this bounds any route's output per unit.
   */
  rateBoundsTo(target: string, maxHops: number, overlay: ReserveOverlay): Array<Map<string, Decimal>> {
    const rated = this.ratedEdges(overlay);
    const bounds: Array<Map<string, Decimal>> = [new Map([[target, ONE]])];

    for (let k = 1; k <= maxHops; k++) {
      const previous = bounds[k - 1];
      const next = new Map(previous);
      for (const { edge, rate } of rated) {
        const downstream = previous.get(edge.tokenOut);
        if (!downstream) continue;
        const candidate = rate.mul(downstream);
        const current = next.get(edge.tokenIn);
        if (!current || candidate.gt(current)) {
          next.set(edge.tokenIn, candidate);
        }
      }
      bounds.push(next);
    }

    return bounds;
  }

  /** Mirror of `rateBoundsTo`: best marginal-price product from `source` to each token. */
  rateBoundsFrom(source: string, maxHops: number, overlay: ReserveOverlay): Array<Map<string, Decimal>> {
    const rated = this.ratedEdges(overlay);
    const bounds: Array<Map<string, Decimal>> = [new Map([[source, ONE]])];

    for (let k = 1; k <= maxHops; k++) {
      const previous = bounds[k - 1];
      const next = new Map(previous);
      for (const { edge, rate } of rated) {
        const upstream = previous.get(edge.tokenIn);
        if (!upstream) continue;
        const candidate = upstream.mul(rate);
        const current = next.get(edge.tokenOut);
        if (!current || candidate.gt(current)) {
          next.set(edge.tokenOut, candidate);
        }
      }
      bounds.push(next);
    }

    return bounds;
  }

  private ratedEdges(overlay: ReserveOverlay): Array<{ edge: Edge; rate: Decimal }> {
    const rated: Array<{ edge: Edge; rate: Decimal }> = [];
    for (const edge of this.edges) {
      const rate = marginalPrice(edge.pool, overlay.reservesOf(edge.pool), edge.tokenIn, edge.tokenOut);
      if (rate.gt(0)) {
        rated.push({ edge, rate });
      }
    }
    return rated;
  }
}
