import { expect } from 'chai';
import { Decimal } from '../../src/utils/decimal';
import { CancelledError } from '../../src/cow/errors';
import { Auction, respectsLimit } from '../../src/cow/model';
import { LiquidityGraph } from '../../src/cow/graph/LiquidityGraph';
import { initialResidual } from '../../src/cow/matching/PeerMatcher';
import { ReserveOverlay } from '../../src/markets/ReserveOverlay';
import { RouteSearch, RouteSearchOptions } from '../../src/cow/routing/RouteSearch';
import { commitRoute, interactionCount, legAmountOut } from '../../src/cow/routing/route';
import {
  TOKEN_A,
  TOKEN_B,
  TOKEN_C,
  TOKEN_D,
  buildAuction,
  buyOrder,
  constantProductPool,
  sellOrder
} from '../helpers/fixtures';

function searchFor(auction: Auction, options: Partial<RouteSearchOptions> = {}): RouteSearch {
  return new RouteSearch(LiquidityGraph.build(auction.liquidity), auction.tokens, {
    maxHops: 3,
    splitChunks: 20,
    ...options
  });
}

describe('RouteSearch', () => {
  describe('findExactIn', () => {
    const triangle = buildAuction({
      liquidity: [
        constantProductPool('ac', TOKEN_A, TOKEN_C, '1000', '1000'),
        constantProductPool('ab', TOKEN_A, TOKEN_B, '1000', '2000'),
        constantProductPool('bc', TOKEN_B, TOKEN_C, '1000', '1000')
      ]
    });

    it('should prefer a two-hop route that pays more than the direct pool', () => {
      const route = searchFor(triangle).findExactIn(TOKEN_A, TOKEN_C, new Decimal(10), ReserveOverlay.empty());

      expect(route).to.not.equal(null);
      expect(route?.legs.map(leg => leg.parts[0].pool.id)).to.deep.equal(['ab', 'bc']);
      // 10 -> 19.80... B -> 19.41... C, against 9.90... C direct
      expect(route?.amountOut.gt('19.4')).to.be.true;
      expect(route?.amountOut.lt('19.5')).to.be.true;
    });

    it('should stay within the hop limit', () => {
      const route = searchFor(triangle, { maxHops: 1 }).findExactIn(TOKEN_A, TOKEN_C, new Decimal(10), ReserveOverlay.empty());

      expect(route?.legs.map(leg => leg.parts[0].pool.id)).to.deep.equal(['ac']);
      expect(route?.amountOut.toFixed()).to.equal('9.90099009900990099');
    });

    it('should return null without a path', () => {
      const route = searchFor(triangle).findExactIn(TOKEN_A, TOKEN_D, new Decimal(10), ReserveOverlay.empty());
      expect(route).to.equal(null);
    });

    it('should round every hop down to the output token decimals', () => {
      const auction = buildAuction({
        liquidity: [constantProductPool('ab', TOKEN_A, TOKEN_B, '1000', '1000')]
      });
      const route = searchFor(auction).findExactIn(TOKEN_A, TOKEN_B, new Decimal(100), ReserveOverlay.empty());

      expect(route?.amountOut.toFixed()).to.equal('90.90909090909090909');
    });

    it('should see less output after committing a route to the overlay', () => {
      const auction = buildAuction({
        liquidity: [constantProductPool('ab', TOKEN_A, TOKEN_B, '1000', '1000')]
      });
      const search = searchFor(auction);
      const first = search.findExactIn(TOKEN_A, TOKEN_B, new Decimal(100), ReserveOverlay.empty());
      if (!first) throw new Error('expected a route');

      const { overlay, interactions } = commitRoute(first, ReserveOverlay.empty());
      const second = search.findExactIn(TOKEN_A, TOKEN_B, new Decimal(100), overlay);

      expect(interactions).to.have.length(1);
      expect(interactions[0].poolId).to.equal('ab');
      expect(second?.amountOut.lt(first.amountOut)).to.be.true;
    });
  });

  describe('splitting', () => {
    const twin = buildAuction({
      liquidity: [
        constantProductPool('ab-1', TOKEN_A, TOKEN_B, '1000', '1000'),
        constantProductPool('ab-2', TOKEN_A, TOKEN_B, '1000', '1000')
      ]
    });

    it('should split evenly across identical parallel pools', () => {
      const route = searchFor(twin).findExactIn(TOKEN_A, TOKEN_B, new Decimal(100), ReserveOverlay.empty());
      if (!route) throw new Error('expected a route');

      const [leg] = route.legs;
      expect(leg.parts.map(part => part.pool.id)).to.deep.equal(['ab-1', 'ab-2']);
      expect(leg.parts.map(part => part.amountIn.toFixed())).to.deep.equal(['50', '50']);
      expect(leg.parts.map(part => part.amountOut.toFixed())).to.deep.equal([
        '47.619047619047619047',
        '47.619047619047619047'
      ]);
      expect(route.amountOut.toFixed()).to.equal('95.238095238095238094');
      expect(legAmountOut(leg).eq(route.amountOut)).to.be.true;
      expect(interactionCount(route)).to.equal(2);
    });

    it('should not split when splitting is disabled', () => {
      const route = searchFor(twin, { splitChunks: 1 }).findExactIn(
        TOKEN_A,
        TOKEN_B,
        new Decimal(100),
        ReserveOverlay.empty()
      );

      expect(route?.legs[0].parts).to.have.length(1);
      expect(route?.amountOut.toFixed()).to.equal('90.90909090909090909');
    });
  });

  describe('findExactOut', () => {
    it('should round the required input up', () => {
      const auction = buildAuction({
        liquidity: [constantProductPool('ab', TOKEN_A, TOKEN_B, '1000', '1000')]
      });
      const route = searchFor(auction).findExactOut(TOKEN_A, TOKEN_B, new Decimal(10), ReserveOverlay.empty());

      expect(route?.amountIn.toFixed()).to.equal('10.101010101010101011');
      expect(route?.amountOut.toFixed()).to.equal('10');
      expect(route?.legs[0].parts[0].amountIn.toFixed()).to.equal('10.101010101010101011');
    });

    it('should chain required amounts through intermediate tokens', () => {
      const auction = buildAuction({
        liquidity: [
          constantProductPool('ab', TOKEN_A, TOKEN_B, '1000', '1000'),
          constantProductPool('bc', TOKEN_B, TOKEN_C, '1000', '1000')
        ]
      });
      const route = searchFor(auction).findExactOut(TOKEN_A, TOKEN_C, new Decimal(10), ReserveOverlay.empty());
      if (!route) throw new Error('expected a route');

      expect(route.legs.map(leg => [leg.tokenIn, leg.tokenOut])).to.deep.equal([
        [TOKEN_A, TOKEN_B],
        [TOKEN_B, TOKEN_C]
      ]);
      expect(route.legs[1].parts[0].amountIn.toFixed()).to.equal('10.101010101010101011');
      expect(route.legs[0].parts[0].amountOut.toFixed()).to.equal('10.101010101010101011');
      expect(route.amountOut.toFixed()).to.equal('10');
    });
  });

  describe('findRoute', () => {
    const single = buildAuction({
      orders: [
        sellOrder('partial', TOKEN_A, TOKEN_B, '100', '95', true),
        sellOrder('strict', TOKEN_A, TOKEN_B, '100', '95'),
        buyOrder('buyer', TOKEN_A, TOKEN_B, '11', '10')
      ],
      liquidity: [constantProductPool('ab', TOKEN_A, TOKEN_B, '1000', '1000')]
    });
    const [partial, strict, buyer] = single.orders;

    it('should bisect to the largest fraction that meets the limit', async () => {
      const routed = await searchFor(single).findRoute(initialResidual(partial), ReserveOverlay.empty());

      expect(routed?.executedSell.toFixed()).to.equal('52.34375');
      expect(respectsLimit(partial, routed?.executedSell ?? new Decimal(0), routed?.executedBuy ?? new Decimal(0))).to.be.true;
    });

    it('should give up on a fill-or-kill order the pool cannot satisfy', async () => {
      expect(await searchFor(single).findRoute(initialResidual(strict), ReserveOverlay.empty())).to.equal(null);
    });

    it('should stop bisecting once cancelled', async () => {
      const controller = new AbortController();
      const pending = searchFor(single).findRoute(initialResidual(partial), ReserveOverlay.empty(), controller.signal);
      controller.abort();

      try {
        await pending;
        expect.fail('expected the search to be cancelled');
      } catch (error) {
        expect(error).to.be.instanceOf(CancelledError);
      }
    });

    it('should route a buy order exactly on its buy amount', async () => {
      const routed = await searchFor(single).findRoute(initialResidual(buyer), ReserveOverlay.empty());

      expect(routed?.executedBuy.toFixed()).to.equal('10');
      expect(routed?.executedSell.toFixed()).to.equal('10.101010101010101011');
    });

    it('should report missing liquidity', () => {
      const search = searchFor(single);

      expect(search.hasLiquidity(TOKEN_A, TOKEN_B)).to.be.true;
      expect(search.hasLiquidity(TOKEN_C, TOKEN_D)).to.be.false;
    });
  });
});
