import { expect } from 'chai';
import { Decimal } from '../../src/utils/decimal';
import { InvalidAuctionError, SolverError, UnknownTokenError } from '../../src/cow/errors';
import {
  auctionFromWire,
  fromAtoms,
  isWireAuction,
  quoteToWire,
  solutionToWire,
  toAtoms,
  toWirePrice
} from '../../src/cow/dto';
import { Solution, zeroFillSolution } from '../../src/cow/model';
import type { QuoteResult } from '../../src/cow/Quoter';
import type { WireAuction } from '../../src/cow/types';
import { FAR_FUTURE, NOW, TOKEN_A, TOKEN_B, TOKEN_C } from '../helpers/fixtures';

function wireAuction(overrides: Partial<WireAuction> = {}): WireAuction {
  return {
    id: 'wire-1',
    tokens: {
      [TOKEN_A]: { decimals: 18, referencePrice: '1' },
      [TOKEN_B]: { decimals: 6 }
    },
    orders: [{
      uid: 'order-1',
      sellToken: TOKEN_A,
      buyToken: TOKEN_B,
      sellAmount: '1000000000000000000',
      buyAmount: '1500000',
      kind: 'sell',
      partiallyFillable: false,
      validTo: FAR_FUTURE,
      feeAmount: '1000000000000000'
    }],
    liquidity: [
      {
        kind: 'ConstantProduct',
        id: 'pool-1',
        tokens: [TOKEN_A, TOKEN_B],
        reserves: ['1000000000000000000000', '2000000000'],
        fee: '0.003'
      },
      {
        kind: 'ConcentratedLiquidity',
        id: 'pool-2',
        tokens: [TOKEN_A, TOKEN_B],
        reserves: ['1', '1'],
        fee: '0.0005'
      }
    ],
    deadline: new Date(NOW.getTime() + 5000).toISOString(),
    ...overrides
  };
}

describe('wire conversion', () => {
  describe('amounts', () => {
    it('should convert atoms to whole-token units and back', () => {
      expect(fromAtoms('1500000', 6)).to.equal('1.5');
      expect(toAtoms(new Decimal('1.5'), 6)).to.equal('1500000');
    });

    it('should truncate below one atom', () => {
      expect(toAtoms(new Decimal('1.9999999'), 6)).to.equal('1999999');
    });

    it('should scale prices per atom', () => {
      expect(toWirePrice(new Decimal('1.9'), 18)).to.equal('1900000000000000000');
      expect(toWirePrice(new Decimal(2), 6)).to.equal('2000000000000000000000000000000');
    });
  });

  describe('isWireAuction', () => {
    it('should accept the auction shape and reject anything else', () => {
      expect(isWireAuction(wireAuction())).to.be.true;
      expect(isWireAuction({ id: 'x', tokens: {}, orders: [] })).to.be.false;
      expect(isWireAuction(null)).to.be.false;
      expect(isWireAuction([])).to.be.false;
    });
  });

  describe('auctionFromWire', () => {
    it('should build the domain auction in whole-token units', () => {
      const auction = auctionFromWire(wireAuction(), NOW);
      const [order] = auction.orders;
      const [pool] = auction.liquidity;

      expect(order.sellAmount.toString()).to.equal('1');
      expect(order.buyAmount.toString()).to.equal('1.5');
      expect(order.feeAmount.toString()).to.equal('0.001');
      expect(auction.tokens.get(TOKEN_A)?.referencePrice?.toString()).to.equal('1');
      expect(auction.tokens.get(TOKEN_B)?.referencePrice).to.equal(undefined);
      expect(pool.kind).to.equal('constantProduct');
      expect(pool.feeBps).to.equal(30);
      expect(pool.reserves.get(TOKEN_B)?.toString()).to.equal('2000');
    });

    it('should skip liquidity of unsupported kinds', () => {
      const auction = auctionFromWire(wireAuction(), NOW);
      expect(auction.liquidity.map(pool => pool.id)).to.deep.equal(['pool-1']);
    });

    it('should skip liquidity kinds that collide with object properties', () => {
      const base = wireAuction();
      const auction = auctionFromWire({
        ...base,
        liquidity: [
          ...base.liquidity,
          { ...base.liquidity[0], id: 'odd-1', kind: 'constructor' },
          { ...base.liquidity[0], id: 'odd-2', kind: 'toString' }
        ]
      }, NOW);

      expect(auction.liquidity.map(pool => pool.id)).to.deep.equal(['pool-1']);
    });

    it('should report conversion and validation errors together', () => {
      const base = wireAuction();
      try {
        auctionFromWire({
          ...base,
          orders: [
            { ...base.orders[0], uid: 'stray', buyToken: TOKEN_C },
            { ...base.orders[0], uid: 'empty', sellAmount: '0' }
          ],
          liquidity: [{ ...base.liquidity[0], reserves: ['1'] }]
        }, NOW);
        expect.fail('expected InvalidAuctionError');
      } catch (error) {
        expect(error).to.be.instanceOf(InvalidAuctionError);
        if (!(error instanceof InvalidAuctionError)) return;
        expect(error.causes).to.have.length(3);
        expect(error.causes[0]).to.be.instanceOf(UnknownTokenError);
        expect(error.causes[1]).to.be.instanceOf(SolverError);
        expect(error.causes[1].message).to.equal('Pool pool-1 has 2 tokens but 1 reserves');
        expect(error.causes[2].message).to.contain('Invalid order empty');
      }
    });
  });

  describe('solutionToWire', () => {
    const auction = auctionFromWire(wireAuction(), NOW);

    it('should report nothing for a zero-fill solution', () => {
      expect(solutionToWire(zeroFillSolution(auction.id), auction)).to.deep.equal({ solutions: [] });
    });

    it('should encode fills, interactions and prices in atoms', () => {
      const solution: Solution = {
        auctionId: auction.id,
        strategy: 'routing-only',
        fills: [{
          orderId: 'order-1',
          executedSell: new Decimal(1),
          executedBuy: new Decimal('1.9'),
          executedFee: new Decimal('0.001')
        }],
        interactions: [{
          poolId: 'pool-1',
          tokenIn: TOKEN_A,
          tokenOut: TOKEN_B,
          amountIn: new Decimal(1),
          amountOut: new Decimal('1.9')
        }],
        clearingPrices: new Map([[TOKEN_A, new Decimal('1.9')], [TOKEN_B, new Decimal(1)]]),
        score: new Decimal('0.4')
      };

      expect(solutionToWire(solution, auction)).to.deep.equal({
        solutions: [{
          id: 0,
          prices: {
            [TOKEN_A]: '1900000000000000000',
            [TOKEN_B]: '1000000000000000000000000000000'
          },
          trades: [{
            kind: 'fulfillment',
            order: 'order-1',
            executedAmount: '1000000000000000000',
            fee: '1000000000000000'
          }],
          interactions: [{
            kind: 'liquidity',
            internalize: false,
            id: 'pool-1',
            inputToken: TOKEN_A,
            outputToken: TOKEN_B,
            inputAmount: '1000000000000000000',
            outputAmount: '1900000'
          }],
          score: '0.4'
        }]
      });
    });
  });

  describe('quoteToWire', () => {
    it('should quote the counter amount in atoms', () => {
      const auction = auctionFromWire(wireAuction(), NOW);
      const result: QuoteResult = {
        sellToken: TOKEN_A,
        buyToken: TOKEN_B,
        side: 'sell',
        sellAmount: new Decimal(1),
        buyAmount: new Decimal('1.9'),
        amount: new Decimal('1.9'),
        interactions: [],
        clearingPrices: new Map()
      };

      expect(quoteToWire(result, auction)).to.deep.equal({
        amount: '1900000',
        interactions: [],
        clearingPrices: {
          [TOKEN_A]: '1900000',
          [TOKEN_B]: '1000000000000000000'
        }
      });
    });
  });
});
