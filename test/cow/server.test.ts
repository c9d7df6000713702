import { expect } from 'chai';
import sinon from 'sinon';
import logger from '../../src/utils/logger';
import { DEFAULT_SOLVER_CONFIG, SolverConfig } from '../../src/config/solver-config';
import { Quoter } from '../../src/cow/Quoter';
import { SolverServer } from '../../src/cow/server';
import type { WireAuction } from '../../src/cow/types';
import { FAR_FUTURE, TOKEN_A, TOKEN_B } from '../helpers/fixtures';

function wireAuction(): WireAuction {
  return {
    id: 'http-1',
    tokens: {
      [TOKEN_A]: { decimals: 18 },
      [TOKEN_B]: { decimals: 18 }
    },
    orders: [{
      uid: 'o',
      sellToken: TOKEN_A,
      buyToken: TOKEN_B,
      sellAmount: '100000000000000000000',
      buyAmount: '90000000000000000000',
      kind: 'sell',
      partiallyFillable: false,
      validTo: FAR_FUTURE
    }],
    liquidity: [{
      kind: 'ConstantProduct',
      id: 'ab',
      tokens: [TOKEN_A, TOKEN_B],
      reserves: ['1000000000000000000000', '1000000000000000000000'],
      fee: '0'
    }],
    deadline: new Date(Date.now() + 3000).toISOString()
  };
}

describe('SolverServer', () => {
  const config: SolverConfig = { ...DEFAULT_SOLVER_CONFIG, port: 0, deadlineBufferMs: 100 };
  let server: SolverServer;
  let baseUrl: string;

  before(async () => {
    server = new SolverServer(config);
    const port = await server.start();
    baseUrl = `http://localhost:${port}`;
  });

  after(async () => {
    await server.stop();
  });

  afterEach(() => {
    sinon.restore();
  });

  const post = (path: string, body: unknown) => fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body)
  });

  it('should answer health checks', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).to.equal(200);
    expect(await response.json()).to.have.property('status', 'alive');
  });

  it('should not quote before any auction was seen', async () => {
    const query = `sellToken=${TOKEN_A}&buyToken=${TOKEN_B}&amount=1000&kind=sell&deadline=${encodeURIComponent(new Date(Date.now() + 1000).toISOString())}`;
    const response = await fetch(`${baseUrl}/quote?${query}`);

    expect(response.status).to.equal(404);
    expect(await response.json()).to.have.property('kind', 'NoLiquidity');
  });

  it('should reject bodies that are not auctions', async () => {
    const response = await post('/solve', { id: 'broken' });

    expect(response.status).to.equal(400);
    expect(await response.json()).to.deep.equal({ kind: 'InvalidAuction', description: 'Invalid auction format' });
  });

  it('should reject auctions that fail validation', async () => {
    const auction = wireAuction();
    const response = await post('/solve', { ...auction, orders: [{ ...auction.orders[0], sellAmount: '0' }] });

    expect(response.status).to.equal(400);
    expect(await response.json()).to.have.property('kind', 'InvalidAuction');
  });

  it('should solve an auction in atoms', async () => {
    const response = await post('/solve', wireAuction());

    expect(response.status).to.equal(200);
    expect(await response.json()).to.deep.equal({
      solutions: [{
        id: 0,
        prices: {
          [TOKEN_A]: '1000000000000000000',
          [TOKEN_B]: '1000000000000000000'
        },
        trades: [{
          kind: 'fulfillment',
          order: 'o',
          executedAmount: '100000000000000000000',
          fee: '0'
        }],
        interactions: [{
          kind: 'liquidity',
          internalize: false,
          id: 'ab',
          inputToken: TOKEN_A,
          outputToken: TOKEN_B,
          inputAmount: '100000000000000000000',
          outputAmount: '90909090909090909090'
        }],
        score: '0.90908990909090909'
      }]
    });
  });

  it('should quote against the last auction', async () => {
    const deadline = encodeURIComponent(new Date(Date.now() + 1000).toISOString());
    const query = `sellToken=${TOKEN_A}&buyToken=${TOKEN_B}&amount=100000000000000000000&kind=sell&deadline=${deadline}`;
    const response = await fetch(`${baseUrl}/quote?${query}`);

    expect(response.status).to.equal(200);
    expect(await response.json()).to.have.property('amount', '90909090909090909090');
  });

  it('should log unexpected quote failures with their context', async () => {
    sinon.stub(Quoter.prototype, 'quote').rejects(new Error('quote engine failure'));
    const logged: sinon.SinonSpy = sinon.spy(logger, 'error');
    const deadline = encodeURIComponent(new Date(Date.now() + 1000).toISOString());
    const query = `sellToken=${TOKEN_A}&buyToken=${TOKEN_B}&amount=1000&kind=sell&deadline=${deadline}`;

    const response = await fetch(`${baseUrl}/quote?${query}`);

    expect(response.status).to.equal(400);
    expect(await response.json()).to.deep.equal({ kind: 'Internal', description: 'quote engine failure' });
    expect(logged.calledWith('Error in /quote endpoint', sinon.match({
      auctionId: 'http-1',
      sellToken: TOKEN_A,
      buyToken: TOKEN_B,
      error: 'quote engine failure'
    }))).to.be.true;
  });

  it('should require every quote parameter', async () => {
    const response = await fetch(`${baseUrl}/quote?sellToken=${TOKEN_A}`);
    expect(response.status).to.equal(400);
  });
});
