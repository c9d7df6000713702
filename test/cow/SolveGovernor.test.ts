import { expect } from 'chai';
import sinon from 'sinon';
import { Decimal } from '../../src/utils/decimal';
import { CancelledError, SolverError } from '../../src/cow/errors';
import { LiquidityGraph } from '../../src/cow/graph/LiquidityGraph';
import { Auction, Solution, zeroFillSolution } from '../../src/cow/model';
import { GovernorSettings, SolveGovernor, solve } from '../../src/cow/SolveGovernor';
import { CandidateStrategy } from '../../src/cow/strategies';
import { TOKEN_A, TOKEN_B, buildAuction, inFuture, sellOrder } from '../helpers/fixtures';

const SETTINGS: GovernorSettings = {
  maxHops: 2,
  interactionPenalty: new Decimal(0),
  solverAddress: '0x0000000000000000000000000000000000000000',
  maxOrders: 100
};

function scored(name: string, score: string): CandidateStrategy {
  return {
    name,
    run: async (auction: Auction): Promise<Solution> => ({
      ...zeroFillSolution(auction.id),
      strategy: name,
      score: new Decimal(score)
    })
  };
}

/** Never finishes on its own; rejects once cancelled. */
function stalled(name: string, signals: AbortSignal[]): CandidateStrategy {
  return {
    name,
    run: (_auction, _context, signal) => new Promise<Solution>((_resolve, reject) => {
      signals.push(signal);
      signal.addEventListener('abort', () => reject(new CancelledError(name)), { once: true });
    })
  };
}

describe('SolveGovernor', () => {
  const auction = buildAuction({ orders: [sellOrder('o', TOKEN_A, TOKEN_B, '1', '1')] });

  afterEach(() => {
    sinon.restore();
  });

  it('should return the baseline without starting candidates when the deadline has passed', async () => {
    const candidate = scored('eager', '5');
    const run = sinon.spy(candidate, 'run');
    const governor = new SolveGovernor([candidate], SETTINGS);

    const outcome = await governor.run(auction, new Date(Date.now() - 1000));

    expect(outcome.state).to.equal('timedOut');
    expect(outcome.solution.strategy).to.equal('baseline');
    expect(run.called).to.be.false;
    expect(governor.currentState).to.equal('timedOut');
  });

  it('should pick the highest scoring candidate', async () => {
    const governor = new SolveGovernor([scored('low', '1'), scored('high', '2')], SETTINGS);

    const outcome = await governor.run(auction, inFuture(1000));

    expect(outcome.state).to.equal('completed');
    expect(outcome.solution.strategy).to.equal('high');
    expect(outcome.completed).to.have.members(['low', 'high']);
    expect(governor.currentState).to.equal('completed');
  });

  it('should break score ties by strategy order', async () => {
    const governor = new SolveGovernor([scored('first', '3'), scored('second', '3')], SETTINGS);
    const outcome = await governor.run(auction, inFuture(1000));

    expect(outcome.solution.strategy).to.equal('first');
  });

  it('should keep the baseline when every candidate scores below zero', async () => {
    const governor = new SolveGovernor([scored('costly', '-0.5')], SETTINGS);
    const outcome = await governor.run(auction, inFuture(1000));

    expect(outcome.solution.strategy).to.equal('baseline');
    expect(outcome.solution.score.isZero()).to.be.true;
  });

  it('should record failed candidates and carry on', async () => {
    const failing: CandidateStrategy = {
      name: 'broken',
      run: async () => {
        throw new Error('boom');
      }
    };
    const governor = new SolveGovernor([failing, scored('ok', '1')], SETTINGS);

    const outcome = await governor.run(auction, inFuture(1000));

    expect(outcome.failed).to.deep.equal(['broken']);
    expect(outcome.completed).to.deep.equal(['ok']);
    expect(outcome.solution.strategy).to.equal('ok');
  });

  it('should answer at the deadline and cancel stragglers', async () => {
    const signals: AbortSignal[] = [];
    const governor = new SolveGovernor([stalled('slow', signals), scored('quick', '1')], SETTINGS);
    const startedAt = Date.now();

    const outcome = await governor.run(auction, inFuture(50));

    expect(outcome.state).to.equal('timedOut');
    expect(outcome.solution.strategy).to.equal('quick');
    expect(outcome.completed).to.deep.equal(['quick']);
    expect(signals).to.have.length(1);
    expect(signals[0].aborted).to.be.true;
    expect(Date.now() - startedAt).to.be.below(1000);
  });

  it('should refuse to run twice', async () => {
    const governor = new SolveGovernor([], SETTINGS);
    await governor.run(auction, inFuture(1000));

    try {
      await governor.run(auction, inFuture(1000));
      expect.fail('expected a second run to throw');
    } catch (error) {
      expect(error).to.be.instanceOf(SolverError);
      if (error instanceof SolverError) {
        expect(error.code).to.equal('GOVERNOR_REUSED');
      }
    }
  });

  describe('solve', () => {
    it('should degrade to the zero-fill solution when solving itself fails', async () => {
      sinon.stub(LiquidityGraph, 'build').throws(new Error('graph unavailable'));

      const solution = await solve(auction, inFuture(1000), { strategies: [scored('any', '1')] });

      expect(solution.strategy).to.equal('baseline');
      expect(solution.fills).to.deep.equal([]);
    });
  });
});
