import { expect } from 'chai';
import sinon from 'sinon';
import { MAX_TIMER_DELAY_MS, SystemClock } from '../../src/utils/clock';

describe('SystemClock', () => {
  let clock: sinon.SinonFakeTimers;

  beforeEach(() => {
    clock = sinon.useFakeTimers({ now: new Date('2026-01-01T00:00:00Z') });
  });

  afterEach(() => {
    clock.restore();
  });

  it('should resolve once the instant is reached', async () => {
    let resolved = false;
    const waiting = new SystemClock()
      .waitUntil(new Date('2026-01-01T00:00:01Z'), new AbortController().signal)
      .then(() => {
        resolved = true;
      });

    await clock.tickAsync(999);
    expect(resolved).to.be.false;
    await clock.tickAsync(1);
    await waiting;
    expect(resolved).to.be.true;
  });

  it('should wait out instants beyond the longest timer delay', async () => {
    const thirtyDays = 30 * 24 * 60 * 60 * 1000;
    let resolved = false;
    const waiting = new SystemClock()
      .waitUntil(new Date(Date.now() + thirtyDays), new AbortController().signal)
      .then(() => {
        resolved = true;
      });

    await clock.tickAsync(1);
    expect(resolved).to.be.false;
    await clock.tickAsync(MAX_TIMER_DELAY_MS);
    expect(resolved).to.be.false;
    await clock.tickAsync(thirtyDays - MAX_TIMER_DELAY_MS - 2);
    expect(resolved).to.be.false;
    await clock.tickAsync(1);
    await waiting;
    expect(resolved).to.be.true;
  });

  it('should resolve early when aborted', async () => {
    const controller = new AbortController();
    const waiting = new SystemClock().waitUntil(new Date('2026-01-01T01:00:00Z'), controller.signal);

    controller.abort();
    await waiting;
    expect(clock.countTimers()).to.equal(0);
  });

  it('should resolve immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await new SystemClock().waitUntil(new Date('2026-01-01T01:00:00Z'), controller.signal);
    expect(clock.countTimers()).to.equal(0);
  });
});
