import { expect } from 'chai';
import { DEFAULT_SOLVER_CONFIG, loadSolverConfig } from '../../src/config/solver-config';
import { ConfigError } from '../../src/cow/errors';

describe('loadSolverConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = loadSolverConfig({});

    expect(config.port).to.equal(8000);
    expect(config.maxHops).to.equal(DEFAULT_SOLVER_CONFIG.maxHops);
    expect(config.interactionPenalty.toString()).to.equal('0.000001');
    expect(config.solverAddress).to.equal('0x0000000000000000000000000000000000000000');
    expect(config.strategies).to.deep.equal([]);
  });

  it('should read every setting from the environment', () => {
    const config = loadSolverConfig({
      PORT: '9000',
      SOLVER_MAX_HOPS: '2',
      SOLVER_SPLIT_CHUNKS: '10',
      SOLVER_INTERACTION_PENALTY: '0.25',
      SOLVER_DEADLINE_BUFFER_MS: '0',
      SOLVER_ADDRESS: '0xABCDEFABCDEFABCDEFABCDEFABCDEFABCDEFABCD',
      SOLVER_MAX_ORDERS: '50',
      SOLVER_STRATEGIES: ' routing-only , direct-only,,'
    });

    expect(config).to.deep.include({
      port: 9000,
      maxHops: 2,
      splitChunks: 10,
      deadlineBufferMs: 0,
      solverAddress: '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd',
      maxOrders: 50,
      strategies: ['routing-only', 'direct-only']
    });
    expect(config.interactionPenalty.toString()).to.equal('0.25');
  });

  it('should accept SOLVER_PORT when PORT is unset', () => {
    expect(loadSolverConfig({ SOLVER_PORT: '8123' }).port).to.equal(8123);
  });

  it('should reject malformed numbers', () => {
    expect(() => loadSolverConfig({ SOLVER_MAX_HOPS: '0' })).to.throw(ConfigError, 'SOLVER_MAX_HOPS');
    expect(() => loadSolverConfig({ SOLVER_SPLIT_CHUNKS: 'many' })).to.throw(ConfigError, 'SOLVER_SPLIT_CHUNKS');
    expect(() => loadSolverConfig({ PORT: '70000' })).to.throw(ConfigError, 'out of range');
    expect(() => loadSolverConfig({ SOLVER_INTERACTION_PENALTY: '-1' })).to.throw(ConfigError, 'SOLVER_INTERACTION_PENALTY');
    expect(() => loadSolverConfig({ SOLVER_INTERACTION_PENALTY: 'abc' })).to.throw(ConfigError, 'SOLVER_INTERACTION_PENALTY');
  });

  it('should reject a malformed solver address', () => {
    expect(() => loadSolverConfig({ SOLVER_ADDRESS: '0x1234' })).to.throw(ConfigError, 'SOLVER_ADDRESS');
  });
});
