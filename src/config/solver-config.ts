import { utils } from 'ethers';
import { Decimal } from '../utils/decimal';
import { ConfigError } from '../cow/errors';

export interface SolverConfig {
  port: number;
  maxHops: number;
  splitChunks: number;
  /** Numeraire charged per interaction when scoring */
  interactionPenalty: Decimal;
  /** Time kept back from the coordinator's deadline for encoding and transport */
  deadlineBufferMs: number;
  /** Address used to recognise orders quoted by this solver */
  solverAddress: string;
  maxOrders: number;
  /** Strategy names to run; empty means the defaults */
  strategies: string[];
}

export const DEFAULT_SOLVER_CONFIG: SolverConfig = {
  port: 8000,
  maxHops: 3,
  splitChunks: 20,
  interactionPenalty: new Decimal('0.000001'),
  deadlineBufferMs: 250,
  solverAddress: '0x0000000000000000000000000000000000000000',
  maxOrders: 500,
  strategies: []
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, variable: string, fallback: number, min: number): number {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(variable, `expected an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readDecimal(env: Env, variable: string, fallback: Decimal): Decimal {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') return fallback;
  try {
    const value = new Decimal(raw.trim());
    if (value.isFinite() && value.gte(0)) return value;
  } catch (error) {
    throw new ConfigError(variable, `expected a non-negative decimal, got "${raw}"`);
  }
  throw new ConfigError(variable, `expected a non-negative decimal, got "${raw}"`);
}

/**
 * Reads solver settings from the environment (after dotenv has loaded it).
 * @throws ConfigError naming the first variable that does not parse
 */
export function loadSolverConfig(env: Env = process.env): SolverConfig {
  const port = readInt(env, env.PORT !== undefined ? 'PORT' : 'SOLVER_PORT', DEFAULT_SOLVER_CONFIG.port, 1);
  if (port > 65535) {
    throw new ConfigError('PORT', `port ${port} out of range`);
  }

  const solverAddress = env.SOLVER_ADDRESS?.trim() || DEFAULT_SOLVER_CONFIG.solverAddress;
  if (!utils.isAddress(solverAddress)) {
    throw new ConfigError('SOLVER_ADDRESS', `"${solverAddress}" is not an address`);
  }

  const strategies = (env.SOLVER_STRATEGIES ?? '')
    .split(',')
    .map(name => name.trim())
    .filter(name => name.length > 0);

  return {
    port,
    maxHops: readInt(env, 'SOLVER_MAX_HOPS', DEFAULT_SOLVER_CONFIG.maxHops, 1),
    splitChunks: readInt(env, 'SOLVER_SPLIT_CHUNKS', DEFAULT_SOLVER_CONFIG.splitChunks, 1),
    interactionPenalty: readDecimal(env, 'SOLVER_INTERACTION_PENALTY', DEFAULT_SOLVER_CONFIG.interactionPenalty),
    deadlineBufferMs: readInt(env, 'SOLVER_DEADLINE_BUFFER_MS', DEFAULT_SOLVER_CONFIG.deadlineBufferMs, 0),
    solverAddress: solverAddress.toLowerCase(),
    maxOrders: readInt(env, 'SOLVER_MAX_ORDERS', DEFAULT_SOLVER_CONFIG.maxOrders, 1),
    strategies
  };
}
