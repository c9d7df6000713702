import * as dotenv from 'dotenv';
import * as path from 'path';
import logger from '../utils/logger';
import { loadSolverConfig } from '../config/solver-config';
import { SolverServer } from './server';

// .env is only for local development; deployments pass real environment variables
if (process.env.NODE_ENV !== 'production') {
  dotenv.config({ path: path.join(__dirname, '../../.env') });
}

async function main() {
  try {
    const config = loadSolverConfig(process.env);

    logger.info('Starting batch auction solver with configuration:');
    logger.info(`- Port: ${config.port}`);
    logger.info(`- Max hops: ${config.maxHops}`);
    logger.info(`- Split chunks: ${config.splitChunks}`);
    logger.info(`- Interaction penalty: ${config.interactionPenalty.toString()}`);
    logger.info(`- Deadline buffer: ${config.deadlineBufferMs}ms`);
    logger.info(`- Strategies: ${config.strategies.length > 0 ? config.strategies.join(', ') : 'default'}`);
    logger.info(`- Node Environment: ${process.env.NODE_ENV || 'development'}`);

    const server = new SolverServer(config);
    await server.start();

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down solver...`);
      server.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Failed to stop solver cleanly:', error);
          process.exit(1);
        }
      );
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.error('Failed to start solver:', error);
    process.exit(1);
  }
}

void main();
