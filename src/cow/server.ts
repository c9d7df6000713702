import express, { Request, Response } from 'express';
import rateLimit from 'express-rate-limit';
import { createServer, Server as HTTPServer } from 'http';
import logger, { logError } from '../utils/logger';
import { Decimal } from '../utils/decimal';
import type { SolverConfig } from '../config/solver-config';
import {
  InvalidAuctionError,
  NoLiquidityError,
  QuoteTimeoutError,
  SolverError
} from './errors';
import { auctionFromWire, fromAtoms, isWireAuction, quoteToWire, solutionToWire } from './dto';
import { Auction, decimalsOf } from './model';
import { Quoter } from './Quoter';
import { SolveGovernor } from './SolveGovernor';
import { selectStrategies } from './strategies';
import type { WireError } from './types';

function errorBody(error: unknown): WireError {
  if (error instanceof SolverError) {
    return { kind: error.name.replace(/Error$/, ''), description: error.message };
  }
  return { kind: 'Internal', description: error instanceof Error ? error.message : String(error) };
}

function errorContext(error: unknown): { error: string; stack?: string } {
  return error instanceof Error
    ? { error: error.message, stack: error.stack }
    : { error: String(error) };
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * HTTP boundary: converts wire auctions, runs a fresh governor per request
 * and answers before the coordinator's deadline less the configured buffer.
 */
export class SolverServer {
  private app: express.Application;
  private httpServer: HTTPServer;
  private readonly quoter: Quoter;
  private lastAuction: Auction | null = null;
  private solvedAuctions = 0;

  constructor(private readonly config: SolverConfig) {
    this.app = express();
    this.httpServer = createServer(this.app);
    this.quoter = new Quoter({ maxHops: config.maxHops, splitChunks: config.splitChunks });

    // Behind one reverse proxy
    this.app.set('trust proxy', 1);

    this.setupMiddleware();
    this.setupRoutes();

    logger.info('SolverServer initialized', {
      port: config.port,
      maxHops: config.maxHops,
      strategies: config.strategies.length > 0 ? config.strategies : 'default'
    });
  }

  private setupMiddleware() {
    this.app.use(express.json({ limit: '10mb' }));

    // Rate limiting - prevent DoS
    const limiter = rateLimit({
      windowMs: 60 * 1000, // 1 minute
      max: 100, // 100 requests per minute
      message: { kind: 'RateLimited', description: 'Too many requests, please try again later' }
    });
    this.app.use(limiter);

    // Request logging
    this.app.use((req, res, next) => {
      logger.info(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes() {
    this.app.post('/solve', async (req: Request, res: Response) => {
      const startTime = Date.now();
      const body: unknown = req.body;

      if (!isWireAuction(body)) {
        res.status(400).json({ kind: 'InvalidAuction', description: 'Invalid auction format' } satisfies WireError);
        return;
      }

      let auction: Auction;
      try {
        auction = auctionFromWire(body);
      } catch (error) {
        if (error instanceof InvalidAuctionError) {
          logger.warn('Rejected auction', { auctionId: body.id, error: error.message });
          res.status(400).json(errorBody(error));
          return;
        }
        logError('Error in /solve endpoint', { auctionId: body.id, ...errorContext(error) });
        res.status(500).json(errorBody(error));
        return;
      }

      try {
        this.lastAuction = auction;
        const deadline = new Date(auction.deadline.getTime() - this.config.deadlineBufferMs);
        const governor = new SolveGovernor(
          selectStrategies(this.config.strategies, this.config.maxHops, this.config.splitChunks),
          this.config
        );
        const outcome = await governor.run(auction, deadline);
        this.solvedAuctions++;

        logger.info(`Solved auction ${auction.id} in ${Date.now() - startTime}ms`, {
          state: outcome.state,
          strategy: outcome.solution.strategy
        });
        res.json(solutionToWire(outcome.solution, auction));
      } catch (error) {
        logError('Error in /solve endpoint', { auctionId: auction.id, ...errorContext(error) });
        res.status(500).json(errorBody(error));
      }
    });

    this.app.get('/quote', async (req: Request, res: Response) => {
      const sellToken = queryString(req, 'sellToken')?.toLowerCase();
      const buyToken = queryString(req, 'buyToken')?.toLowerCase();
      const amount = queryString(req, 'amount');
      const kind = queryString(req, 'kind');
      const deadlineParam = queryString(req, 'deadline');
      const deadline = deadlineParam ? new Date(deadlineParam) : null;

      if (!sellToken || !buyToken || !amount || (kind !== 'sell' && kind !== 'buy') || !deadline || Number.isNaN(deadline.getTime())) {
        res.status(400).json({ kind: 'InvalidOrder', description: 'sellToken, buyToken, amount, kind and deadline are required' } satisfies WireError);
        return;
      }

      const auction = this.lastAuction;
      if (!auction) {
        res.status(404).json(errorBody(new NoLiquidityError(sellToken, buyToken)));
        return;
      }

      try {
        const fixedToken = kind === 'sell' ? sellToken : buyToken;
        const units = new Decimal(fromAtoms(amount, decimalsOf(auction.tokens, fixedToken)));
        const result = await this.quoter.quote(auction, { sellToken, buyToken, amount: units, side: kind }, deadline);
        res.json(quoteToWire(result, auction));
      } catch (error) {
        if (error instanceof NoLiquidityError) {
          res.status(404).json(errorBody(error));
        } else if (error instanceof QuoteTimeoutError) {
          res.status(408).json(errorBody(error));
        } else if (error instanceof SolverError) {
          res.status(400).json(errorBody(error));
        } else {
          logError('Error in /quote endpoint', { auctionId: auction.id, sellToken, buyToken, ...errorContext(error) });
          res.status(400).json(errorBody(error));
        }
      }
    });

    // Health check
    this.app.get('/health', (req: Request, res: Response) => {
      res.json({
        status: 'alive',
        solvedAuctions: this.solvedAuctions,
        lastAuction: this.lastAuction?.id ?? null,
        timestamp: new Date().toISOString()
      });
    });
  }

  /** Resolves with the bound port, which differs from the configured one when that is 0. */
  async start(): Promise<number> {
    return new Promise((resolve) => {
      const host = process.env.NODE_ENV === 'production' ? '0.0.0.0' : 'localhost';
      this.httpServer.listen(this.config.port, host, () => {
        const address = this.httpServer.address();
        const port = address !== null && typeof address === 'object' ? address.port : this.config.port;
        logger.info(`Batch auction solver running on http://${host}:${port}`);
        logger.info(`Health check: http://${host}:${port}/health`);
        logger.info(`Solve endpoint: http://${host}:${port}/solve`);
        resolve(port);
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve) => {
      this.httpServer.close(() => {
        logger.info('SolverServer stopped');
        resolve();
      });
    });
  }
}
