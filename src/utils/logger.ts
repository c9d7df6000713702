import winston, { format } from 'winston';
import { isDecimal } from './decimal';

// Decimal amounts are logged as plain strings
const decimalFormat = winston.format((info) => {
    const transformed = { ...info };
    Object.keys(transformed).forEach(key => {
        const value = transformed[key];
        if (isDecimal(value)) {
            transformed[key] = value.toString();
        }
    });
    return transformed;
});

const terminalFormat = format.printf(({ level, message, timestamp, ...rest }) => {
    const formattedTime = typeof timestamp === 'string'
        ? new Date(timestamp).toLocaleTimeString()
        : new Date().toLocaleTimeString();

    let label = level.toUpperCase();
    if (rest.event === 'SOLVE_OUTCOME') {
        label = 'SOLVED';
    } else if (rest.event === 'CANDIDATE_FAILURE') {
        label = 'CANDIDATE';
    }

    const contextString = formatContext(rest);
    return `${label} | ${formattedTime} | ${String(message)}${contextString ? '\n' + contextString : ''}`;
});

const formatContext = (context: Record<string, unknown>): string => {
    const { service, event, ...restContext } = context;
    if (Object.keys(restContext).length === 0) {
        return '';
    }

    let formatted = '  ┌─ Details ──────────────────────────────────────────────────';

    Object.entries(restContext).forEach(([key, value]) => {
        let formattedValue: unknown = value;
        if (typeof value === 'object' && value !== null) {
            if (value instanceof Error) {
                formattedValue = value.message;
            } else {
                try {
                    formattedValue = JSON.stringify(value, null, 2);
                } catch (e) {
                    formattedValue = '[Complex Object]';
                }
            }
        }
        formatted += '\n' + `  │ ${key}: ${String(formattedValue)}`;
    });

    formatted += '\n' + '  └──────────────────────────────────────────────────────────';
    return formatted;
};

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.timestamp(),
            terminalFormat
        )
    })
];

if (process.env.LOG_TO_FILE === 'true') {
    transports.push(
        new winston.transports.File({
            filename: 'error.log',
            level: 'error'
        }),
        new winston.transports.File({
            filename: 'combined.log'
        })
    );
}

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.combine(
        decimalFormat(),
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
    ),
    defaultMeta: { service: 'batch-auction-solver' },
    transports
});

export interface LogContext {
    auctionId?: string;
    orderId?: string;
    poolId?: string;
    strategy?: string;
    token?: string;
    error?: Error | string;
    orderCount?: number;
    poolCount?: number;
    tokenCount?: number;
    edgeCount?: number;
    fillCount?: number;
    interactionCount?: number;
    matchCount?: number;
    hops?: number;
    elapsedMs?: number;
    remainingMs?: number;
    score?: string;
    state?: string;
    reason?: string;
    [key: string]: unknown;
}

export const logInfo = (message: string, context: LogContext = {}) => {
    logger.info(message, context);
};

export const logError = (message: string, context: LogContext = {}) => {
    logger.error(message, context);
};

export const logWarn = (message: string, context: LogContext = {}) => {
    logger.warn(message, context);
};

export const logDebug = (message: string, context: LogContext = {}) => {
    logger.debug(message, context);
};

export const logSolveOutcome = (context: LogContext & {
    auctionId: string;
    state: string;
    strategy: string;
    score: string;
    completedCandidates: number;
    failedCandidates: number;
    elapsedMs: number;
}) => {
    logger.info('Auction solved', {
        ...context,
        event: 'SOLVE_OUTCOME'
    });
};

export const logCandidateFailure = (strategy: string, error: unknown, context: LogContext = {}) => {
    logger.warn(`Candidate ${strategy} discarded`, {
        ...context,
        strategy,
        error: error instanceof Error ? error.message : String(error),
        event: 'CANDIDATE_FAILURE'
    });
};

export default logger;
