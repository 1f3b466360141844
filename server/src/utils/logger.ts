/**
 * Centralized logger using Pino
 *
 * Pretty output in development, JSON lines in production, silent under
 * test unless LOG_LEVEL asks for output.
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import type { Request, Response, NextFunction } from 'express';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isDev = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

function resolveLevel(): string {
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
    if (isTest) return 'silent';
    return isDev ? 'debug' : 'info';
}

const options: LoggerOptions = {
    level: resolveLevel(),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
};

// Create the logger instance
const logger: Logger = isDev
    ? pino(options, pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
        },
    }))
    : pino(options);

// Child loggers per module
export const checkoutLogger: Logger = logger.child({ module: 'checkout' });
export const inventoryLogger: Logger = logger.child({ module: 'inventory' });
export const syncLogger: Logger = logger.child({ module: 'sync' });
export const cacheLogger: Logger = logger.child({ module: 'cache' });
export const posLogger: Logger = logger.child({ module: 'pos' });

export default logger;

// Request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = {
            method: req.method,
            url: req.originalUrl,
            status: res.statusCode,
            duration: `${duration}ms`,
        };

        if (res.statusCode >= 500) {
            logger.error(logData, 'Request error');
        } else if (res.statusCode >= 400) {
            logger.warn(logData, 'Request warning');
        } else if (duration > 1000) {
            logger.warn(logData, 'Slow request');
        } else {
            logger.debug(logData, 'Request completed');
        }
    });

    next();
}

/** Message of an unknown thrown value, for log fields */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
