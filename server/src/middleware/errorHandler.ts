/**
 * Centralized Error Handler Middleware
 * Turns thrown errors into consistent JSON responses
 *
 * Must be added AFTER all routes:
 * app.use(errorHandler);
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import {
    ValidationError,
    NotFoundError,
    ConflictError,
    StockInsufficientError,
    BusinessLogicError,
    PersistenceError,
    MirrorError,
    LedgerUpdateError,
    CacheRefreshError,
    isCustomError,
} from '../utils/errors.js';
import logger from '../utils/logger.js';

const isDev = process.env.NODE_ENV === 'development';

/**
 * Global error handling middleware
 */
export const errorHandler: ErrorRequestHandler = (
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const error = err instanceof Error ? err : new Error(String(err));
    const statusCode = isCustomError(error) ? error.statusCode : 500;

    const logData = {
        method: req.method,
        path: req.path,
        error: error.message,
        type: error.name,
        ...(isDev && { stack: error.stack }),
    };
    if (statusCode >= 500) {
        logger.error(logData, 'Request failed');
    } else {
        logger.warn(logData, 'Request rejected');
    }

    if (error instanceof ValidationError) {
        res.status(400).json({
            error: error.message,
            type: 'ValidationError',
            details: error.details,
        });
        return;
    }

    if (error instanceof NotFoundError) {
        res.status(404).json({
            error: error.message,
            type: 'NotFoundError',
            resourceType: error.resourceType,
            resourceId: error.resourceId,
        });
        return;
    }

    if (error instanceof StockInsufficientError) {
        res.status(409).json({
            error: error.message,
            type: 'StockInsufficientError',
            shortfalls: error.shortfalls,
        });
        return;
    }

    if (error instanceof ConflictError) {
        res.status(409).json({
            error: error.message,
            type: 'ConflictError',
            conflictType: error.conflictType,
        });
        return;
    }

    if (error instanceof BusinessLogicError) {
        res.status(422).json({
            error: error.message,
            type: 'BusinessLogicError',
            rule: error.rule,
        });
        return;
    }

    if (error instanceof PersistenceError) {
        res.status(503).json({
            error: error.message,
            type: 'PersistenceError',
            ...(isDev && error.originalError && { details: error.originalError.message }),
        });
        return;
    }

    if (error instanceof MirrorError) {
        res.status(502).json({
            error: error.message,
            type: 'MirrorError',
            transactionId: error.transactionId,
            branchId: error.branchId,
        });
        return;
    }

    if (error instanceof LedgerUpdateError) {
        res.status(500).json({
            error: error.message,
            type: 'LedgerUpdateError',
            transactionId: error.transactionId,
            productId: error.productId,
        });
        return;
    }

    if (error instanceof CacheRefreshError) {
        res.status(503).json({
            error: error.message,
            type: 'CacheRefreshError',
            key: error.key,
        });
        return;
    }

    if (error instanceof ZodError) {
        res.status(400).json({
            error: 'Validation failed',
            type: 'ValidationError',
            details: error.issues.map(issue => ({
                path: issue.path.join('.'),
                message: issue.message,
            })),
        });
        return;
    }

    res.status(statusCode).json({
        error: statusCode === 500 && !isDev ? 'Internal server error' : error.message,
        type: error.name || 'Error',
        ...(isDev && { stack: error.stack }),
    });
};

export default errorHandler;
