/**
 * Custom error classes for checkout, sync and cache failures
 * Use these instead of generic Error so the error handler can map them
 */

import type { StockIssue } from '@tillsync/shared';

/**
 * Base interface for custom errors with HTTP status codes
 */
export interface CustomError extends Error {
    readonly statusCode: number;
}

/**
 * Validation error - thrown when input validation fails
 *
 * @example
 * throw new ValidationError('Checkout validation failed', [{ path: 'lines', message: 'Your cart is empty' }]);
 */
export class ValidationError extends Error implements CustomError {
    readonly name = 'ValidationError' as const;
    readonly statusCode = 400 as const;
    readonly details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

/**
 * Not found error - thrown when a document does not exist
 *
 * @example
 * throw new NotFoundError('Order not found', 'transaction', id);
 */
export class NotFoundError extends Error implements CustomError {
    readonly name = 'NotFoundError' as const;
    readonly statusCode = 404 as const;
    readonly resourceType: string | null;
    readonly resourceId: string | null;

    constructor(
        message: string = 'Resource not found',
        resourceType: string | null = null,
        resourceId: string | null = null
    ) {
        super(message);
        this.resourceType = resourceType;
        this.resourceId = resourceId;
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}

/**
 * Conflict error - thrown when a write loses against a concurrent writer
 *
 * @example
 * throw new ConflictError('Stock ledger changed concurrently', 'version');
 */
export class ConflictError extends Error implements CustomError {
    readonly name = 'ConflictError' as const;
    readonly statusCode = 409 as const;
    readonly conflictType: string | null;

    constructor(message: string = 'Conflict', conflictType: string | null = null) {
        super(message);
        this.conflictType = conflictType;
        Object.setPrototypeOf(this, ConflictError.prototype);
    }
}

/**
 * Stock insufficient - one or more cart lines exceed live stock.
 * Carries every shortfall, not just the first.
 */
export class StockInsufficientError extends Error implements CustomError {
    readonly name = 'StockInsufficientError' as const;
    readonly statusCode = 409 as const;
    readonly shortfalls: readonly StockIssue[];

    constructor(message: string, shortfalls: readonly StockIssue[]) {
        super(message);
        this.shortfalls = shortfalls;
        Object.setPrototypeOf(this, StockInsufficientError.prototype);
    }
}

/**
 * Business logic error - thrown when business rules are violated
 *
 * @example
 * throw new BusinessLogicError("Cannot change status from 'Completed' to 'New'", 'status_transition');
 */
export class BusinessLogicError extends Error implements CustomError {
    readonly name = 'BusinessLogicError' as const;
    readonly statusCode = 422 as const;
    readonly rule: string | null;

    constructor(message: string, rule: string | null = null) {
        super(message);
        this.rule = rule;
        Object.setPrototypeOf(this, BusinessLogicError.prototype);
    }
}

/**
 * Persistence error - the primary order write failed.
 * The client sees a generic message; nothing was committed.
 */
export class PersistenceError extends Error implements CustomError {
    readonly name = 'PersistenceError' as const;
    readonly statusCode = 503 as const;
    readonly originalError: Error | null;

    constructor(
        message: string = 'Your order could not be saved. Please try again.',
        originalError: Error | null = null
    ) {
        super(message);
        this.originalError = originalError;
        Object.setPrototypeOf(this, PersistenceError.prototype);
    }
}

/**
 * Mirror error - writing an online sale to the POS failed
 */
export class MirrorError extends Error implements CustomError {
    readonly name = 'MirrorError' as const;
    readonly statusCode = 502 as const;
    readonly branchId: string;
    readonly transactionId: string;
    readonly originalError: Error | null;

    constructor(message: string, branchId: string, transactionId: string, originalError: Error | null = null) {
        super(message);
        this.branchId = branchId;
        this.transactionId = transactionId;
        this.originalError = originalError;
        Object.setPrototypeOf(this, MirrorError.prototype);
    }
}

/**
 * Ledger update error - a stock ledger or product stock write failed
 */
export class LedgerUpdateError extends Error implements CustomError {
    readonly name = 'LedgerUpdateError' as const;
    readonly statusCode = 500 as const;
    readonly transactionId: string;
    readonly productId: string;
    readonly originalError: Error | null;

    constructor(message: string, transactionId: string, productId: string, originalError: Error | null = null) {
        super(message);
        this.transactionId = transactionId;
        this.productId = productId;
        this.originalError = originalError;
        Object.setPrototypeOf(this, LedgerUpdateError.prototype);
    }
}

/**
 * Cache refresh error - recomputing a snapshot failed; the old one stays
 */
export class CacheRefreshError extends Error implements CustomError {
    readonly name = 'CacheRefreshError' as const;
    readonly statusCode = 503 as const;
    readonly key: string;
    readonly originalError: Error | null;

    constructor(message: string, key: string, originalError: Error | null = null) {
        super(message);
        this.key = key;
        this.originalError = originalError;
        Object.setPrototypeOf(this, CacheRefreshError.prototype);
    }
}

/**
 * Type guard to check if an error is a custom error with statusCode
 */
export function isCustomError(error: unknown): error is CustomError {
    return (
        error instanceof Error &&
        'statusCode' in error &&
        typeof error.statusCode === 'number'
    );
}

/** Coerce an unknown thrown value into an Error for `originalError` fields */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
