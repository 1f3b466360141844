/**
 * Stock Ledger Service
 *
 * Persists the pure StockItem ledger. Writers for the same product are
 * serialized in-process by a keyed lock and across processes by a version
 * compare-and-set. Each transaction is applied at most once per product,
 * with all of its lines for that product in one write.
 *
 * Availability is re-checked here: when the ledger holds less than a sale
 * takes, the sale still goes through (the order exists) and the oversell is
 * reported.
 */

import {
    StockItem,
    StockItemStateSchema,
    type SaleMovement,
    type Transaction,
} from '@tillsync/shared';
import { COLLECTIONS, LEDGER_CAS_MAX_RETRIES } from '../config/index.js';
import type { DocumentStore } from '../lib/store/index.js';
import { ConflictError, LedgerUpdateError, toError } from '../utils/errors.js';
import { KeyedLock } from '../utils/keyedLock.js';
import { inventoryLogger, errorMessage } from '../utils/logger.js';
import type { CatalogRepository } from './catalogRepository.js';

// ============================================
// TYPES
// ============================================

export interface LedgerApplyResult {
    productId: string;
    /** False when this transaction had already been applied */
    applied: boolean;
    quantityBefore: number;
    quantityAfter: number;
    requested: number;
    /** The ledger held less than the sale took */
    oversold: boolean;
}

export interface LedgerFailure {
    productId: string;
    error: LedgerUpdateError;
}

export interface TransactionLedgerResult {
    results: LedgerApplyResult[];
    failures: LedgerFailure[];
}

interface LoadedItem {
    item: StockItem;
    version: number | null;
}

// ============================================
// SERVICE
// ============================================

export class StockLedgerService {
    constructor(
        private readonly store: DocumentStore,
        private readonly catalog: CatalogRepository,
        private readonly lock: KeyedLock = new KeyedLock(),
        private readonly maxRetries: number = LEDGER_CAS_MAX_RETRIES
    ) {}

    /** Stored ledger for a product, or null when none was opened yet */
    async get(productId: string): Promise<StockItem | null> {
        const doc = await this.store.get(COLLECTIONS.stockItems, productId);
        return doc ? StockItem.fromState(StockItemStateSchema.parse(doc.data)) : null;
    }

    /** Apply one sale line; see applyProductSales */
    async applySale(transactionId: string, movement: SaleMovement): Promise<LedgerApplyResult> {
        return this.applyProductSales(transactionId, movement.productId, [movement]);
    }

    /**
     * Apply every line a transaction has for one product in a single ledger
     * write, so a cart listing a product twice takes both lines off. The
     * ledger is opened from the first line's product snapshot when the
     * product has none yet. After the ledger commits, the product's catalog
     * stock figure is set to the ledger quantity, also on replays, so a
     * half-finished earlier attempt converges.
     */
    async applyProductSales(
        transactionId: string,
        productId: string,
        movements: readonly SaleMovement[]
    ): Promise<LedgerApplyResult> {
        const [first] = movements;
        if (!first || movements.some(m => m.productId !== productId)) {
            throw new LedgerUpdateError(`No sale lines for ${productId} in ${transactionId}`, transactionId, productId);
        }
        const requested = movements.reduce((sum, m) => sum + m.quantity, 0);

        return this.lock.run(productId, async () => {
            for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
                const { item, version } = await this.load(productId, first);
                const quantityBefore = item.quantity;

                if (item.hasApplied(transactionId)) {
                    await this.catalog.setStockQuantity(productId, item.quantity);
                    return {
                        productId,
                        applied: false,
                        quantityBefore,
                        quantityAfter: item.quantity,
                        requested,
                        oversold: false,
                    };
                }

                const oversold = quantityBefore < requested;
                for (const movement of movements) {
                    item.addOutgoingStock(movement);
                }
                item.markApplied(transactionId);

                const committed = await this.store.compareAndSet(COLLECTIONS.stockItems, productId, version, item.toState());
                if (!committed) {
                    inventoryLogger.debug({ productId, transactionId, attempt }, 'Stock ledger changed concurrently, retrying');
                    continue;
                }

                if (oversold) {
                    inventoryLogger.warn(
                        { productId, transactionId, available: quantityBefore, requested },
                        'Oversell: ledger held less stock than the order took'
                    );
                }

                await this.catalog.setStockQuantity(productId, item.quantity);

                return {
                    productId,
                    applied: true,
                    quantityBefore,
                    quantityAfter: item.quantity,
                    requested,
                    oversold,
                };
            }

            throw new ConflictError(`Stock ledger for ${productId} kept changing after ${this.maxRetries} attempts`, 'version');
        });
    }

    /**
     * Apply every product of a transaction. Products are independent: one
     * failing ledger does not stop the rest.
     */
    async applyTransaction(transaction: Transaction, productIds?: ReadonlySet<string>): Promise<TransactionLedgerResult> {
        const results: LedgerApplyResult[] = [];
        const failures: LedgerFailure[] = [];

        for (const [productId, movements] of groupByProduct(transaction.stockMovements)) {
            if (productIds && productIds.size > 0 && !productIds.has(productId)) continue;
            try {
                results.push(await this.applyProductSales(transaction.id, productId, movements));
            } catch (error) {
                const cause = toError(error);
                inventoryLogger.error(
                    { transactionId: transaction.id, branchId: transaction.branchDbName, productId, error: errorMessage(error) },
                    'Stock ledger update failed'
                );
                failures.push({
                    productId,
                    error: new LedgerUpdateError(
                        `Failed to update stock for ${productId}: ${cause.message}`,
                        transaction.id,
                        productId,
                        cause
                    ),
                });
            }
        }

        return { results, failures };
    }

    private async load(productId: string, movement: SaleMovement): Promise<LoadedItem> {
        const doc = await this.store.get(COLLECTIONS.stockItems, productId);
        if (!doc) {
            return { item: StockItem.open(movement.product), version: null };
        }
        return { item: StockItem.fromState(StockItemStateSchema.parse(doc.data)), version: doc.version };
    }
}

/** Sale lines keyed by product, in first-seen order */
export function groupByProduct(movements: readonly SaleMovement[]): Map<string, SaleMovement[]> {
    const groups = new Map<string, SaleMovement[]>();
    for (const movement of movements) {
        const group = groups.get(movement.productId);
        if (group) {
            group.push(movement);
        } else {
            groups.set(movement.productId, [movement]);
        }
    }
    return groups;
}
