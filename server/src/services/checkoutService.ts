/**
 * Checkout Service
 *
 * Turns a cart into a persisted online order:
 *
 *   Validating → StockChecked → Priced → Persisted → Mirrored → LedgerUpdated → Cleared
 *
 * Anything before Persisted that fails aborts with nothing written. Once the
 * order is persisted the checkout succeeds: POS mirror and stock ledger
 * failures are logged, parked in the sync outbox, and reported in the result.
 */

import {
    applyOrderDetails,
    assignTransactionId,
    buildOrderMessage,
    buildTransaction,
    buildWhatsAppUrl,
    estimateDeliveryFee,
    findStockIssues,
    formatStockIssues,
    forWhoFor,
    isPosIntegrationEnabled,
    roundTo2,
    validateCheckoutRequest,
    type BusinessSettings,
    type NormalizedCheckout,
    type Product,
    type StockIssue,
    type Transaction,
} from '@tillsync/shared';
import {
    PersistenceError,
    StockInsufficientError,
    ValidationError,
    toError,
} from '../utils/errors.js';
import { checkoutLogger, errorMessage } from '../utils/logger.js';
import type { CartStore } from './cartStore.js';
import type { CatalogCache } from './catalogCache.js';
import type { CatalogRepository } from './catalogRepository.js';
import type { PosMirror } from './posMirror.js';
import type { StockLedgerService } from './stockLedgerService.js';
import type { RecordOutboxInput, SyncOutbox } from './syncOutbox.js';
import type { TransactionRepository } from './transactionRepository.js';

// ============================================
// TYPES
// ============================================

export const CHECKOUT_STAGES = [
    'Validating',
    'StockChecked',
    'Priced',
    'Persisted',
    'Mirrored',
    'LedgerUpdated',
    'Cleared',
] as const;

export type CheckoutStage = typeof CHECKOUT_STAGES[number];

export type MirrorOutcome = 'written' | 'skipped' | 'failed';

export interface LedgerOutcome {
    updated: string[];
    failed: string[];
    /** Products whose ledger held less than the order took */
    oversold: string[];
}

export interface CheckoutResult {
    transactionId: string;
    transaction: Transaction;
    /** Stages completed, in order */
    stages: CheckoutStage[];
    mirror: MirrorOutcome;
    ledger: LedgerOutcome;
    cartCleared: boolean;
    deliveryFee: number;
    totalWithDelivery: number;
    orderMessage: string;
    whatsAppUrl: string | null;
}

export interface CheckoutHooks {
    /** Clears the live cart held by the web layer's session */
    clearSessionCart?: () => void | Promise<void>;
}

export interface CheckoutServiceDeps {
    catalog: CatalogRepository;
    cache: CatalogCache;
    transactions: TransactionRepository;
    mirror: PosMirror;
    ledger: StockLedgerService;
    outbox: SyncOutbox;
    carts: CartStore;
    clock?: () => Date;
}

// ============================================
// SERVICE
// ============================================

export class CheckoutService {
    private readonly clock: () => Date;

    constructor(private readonly deps: CheckoutServiceDeps) {
        this.clock = deps.clock ?? (() => new Date());
    }

    /**
     * Run a checkout for a raw request body.
     *
     * @throws ValidationError when the request is malformed
     * @throws StockInsufficientError when any line exceeds live stock
     * @throws PersistenceError when the order cannot be saved
     */
    async checkout(input: unknown, hooks: CheckoutHooks = {}): Promise<CheckoutResult> {
        const stages: CheckoutStage[] = [];

        // Validating
        const validation = validateCheckoutRequest(input);
        if (!validation.success) {
            checkoutLogger.info({ stage: 'Validating', errors: validation.errors.length }, 'Checkout aborted: validation failed');
            throw new ValidationError('Checkout validation failed', validation.errors);
        }
        const request = validation.data;
        stages.push('Validating');

        // StockChecked
        const settings = await this.deps.cache.getSettings();
        const products = await this.deps.catalog.getProducts(request.lines.map(l => l.productId));
        const issues = this.stockIssues(request, products, settings);
        if (issues.length > 0) {
            const message = formatStockIssues(issues);
            checkoutLogger.info({ stage: 'StockChecked', customerId: request.customer.id, issues: issues.length }, 'Checkout aborted: stock issues');
            throw new StockInsufficientError(message, issues);
        }
        stages.push('StockChecked');

        // Priced
        const now = this.clock();
        const { draft } = buildTransaction({
            branchId: settings.branchId,
            customer: request.customer,
            lines: request.lines,
            products,
            forWho: forWhoFor(request.customer, request.details),
            now,
        });
        const priced = applyOrderDetails(draft, request.details, request.orderer);
        stages.push('Priced');

        // Persisted
        let transaction: Transaction;
        try {
            const id = await this.deps.transactions.nextId(now);
            transaction = assignTransactionId(priced, id);
            await this.deps.transactions.save(transaction);
        } catch (error) {
            checkoutLogger.error(
                { stage: 'Persisted', customerId: request.customer.id, error: errorMessage(error) },
                'Checkout aborted: order could not be saved'
            );
            throw new PersistenceError(undefined, toError(error));
        }
        stages.push('Persisted');

        const log = checkoutLogger.child({ transactionId: transaction.id, branchId: settings.branchId });
        log.info({ grandTotal: transaction.grandTotal, lines: transaction.stockMovements.length }, 'Order persisted');

        // Mirrored
        const mirror = await this.mirrorToPos(transaction, settings);
        stages.push('Mirrored');

        // LedgerUpdated
        const ledger = await this.updateLedger(transaction);
        stages.push('LedgerUpdated');

        // Cleared
        const cartCleared = await this.clearCart(request.customer.id, hooks, transaction.id);
        stages.push('Cleared');

        const deliveryFee = estimateDeliveryFee(transaction.grandTotal, transaction.deliveryType);
        const orderMessage = buildOrderMessage(request.orderer, request.details, request.lines, products);

        return {
            transactionId: transaction.id,
            transaction,
            stages,
            mirror,
            ledger,
            cartCleared,
            deliveryFee,
            totalWithDelivery: roundTo2(transaction.grandTotal + deliveryFee),
            orderMessage,
            whatsAppUrl: buildWhatsAppUrl(settings.phone, orderMessage),
        };
    }

    /**
     * Missing products always abort; shortfalls only when the business has
     * stock validation on.
     */
    private stockIssues(
        request: NormalizedCheckout,
        products: ReadonlyMap<string, Product>,
        settings: BusinessSettings
    ): StockIssue[] {
        const issues = findStockIssues(request.lines, products);
        return settings.enableStockValidation ? issues : issues.filter(i => i.kind === 'missing');
    }

    private async mirrorToPos(transaction: Transaction, settings: BusinessSettings): Promise<MirrorOutcome> {
        const branchId = settings.branchId;
        if (!isPosIntegrationEnabled(settings, branchId)) {
            return 'skipped';
        }

        try {
            await this.deps.mirror.write(branchId, transaction);
            return 'written';
        } catch (error) {
            checkoutLogger.error(
                { transactionId: transaction.id, branchId, error: errorMessage(error) },
                'POS mirror write failed, queued for reconciliation'
            );
            await this.park({ kind: 'mirror', transactionId: transaction.id, branchId, error: errorMessage(error) });
            return 'failed';
        }
    }

    private async updateLedger(transaction: Transaction): Promise<LedgerOutcome> {
        const { results, failures } = await this.deps.ledger.applyTransaction(transaction);

        if (failures.length > 0) {
            await this.park({
                kind: 'ledger',
                transactionId: transaction.id,
                branchId: transaction.branchDbName,
                productIds: failures.map(f => f.productId),
                error: failures.map(f => f.error.message).join('; '),
            });
        }

        return {
            updated: results.map(r => r.productId),
            failed: failures.map(f => f.productId),
            oversold: results.filter(r => r.oversold).map(r => r.productId),
        };
    }

    private async clearCart(customerId: string, hooks: CheckoutHooks, transactionId: string): Promise<boolean> {
        let cleared = true;

        if (hooks.clearSessionCart) {
            try {
                await hooks.clearSessionCart();
            } catch (error) {
                cleared = false;
                checkoutLogger.warn({ transactionId, customerId, error: errorMessage(error) }, 'Failed to clear session cart');
            }
        }

        try {
            await this.deps.carts.clear(customerId);
        } catch (error) {
            cleared = false;
            checkoutLogger.warn({ transactionId, customerId, error: errorMessage(error) }, 'Failed to delete cart backup');
        }

        return cleared;
    }

    private async park(input: RecordOutboxInput): Promise<void> {
        try {
            await this.deps.outbox.record(input);
        } catch (error) {
            checkoutLogger.error(
                { transactionId: input.transactionId, branchId: input.branchId, kind: input.kind, error: errorMessage(error) },
                'Failed to record sync outbox entry'
            );
        }
    }
}
