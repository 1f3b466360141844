/**
 * Order Status Service
 *
 * Status transitions on persisted online orders, and manual re-mirroring
 * of an order to the POS.
 */

import {
    buildStatusTransitionError,
    isPosIntegrationEnabled,
    resolveStatusTransition,
    type OrderStatus,
    type Transaction,
} from '@tillsync/shared';
import { BusinessLogicError, NotFoundError } from '../utils/errors.js';
import { posLogger, errorMessage } from '../utils/logger.js';
import type { CatalogCache } from './catalogCache.js';
import type { MirrorOutcome } from './checkoutService.js';
import type { PosMirror } from './posMirror.js';
import type { SyncOutbox } from './syncOutbox.js';
import type { TransactionRepository } from './transactionRepository.js';

export interface StatusUpdateResult {
    transaction: Transaction;
    previousStatus: OrderStatus;
    changed: boolean;
    mirror: MirrorOutcome;
}

export interface OrderStatusServiceDeps {
    transactions: TransactionRepository;
    cache: CatalogCache;
    mirror: PosMirror;
    outbox: SyncOutbox;
    clock?: () => Date;
}

export class OrderStatusService {
    private readonly clock: () => Date;

    constructor(private readonly deps: OrderStatusServiceDeps) {
        this.clock = deps.clock ?? (() => new Date());
    }

    async getOrder(id: string): Promise<Transaction> {
        const transaction = await this.deps.transactions.get(id);
        if (!transaction) {
            throw new NotFoundError('Order not found', 'transaction', id);
        }
        return transaction;
    }

    /**
     * Move an order to `status`. Re-applying the current status changes
     * nothing. A changed order is re-mirrored when the branch mirrors to
     * the POS; a failed mirror goes to the outbox.
     */
    async updateOrderStatus(id: string, status: OrderStatus): Promise<StatusUpdateResult> {
        const current = await this.getOrder(id);
        const transition = resolveStatusTransition(current.orderStatus, status);

        if (!transition) {
            throw new BusinessLogicError(buildStatusTransitionError(current.orderStatus, status), 'status_transition');
        }
        if (!transition.changed) {
            return { transaction: current, previousStatus: current.orderStatus, changed: false, mirror: 'skipped' };
        }

        const stamp = this.clock().toISOString();
        const updated: Transaction = {
            ...current,
            orderStatus: status,
            fulfillmentStatus: transition.fulfillmentStatus,
            completionTime: status === 'Completed' ? stamp : current.completionTime,
            updatedAt: stamp,
        };
        await this.deps.transactions.save(updated);
        posLogger.info({ transactionId: id, from: current.orderStatus, to: status }, 'Order status changed');

        const mirror = await this.remirror(updated);
        return { transaction: updated, previousStatus: current.orderStatus, changed: true, mirror };
    }

    /**
     * Rewrite the POS copy of an order from the stored transaction.
     * Refused when the order's branch does not mirror to the POS.
     */
    async resyncToPos(id: string): Promise<Transaction> {
        const transaction = await this.getOrder(id);
        const settings = await this.deps.cache.getSettings();
        const branchId = transaction.branchDbName;

        if (!isPosIntegrationEnabled(settings, branchId)) {
            throw new BusinessLogicError(`POS integration is disabled for branch '${branchId}'`, 'pos_integration_disabled');
        }

        await this.deps.mirror.write(branchId, transaction);
        posLogger.info({ transactionId: id, branchId }, 'Order resynced to POS');
        return transaction;
    }

    private async remirror(transaction: Transaction): Promise<MirrorOutcome> {
        const settings = await this.deps.cache.getSettings();
        const branchId = transaction.branchDbName;
        if (!isPosIntegrationEnabled(settings, branchId)) return 'skipped';

        try {
            await this.deps.mirror.write(branchId, transaction);
            return 'written';
        } catch (error) {
            posLogger.error(
                { transactionId: transaction.id, branchId, error: errorMessage(error) },
                'POS re-mirror after status change failed, queued for reconciliation'
            );
            try {
                await this.deps.outbox.record({ kind: 'mirror', transactionId: transaction.id, branchId, error: errorMessage(error) });
            } catch (outboxError) {
                posLogger.error(
                    { transactionId: transaction.id, branchId, error: errorMessage(outboxError) },
                    'Failed to record sync outbox entry'
                );
            }
            return 'failed';
        }
    }
}
