/**
 * POS Mirror
 *
 * Writes online sales into the point-of-sale side's layout
 * (onlinesale/{branchId}/transaction/{id}). Each write goes through the
 * mirror circuit and a timeout; any failure surfaces as MirrorError.
 */

import { transactionToPos, type Transaction } from '@tillsync/shared';
import { posTransactionCollection } from '../config/index.js';
import type { DocumentStore } from '../lib/store/index.js';
import { MirrorError, toError } from '../utils/errors.js';
import { posLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { MirrorCircuit } from './mirrorCircuit.js';

export interface PosMirrorOptions {
    writeTimeoutMs: number;
}

export class PosMirror {
    constructor(
        private readonly store: DocumentStore,
        private readonly circuit: MirrorCircuit,
        private readonly options: PosMirrorOptions
    ) {}

    /** Writes are being refused until the circuit's cooldown ends */
    isPaused(): boolean {
        return this.circuit.isOpen();
    }

    async write(branchId: string, transaction: Transaction): Promise<void> {
        const doc = transactionToPos(transaction);
        const collection = posTransactionCollection(branchId);

        try {
            await this.circuit.run({ branchId, transactionId: transaction.id }, () =>
                withTimeout(
                    this.store.set(collection, transaction.id, doc),
                    this.options.writeTimeoutMs,
                    'POS mirror write'
                )
            );
        } catch (error) {
            const cause = toError(error);
            throw new MirrorError(`Failed to mirror order to POS: ${cause.message}`, branchId, transaction.id, cause);
        }

        posLogger.debug({ branchId, transactionId: transaction.id }, 'Order mirrored to POS');
    }
}
