/**
 * Checkout pipeline tests against the in-memory document store
 */

import { MISSING_PRODUCT_MESSAGE } from '@tillsync/shared';
import { COLLECTIONS } from '../../config/index.js';
import { MemoryDocumentStore } from '../../lib/store/index.js';
import { PersistenceError, StockInsufficientError, ValidationError } from '../../utils/errors.js';
import { checkoutRequest, seedProduct, seedSettings, testContainer } from './helpers.js';

/** Memory store whose chosen operations fail */
class FlakyStore extends MemoryDocumentStore {
    failIncrement = false;
    failMirrorWrites = false;
    failLedgerWrites = false;

    override async increment(collection: string, id: string, field: string, by?: number): Promise<number> {
        if (this.failIncrement) throw new Error('counter unavailable');
        return super.increment(collection, id, field, by);
    }

    override async set(collection: string, id: string, data: object): Promise<number> {
        if (this.failMirrorWrites && collection.startsWith('onlinesale/')) throw new Error('pos offline');
        return super.set(collection, id, data);
    }

    override async compareAndSet(collection: string, id: string, expectedVersion: number | null, data: object): Promise<boolean> {
        if (this.failLedgerWrites && collection === COLLECTIONS.stockItems) throw new Error('ledger offline');
        return super.compareAndSet(collection, id, expectedVersion, data);
    }
}

describe('CheckoutService', () => {
    let store: FlakyStore;

    beforeEach(async () => {
        store = new FlakyStore();
        await seedProduct(store, { id: 'soap', name: 'Soap', price: 25, stockQuantity: 10 });
        await seedProduct(store, { id: 'kettle', name: 'Kettle', price: 300, stockQuantity: 2 });
    });

    describe('successful checkout', () => {
        it('persists the order and runs every stage', async () => {
            const { checkout, transactions } = testContainer(store);

            const result = await checkout.checkout(checkoutRequest([
                { productId: 'soap', quantity: 2 },
                { productId: 'kettle', quantity: 1 },
            ]));

            expect(result.transactionId).toBe('order_20260301_0001');
            expect(result.stages).toEqual([
                'Validating', 'StockChecked', 'Priced', 'Persisted', 'Mirrored', 'LedgerUpdated', 'Cleared',
            ]);
            expect(result.transaction.grandTotal).toBe(350);
            expect(result.transaction.branchDbName).toBe('default_branch');
            expect(result.transaction.stockMovements.map(m => [m.productId, m.quantity])).toEqual([['soap', 2], ['kettle', 1]]);

            const saved = await transactions.get('order_20260301_0001');
            expect(saved?.grandTotal).toBe(350);
            expect(saved?.orderStatus).toBe('New');
        });

        it('hands out sequential ids within a day', async () => {
            const { checkout } = testContainer(store);
            const first = await checkout.checkout(checkoutRequest([{ productId: 'soap', quantity: 1 }]));
            const second = await checkout.checkout(checkoutRequest([{ productId: 'soap', quantity: 1 }]));
            expect([first.transactionId, second.transactionId]).toEqual(['order_20260301_0001', 'order_20260301_0002']);
        });

        it('quotes the delivery fee without adding it to the order', async () => {
            const { checkout } = testContainer(store);
            const result = await checkout.checkout(checkoutRequest([{ productId: 'soap', quantity: 2 }]));

            expect(result.transaction.grandTotal).toBe(50);
            expect(result.deliveryFee).toBe(50);
            expect(result.totalWithDelivery).toBe(100);
        });

        it('charges no delivery for pickup', async () => {
            const { checkout } = testContainer(store);
            const result = await checkout.checkout(checkoutRequest(
                [{ productId: 'soap', quantity: 2 }],
                { deliveryOption: 'pickup', deliveryAddress: '' }
            ));

            expect(result.deliveryFee).toBe(0);
            expect(result.transaction.deliveryType).toBe('Pickup');
            expect(result.transaction.deliveryAddress).toBe('Pickup from store');
        });

        it('updates the stock ledger and the catalog stock figure', async () => {
            const { checkout, ledger, catalog } = testContainer(store);
            const result = await checkout.checkout(checkoutRequest([
                { productId: 'soap', quantity: 2 },
                { productId: 'kettle', quantity: 1 },
            ]));

            expect(result.ledger).toEqual({ updated: ['soap', 'kettle'], failed: [], oversold: [] });
            expect((await ledger.get('soap'))?.quantity).toBe(8);
            expect((await ledger.get('kettle'))?.quantity).toBe(1);

            const products = await catalog.getProducts(['soap', 'kettle']);
            expect(products.get('soap')?.stockQuantity).toBe(8);
            expect(products.get('kettle')?.stockQuantity).toBe(1);
        });

        it('takes every line of a repeated product off the ledger', async () => {
            const { checkout, ledger, catalog } = testContainer(store);
            const result = await checkout.checkout(checkoutRequest([
                { productId: 'soap', quantity: 2 },
                { productId: 'soap', quantity: 3 },
            ]));

            expect(result.transaction.grandTotal).toBe(125);
            expect(result.ledger).toEqual({ updated: ['soap'], failed: [], oversold: [] });
            const item = await ledger.get('soap');
            expect(item?.quantity).toBe(5);
            expect(item?.outgoing.map(m => m.quantity)).toEqual([2, 3]);
            expect((await catalog.getProducts(['soap'])).get('soap')?.stockQuantity).toBe(5);
        });

        it('builds the confirmation message and leaves the link out without a business phone', async () => {
            const { checkout } = testContainer(store);
            const result = await checkout.checkout(checkoutRequest([{ productId: 'soap', quantity: 2 }]));

            expect(result.orderMessage).toContain('• Soap × 2 @ R25.00 = R50.00');
            expect(result.whatsAppUrl).toBeNull();
        });

        it('links the message to the business phone when one is set', async () => {
            await seedSettings(store, { phone: '+27 82 000 0000' });
            const { checkout } = testContainer(store);
            const result = await checkout.checkout(checkoutRequest([{ productId: 'soap', quantity: 1 }]));

            expect(result.whatsAppUrl).toBe(`https://wa.me/27820000000?text=${encodeURIComponent(result.orderMessage)}`);
        });
    });

    describe('aborts before anything is written', () => {
        it('rejects an invalid request with every field error', async () => {
            const { checkout } = testContainer(store);

            const error = await checkout.checkout(checkoutRequest([])).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ValidationError);
            if (!(error instanceof ValidationError)) return;
            expect(error.details).toEqual([{ path: 'lines', message: 'Your cart is empty' }]);
            expect(await store.list(COLLECTIONS.transactions)).toEqual([]);
        });

        it('rejects a cart that exceeds live stock', async () => {
            const { checkout } = testContainer(store);

            const error = await checkout.checkout(checkoutRequest([{ productId: 'kettle', quantity: 3 }])).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(StockInsufficientError);
            if (!(error instanceof StockInsufficientError)) return;
            expect(error.message).toBe('Stock issues: Kettle — Available: 2, Requested: 3');
            expect(error.shortfalls).toEqual([
                { kind: 'shortfall', productId: 'kettle', productName: 'Kettle', available: 2, requested: 3 },
            ]);
            expect(await store.list(COLLECTIONS.transactions)).toEqual([]);
            expect(await store.list(COLLECTIONS.counters)).toEqual([]);
        });

        it('sums repeated lines of one product before checking stock', async () => {
            const { checkout } = testContainer(store);
            await expect(checkout.checkout(checkoutRequest([
                { productId: 'kettle', quantity: 1 },
                { productId: 'kettle', quantity: 2 },
            ]))).rejects.toBeInstanceOf(StockInsufficientError);
        });

        it('rejects a missing product even with stock validation off', async () => {
            await seedSettings(store, { enableStockValidation: false });
            const { checkout } = testContainer(store);

            await expect(checkout.checkout(checkoutRequest([{ productId: 'ghost', quantity: 1 }])))
                .rejects.toThrow(`Stock issues: ${MISSING_PRODUCT_MESSAGE}`);
        });

        it('turns a failed save into a PersistenceError', async () => {
            store.failIncrement = true;
            const { checkout } = testContainer(store);

            const error = await checkout.checkout(checkoutRequest([{ productId: 'soap', quantity: 1 }])).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(PersistenceError);
            if (!(error instanceof PersistenceError)) return;
            expect(error.message).toBe('Your order could not be saved. Please try again.');
            expect(error.originalError?.message).toBe('counter unavailable');
            expect(await store.list(COLLECTIONS.transactions)).toEqual([]);
            expect(await store.list(COLLECTIONS.stockItems)).toEqual([]);
        });
    });

    describe('stock validation off', () => {
        it('lets an oversell through and reports it', async () => {
            await seedSettings(store, { enableStockValidation: false });
            const { checkout, ledger } = testContainer(store);

            const result = await checkout.checkout(checkoutRequest([{ productId: 'kettle', quantity: 3 }]));

            expect(result.ledger.oversold).toEqual(['kettle']);
            expect((await ledger.get('kettle'))?.quantity).toBe(0);
        });
    });

    describe('POS mirror', () => {
        it('skips the mirror when integration is off', async () => {
            const { checkout } = testContainer(store);
            const result = await checkout.checkout(checkoutRequest([{ productId: 'soap', quantity: 1 }]));

            expect(result.mirror).toBe('skipped');
            expect(await store.list('onlinesale/default_branch/transaction')).toEqual([]);
        });

        it('writes the order to the branch collection when integration is on', async () => {
            await seedSettings(store, { posIntegrationEnabled: true, branchId: 'maputo' });
            const { checkout } = testContainer(store);

            const result = await checkout.checkout(checkoutRequest([{ productId: 'soap', quantity: 1 }]));

            expect(result.mirror).toBe('written');
            const mirrored = await store.get('onlinesale/maputo/transaction', result.transactionId);
            expect(mirrored?.data.ID).toBe(result.transactionId);
        });

        it('follows the per-branch override', async () => {
            await seedSettings(store, { posIntegrationEnabled: true, BranchOnlineSaleToSystem: { default_branch: false } });
            const { checkout } = testContainer(store);

            const result = await checkout.checkout(checkoutRequest([{ productId: 'soap', quantity: 1 }]));
            expect(result.mirror).toBe('skipped');
        });

        it('keeps the order and parks a failed mirror in the outbox', async () => {
            await seedSettings(store, { posIntegrationEnabled: true });
            store.failMirrorWrites = true;
            const { checkout, outbox, transactions } = testContainer(store);

            const result = await checkout.checkout(checkoutRequest([{ productId: 'soap', quantity: 1 }]));

            expect(result.mirror).toBe('failed');
            expect(result.stages).toContain('Cleared');
            expect(await transactions.get(result.transactionId)).not.toBeNull();

            const entry = await outbox.get(`mirror_${result.transactionId}`);
            expect(entry).toMatchObject({
                kind: 'mirror',
                transactionId: result.transactionId,
                branchId: 'default_branch',
                status: 'pending',
                attempts: 0,
                lastError: 'Failed to mirror order to POS: pos offline',
            });
        });
    });

    describe('stock ledger failures', () => {
        it('parks failed products in the outbox and still succeeds', async () => {
            store.failLedgerWrites = true;
            const { checkout, outbox } = testContainer(store);

            const result = await checkout.checkout(checkoutRequest([
                { productId: 'soap', quantity: 1 },
                { productId: 'kettle', quantity: 1 },
            ]));

            expect(result.ledger).toEqual({ updated: [], failed: ['soap', 'kettle'], oversold: [] });
            const entry = await outbox.get(`ledger_${result.transactionId}`);
            expect(entry?.productIds).toEqual(['soap', 'kettle']);
            expect(entry?.status).toBe('pending');
        });
    });

    describe('cart clearing', () => {
        it('deletes the durable cart backup and runs the session hook', async () => {
            const { checkout, carts } = testContainer(store);
            await carts.save('rui@example.com', [{ productId: 'soap', quantity: 1 }]);
            const clearSessionCart = vi.fn();

            const result = await checkout.checkout(checkoutRequest([{ productId: 'soap', quantity: 1 }]), { clearSessionCart });

            expect(result.cartCleared).toBe(true);
            expect(clearSessionCart).toHaveBeenCalledTimes(1);
            expect(await carts.get('rui@example.com')).toEqual([]);
        });

        it('reports a failed session clear without failing the checkout', async () => {
            const { checkout } = testContainer(store);

            const result = await checkout.checkout(checkoutRequest([{ productId: 'soap', quantity: 1 }]), {
                clearSessionCart: () => {
                    throw new Error('session gone');
                },
            });

            expect(result.cartCleared).toBe(false);
            expect(result.transactionId).toBe('order_20260301_0001');
        });
    });
});
