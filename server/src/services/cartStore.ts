/**
 * Durable cart backup (carts/{customerId})
 *
 * The live cart sits in the web layer's session; this copy lets a customer
 * pick it up again on another visit. Checkout deletes it.
 */

import { z } from 'zod';
import { CartLineSchema, type CartLine } from '@tillsync/shared';
import { COLLECTIONS } from '../config/index.js';
import type { DocumentStore } from '../lib/store/index.js';

const StoredCartSchema = z.object({
    lines: z.array(CartLineSchema),
    updatedAt: z.string(),
});

export type StoredCart = z.infer<typeof StoredCartSchema>;

export class CartStore {
    constructor(private readonly store: DocumentStore) {}

    /** Saved lines, or an empty list when there is no backup */
    async get(customerId: string): Promise<CartLine[]> {
        const doc = await this.store.get(COLLECTIONS.carts, customerId);
        if (!doc) return [];
        const parsed = StoredCartSchema.safeParse(doc.data);
        return parsed.success ? parsed.data.lines : [];
    }

    async save(customerId: string, lines: readonly CartLine[], now: Date = new Date()): Promise<void> {
        const cart: StoredCart = { lines: [...lines], updatedAt: now.toISOString() };
        await this.store.set(COLLECTIONS.carts, customerId, cart);
    }

    /** Returns whether a backup existed */
    async clear(customerId: string): Promise<boolean> {
        return this.store.delete(COLLECTIONS.carts, customerId);
    }
}
