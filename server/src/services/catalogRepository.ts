/**
 * Catalog Repository
 *
 * Reads POS-owned product documents through the translator and writes
 * back the one field the storefront owns: the stock figure.
 */

import { ZodError, z } from 'zod';
import { productFromPos, snapshotProduct, type Product } from '@tillsync/shared';
import { CATALOG_MARKER, COLLECTIONS } from '../config/index.js';
import type { DocumentStore } from '../lib/store/index.js';
import { cacheLogger } from '../utils/logger.js';

const MarkerSchema = z.object({
    [CATALOG_MARKER.field]: z.union([z.string(), z.number()]),
});

function readProduct(id: string, data: unknown): Product | null {
    try {
        return productFromPos(data, id);
    } catch (error) {
        if (!(error instanceof ZodError)) throw error;
        cacheLogger.warn({ productId: id, issues: error.issues.length }, 'Skipping unreadable product document');
        return null;
    }
}

export class CatalogRepository {
    constructor(private readonly store: DocumentStore) {}

    /**
     * Every readable product in the catalog. Documents that do not parse
     * are skipped with a warning so one bad edit cannot empty the shop.
     */
    async listProducts(): Promise<Product[]> {
        const docs = await this.store.list(COLLECTIONS.products);
        const products: Product[] = [];

        for (const doc of docs) {
            const product = readProduct(doc.id, doc.data);
            if (product) products.push(snapshotProduct(product));
        }

        return products;
    }

    /** Live products for the given ids; missing or unreadable ids are absent from the map */
    async getProducts(ids: readonly string[]): Promise<Map<string, Product>> {
        const docs = await this.store.getMany(COLLECTIONS.products, [...new Set(ids)]);
        const products = new Map<string, Product>();

        for (const [id, doc] of docs) {
            const product = readProduct(id, doc.data);
            if (product) products.set(id, product);
        }

        return products;
    }

    async setStockQuantity(productId: string, quantity: number): Promise<void> {
        await this.store.patch(COLLECTIONS.products, productId, { StockQuantity: Math.max(0, quantity) });
    }

    /**
     * Current upstream catalog marker, or null when the marker document is
     * missing or its timestamp cannot be read.
     */
    async readMarker(): Promise<Date | null> {
        const doc = await this.store.get(CATALOG_MARKER.collection, CATALOG_MARKER.id);
        if (!doc) return null;

        const parsed = MarkerSchema.safeParse(doc.data);
        if (!parsed.success) return null;

        const marker = new Date(parsed.data[CATALOG_MARKER.field]);
        return Number.isNaN(marker.getTime()) ? null : marker;
    }
}
