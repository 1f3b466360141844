import { CATALOG_MARKER, COLLECTIONS } from '../../config/index.js';
import { MemoryDocumentStore } from '../../lib/store/index.js';
import { CatalogRepository } from '../catalogRepository.js';
import { seedProduct } from './helpers.js';

describe('CatalogRepository', () => {
    let store: MemoryDocumentStore;
    let catalog: CatalogRepository;

    beforeEach(async () => {
        store = new MemoryDocumentStore();
        catalog = new CatalogRepository(store);
        await seedProduct(store, { id: 'soap', name: 'Soap', price: 25, stockQuantity: 10 });
        await seedProduct(store, { id: 'kettle', name: 'Kettle', price: 300, stockQuantity: 2 });
    });

    it('lists every readable product as a frozen snapshot', async () => {
        const products = await catalog.listProducts();
        expect(products.map(p => p.id)).toEqual(['kettle', 'soap']);
        expect(Object.isFrozen(products[0])).toBe(true);
    });

    it('skips documents that do not parse', async () => {
        await store.set(COLLECTIONS.products, 'broken', { Name: 'Broken', Price: 'twelve' });
        const products = await catalog.listProducts();
        expect(products.map(p => p.id)).toEqual(['kettle', 'soap']);
    });

    it('reads products by id, leaving out unknown ones', async () => {
        const products = await catalog.getProducts(['soap', 'ghost', 'soap']);
        expect(Array.from(products.keys())).toEqual(['soap']);
        expect(products.get('soap')?.stockQuantity).toBe(10);
    });

    it('writes the stock figure back, never below zero', async () => {
        await catalog.setStockQuantity('soap', 4);
        expect((await store.get(COLLECTIONS.products, 'soap'))?.data.StockQuantity).toBe(4);

        await catalog.setStockQuantity('soap', -3);
        expect((await store.get(COLLECTIONS.products, 'soap'))?.data.StockQuantity).toBe(0);
    });

    describe('readMarker', () => {
        it('returns null without a marker document', async () => {
            expect(await catalog.readMarker()).toBeNull();
        });

        it('reads an ISO timestamp', async () => {
            await store.set(CATALOG_MARKER.collection, CATALOG_MARKER.id, { timestamp: '2026-03-01T10:00:00Z' });
            expect(await catalog.readMarker()).toEqual(new Date('2026-03-01T10:00:00Z'));
        });

        it('reads epoch milliseconds', async () => {
            const ms = Date.UTC(2026, 2, 1, 10, 0, 0);
            await store.set(CATALOG_MARKER.collection, CATALOG_MARKER.id, { timestamp: ms });
            expect(await catalog.readMarker()).toEqual(new Date(ms));
        });

        it('returns null for an unreadable timestamp', async () => {
            await store.set(CATALOG_MARKER.collection, CATALOG_MARKER.id, { timestamp: 'yesterday-ish' });
            expect(await catalog.readMarker()).toBeNull();
        });
    });
});
