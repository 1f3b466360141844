import { MemoryDocumentStore } from '../memoryStore.js';
import { NotFoundError } from '../../../utils/errors.js';

describe('MemoryDocumentStore', () => {
    let store: MemoryDocumentStore;

    beforeEach(() => {
        store = new MemoryDocumentStore();
    });

    describe('set / get', () => {
        it('returns null for a missing document', async () => {
            expect(await store.get('products', 'p1')).toBeNull();
        });

        it('starts versions at 1 and bumps them on every write', async () => {
            expect(await store.set('products', 'p1', { Name: 'Kettle' })).toBe(1);
            expect(await store.set('products', 'p1', { Name: 'Kettle 2L' })).toBe(2);
            expect(await store.get('products', 'p1')).toEqual({ id: 'p1', data: { Name: 'Kettle 2L' }, version: 2 });
        });

        it('hands out copies, not the stored object', async () => {
            await store.set('products', 'p1', { tags: ['a'] });
            const doc = await store.get('products', 'p1');
            const tags = doc?.data.tags;
            if (Array.isArray(tags)) tags.push('b');
            expect((await store.get('products', 'p1'))?.data).toEqual({ tags: ['a'] });
        });

        it('stores dates as ISO strings', async () => {
            await store.set('carts', 'c1', { updatedAt: new Date('2026-03-01T10:00:00Z') });
            expect((await store.get('carts', 'c1'))?.data.updatedAt).toBe('2026-03-01T10:00:00.000Z');
        });
    });

    it('getMany returns only the documents that exist', async () => {
        await store.set('products', 'p1', { n: 1 });
        await store.set('products', 'p3', { n: 3 });
        const found = await store.getMany('products', ['p1', 'p2', 'p3']);
        expect(Array.from(found.keys())).toEqual(['p1', 'p3']);
    });

    describe('patch', () => {
        it('merges fields into the document', async () => {
            await store.set('products', 'p1', { Name: 'Kettle', StockQuantity: 4 });
            expect(await store.patch('products', 'p1', { StockQuantity: 2 })).toBe(2);
            expect((await store.get('products', 'p1'))?.data).toEqual({ Name: 'Kettle', StockQuantity: 2 });
        });

        it('throws NotFoundError for a missing document', async () => {
            await expect(store.patch('products', 'nope', { a: 1 })).rejects.toBeInstanceOf(NotFoundError);
        });
    });

    it('delete reports whether anything was removed', async () => {
        await store.set('carts', 'c1', { lines: [] });
        expect(await store.delete('carts', 'c1')).toBe(true);
        expect(await store.delete('carts', 'c1')).toBe(false);
        expect(await store.delete('unknown', 'c1')).toBe(false);
    });

    it('list orders documents by id', async () => {
        await store.set('products', 'b', {});
        await store.set('products', 'a', {});
        await store.set('products', 'c', {});
        expect((await store.list('products')).map(d => d.id)).toEqual(['a', 'b', 'c']);
        expect(await store.list('empty')).toEqual([]);
    });

    it('where matches a top-level field exactly', async () => {
        await store.set('runs', 'r1', { status: 'running' });
        await store.set('runs', 'r2', { status: 'completed' });
        await store.set('runs', 'r3', { status: 'running' });
        expect((await store.where('runs', 'status', 'running')).map(d => d.id)).toEqual(['r1', 'r3']);
    });

    describe('compareAndSet', () => {
        it('creates a document only when none exists', async () => {
            expect(await store.compareAndSet('ledger', 'p1', null, { quantity: 5 })).toBe(true);
            expect(await store.compareAndSet('ledger', 'p1', null, { quantity: 9 })).toBe(false);
            expect((await store.get('ledger', 'p1'))?.data).toEqual({ quantity: 5 });
        });

        it('rejects a stale version', async () => {
            await store.set('ledger', 'p1', { quantity: 5 });
            await store.set('ledger', 'p1', { quantity: 4 });
            expect(await store.compareAndSet('ledger', 'p1', 1, { quantity: 3 })).toBe(false);
            expect(await store.compareAndSet('ledger', 'p1', 2, { quantity: 3 })).toBe(true);
            expect(await store.get('ledger', 'p1')).toEqual({ id: 'p1', data: { quantity: 3 }, version: 3 });
        });
    });

    describe('increment', () => {
        it('creates the counter on first use', async () => {
            expect(await store.increment('counters', 'orders', 'value')).toBe(1);
            expect(await store.increment('counters', 'orders', 'value')).toBe(2);
            expect(await store.increment('counters', 'orders', 'value', 10)).toBe(12);
        });

        it('keeps the other fields of the document', async () => {
            await store.set('counters', 'orders', { label: 'daily' });
            await store.increment('counters', 'orders', 'value');
            expect((await store.get('counters', 'orders'))?.data).toEqual({ label: 'daily', value: 1 });
        });
    });

    it('clear drops everything', async () => {
        await store.set('products', 'p1', {});
        store.clear();
        expect(await store.list('products')).toEqual([]);
    });
});
