/**
 * In-process document store for tests and local runs
 */

import { NotFoundError } from '../../utils/errors.js';
import {
    toDocumentFields,
    type DocumentFields,
    type DocumentStore,
    type StoredDocument,
} from './types.js';

interface Entry {
    data: DocumentFields;
    version: number;
}

export class MemoryDocumentStore implements DocumentStore {
    private readonly collections = new Map<string, Map<string, Entry>>();

    async get(collection: string, id: string): Promise<StoredDocument | null> {
        const entry = this.collections.get(collection)?.get(id);
        return entry ? this.toStored(id, entry) : null;
    }

    async getMany(collection: string, ids: readonly string[]): Promise<Map<string, StoredDocument>> {
        const found = new Map<string, StoredDocument>();
        const docs = this.collections.get(collection);
        if (!docs) return found;
        for (const id of ids) {
            const entry = docs.get(id);
            if (entry) found.set(id, this.toStored(id, entry));
        }
        return found;
    }

    async set(collection: string, id: string, data: object): Promise<number> {
        const docs = this.collectionFor(collection);
        const version = (docs.get(id)?.version ?? 0) + 1;
        docs.set(id, { data: toDocumentFields(data), version });
        return version;
    }

    async patch(collection: string, id: string, fields: DocumentFields): Promise<number> {
        const docs = this.collections.get(collection);
        const entry = docs?.get(id);
        if (!docs || !entry) {
            throw new NotFoundError(`Document ${collection}/${id} not found`, collection, id);
        }
        const version = entry.version + 1;
        docs.set(id, { data: { ...entry.data, ...toDocumentFields(fields) }, version });
        return version;
    }

    async delete(collection: string, id: string): Promise<boolean> {
        return this.collections.get(collection)?.delete(id) ?? false;
    }

    async list(collection: string): Promise<StoredDocument[]> {
        const docs = this.collections.get(collection);
        if (!docs) return [];
        return Array.from(docs.entries())
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([id, entry]) => this.toStored(id, entry));
    }

    async where(collection: string, field: string, value: string | number | boolean): Promise<StoredDocument[]> {
        const all = await this.list(collection);
        return all.filter(doc => doc.data[field] === value);
    }

    async compareAndSet(collection: string, id: string, expectedVersion: number | null, data: object): Promise<boolean> {
        const docs = this.collectionFor(collection);
        const current = docs.get(id)?.version ?? null;
        if (current !== expectedVersion) return false;
        docs.set(id, { data: toDocumentFields(data), version: (current ?? 0) + 1 });
        return true;
    }

    async increment(collection: string, id: string, field: string, by = 1): Promise<number> {
        const docs = this.collectionFor(collection);
        const entry = docs.get(id);
        const previous = entry?.data[field];
        const next = (typeof previous === 'number' ? previous : 0) + by;
        docs.set(id, {
            data: { ...(entry?.data ?? {}), [field]: next },
            version: (entry?.version ?? 0) + 1,
        });
        return next;
    }

    /** Drop every collection */
    clear(): void {
        this.collections.clear();
    }

    private collectionFor(collection: string): Map<string, Entry> {
        let docs = this.collections.get(collection);
        if (!docs) {
            docs = new Map();
            this.collections.set(collection, docs);
        }
        return docs;
    }

    private toStored(id: string, entry: Entry): StoredDocument {
        return { id, data: toDocumentFields(entry.data), version: entry.version };
    }
}
