/**
 * Document store contract
 *
 * Collections hold JSON documents addressed by (collection, id). Every
 * write bumps the document's version, which `compareAndSet` checks.
 * Collection names may contain slashes (`onlinesale/{branch}/transaction`).
 */

export type DocumentFields = Record<string, unknown>;

export interface StoredDocument {
    id: string;
    /** Parsed JSON; callers validate it against their own schema */
    data: DocumentFields;
    version: number;
}

export interface DocumentStore {
    get(collection: string, id: string): Promise<StoredDocument | null>;

    /** Documents that exist among `ids`, keyed by id */
    getMany(collection: string, ids: readonly string[]): Promise<Map<string, StoredDocument>>;

    /** Create or replace. Returns the new version */
    set(collection: string, id: string, data: object): Promise<number>;

    /**
     * Shallow-merge top-level fields into an existing document.
     * Rejects with NotFoundError when the document does not exist.
     */
    patch(collection: string, id: string, fields: DocumentFields): Promise<number>;

    /** Returns whether a document was removed */
    delete(collection: string, id: string): Promise<boolean>;

    /** Every document in a collection, ordered by id */
    list(collection: string): Promise<StoredDocument[]>;

    /** Documents whose top-level `field` equals `value`, ordered by id */
    where(collection: string, field: string, value: string | number | boolean): Promise<StoredDocument[]>;

    /**
     * Write only if the stored version still equals `expectedVersion`.
     * `null` means the document must not exist yet.
     */
    compareAndSet(collection: string, id: string, expectedVersion: number | null, data: object): Promise<boolean>;

    /**
     * Atomically add `by` to a numeric field, creating the document when
     * missing. Returns the new value.
     */
    increment(collection: string, id: string, field: string, by?: number): Promise<number>;
}

export function isDocumentFields(value: unknown): value is DocumentFields {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON round-trip, the same normalization a JSONB column applies
 * (undefined fields dropped, dates to strings).
 */
export function toDocumentFields(data: object): DocumentFields {
    const copy: unknown = JSON.parse(JSON.stringify(data));
    if (!isDocumentFields(copy)) {
        throw new TypeError('Document data must be a JSON object');
    }
    return copy;
}
