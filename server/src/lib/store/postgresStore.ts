/**
 * PostgreSQL document store
 *
 * One `documents` table keyed by (collection, id) with a JSONB body and an
 * integer version bumped on every write.
 */

import { sql } from 'kysely';
import type { KyselyDB } from '../../db/createKysely.js';
import { NotFoundError } from '../../utils/errors.js';
import type { DocumentFields, DocumentStore, StoredDocument } from './types.js';

export class PostgresDocumentStore implements DocumentStore {
    constructor(private readonly db: KyselyDB) {}

    async get(collection: string, id: string): Promise<StoredDocument | null> {
        const row = await this.db
            .selectFrom('documents')
            .select(['id', 'data', 'version'])
            .where('collection', '=', collection)
            .where('id', '=', id)
            .executeTakeFirst();
        return row ?? null;
    }

    async getMany(collection: string, ids: readonly string[]): Promise<Map<string, StoredDocument>> {
        const found = new Map<string, StoredDocument>();
        if (ids.length === 0) return found;

        const rows = await this.db
            .selectFrom('documents')
            .select(['id', 'data', 'version'])
            .where('collection', '=', collection)
            .where('id', 'in', [...ids])
            .execute();
        for (const row of rows) found.set(row.id, row);
        return found;
    }

    async set(collection: string, id: string, data: object): Promise<number> {
        const row = await this.db
            .insertInto('documents')
            .values({ collection, id, data: JSON.stringify(data), version: 1 })
            .onConflict(oc => oc.columns(['collection', 'id']).doUpdateSet({
                data: sql<string>`excluded.data`,
                version: sql<number>`documents.version + 1`,
                updated_at: sql<string>`now()`,
            }))
            .returning('version')
            .executeTakeFirstOrThrow();
        return row.version;
    }

    async patch(collection: string, id: string, fields: DocumentFields): Promise<number> {
        const row = await this.db
            .updateTable('documents')
            .set({
                data: sql<string>`data || ${JSON.stringify(fields)}::jsonb`,
                version: sql<number>`version + 1`,
                updated_at: sql<string>`now()`,
            })
            .where('collection', '=', collection)
            .where('id', '=', id)
            .returning('version')
            .executeTakeFirst();

        if (!row) {
            throw new NotFoundError(`Document ${collection}/${id} not found`, collection, id);
        }
        return row.version;
    }

    async delete(collection: string, id: string): Promise<boolean> {
        const result = await this.db
            .deleteFrom('documents')
            .where('collection', '=', collection)
            .where('id', '=', id)
            .executeTakeFirst();
        return result.numDeletedRows > 0n;
    }

    async list(collection: string): Promise<StoredDocument[]> {
        return this.db
            .selectFrom('documents')
            .select(['id', 'data', 'version'])
            .where('collection', '=', collection)
            .orderBy('id')
            .execute();
    }

    async where(collection: string, field: string, value: string | number | boolean): Promise<StoredDocument[]> {
        return this.db
            .selectFrom('documents')
            .select(['id', 'data', 'version'])
            .where('collection', '=', collection)
            .where(sql<boolean>`data -> ${field} = ${JSON.stringify(value)}::jsonb`)
            .orderBy('id')
            .execute();
    }

    async compareAndSet(collection: string, id: string, expectedVersion: number | null, data: object): Promise<boolean> {
        const body = JSON.stringify(data);

        if (expectedVersion === null) {
            const inserted = await this.db
                .insertInto('documents')
                .values({ collection, id, data: body, version: 1 })
                .onConflict(oc => oc.columns(['collection', 'id']).doNothing())
                .returning('version')
                .executeTakeFirst();
            return inserted !== undefined;
        }

        const updated = await this.db
            .updateTable('documents')
            .set({
                data: body,
                version: expectedVersion + 1,
                updated_at: sql<string>`now()`,
            })
            .where('collection', '=', collection)
            .where('id', '=', id)
            .where('version', '=', expectedVersion)
            .returning('version')
            .executeTakeFirst();
        return updated !== undefined;
    }

    async increment(collection: string, id: string, field: string, by = 1): Promise<number> {
        const row = await this.db
            .insertInto('documents')
            .values({ collection, id, data: JSON.stringify({ [field]: by }), version: 1 })
            .onConflict(oc => oc.columns(['collection', 'id']).doUpdateSet({
                data: sql<string>`jsonb_set(
                    documents.data,
                    array[${field}]::text[],
                    to_jsonb(coalesce((documents.data ->> ${field})::numeric, 0) + ${by})
                )`,
                version: sql<number>`documents.version + 1`,
                updated_at: sql<string>`now()`,
            }))
            .returning(sql<string>`data ->> ${field}`.as('value'))
            .executeTakeFirstOrThrow();
        return Number(row.value);
    }
}
