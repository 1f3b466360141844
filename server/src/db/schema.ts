/**
 * Creates the documents table and its indexes when missing.
 * Run once at startup by the entry point.
 */

import { sql } from 'kysely';
import type { KyselyDB } from './createKysely.js';

export async function ensureDocumentsTable(db: KyselyDB): Promise<void> {
    await db.schema
        .createTable('documents')
        .ifNotExists()
        .addColumn('collection', 'text', col => col.notNull())
        .addColumn('id', 'text', col => col.notNull())
        .addColumn('data', 'jsonb', col => col.notNull().defaultTo(sql`'{}'::jsonb`))
        .addColumn('version', 'integer', col => col.notNull().defaultTo(1))
        .addColumn('updated_at', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
        .addPrimaryKeyConstraint('documents_pkey', ['collection', 'id'])
        .execute();

    await db.schema
        .createIndex('documents_data_gin')
        .ifNotExists()
        .on('documents')
        .using('gin')
        .column('data')
        .execute();
}
