/**
 * Table types for the Kysely client
 */

import type { ColumnType } from 'kysely';

/** JSONB column: read as parsed JSON, written as a JSON string */
type Json = ColumnType<Record<string, unknown>, string, string>;

export interface DocumentsTable {
    collection: string;
    id: string;
    data: Json;
    version: number;
    updated_at: ColumnType<Date, string | undefined, string>;
}

export interface DB {
    documents: DocumentsTable;
}
