/**
 * Kysely Factory
 *
 * Creates and manages a singleton Kysely instance over a pg pool.
 */

import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';
import type { DB } from './types.js';

let kyselyInstance: Kysely<DB> | null = null;

/**
 * Create or return the singleton Kysely instance
 */
export function createKysely(connectionString: string): Kysely<DB> {
    if (kyselyInstance) return kyselyInstance;

    const pool = new pg.Pool({
        connectionString,
        max: 10,
    });

    kyselyInstance = new Kysely<DB>({
        dialect: new PostgresDialect({ pool }),
    });

    return kyselyInstance;
}

/**
 * Close the pool and forget the instance
 */
export async function destroyKysely(): Promise<void> {
    if (!kyselyInstance) return;
    const instance = kyselyInstance;
    kyselyInstance = null;
    await instance.destroy();
}

export type KyselyDB = Kysely<DB>;
