/**
 * Kysely Factory
 *
 * Creates and manages a singleton Kysely instance for the sync engine.
 */

import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';
import { env } from '../config/env.js';
import { ConfigurationError } from '../utils/errors.js';
import { dbLogger } from '../utils/logger.js';
import type { DB } from './schema.js';

let kyselyInstance: Kysely<DB> | null = null;

/**
 * Create or return the singleton Kysely instance
 *
 * @param connectionString - Defaults to DATABASE_URL
 * @throws ConfigurationError when no connection string is available
 */
export function createKysely(connectionString?: string): Kysely<DB> {
    if (kyselyInstance) return kyselyInstance;

    const url = connectionString || env.DATABASE_URL;
    if (!url) {
        throw new ConfigurationError('DATABASE_URL is not configured', 'DATABASE_URL');
    }

    const pool = new pg.Pool({
        connectionString: url,
        max: 10,
    });
    pool.on('error', err => dbLogger.error({ err }, 'Idle Postgres client error'));

    kyselyInstance = new Kysely<DB>({
        dialect: new PostgresDialect({ pool }),
    });

    return kyselyInstance;
}

/** Close the pool and forget the singleton */
export async function destroyKysely(): Promise<void> {
    if (!kyselyInstance) return;
    const instance = kyselyInstance;
    kyselyInstance = null;
    await instance.destroy();
}

export type { DB } from './schema.js';
