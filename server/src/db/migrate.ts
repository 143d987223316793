/**
 * Kysely migrations, registered statically so they run from sources or dist alike
 */

import { Migrator, type Kysely, type Migration, type MigrationProvider, type MigrationResultSet } from 'kysely';
import * as createShipments from './migrations/001_create_shipments.js';
import * as createSheetSyncRuns from './migrations/002_create_sheet_sync_runs.js';
import { dbLogger } from '../utils/logger.js';
import { DatabaseError, toError } from '../utils/errors.js';
import type { DB } from './schema.js';

const MIGRATIONS: Record<string, Migration> = {
    '001_create_shipments': createShipments,
    '002_create_sheet_sync_runs': createSheetSyncRuns,
};

const provider: MigrationProvider = {
    getMigrations: async () => MIGRATIONS,
};

export function createMigrator(db: Kysely<DB>): Migrator {
    return new Migrator({ db, provider });
}

function report(resultSet: MigrationResultSet): void {
    for (const result of resultSet.results ?? []) {
        if (result.status === 'Success') {
            dbLogger.info({ migration: result.migrationName, direction: result.direction }, 'Migration applied');
        } else if (result.status === 'Error') {
            dbLogger.error({ migration: result.migrationName }, 'Migration failed');
        }
    }
    if (resultSet.error) {
        throw new DatabaseError('Migration failed', toError(resultSet.error));
    }
}

export async function migrateToLatest(db: Kysely<DB>): Promise<void> {
    report(await createMigrator(db).migrateToLatest());
}

export async function migrateDown(db: Kysely<DB>): Promise<void> {
    report(await createMigrator(db).migrateDown());
}
