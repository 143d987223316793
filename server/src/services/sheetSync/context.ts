/**
 * Production wiring for the sync operations
 */

import {
    ANNOTATION_LINK_URI,
    SHEET_TIMEZONE_OFFSET_HOURS,
    SHIPMENT_SPREADSHEET_URL,
} from '../../config/sync/sheets.js';
import { createKysely } from '../../db/index.js';
import { KyselyShipmentRepository } from '../../db/queries/shipments.js';
import { KyselySyncRunStore, type SyncRunStore } from '../../db/queries/syncRuns.js';
import { createGoogleSheetSource } from '../googleSheetsClient.js';
import type { SheetSyncDeps } from './types.js';

/**
 * Dependencies backed by Postgres and the Sheets API.
 * @throws ConfigurationError when DATABASE_URL is missing
 */
export function createSheetSyncContext(overrides: Partial<SheetSyncDeps> = {}): SheetSyncDeps {
    return {
        repository: overrides.repository ?? new KyselyShipmentRepository(createKysely()),
        sheetSource: overrides.sheetSource ?? createGoogleSheetSource(),
        spreadsheetLocator: overrides.spreadsheetLocator !== undefined ? overrides.spreadsheetLocator : SHIPMENT_SPREADSHEET_URL,
        now: overrides.now ?? (() => new Date()),
        timezoneOffsetHours: overrides.timezoneOffsetHours ?? SHEET_TIMEZONE_OFFSET_HOURS,
        annotationLinkUri: overrides.annotationLinkUri ?? ANNOTATION_LINK_URI,
    };
}

export function createSyncRunStore(): SyncRunStore {
    return new KyselySyncRunStore(createKysely());
}
