/**
 * Shipment Sheet Sync Configuration
 *
 * Worksheet profiles, styling and pacing for the sync engine that keeps the
 * shipments table and the shipment spreadsheet in agreement.
 *
 * TO CHANGE SYNC SETTINGS:
 * Update the values below. Changes take effect on the next operation.
 */

import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { env } from '../env.js';

const __dirname = fileURLToPath(new URL('.', import.meta.url));

// ============================================
// SPREADSHEET LOCATION & AUTH
// ============================================

/** URL or bare ID of the shipment spreadsheet (null when unconfigured) */
export const SHIPMENT_SPREADSHEET_URL: string | null = env.SHIPMENT_SPREADSHEET_URL ?? null;

/** Service account key file, resolved relative to the server package */
export const GOOGLE_SERVICE_ACCOUNT_PATH = resolve(__dirname, '../../..', env.GOOGLE_SERVICE_ACCOUNT_PATH);

export const SHEETS_API_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

// ============================================
// WORKSHEET PROFILES
// ============================================

/** Which worksheets take part in an operation, and where their data starts */
export interface SheetSourceProfile {
    name: 'shipments' | 'plan';
    filter:
        | { kind: 'exclude'; titles: readonly string[] }
        | { kind: 'prefix'; prefix: string };
    /** 1-based row holding the headers */
    headerRow: number;
    /** 1-based first data row */
    dataStartRow: number;
}

/** Shipment tabs: everything except the lookup tabs */
export const SHIPMENTS_PROFILE: SheetSourceProfile = {
    name: 'shipments',
    filter: { kind: 'exclude', titles: ['pm location & contact pic', 'other'] },
    headerRow: 1,
    dataStartRow: 2,
};

/** Plan tabs: "Plan MOS ..." with two banner rows above the headers */
export const PLAN_PROFILE: SheetSourceProfile = {
    name: 'plan',
    filter: { kind: 'prefix', prefix: 'Plan MOS' },
    headerRow: 3,
    dataStartRow: 4,
};

/** Worksheet that receives records with no known spreadsheet origin */
export const FALLBACK_SHEET_TITLE = 'unknown';

// ============================================
// CELL ANNOTATION & STYLING
// ============================================

/** Note attached to every cell the engine writes */
export const NOTE_TEXT = 'Modified by Shipment Sync';

export const DEFAULT_ANNOTATION_LINK_URI = 'https://example.com/shipment-sync';

/** Link attached to every touched or archived cell */
export const ANNOTATION_LINK_URI: string = env.SHEET_ANNOTATION_LINK_URI ?? DEFAULT_ANNOTATION_LINK_URI;

export const ANNOTATION_FONT_SIZE = 8;

/** Dimmed text colour of archived rows */
export const ARCHIVE_TEXT_COLOR = { red: 0.6, green: 0.6, blue: 0.6 } as const;

// ============================================
// ARCHIVE SWEEP
// ============================================

export const DEFAULT_ARCHIVE_THRESHOLD_DAYS = 7;

/** Max pending format requests per batchUpdate */
export const ARCHIVE_FLUSH_CHUNK = 90;

// ============================================
// TIMING & LIMITS
// ============================================

/** Fixed UTC offset for dates/timestamps written to or compared against the sheet */
export const SHEET_TIMEZONE_OFFSET_HOURS = env.SHEET_TIMEZONE_OFFSET_HOURS;

/** Minimum delay between Sheets API calls (300/min quota) */
export const API_CALL_DELAY_MS = 250;

/** Retries on 429/500/503 */
export const API_MAX_RETRIES = 3;

/** Rows per INSERT ... ON CONFLICT statement */
export const UPSERT_BATCH_SIZE = 500;

// ============================================
// SCHEDULED PULL SYNC
// ============================================

export const ENABLE_SHEET_PULL_SYNC = env.ENABLE_SHEET_PULL_SYNC === 'true';

export const SHEET_PULL_SYNC_INTERVAL_MS = env.SHEET_PULL_SYNC_INTERVAL_MINUTES * 60 * 1000;
