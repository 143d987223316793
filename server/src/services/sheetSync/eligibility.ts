/**
 * Which worksheets take part in an operation, and where their rows start
 */

import { normalizeHeader } from '@shipsync/shared/domain';
import {
    PLAN_PROFILE,
    type SheetSourceProfile,
} from '../../config/sync/sheets.js';
import { ConfigurationError } from '../../utils/errors.js';
import { refreshWorksheetRegistry } from './worksheetRegistry.js';
import type { SheetDocument, SheetSyncDeps, WorksheetInfo } from './types.js';

/** Title match against a profile, on normalized titles */
export function isEligibleTitle(title: string, profile: SheetSourceProfile): boolean {
    const normalized = normalizeHeader(title);
    const { filter } = profile;
    if (filter.kind === 'prefix') {
        return normalized.startsWith(normalizeHeader(filter.prefix));
    }
    return !filter.titles.some(excluded => normalizeHeader(excluded) === normalized);
}

/**
 * Header and first data row for one worksheet.
 * Plan tabs keep their banner offset even when a broader profile picks them up.
 */
export function resolveSheetRows(
    title: string,
    profile: SheetSourceProfile
): { headerRow: number; dataStartRow: number } {
    const rows = profile.filter.kind === 'exclude' && isEligibleTitle(title, PLAN_PROFILE)
        ? PLAN_PROFILE
        : profile;
    return { headerRow: rows.headerRow, dataStartRow: rows.dataStartRow };
}

/** Enumerate worksheets, refresh the registry, keep the eligible ones */
export async function listEligibleWorksheets(
    document: SheetDocument,
    profile: SheetSourceProfile
): Promise<{ all: WorksheetInfo[]; eligible: WorksheetInfo[] }> {
    const all = await document.listWorksheets();
    refreshWorksheetRegistry(all);
    return { all, eligible: all.filter(sheet => isEligibleTitle(sheet.title, profile)) };
}

/**
 * Open the configured spreadsheet.
 * @throws ConfigurationError before any remote call when no locator is configured
 */
export async function openSpreadsheet(deps: SheetSyncDeps): Promise<SheetDocument> {
    return deps.sheetSource.open(requireSpreadsheetLocator(deps));
}

export function requireSpreadsheetLocator(deps: SheetSyncDeps): string {
    const locator = deps.spreadsheetLocator?.trim();
    if (!locator) {
        throw new ConfigurationError('Shipment spreadsheet location is not configured', 'SHIPMENT_SPREADSHEET_URL');
    }
    return locator;
}

