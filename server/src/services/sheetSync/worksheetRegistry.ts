/**
 * Worksheet registry
 *
 * Process-wide title → numeric sheet id map, refreshed every time an
 * operation enumerates worksheets. Advisory only: operations resolve ids
 * from their own enumeration and never depend on this map.
 */

import type { WorksheetInfo } from './types.js';

const sheetIds = new Map<string, number>();
let refreshedAt: Date | null = null;

export function refreshWorksheetRegistry(worksheets: readonly WorksheetInfo[]): void {
    sheetIds.clear();
    for (const sheet of worksheets) {
        sheetIds.set(sheet.title, sheet.sheetId);
    }
    refreshedAt = new Date();
}

export function lookupSheetId(title: string): number | null {
    return sheetIds.get(title) ?? null;
}

export function getWorksheetRegistry(): { refreshedAt: Date | null; sheets: Record<string, number> } {
    return { refreshedAt, sheets: Object.fromEntries(sheetIds) };
}

export function clearWorksheetRegistry(): void {
    sheetIds.clear();
    refreshedAt = null;
}
