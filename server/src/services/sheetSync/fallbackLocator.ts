/**
 * Fallback locator: full scan of the identity column of every eligible
 * worksheet. Only runs when a cached position is missing or drifted.
 */

import { IDENTITY_FIELD, columnOf, identitiesMatch } from '@shipsync/shared/domain';
import { toError } from '../../utils/errors.js';
import { sheetsLogger } from '../../utils/logger.js';
import type { HeaderCache } from './headerCache.js';
import type { SheetDocument, WorksheetInfo } from './types.js';

const log = sheetsLogger.child({ service: 'fallbackLocator' });

export interface IdentityMatch {
    sheetTitle: string;
    /** 1-based */
    row: number;
    /** 1-based identity column */
    column: number;
}

/**
 * Every row holding the shipment number, in enumeration order
 * (worksheet order, then row order). Unreadable worksheets are skipped.
 */
export async function locateIdentity(
    document: SheetDocument,
    worksheets: readonly WorksheetInfo[],
    headers: HeaderCache,
    shipmentNo: string
): Promise<IdentityMatch[]> {
    const matches: IdentityMatch[] = [];

    for (const sheet of worksheets) {
        try {
            const layout = await headers.layout(sheet.title);
            const identityIndex = columnOf(layout, IDENTITY_FIELD);
            if (identityIndex === null) continue;

            const column = identityIndex + 1;
            const { dataStartRow } = headers.rowsFor(sheet.title);
            const values = await document.worksheet(sheet.title).readColumn(column);

            values.forEach((value, index) => {
                const row = index + 1;
                if (row >= dataStartRow && identitiesMatch(value, shipmentNo)) {
                    matches.push({ sheetTitle: sheet.title, row, column });
                }
            });
        } catch (error: unknown) {
            log.warn({ sheet: sheet.title, shipmentNo, err: toError(error) }, 'Failed to scan worksheet, skipping');
        }
    }

    log.debug({ shipmentNo, matches: matches.length }, 'Fallback scan finished');
    return matches;
}

/** Relocation policy used everywhere: the most recently read match wins */
export function pickRelocationMatch(matches: readonly IdentityMatch[]): IdentityMatch | null {
    return matches.length > 0 ? matches[matches.length - 1] : null;
}
