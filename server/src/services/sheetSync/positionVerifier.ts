/**
 * Position cache verification
 *
 * A cached pointer is only trusted after the identity cell at its row
 * still holds the record's shipment number. Every failure mode (no pointer,
 * worksheet gone, header moved, read error, mismatch) comes back as
 * needs-relocation rather than an exception.
 */

import { IDENTITY_FIELD, columnOf, identitiesMatch } from '@shipsync/shared/domain';
import { errorMessage } from '../../utils/errors.js';
import { sheetsLogger } from '../../utils/logger.js';
import type { HeaderCache } from './headerCache.js';
import type { PositionPointer, SheetDocument } from './types.js';

const log = sheetsLogger.child({ service: 'positionVerifier' });

export type VerificationResult =
    | { status: 'verified' }
    | { status: 'needs-relocation'; reason: string };

export interface CachedPosition {
    sheetTitle: string | null;
    sheetRow: number | null;
}

/** Pointer fields as a usable position, or null when incomplete */
export function cachedPosition(record: CachedPosition): Pick<PositionPointer, 'sheetTitle' | 'sheetRow'> | null {
    if (!record.sheetTitle || record.sheetRow === null || record.sheetRow < 1) return null;
    return { sheetTitle: record.sheetTitle, sheetRow: record.sheetRow };
}

export async function verifyPosition(
    document: SheetDocument,
    headers: HeaderCache,
    knownTitles: ReadonlySet<string>,
    shipmentNo: string,
    position: CachedPosition
): Promise<VerificationResult> {
    const cached = cachedPosition(position);
    if (!cached) {
        return { status: 'needs-relocation', reason: 'no cached position' };
    }
    if (!knownTitles.has(cached.sheetTitle)) {
        return { status: 'needs-relocation', reason: `worksheet "${cached.sheetTitle}" not found` };
    }

    try {
        const layout = await headers.layout(cached.sheetTitle);
        const identityColumn = columnOf(layout, IDENTITY_FIELD);
        if (identityColumn === null) {
            return { status: 'needs-relocation', reason: `worksheet "${cached.sheetTitle}" has no shipment number column` };
        }

        const value = await document.worksheet(cached.sheetTitle).readCell(cached.sheetRow, identityColumn + 1);
        if (!identitiesMatch(value, shipmentNo)) {
            log.info({ shipmentNo, ...cached, found: value }, 'Cached position drifted');
            return { status: 'needs-relocation', reason: 'identity mismatch at cached position' };
        }
        return { status: 'verified' };
    } catch (error: unknown) {
        log.warn({ shipmentNo, ...cached, error: errorMessage(error) }, 'Failed to verify cached position');
        return { status: 'needs-relocation', reason: `verification read failed: ${errorMessage(error)}` };
    }
}
