/**
 * Write-back batcher
 *
 * Resolves each record's position once (cached pointer verified, else the
 * fallback scan), turns every field write into a value + note + style cell
 * request, and submits them all in one batch. When the batch call fails the
 * same cells are written one by one, each failure isolated to its cell.
 */

import {
    ARRIVAL_STATUSES,
    DEPARTURE_STATUSES,
    IDENTITY_FIELD,
    columnOf,
    formatStatusTimestamp,
    normalizeStatus,
    rowColToA1,
    type ShipmentBusinessField,
} from '@shipsync/shared/domain';
import { ANNOTATION_FONT_SIZE, NOTE_TEXT } from '../../config/sync/sheets.js';
import { errorMessage } from '../../utils/errors.js';
import { sheetsLogger } from '../../utils/logger.js';
import { locateIdentity, pickRelocationMatch } from './fallbackLocator.js';
import type { HeaderCache } from './headerCache.js';
import { verifyPosition, type CachedPosition } from './positionVerifier.js';
import type {
    FieldWriteResult,
    PositionPointer,
    RepeatCellRequest,
    SheetDocument,
    TextStyle,
    WorksheetInfo,
} from './types.js';

const log = sheetsLogger.child({ service: 'writeBackBatcher' });

// ============================================
// TYPES
// ============================================

export interface CellWrite {
    field: ShipmentBusinessField;
    value: string | null;
    /** Added because of another write (ata/atd stamps) */
    derived?: boolean;
}

export interface RecordWriteTarget extends CachedPosition {
    shipmentNo: string;
    writes: readonly CellWrite[];
}

export type PositionResolution =
    | { status: 'verified'; pointer: PositionPointer }
    | { status: 'relocated'; pointer: PositionPointer; reason: string }
    | { status: 'not-found'; reason: string };

export interface RecordWriteOutcome {
    shipmentNo: string;
    position: PositionResolution;
    fieldResults: FieldWriteResult[];
}

export interface WriteBatchContext {
    document: SheetDocument;
    /** Worksheets eligible for lookup, from this operation's enumeration */
    worksheets: readonly WorksheetInfo[];
    headers: HeaderCache;
    annotationLinkUri: string;
}

export interface WriteBatchResult {
    records: RecordWriteOutcome[];
    /** True when the single batch call succeeded */
    batchApplied: boolean;
    batchError: string | null;
}

interface PendingCell {
    result: FieldWriteResult;
    sheetTitle: string;
    row: number;
    column: number;
    request: RepeatCellRequest;
}

// ============================================
// DERIVED WRITES
// ============================================

/**
 * Add the ATA/ATD stamp a status delivery value implies.
 * An explicit write to the same column takes precedence.
 */
export function withDerivedWrites(
    writes: readonly CellWrite[],
    now: Date,
    timezoneOffsetHours: number
): CellWrite[] {
    const result = [...writes];
    const explicit = new Set(writes.map(write => write.field));
    const statusWrite = writes.find(write => write.field === 'statusDelivery' && write.value);
    if (!statusWrite) return result;

    const status = normalizeStatus(statusWrite.value);
    const stamp = formatStatusTimestamp(now, timezoneOffsetHours);
    if (ARRIVAL_STATUSES.has(status) && !explicit.has('ata')) {
        result.push({ field: 'ata', value: stamp, derived: true });
    }
    if (DEPARTURE_STATUSES.has(status) && !explicit.has('atd')) {
        result.push({ field: 'atd', value: stamp, derived: true });
    }
    return result;
}

// ============================================
// POSITION RESOLUTION
// ============================================

export async function resolvePosition(
    context: WriteBatchContext,
    target: CachedPosition & { shipmentNo: string }
): Promise<PositionResolution> {
    const { document, worksheets, headers } = context;
    const knownTitles = new Set(worksheets.map(sheet => sheet.title));

    const verification = await verifyPosition(document, headers, knownTitles, target.shipmentNo, target);
    if (verification.status === 'verified' && target.sheetTitle && target.sheetRow !== null) {
        const layout = await headers.layout(target.sheetTitle);
        const identityColumn = columnOf(layout, IDENTITY_FIELD) ?? 0;
        return {
            status: 'verified',
            pointer: {
                sheetTitle: target.sheetTitle,
                sheetRow: target.sheetRow,
                sheetCell: rowColToA1(target.sheetRow, identityColumn + 1),
            },
        };
    }

    const reason = verification.status === 'needs-relocation' ? verification.reason : 'unverified position';
    const match = pickRelocationMatch(await locateIdentity(document, worksheets, headers, target.shipmentNo));
    if (!match) {
        log.warn({ shipmentNo: target.shipmentNo, reason }, 'Shipment not found in spreadsheet');
        return { status: 'not-found', reason: `identity not found in spreadsheet (${reason})` };
    }

    log.info({ shipmentNo: target.shipmentNo, sheet: match.sheetTitle, row: match.row, reason }, 'Relocated shipment');
    return {
        status: 'relocated',
        reason,
        pointer: {
            sheetTitle: match.sheetTitle,
            sheetRow: match.row,
            sheetCell: rowColToA1(match.row, match.column),
        },
    };
}

// ============================================
// BATCH
// ============================================

export function annotationStyle(linkUri: string): TextStyle {
    return { fontSize: ANNOTATION_FONT_SIZE, linkUri };
}

async function writeSingleCell(context: WriteBatchContext, cell: PendingCell): Promise<void> {
    const worksheet = context.document.worksheet(cell.sheetTitle);
    try {
        await worksheet.writeCell(cell.row, cell.column, cell.result.value);
        cell.result.status = 'written';
    } catch (error: unknown) {
        cell.result.status = 'failed';
        cell.result.error = errorMessage(error);
        log.warn({ sheet: cell.sheetTitle, row: cell.row, column: cell.column, error: cell.result.error }, 'Cell write failed');
        return;
    }

    // Annotation is cosmetic: the value is already written
    const address = rowColToA1(cell.row, cell.column);
    try {
        await worksheet.applyNote(address, NOTE_TEXT);
        await worksheet.applyFormat(address, annotationStyle(context.annotationLinkUri));
    } catch (error: unknown) {
        log.debug({ sheet: cell.sheetTitle, address, error: errorMessage(error) }, 'Failed to annotate cell');
    }
}

/**
 * Apply every record's writes in one batch, degrading to per-cell writes.
 * Records that cannot be located get failed results; the others proceed.
 */
export async function applyWriteBatch(
    context: WriteBatchContext,
    targets: readonly RecordWriteTarget[]
): Promise<WriteBatchResult> {
    const sheetIds = new Map(context.worksheets.map(sheet => [sheet.title, sheet.sheetId]));
    const style = annotationStyle(context.annotationLinkUri);
    const records: RecordWriteOutcome[] = [];
    const pending: PendingCell[] = [];

    for (const target of targets) {
        const position = await resolvePosition(context, target);
        const fieldResults: FieldWriteResult[] = target.writes.map((write): FieldWriteResult => ({
            shipmentNo: target.shipmentNo,
            field: write.field,
            value: write.value,
            derived: write.derived ?? false,
            status: 'failed',
        }));
        records.push({ shipmentNo: target.shipmentNo, position, fieldResults });

        if (position.status === 'not-found') {
            for (const result of fieldResults) result.error = position.reason;
            continue;
        }

        const { sheetTitle, sheetRow } = position.pointer;
        const sheetId = sheetIds.get(sheetTitle);
        const layout = await context.headers.layout(sheetTitle);

        for (const result of fieldResults) {
            const columnIndex = columnOf(layout, result.field);
            if (columnIndex === null || sheetId === undefined) {
                // Derived stamps are optional; explicit writes must land
                result.status = result.derived ? 'skipped' : 'failed';
                result.error = `column for ${result.field} not present in "${sheetTitle}"`;
                continue;
            }

            const column = columnIndex + 1;
            pending.push({
                result,
                sheetTitle,
                row: sheetRow,
                column,
                request: {
                    sheetId,
                    startRow: sheetRow,
                    endRow: sheetRow,
                    startColumn: column,
                    endColumn: column,
                    value: result.value,
                    note: NOTE_TEXT,
                    style,
                },
            });
        }
    }

    if (pending.length === 0) {
        return { records, batchApplied: false, batchError: null };
    }

    try {
        await context.document.batchApply(pending.map(cell => cell.request));
        for (const cell of pending) cell.result.status = 'written';
        log.info({ cells: pending.length, records: targets.length }, 'Batch write applied');
        return { records, batchApplied: true, batchError: null };
    } catch (error: unknown) {
        const batchError = errorMessage(error);
        log.warn({ cells: pending.length, error: batchError }, 'Batch write failed, writing cells individually');
        for (const cell of pending) {
            await writeSingleCell(context, cell);
        }
        return { records, batchApplied: false, batchError };
    }
}
