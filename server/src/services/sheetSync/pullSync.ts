/**
 * Bulk pull-sync: spreadsheet → shipments table
 *
 * One read per eligible worksheet, last occurrence of a shipment number
 * wins, then a single transaction: snapshot, diff-gated upsert, soft-delete
 * of active keys that no longer appear in the sheet.
 *
 * Counts come from set differences against the pre-upsert snapshot, not
 * from per-row upsert results.
 */

import {
    IDENTITY_FIELD,
    buildBusinessRecord,
    buildHeaderLayout,
    cellToText,
    columnOf,
    isBlankRow,
    mapRow,
    rowColToA1,
    type CellValue,
} from '@shipsync/shared/domain';
import { SHIPMENTS_PROFILE, type SheetSourceProfile } from '../../config/sync/sheets.js';
import { hasTrackedChanges, type IncomingShipment } from '../../db/queries/shipments.js';
import { DatabaseError, isCustomError, toError } from '../../utils/errors.js';
import { syncLogger } from '../../utils/logger.js';
import { listEligibleWorksheets, openSpreadsheet, resolveSheetRows } from './eligibility.js';
import type { PullSyncResult, SheetDocument, SheetSyncDeps, WorksheetInfo } from './types.js';

const log = syncLogger.child({ service: 'pullSync' });

/**
 * A worksheet whose read fails contributes no rows; the sync carries on
 * with the others. Its records are then soft-deleted like any vanished row.
 */
export const SKIP_UNREADABLE_SHEETS = true;

const EMPTY_RESULT: PullSyncResult = { created: 0, updated: 0, softDeleted: 0, total: 0 };

// ============================================
// READ
// ============================================

/** Map one worksheet's values to incoming rows (pure) */
export function extractIncomingRows(
    title: string,
    values: readonly CellValue[][],
    rows: { headerRow: number; dataStartRow: number }
): IncomingShipment[] {
    const layout = buildHeaderLayout(values[rows.headerRow - 1] ?? []);
    const identityColumn = columnOf(layout, IDENTITY_FIELD);
    if (identityColumn === null) {
        log.warn({ sheet: title }, 'Worksheet has no shipment number header, skipping');
        return [];
    }

    const incoming: IncomingShipment[] = [];
    for (let index = rows.dataStartRow - 1; index < values.length; index++) {
        const raw = values[index];
        if (isBlankRow(raw)) continue;

        const mapped = mapRow(layout, raw);
        const shipmentNo = cellToText(mapped.shipmentNo);
        if (!shipmentNo) continue;

        const sheetRow = index + 1;
        incoming.push({
            shipmentNo,
            ...buildBusinessRecord(field => cellToText(mapped[field])),
            sheetTitle: title,
            sheetRow,
            sheetCell: rowColToA1(sheetRow, identityColumn + 1),
        });
    }
    return incoming;
}

async function readWorksheet(
    document: SheetDocument,
    sheet: WorksheetInfo,
    profile: SheetSourceProfile
): Promise<IncomingShipment[]> {
    let values: CellValue[][];
    try {
        values = await document.worksheet(sheet.title).readAllValues();
    } catch (error: unknown) {
        if (!SKIP_UNREADABLE_SHEETS) throw error;
        log.warn({ sheet: sheet.title, err: toError(error) }, 'Failed to read worksheet, skipping');
        return [];
    }

    const rows = extractIncomingRows(sheet.title, values, resolveSheetRows(sheet.title, profile));
    log.debug({ sheet: sheet.title, rows: rows.length }, 'Read worksheet');
    return rows;
}

// ============================================
// MAIN
// ============================================

/**
 * Mirror every eligible worksheet into the shipments table.
 *
 * @throws ConfigurationError when the spreadsheet location is not configured
 * @throws DatabaseError when the transaction fails (nothing is committed)
 */
export async function pullSync(
    deps: SheetSyncDeps,
    profile: SheetSourceProfile = SHIPMENTS_PROFILE
): Promise<PullSyncResult> {
    const document = await openSpreadsheet(deps);
    const { eligible } = await listEligibleWorksheets(document, profile);
    log.info({ profile: profile.name, sheets: eligible.length }, 'Starting pull sync');

    // Last occurrence wins: later sheets/rows overwrite earlier ones
    const collected = new Map<string, IncomingShipment>();
    for (const sheet of eligible) {
        for (const row of await readWorksheet(document, sheet, profile)) {
            collected.set(row.shipmentNo, row);
        }
    }

    const incoming = [...collected.values()];
    if (incoming.length === 0) {
        log.info({ profile: profile.name }, 'No usable rows found, nothing to sync');
        return { ...EMPTY_RESULT };
    }

    try {
        const result = await deps.repository.transaction(async repository => {
            const snapshot = new Map((await repository.listAll()).map(record => [record.shipmentNo, record]));

            let created = 0;
            let updated = 0;
            for (const row of incoming) {
                const stored = snapshot.get(row.shipmentNo);
                if (!stored) created++;
                else if (hasTrackedChanges(stored, row)) updated++;
            }

            await repository.upsertFromSheet(incoming);

            const vanished = [...snapshot.values()]
                .filter(record => !record.isDeleted && !collected.has(record.shipmentNo))
                .map(record => record.shipmentNo);
            if (vanished.length > 0) {
                await repository.softDelete(vanished);
            }

            return { created, updated, softDeleted: vanished.length, total: incoming.length };
        });

        log.info({ profile: profile.name, ...result }, 'Pull sync completed');
        return result;
    } catch (error: unknown) {
        if (isCustomError(error)) throw error;
        throw new DatabaseError('Pull sync transaction failed', toError(error));
    }
}
