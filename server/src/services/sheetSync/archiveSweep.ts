/**
 * Archival sweep
 *
 * Dims plan rows whose plan date is strictly older than today minus the
 * threshold and whose delivery status is the terminal one. Formatting
 * requests are flushed in chunks of ARCHIVE_FLUSH_CHUNK and once at the end.
 */

import {
    ARCHIVE_TERMINAL_STATUS,
    archiveSweepInputSchema,
    buildHeaderLayout,
    calendarDayInOffset,
    calendarDayToIso,
    cellToText,
    columnOf,
    normalizeStatus,
    parseSheetDate,
    type ArchiveSweepInput,
    type CellValue,
} from '@shipsync/shared';
import {
    ARCHIVE_FLUSH_CHUNK,
    ARCHIVE_TEXT_COLOR,
    ANNOTATION_FONT_SIZE,
    PLAN_PROFILE,
} from '../../config/sync/sheets.js';
import { ValidationError, errorMessage } from '../../utils/errors.js';
import { archiveLogger } from '../../utils/logger.js';
import { listEligibleWorksheets, openSpreadsheet } from './eligibility.js';
import type {
    ArchiveSweepResult,
    ArchivedRow,
    RepeatCellRequest,
    SheetDocument,
    SheetSyncDeps,
    TextStyle,
} from './types.js';

const log = archiveLogger.child({ service: 'archiveSweep' });

interface PendingFormat {
    request: RepeatCellRequest;
    row: ArchivedRow;
}

function archiveStyle(linkUri: string): TextStyle {
    return { foregroundColor: { ...ARCHIVE_TEXT_COLOR }, fontSize: ANNOTATION_FONT_SIZE, linkUri };
}

/**
 * Format archive-eligible plan rows.
 *
 * @throws ValidationError for a negative or non-integer threshold (no remote calls made)
 * @throws ConfigurationError when the spreadsheet location is not configured
 */
export async function archiveSweep(
    deps: SheetSyncDeps,
    input: ArchiveSweepInput = {}
): Promise<ArchiveSweepResult> {
    const parsed = archiveSweepInputSchema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError('Invalid archive threshold', parsed.error.issues);
    }
    const { thresholdDays } = parsed.data;

    const today = calendarDayInOffset(deps.now(), deps.timezoneOffsetHours);
    const threshold = today - thresholdDays;
    // Local midnight of "today" so year-less dates pick up the sheet's year
    const referenceDate = new Date(`${calendarDayToIso(today)}T00:00:00`);
    const style = archiveStyle(deps.annotationLinkUri);

    const result: ArchiveSweepResult = {
        thresholdDays,
        thresholdDate: calendarDayToIso(threshold),
        matchedRows: 0,
        formattedRows: 0,
        sheetsProcessed: [],
        affectedRows: [],
        errors: [],
    };

    const document = await openSpreadsheet(deps);
    const { eligible } = await listEligibleWorksheets(document, PLAN_PROFILE);
    let pending: PendingFormat[] = [];

    const flush = async (): Promise<void> => {
        if (pending.length === 0) return;
        const chunk = pending;
        pending = [];
        try {
            await document.batchApply(chunk.map(item => item.request));
            for (const item of chunk) item.row.formatted = true;
            result.formattedRows += chunk.length;
        } catch (error: unknown) {
            const message = `format flush of ${chunk.length} rows failed: ${errorMessage(error)}`;
            log.warn({ rows: chunk.length, error: errorMessage(error) }, 'Archive format flush failed');
            result.errors.push(message);
        }
    };

    for (const sheet of eligible) {
        const values = await readPlanSheet(document, sheet.title, result.errors);
        if (!values) continue;
        result.sheetsProcessed.push(sheet.title);

        const layout = buildHeaderLayout(values[PLAN_PROFILE.headerRow - 1] ?? []);
        const planColumn = columnOf(layout, 'planDate');
        const statusColumn = columnOf(layout, 'statusDelivery');
        if (planColumn === null || statusColumn === null) {
            log.warn({ sheet: sheet.title }, 'Plan sheet lacks plan date or status delivery column, skipping');
            continue;
        }

        for (let index = PLAN_PROFILE.dataStartRow - 1; index < values.length; index++) {
            const cells = values[index];
            const status = normalizeStatus(cellToText(cells[statusColumn]));
            if (status !== ARCHIVE_TERMINAL_STATUS) continue;

            const planDate = cellToText(cells[planColumn]);
            const day = parseSheetDate(planDate, referenceDate);
            if (planDate === null || day === null || day >= threshold) continue;

            const row: ArchivedRow = {
                sheetTitle: sheet.title,
                row: index + 1,
                planDate,
                statusDelivery: status,
                formatted: false,
            };
            result.matchedRows++;
            result.affectedRows.push(row);

            if (sheet.columnCount <= 0) continue;
            pending.push({
                row,
                request: {
                    sheetId: sheet.sheetId,
                    startRow: row.row,
                    endRow: row.row,
                    startColumn: 1,
                    endColumn: sheet.columnCount,
                    style,
                },
            });
            if (pending.length >= ARCHIVE_FLUSH_CHUNK) await flush();
        }
    }
    await flush();

    log.info({
        thresholdDate: result.thresholdDate,
        sheets: result.sheetsProcessed.length,
        matched: result.matchedRows,
        formatted: result.formattedRows,
    }, 'Archive sweep completed');
    return result;
}

async function readPlanSheet(document: SheetDocument, title: string, errors: string[]): Promise<CellValue[][] | null> {
    try {
        return await document.worksheet(title).readAllValues();
    } catch (error: unknown) {
        log.warn({ sheet: title, error: errorMessage(error) }, 'Failed to read plan sheet, skipping');
        errors.push(`${title}: read failed: ${errorMessage(error)}`);
        return null;
    }
}
