/**
 * Targeted write-back: database → spreadsheet cells
 *
 * writeBackShipment updates one shipment's fields; assignPmLocation updates
 * every active shipment of an order. Both update the database first, then
 * push the same values to the sheet through the batcher and persist any
 * corrected position pointer. Unknown shipments are created and appended
 * to the fallback worksheet.
 */

import {
    BUSINESS_FIELDS,
    IDENTITY_FIELD,
    assignPmLocationInputSchema,
    columnOf,
    formatInsertTime,
    generateFallbackShipmentNo,
    normalizeHeader,
    rowColToA1,
    writeBackInputSchema,
    type AssignPmLocationInput,
    type ShipmentBusinessField,
    type WriteBackInput,
} from '@shipsync/shared';
import { FALLBACK_SHEET_TITLE, SHIPMENTS_PROFILE } from '../../config/sync/sheets.js';
import type { ShipmentFieldValues, ShipmentRecord } from '../../db/queries/shipments.js';
import { DatabaseError, ValidationError, errorMessage } from '../../utils/errors.js';
import { sheetsLogger } from '../../utils/logger.js';
import { listEligibleWorksheets, requireSpreadsheetLocator } from './eligibility.js';
import { HeaderCache } from './headerCache.js';
import {
    applyWriteBatch,
    withDerivedWrites,
    type CellWrite,
    type RecordWriteOutcome,
    type WriteBatchContext,
} from './writeBackBatcher.js';
import type {
    AssignPmLocationResult,
    FieldWriteResult,
    PositionPointer,
    SheetSyncDeps,
    WorksheetInfo,
    WriteBackResult,
    WriteStatus,
} from './types.js';

const log = sheetsLogger.child({ service: 'writeBack' });

const MAX_GENERATED_ID_ATTEMPTS = 3;

interface RemoteSession extends WriteBatchContext {
    allWorksheets: WorksheetInfo[];
}

// ============================================
// HELPERS
// ============================================

function toFieldUpdates(writes: readonly CellWrite[]): Partial<ShipmentFieldValues> {
    const updates: Partial<ShipmentFieldValues> = {};
    for (const write of writes) updates[write.field] = write.value;
    return updates;
}

function fieldResultsWithStatus(
    shipmentNo: string,
    writes: readonly CellWrite[],
    status: WriteStatus,
    error?: string
): FieldWriteResult[] {
    return writes.map(write => ({
        shipmentNo,
        field: write.field,
        value: write.value,
        derived: write.derived ?? false,
        status,
        ...(error ? { error } : {}),
    }));
}

async function openSession(deps: SheetSyncDeps, locator: string): Promise<RemoteSession> {
    const document = await deps.sheetSource.open(locator);
    const { all, eligible } = await listEligibleWorksheets(document, SHIPMENTS_PROFILE);
    return {
        document,
        worksheets: eligible,
        allWorksheets: all,
        headers: new HeaderCache(document, SHIPMENTS_PROFILE),
        annotationLinkUri: deps.annotationLinkUri,
    };
}

interface AppendedRow {
    pointer: PositionPointer;
    /** Business fields the worksheet has a column for */
    placed: ReadonlySet<ShipmentBusinessField>;
}

/** Append a record to the fallback worksheet */
async function appendToFallbackSheet(session: RemoteSession, record: ShipmentRecord): Promise<AppendedRow> {
    const sheet = session.allWorksheets.find(ws => normalizeHeader(ws.title) === FALLBACK_SHEET_TITLE);
    if (!sheet) {
        throw new Error(`Fallback worksheet "${FALLBACK_SHEET_TITLE}" not found`);
    }

    const layout = await session.headers.layout(sheet.title);
    const identityIndex = columnOf(layout, IDENTITY_FIELD);
    if (identityIndex === null) {
        throw new Error(`Fallback worksheet "${sheet.title}" has no shipment number column`);
    }

    const values: (string | null)[] = layout.headers.map(() => null);
    values[identityIndex] = record.shipmentNo;
    const placed = new Set<ShipmentBusinessField>();
    for (const field of BUSINESS_FIELDS) {
        const index = columnOf(layout, field);
        if (index === null) continue;
        values[index] = record[field];
        placed.add(field);
    }

    const row = await session.document.worksheet(sheet.title).appendRow(values);
    return {
        pointer: { sheetTitle: sheet.title, sheetRow: row, sheetCell: rowColToA1(row, identityIndex + 1) },
        placed,
    };
}

/** Per-field results of an appended row; a write without a column is treated as in the batcher */
function appendedFieldResults(
    shipmentNo: string,
    writes: readonly CellWrite[],
    appended: AppendedRow
): FieldWriteResult[] {
    return writes.map((write): FieldWriteResult => {
        const derived = write.derived ?? false;
        const base = { shipmentNo, field: write.field, value: write.value, derived };
        if (appended.placed.has(write.field)) return { ...base, status: 'written' };
        return {
            ...base,
            status: derived ? 'skipped' : 'failed',
            error: `column for ${write.field} not present in "${appended.pointer.sheetTitle}"`,
        };
    });
}

/**
 * Create a record the sheet does not know yet and, unless remote work is
 * skipped, append it to the fallback worksheet. Resolves to null when the
 * shipment number was inserted concurrently.
 */
async function createAndAppend(
    deps: SheetSyncDeps,
    shipmentNo: string,
    writes: readonly CellWrite[],
    locator: string | null,
    now: Date
): Promise<WriteBackResult | null> {
    const fields = toFieldUpdates(writes);
    if (!fields.insertTime) {
        fields.insertTime = formatInsertTime(now, deps.timezoneOffsetHours);
    }

    const record = await deps.repository.create({ shipmentNo, fields });
    if (!record) return null;
    log.info({ shipmentNo }, 'Created shipment not present in database');

    const result: WriteBackResult = {
        updatedCount: 0,
        created: true,
        shipmentNo,
        sheetTitle: null,
        sheetRow: null,
        sheetCell: null,
        correctedPosition: false,
        remoteSkipped: locator === null,
        fieldResults: fieldResultsWithStatus(shipmentNo, writes, 'skipped'),
        errors: [],
    };
    if (locator === null) return result;

    try {
        const session = await openSession(deps, locator);
        const appended = await appendToFallbackSheet(session, record);
        const { pointer } = appended;
        await deps.repository.updatePointer(record.id, pointer, now);
        log.info({ shipmentNo, sheet: pointer.sheetTitle, row: pointer.sheetRow }, 'Appended shipment to fallback worksheet');
        const fieldResults = appendedFieldResults(shipmentNo, writes, appended);
        return {
            ...result,
            ...pointer,
            fieldResults,
            errors: fieldResults.flatMap(field =>
                field.status === 'failed' && field.error ? [`${shipmentNo}.${field.field}: ${field.error}`] : []
            ),
        };
    } catch (error: unknown) {
        const message = `append to fallback worksheet failed: ${errorMessage(error)}`;
        log.warn({ shipmentNo, error: message }, 'Failed to append shipment');
        return {
            ...result,
            fieldResults: fieldResultsWithStatus(shipmentNo, writes, 'failed', message),
            errors: [message],
        };
    }
}

interface SheetSyncOutcome {
    outcomes: RecordWriteOutcome[];
    errors: string[];
}

/** Push writes for existing records and persist their resolved pointers */
async function syncRecordsToSheet(
    deps: SheetSyncDeps,
    locator: string,
    targets: ReadonlyArray<{ record: ShipmentRecord; writes: readonly CellWrite[] }>,
    now: Date
): Promise<SheetSyncOutcome> {
    let session: RemoteSession;
    try {
        session = await openSession(deps, locator);
    } catch (error: unknown) {
        const message = `spreadsheet unavailable: ${errorMessage(error)}`;
        log.warn({ error: message }, 'Failed to open spreadsheet for write-back');
        return {
            outcomes: targets.map(({ record, writes }): RecordWriteOutcome => ({
                shipmentNo: record.shipmentNo,
                position: { status: 'not-found', reason: message },
                fieldResults: fieldResultsWithStatus(record.shipmentNo, writes, 'failed', message),
            })),
            errors: [message],
        };
    }

    const batch = await applyWriteBatch(session, targets.map(({ record, writes }) => ({
        shipmentNo: record.shipmentNo,
        sheetTitle: record.sheetTitle,
        sheetRow: record.sheetRow,
        writes,
    })));

    const errors: string[] = [];
    for (const [index, outcome] of batch.records.entries()) {
        const { record } = targets[index];
        if (outcome.position.status === 'not-found') {
            errors.push(`${record.shipmentNo}: ${outcome.position.reason}`);
            continue;
        }
        for (const field of outcome.fieldResults) {
            if (field.status === 'failed' && field.error) {
                errors.push(`${record.shipmentNo}.${field.field}: ${field.error}`);
            }
        }

        const written = outcome.fieldResults.some(field => field.status === 'written');
        try {
            await deps.repository.updatePointer(record.id, outcome.position.pointer, written ? now : null);
        } catch (error: unknown) {
            errors.push(`${record.shipmentNo}: failed to store position: ${errorMessage(error)}`);
        }
    }

    return { outcomes: batch.records, errors };
}

function pointerOf(outcome: RecordWriteOutcome | undefined): PositionPointer | null {
    if (!outcome || outcome.position.status === 'not-found') return null;
    return outcome.position.pointer;
}

// ============================================
// OPERATIONS
// ============================================

/**
 * Update one shipment's fields in the database and the spreadsheet.
 *
 * @throws ValidationError on malformed input (nothing is touched)
 * @throws ConfigurationError when remote work is requested without a spreadsheet location
 */
export async function writeBackShipment(deps: SheetSyncDeps, input: WriteBackInput): Promise<WriteBackResult> {
    const parsed = writeBackInputSchema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError('Invalid write-back input', parsed.error.issues);
    }
    const { shipmentNo, fields, options } = parsed.data;
    const locator = options.skipRemote ? null : requireSpreadsheetLocator(deps);
    const now = deps.now();

    const explicit: CellWrite[] = [];
    for (const field of BUSINESS_FIELDS) {
        const value = fields[field];
        if (value !== undefined) explicit.push({ field, value });
    }
    const writes = withDerivedWrites(explicit, now, deps.timezoneOffsetHours);

    let existing = await deps.repository.findByShipmentNo(shipmentNo);
    if (!existing) {
        const created = await createAndAppend(deps, shipmentNo, writes, locator, now);
        if (created) return created;
        log.info({ shipmentNo }, 'Shipment created concurrently, updating it instead');
        existing = await deps.repository.findByShipmentNo(shipmentNo);
        if (!existing) {
            throw new DatabaseError(`Shipment ${shipmentNo} could be neither created nor found`);
        }
    }

    await deps.repository.updateFields(existing.id, toFieldUpdates(writes));

    if (locator === null) {
        return {
            updatedCount: 1,
            created: false,
            shipmentNo: existing.shipmentNo,
            sheetTitle: existing.sheetTitle,
            sheetRow: existing.sheetRow,
            sheetCell: existing.sheetCell,
            correctedPosition: false,
            remoteSkipped: true,
            fieldResults: fieldResultsWithStatus(existing.shipmentNo, writes, 'skipped'),
            errors: [],
        };
    }

    const { outcomes, errors } = await syncRecordsToSheet(deps, locator, [{ record: existing, writes }], now);
    const outcome = outcomes[0];
    const pointer = pointerOf(outcome);

    return {
        updatedCount: 1,
        created: false,
        shipmentNo: existing.shipmentNo,
        sheetTitle: pointer?.sheetTitle ?? null,
        sheetRow: pointer?.sheetRow ?? null,
        sheetCell: pointer?.sheetCell ?? null,
        correctedPosition: outcome?.position.status === 'relocated',
        remoteSkipped: false,
        fieldResults: outcome?.fieldResults ?? [],
        errors,
    };
}

/**
 * Set the PM location (and insert time) of every active shipment of an
 * order. With no matching shipment, one is created under a generated
 * shipment number and appended to the fallback worksheet.
 *
 * @throws ValidationError on malformed input (nothing is touched)
 * @throws ConfigurationError when remote work is requested without a spreadsheet location
 */
export async function assignPmLocation(
    deps: SheetSyncDeps,
    input: AssignPmLocationInput
): Promise<AssignPmLocationResult> {
    const parsed = assignPmLocationInputSchema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError('Invalid PM location input', parsed.error.issues);
    }
    const { orderName, pmLocation, options } = parsed.data;
    const locator = options.skipRemote ? null : requireSpreadsheetLocator(deps);
    const now = deps.now();
    const insertTime = formatInsertTime(now, deps.timezoneOffsetHours);

    const writes: CellWrite[] = [
        { field: 'pmLocation', value: pmLocation },
        { field: 'insertTime', value: insertTime },
    ];

    const records = await deps.repository.findActiveByOrderName(orderName);
    if (records.length === 0) {
        // A taken generated number is drawn again
        for (let attempt = 0; attempt < MAX_GENERATED_ID_ATTEMPTS; attempt++) {
            const shipmentNo = generateFallbackShipmentNo(orderName);
            const result = await createAndAppend(
                deps,
                shipmentNo,
                [{ field: 'orderName', value: orderName }, ...writes],
                locator,
                now
            );
            if (result) return { ...result, shipmentNos: [shipmentNo] };
        }
        throw new DatabaseError(`No free shipment number for order ${orderName}`);
    }

    await deps.repository.transaction(async repository => {
        for (const record of records) {
            await repository.updateFields(record.id, toFieldUpdates(writes));
        }
    });

    const first = records[0];
    const base: AssignPmLocationResult = {
        updatedCount: records.length,
        created: false,
        shipmentNo: first.shipmentNo,
        shipmentNos: records.map(record => record.shipmentNo),
        sheetTitle: first.sheetTitle,
        sheetRow: first.sheetRow,
        sheetCell: first.sheetCell,
        correctedPosition: false,
        remoteSkipped: locator === null,
        fieldResults: records.flatMap(record => fieldResultsWithStatus(record.shipmentNo, writes, 'skipped')),
        errors: [],
    };
    if (locator === null) return base;

    const { outcomes, errors } = await syncRecordsToSheet(
        deps,
        locator,
        records.map(record => ({ record, writes })),
        now
    );
    const pointer = pointerOf(outcomes[0]);

    return {
        ...base,
        sheetTitle: pointer?.sheetTitle ?? null,
        sheetRow: pointer?.sheetRow ?? null,
        sheetCell: pointer?.sheetCell ?? null,
        correctedPosition: outcomes.some(outcome => outcome.position.status === 'relocated'),
        fieldResults: outcomes.flatMap(outcome => outcome.fieldResults),
        errors,
    };
}
