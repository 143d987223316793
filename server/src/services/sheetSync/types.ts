/**
 * Sheet sync: collaborator contracts and result types
 */

import type { CellValue, ShipmentBusinessField } from '@shipsync/shared/domain';
import type { PositionPointer, ShipmentRepository } from '../../db/queries/shipments.js';

// ============================================
// EXTERNAL WORKSHEET SOURCE
// ============================================

export interface WorksheetInfo {
    title: string;
    sheetId: number;
    columnCount: number;
    rowCount: number;
}

export interface RgbColor {
    red: number;
    green: number;
    blue: number;
}

export interface TextStyle {
    fontSize?: number;
    linkUri?: string;
    foregroundColor?: RgbColor;
}

/**
 * One cell range to update in a batch.
 * Rows and columns are 1-based and inclusive.
 */
export interface RepeatCellRequest {
    sheetId: number;
    startRow: number;
    endRow: number;
    startColumn: number;
    endColumn: number;
    value?: string | null;
    note?: string;
    style?: TextStyle;
}

/** One worksheet (tab). Rows and columns are 1-based. */
export interface Worksheet {
    readonly title: string;
    /** Header + data rows in a single call */
    readAllValues(): Promise<CellValue[][]>;
    readRow(row: number): Promise<CellValue[]>;
    readColumn(column: number): Promise<CellValue[]>;
    readCell(row: number, column: number): Promise<CellValue>;
    writeCell(row: number, column: number, value: string | null): Promise<void>;
    /** Returns the 1-based row the values landed on */
    appendRow(values: readonly (string | null)[]): Promise<number>;
    applyNote(address: string, text: string): Promise<void>;
    applyFormat(address: string, style: TextStyle): Promise<void>;
}

export interface SheetDocument {
    listWorksheets(): Promise<WorksheetInfo[]>;
    worksheet(title: string): Worksheet;
    /** All-or-nothing: throws without applying anything on failure */
    batchApply(requests: readonly RepeatCellRequest[]): Promise<void>;
}

export interface SheetSource {
    open(locator: string): Promise<SheetDocument>;
}

// ============================================
// OPERATION DEPENDENCIES
// ============================================

export interface SheetSyncDeps {
    repository: ShipmentRepository;
    sheetSource: SheetSource;
    /** Spreadsheet URL or id; null when unconfigured */
    spreadsheetLocator: string | null;
    now: () => Date;
    timezoneOffsetHours: number;
    /** Link attached to touched cells */
    annotationLinkUri: string;
}

// ============================================
// RESULTS
// ============================================

export interface PullSyncResult {
    created: number;
    updated: number;
    softDeleted: number;
    total: number;
}

export type WriteStatus = 'written' | 'failed' | 'skipped';

export interface FieldWriteResult {
    shipmentNo: string;
    field: ShipmentBusinessField;
    value: string | null;
    status: WriteStatus;
    /** Set for writes added because of another field's value */
    derived: boolean;
    error?: string;
}

export interface WriteBackResult {
    updatedCount: number;
    created: boolean;
    shipmentNo: string;
    sheetTitle: string | null;
    sheetRow: number | null;
    sheetCell: string | null;
    correctedPosition: boolean;
    remoteSkipped: boolean;
    fieldResults: FieldWriteResult[];
    errors: string[];
}

/** Write-back result for every record sharing an order name */
export interface AssignPmLocationResult extends WriteBackResult {
    shipmentNos: string[];
}

export interface ArchivedRow {
    sheetTitle: string;
    row: number;
    planDate: string;
    statusDelivery: string;
    /** False when the sheet has no columns or the flush carrying it failed */
    formatted: boolean;
}

export interface ArchiveSweepResult {
    thresholdDays: number;
    /** YYYY-MM-DD; rows strictly older are eligible */
    thresholdDate: string;
    matchedRows: number;
    formattedRows: number;
    sheetsProcessed: string[];
    affectedRows: ArchivedRow[];
    errors: string[];
}

export type { PositionPointer };
