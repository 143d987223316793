/**
 * Header normalizer / schema mapper
 *
 * Turns raw header cells into stable lookup keys and maps data rows onto
 * canonical shipment fields through the fixed HEADER_FIELD_MAP.
 * Date parsing is NOT done here: date-like text passes through untouched.
 */

import { HEADER_FIELD_MAP, buildFieldRecord, type ShipmentField } from '../shipments/fields.js';

/** A single cell as returned by the worksheet source */
export type CellValue = string | number | boolean | null;

/** Canonical field → normalized cell value */
export type MappedRow = Record<ShipmentField, CellValue>;

/**
 * Normalize a header cell: lowercase, '.' and '_' become spaces,
 * whitespace collapsed to single spaces.
 *
 * @example normalizeHeader(' Shipment_No. ') === 'shipment no'
 */
export function normalizeHeader(value: unknown): string {
    const text = value === null || value === undefined ? '' : String(value);
    return text
        .toLowerCase()
        .replace(/[._]/g, ' ')
        .split(/\s+/)
        .filter(Boolean)
        .join(' ');
}

export function normalizeHeaders(headers: readonly unknown[]): string[] {
    return headers.map(normalizeHeader);
}

/**
 * Normalize a data cell.
 * Strings are trimmed (empty → null); anything else is returned as-is.
 */
export function normalizeCellValue(value: CellValue | undefined): CellValue {
    if (value === undefined || value === null) return null;
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed || null;
    }
    return value;
}

/** Cell value as stored text (numbers/booleans stringified) */
export function cellToText(value: CellValue | undefined): string | null {
    const normalized = normalizeCellValue(value);
    if (normalized === null) return null;
    return typeof normalized === 'string' ? normalized : String(normalized);
}

/** Trim free-text API input; empty → null */
export function normalizeTextInput(value: string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    const trimmed = value.trim();
    return trimmed || null;
}

export function isBlankRow(row: readonly CellValue[] | undefined): boolean {
    if (!row || row.length === 0) return true;
    return row.every(cell => normalizeCellValue(cell) === null);
}

// ============================================
// HEADER LAYOUT
// ============================================

/**
 * Column positions of canonical fields within one worksheet.
 * Indices are 0-based; the first header mapping to a field wins.
 */
export interface HeaderLayout {
    headers: string[];
    columns: Partial<Record<ShipmentField, number>>;
}

export function buildHeaderLayout(headerRow: readonly unknown[]): HeaderLayout {
    const headers = normalizeHeaders(headerRow);
    const columns: Partial<Record<ShipmentField, number>> = {};

    headers.forEach((header, index) => {
        const field = HEADER_FIELD_MAP[header];
        if (field && columns[field] === undefined) {
            columns[field] = index;
        }
    });

    return { headers, columns };
}

/** 0-based column of a field, or null when the sheet has no such header */
export function columnOf(layout: HeaderLayout, field: ShipmentField): number | null {
    return layout.columns[field] ?? null;
}

/**
 * Map a raw data row onto every canonical field.
 * Unknown headers are dropped; fields whose header is missing come back null.
 */
export function mapRow(layout: HeaderLayout, row: readonly CellValue[]): MappedRow {
    const value = (field: ShipmentField): CellValue => {
        const index = layout.columns[field];
        return index === undefined ? null : normalizeCellValue(row[index]);
    };

    return buildFieldRecord(value);
}
