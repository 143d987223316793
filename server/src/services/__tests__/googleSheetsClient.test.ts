/**
 * Unit tests for the Sheets client's request/response helpers
 */

import { ConfigurationError, MalformedResponseError } from '../../utils/errors.js';
import {
    extractSpreadsheetId,
    parseAppendedRow,
    toCellValue,
    toRepeatCellRequest,
} from '../googleSheetsClient.js';

describe('extractSpreadsheetId', () => {
    it('reads the id from a sheet URL', () => {
        expect(extractSpreadsheetId('https://docs.google.com/spreadsheets/d/abc-123_X/edit#gid=0')).toBe('abc-123_X');
    });

    it('accepts a bare id', () => {
        expect(extractSpreadsheetId('  test-sheet-id ')).toBe('test-sheet-id');
    });

    it('rejects anything else', () => {
        expect(() => extractSpreadsheetId('not a sheet!')).toThrow(ConfigurationError);
    });
});

describe('parseAppendedRow', () => {
    it('returns the first row of the updated range', () => {
        expect(parseAppendedRow("'unknown'!A125:S125")).toBe(125);
        expect(parseAppendedRow('Sheet1!$A$7')).toBe(7);
    });

    it('throws on a missing range', () => {
        expect(() => parseAppendedRow(undefined)).toThrow(MalformedResponseError);
        expect(() => parseAppendedRow('Sheet1')).toThrow(MalformedResponseError);
    });
});

describe('toCellValue', () => {
    it('keeps primitives and stringifies the rest', () => {
        expect(toCellValue('x')).toBe('x');
        expect(toCellValue(3)).toBe(3);
        expect(toCellValue(undefined)).toBeNull();
        expect(toCellValue(['a'])).toBe('a');
    });
});

describe('toRepeatCellRequest', () => {
    it('converts 1-based inclusive bounds to a half-open grid range', () => {
        const request = toRepeatCellRequest({
            sheetId: 5,
            startRow: 2,
            endRow: 2,
            startColumn: 3,
            endColumn: 3,
            value: 'late',
            note: 'Modified by Shipment Sync',
            style: { fontSize: 8, linkUri: 'https://example.com/sync-log' },
        });

        expect(request).toEqual({
            repeatCell: {
                range: { sheetId: 5, startRowIndex: 1, endRowIndex: 2, startColumnIndex: 2, endColumnIndex: 3 },
                cell: {
                    userEnteredValue: { stringValue: 'late' },
                    note: 'Modified by Shipment Sync',
                    userEnteredFormat: {
                        textFormat: { fontSize: 8, link: { uri: 'https://example.com/sync-log' } },
                    },
                },
                fields: 'userEnteredValue,note,userEnteredFormat.textFormat.fontSize,userEnteredFormat.textFormat.link',
            },
        });
    });

    it('clears the cell for a null value and leaves it alone for a style-only request', () => {
        const cleared = toRepeatCellRequest({ sheetId: 1, startRow: 1, endRow: 1, startColumn: 1, endColumn: 1, value: null });
        expect(cleared.repeatCell?.cell).toEqual({});
        expect(cleared.repeatCell?.fields).toBe('userEnteredValue');

        const styled = toRepeatCellRequest({
            sheetId: 1,
            startRow: 4,
            endRow: 4,
            startColumn: 1,
            endColumn: 6,
            style: { foregroundColor: { red: 0.6, green: 0.6, blue: 0.6 } },
        });
        expect(styled.repeatCell?.fields).toBe('userEnteredFormat.textFormat.foregroundColor');
        expect(styled.repeatCell?.range).toEqual({
            sheetId: 1, startRowIndex: 3, endRowIndex: 4, startColumnIndex: 0, endColumnIndex: 6,
        });
    });
});
