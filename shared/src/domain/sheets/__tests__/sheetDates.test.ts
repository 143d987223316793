/**
 * Unit tests for sheet date parsing and timestamp formatting
 */

import {
    calendarDayInOffset,
    calendarDayToIso,
    formatInsertTime,
    formatStatusTimestamp,
    parseSheetDate,
    repairMonthTypos,
    toCalendarDay,
} from '../sheetDates.js';

const reference = new Date(2024, 9, 15);
const oct5 = toCalendarDay(2024, 9, 5);

describe('parseSheetDate', () => {
    it('parses the literal sheet formats', () => {
        expect(parseSheetDate('5 Oct 24', reference)).toBe(oct5);
        expect(parseSheetDate('05 Oct 2024', reference)).toBe(oct5);
        expect(parseSheetDate('5-Oct-24', reference)).toBe(oct5);
        expect(parseSheetDate('5-Oct-2024', reference)).toBe(oct5);
        expect(parseSheetDate('2024/10/05', reference)).toBe(oct5);
    });

    it('takes the reference year for day-month values', () => {
        expect(parseSheetDate('5Oct', reference)).toBe(oct5);
    });

    it('repairs month typos before parsing', () => {
        expect(parseSheetDate('5 Sept 2024', reference)).toBe(toCalendarDay(2024, 8, 5));
        expect(parseSheetDate('5 Okt 2024', reference)).toBe(oct5);
        expect(parseSheetDate('24 Des 2023', reference)).toBe(toCalendarDay(2023, 11, 24));
    });

    it('falls back to ISO and general parsing', () => {
        expect(parseSheetDate('2024-10-05', reference)).toBe(oct5);
        expect(parseSheetDate('October 5, 2024', reference)).toBe(oct5);
    });

    it('returns null for blank or unparseable text', () => {
        expect(parseSheetDate('not a date', reference)).toBeNull();
        expect(parseSheetDate('12', reference)).toBeNull();
        expect(parseSheetDate('   ', reference)).toBeNull();
        expect(parseSheetDate(null, reference)).toBeNull();
    });
});

describe('repairMonthTypos', () => {
    it('only replaces whole words', () => {
        expect(repairMonthTypos('Sept Septa')).toBe('Sep Septa');
    });
});

describe('calendar days', () => {
    it('reads the day at a fixed offset', () => {
        expect(calendarDayInOffset(new Date('2024-10-14T20:00:00Z'), 7)).toBe(toCalendarDay(2024, 9, 15));
        expect(calendarDayInOffset(new Date('2024-10-14T16:00:00Z'), 7)).toBe(toCalendarDay(2024, 9, 14));
    });

    it('formats a calendar day as ISO', () => {
        expect(calendarDayToIso(toCalendarDay(2024, 9, 8))).toBe('2024-10-08');
    });
});

describe('timestamps', () => {
    const instant = new Date('2024-10-15T02:05:09Z');

    it('formats status timestamps without padding month, day or hour', () => {
        expect(formatStatusTimestamp(instant, 7)).toBe('10/15/2024 9:05:09');
    });

    it('formats insert times zero-padded', () => {
        expect(formatInsertTime(instant, 7)).toBe('2024-10-15 09:05:09');
    });
});
