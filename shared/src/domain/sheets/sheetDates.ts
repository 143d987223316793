/**
 * Date handling for spreadsheet cells.
 *
 * Sheets are edited by hand, so plan dates arrive in several literal formats
 * and with a few recurring locale typos in month abbreviations. Dates are
 * compared as calendar days (days since 1970-01-01), never as instants.
 */

import { isValid, parse, parseISO } from 'date-fns';

/** Whole days since 1970-01-01 */
export type CalendarDay = number;

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

const MONTH_TYPOS: ReadonlyArray<readonly [RegExp, string]> = [
    [/\bSept\b/g, 'Sep'],
    [/\bOkt\b/g, 'Oct'],
    [/\bDes\b/g, 'Dec'],
];

/**
 * Tried in order; `ddMMM` takes its year from the reference date.
 * Two-digit-year variants come first: `yyyy` would also accept "24" as year 24.
 */
const SHEET_DATE_FORMATS = [
    'dd MMM yy',
    'dd MMM yyyy',
    'dd-MMM-yy',
    'dd-MMM-yyyy',
    'ddMMM',
    'yyyy/MM/dd',
] as const;

export function toCalendarDay(year: number, monthIndex: number, day: number): CalendarDay {
    return Math.floor(Date.UTC(year, monthIndex, day) / DAY_MS);
}

function localCalendarDay(date: Date): CalendarDay {
    return toCalendarDay(date.getFullYear(), date.getMonth(), date.getDate());
}

/** Calendar day of an instant as seen at a fixed UTC offset */
export function calendarDayInOffset(instant: Date, offsetHours: number): CalendarDay {
    const shifted = new Date(instant.getTime() + offsetHours * HOUR_MS);
    return toCalendarDay(shifted.getUTCFullYear(), shifted.getUTCMonth(), shifted.getUTCDate());
}

/** 'YYYY-MM-DD' */
export function calendarDayToIso(day: CalendarDay): string {
    return new Date(day * DAY_MS).toISOString().slice(0, 10);
}

export function repairMonthTypos(value: string): string {
    return MONTH_TYPOS.reduce((text, [typo, fix]) => text.replace(typo, fix), value);
}

/**
 * Parse a hand-entered sheet date.
 * Returns null when no literal format, ISO parse or general parse fits.
 */
export function parseSheetDate(value: string | null | undefined, referenceDate: Date): CalendarDay | null {
    if (!value) return null;
    const text = repairMonthTypos(value).trim();
    if (!text) return null;

    for (const format of SHEET_DATE_FORMATS) {
        const parsed = parse(text, format, referenceDate);
        if (isValid(parsed)) return localCalendarDay(parsed);
    }

    const iso = parseISO(text);
    if (isValid(iso)) return localCalendarDay(iso);

    // Bare numbers are not dates (Date() would read "12" as a year-2001 date)
    if (!/\D/.test(text)) return null;
    const general = new Date(text);
    return isValid(general) ? localCalendarDay(general) : null;
}

// ============================================
// TIMESTAMPS WRITTEN TO THE SHEET
// ============================================

function shiftedParts(instant: Date, offsetHours: number) {
    const shifted = new Date(instant.getTime() + offsetHours * HOUR_MS);
    return {
        year: shifted.getUTCFullYear(),
        month: shifted.getUTCMonth() + 1,
        day: shifted.getUTCDate(),
        hour: shifted.getUTCHours(),
        minute: shifted.getUTCMinutes(),
        second: shifted.getUTCSeconds(),
    };
}

const pad2 = (n: number): string => String(n).padStart(2, '0');

/** ATA/ATD stamp: 'M/D/YYYY H:MM:SS' */
export function formatStatusTimestamp(instant: Date, offsetHours: number): string {
    const p = shiftedParts(instant, offsetHours);
    return `${p.month}/${p.day}/${p.year} ${p.hour}:${pad2(p.minute)}:${pad2(p.second)}`;
}

/** Insert-time stamp: 'YYYY-MM-DD HH:MM:SS' */
export function formatInsertTime(instant: Date, offsetHours: number): string {
    const p = shiftedParts(instant, offsetHours);
    return `${p.year}-${pad2(p.month)}-${pad2(p.day)} ${pad2(p.hour)}:${pad2(p.minute)}:${pad2(p.second)}`;
}
