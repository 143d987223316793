import { a1ToRowCol, columnToLetter, quoteSheetTitle, rowColToA1 } from '../a1.js';

describe('A1 notation', () => {
    it('converts column numbers to letters', () => {
        expect(columnToLetter(1)).toBe('A');
        expect(columnToLetter(26)).toBe('Z');
        expect(columnToLetter(27)).toBe('AA');
        expect(columnToLetter(702)).toBe('ZZ');
        expect(columnToLetter(703)).toBe('AAA');
    });

    it('rejects non-positive columns', () => {
        expect(() => columnToLetter(0)).toThrow(RangeError);
    });

    it('round-trips a cell address', () => {
        expect(rowColToA1(4, 28)).toBe('AB4');
        expect(a1ToRowCol('AB4')).toEqual({ row: 4, column: 28 });
        expect(a1ToRowCol('$C$10')).toEqual({ row: 10, column: 3 });
    });

    it('quotes sheet titles', () => {
        expect(quoteSheetTitle("Bob's")).toBe("'Bob''s'");
    });
});
