/**
 * A1 notation helpers (1-based rows and columns).
 */

export function columnToLetter(column: number): string {
    if (!Number.isInteger(column) || column < 1) {
        throw new RangeError(`Invalid column number: ${column}`);
    }
    let letters = '';
    let remaining = column;
    while (remaining > 0) {
        const mod = (remaining - 1) % 26;
        letters = String.fromCharCode(65 + mod) + letters;
        remaining = Math.floor((remaining - 1) / 26);
    }
    return letters;
}

export function letterToColumn(letters: string): number {
    let column = 0;
    for (const ch of letters.toUpperCase()) {
        const code = ch.charCodeAt(0);
        if (code < 65 || code > 90) {
            throw new RangeError(`Invalid column letters: ${letters}`);
        }
        column = column * 26 + (code - 64);
    }
    return column;
}

/** rowColToA1(4, 28) === 'AB4' */
export function rowColToA1(row: number, column: number): string {
    if (!Number.isInteger(row) || row < 1) {
        throw new RangeError(`Invalid row number: ${row}`);
    }
    return `${columnToLetter(column)}${row}`;
}

export function a1ToRowCol(address: string): { row: number; column: number } {
    const match = address.trim().match(/^\$?([A-Za-z]+)\$?(\d+)$/);
    if (!match) {
        throw new RangeError(`Invalid A1 address: ${address}`);
    }
    return { row: Number(match[2]), column: letterToColumn(match[1]) };
}

/** Quote a worksheet title for use in a range: 'Plan MOS 01'!A1 */
export function quoteSheetTitle(title: string): string {
    return `'${title.replace(/'/g, "''")}'`;
}
