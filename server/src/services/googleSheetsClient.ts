/**
 * Google Sheets API v4 Client (Authenticated)
 *
 * Implements the worksheet source the sync engine works against, using a
 * service account JWT.
 *
 * Features:
 * - Lazy auth: authenticates on first API call
 * - Rate limiter: respects 300 calls/min quota (250 safe limit)
 * - Retry: exponential backoff on 429/500/503
 * - Transport failures become ExternalServiceError, unusable responses
 *   MalformedResponseError
 */

import { google, type sheets_v4 } from 'googleapis';
import { readFileSync, existsSync } from 'fs';
import { z } from 'zod';
import { a1ToRowCol, columnToLetter, quoteSheetTitle, rowColToA1, type CellValue } from '@shipsync/shared/domain';
import { env } from '../config/env.js';
import {
    API_CALL_DELAY_MS,
    API_MAX_RETRIES,
    GOOGLE_SERVICE_ACCOUNT_PATH,
    SHEETS_API_SCOPE,
} from '../config/sync/sheets.js';
import {
    ConfigurationError,
    ExternalServiceError,
    MalformedResponseError,
    toError,
} from '../utils/errors.js';
import { sheetsLogger } from '../utils/logger.js';
import type {
    RepeatCellRequest,
    SheetDocument,
    SheetSource,
    TextStyle,
    Worksheet,
    WorksheetInfo,
} from './sheetSync/types.js';

const SERVICE_NAME = 'google-sheets';

// ============================================
// TYPES
// ============================================

const serviceAccountKeySchema = z.object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
});

type ServiceAccountKey = z.infer<typeof serviceAccountKeySchema>;

// ============================================
// SINGLETON STATE
// ============================================

let sheetsClient: sheets_v4.Sheets | null = null;
let lastCallAt = 0;

// ============================================
// AUTH
// ============================================

function parseServiceAccountKey(raw: string, source: string): ServiceAccountKey {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error: unknown) {
        throw new ConfigurationError(`Google service account key from ${source} is not valid JSON: ${toError(error).message}`, source);
    }
    const parsed = serviceAccountKeySchema.safeParse(json);
    if (!parsed.success) {
        throw new ConfigurationError(`Google service account key from ${source} lacks client_email/private_key`, source);
    }
    return parsed.data;
}

/**
 * Get or create the authenticated Sheets client.
 *
 * Credential sources (checked in order):
 *   1. GOOGLE_SERVICE_ACCOUNT_JSON env var (JSON string, for CI / hosted)
 *   2. JSON key file at GOOGLE_SERVICE_ACCOUNT_PATH (local dev)
 */
function getClient(): sheets_v4.Sheets {
    if (sheetsClient) return sheetsClient;

    let keyFile: ServiceAccountKey;

    if (env.GOOGLE_SERVICE_ACCOUNT_JSON) {
        keyFile = parseServiceAccountKey(env.GOOGLE_SERVICE_ACCOUNT_JSON, 'GOOGLE_SERVICE_ACCOUNT_JSON');
        sheetsLogger.info('Using Google service account from GOOGLE_SERVICE_ACCOUNT_JSON env var');
    } else if (existsSync(GOOGLE_SERVICE_ACCOUNT_PATH)) {
        keyFile = parseServiceAccountKey(readFileSync(GOOGLE_SERVICE_ACCOUNT_PATH, 'utf-8'), 'GOOGLE_SERVICE_ACCOUNT_PATH');
        sheetsLogger.info('Using Google service account from key file');
    } else {
        throw new ConfigurationError(
            'Google service account credentials not found. ' +
            'Set GOOGLE_SERVICE_ACCOUNT_JSON or place a key file at GOOGLE_SERVICE_ACCOUNT_PATH',
            'GOOGLE_SERVICE_ACCOUNT_JSON'
        );
    }

    const auth = new google.auth.JWT({
        email: keyFile.client_email,
        key: keyFile.private_key,
        scopes: [SHEETS_API_SCOPE],
    });

    sheetsClient = google.sheets({ version: 'v4', auth });
    sheetsLogger.info('Google Sheets API client initialized');
    return sheetsClient;
}

// ============================================
// RATE LIMITER
// ============================================

/**
 * Wait if needed to respect rate limit (min API_CALL_DELAY_MS between calls)
 */
async function rateLimit(): Promise<void> {
    const now = Date.now();
    const elapsed = now - lastCallAt;
    if (elapsed < API_CALL_DELAY_MS) {
        await new Promise(resolve => setTimeout(resolve, API_CALL_DELAY_MS - elapsed));
    }
    lastCallAt = Date.now();
}

// ============================================
// RETRY LOGIC
// ============================================

function statusCodeOf(error: unknown): number | undefined {
    // googleapis throws GaxiosError with `code` as a string
    if (!(error instanceof Error) || !('code' in error)) return undefined;
    const code = Number(error.code);
    return Number.isFinite(code) ? code : undefined;
}

/**
 * Retry on transient errors (429, 500, 503) with exponential backoff.
 * Whatever still fails is rethrown as ExternalServiceError.
 */
async function withRetry<T>(operation: () => Promise<T>, label: string): Promise<T> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= API_MAX_RETRIES; attempt++) {
        try {
            await rateLimit();
            return await operation();
        } catch (error: unknown) {
            lastError = toError(error);
            const statusCode = statusCodeOf(error);

            const isTransient = statusCode === 429 || statusCode === 500 || statusCode === 503;
            if (!isTransient || attempt === API_MAX_RETRIES) break;

            const delay = Math.pow(2, attempt) * 1000; // 1s, 2s, 4s
            sheetsLogger.warn(
                { attempt: attempt + 1, delay, statusCode, label },
                'Retrying after transient error'
            );
            await new Promise(resolve => setTimeout(resolve, delay));
        }
    }

    throw new ExternalServiceError(
        `${label} failed: ${lastError?.message ?? 'exhausted retries'}`,
        SERVICE_NAME,
        lastError
    );
}

// ============================================
// PURE HELPERS
// ============================================

/**
 * Spreadsheet ID from a sheet URL (…/d/<id>/edit) or a bare ID.
 * @throws ConfigurationError when neither form matches
 */
export function extractSpreadsheetId(locator: string): string {
    const trimmed = locator.trim();
    const fromUrl = trimmed.match(/\/d\/([a-zA-Z0-9-_]+)/);
    if (fromUrl) return fromUrl[1];
    if (/^[a-zA-Z0-9-_]+$/.test(trimmed)) return trimmed;
    throw new ConfigurationError(`Cannot extract a spreadsheet ID from "${locator}"`, 'SHIPMENT_SPREADSHEET_URL');
}

/**
 * 1-based first row of an append's updatedRange ("'unknown'!A125:S125" → 125)
 * @throws MalformedResponseError when the range cannot be read
 */
export function parseAppendedRow(updatedRange: string | null | undefined): number {
    const match = (updatedRange ?? '').match(/!\$?[A-Za-z]+\$?(\d+)/);
    if (!match) {
        throw new MalformedResponseError(`Unexpected updatedRange in append response: "${updatedRange ?? ''}"`, 'append');
    }
    return Number(match[1]);
}

export function toCellValue(value: unknown): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    return String(value);
}

function toCellRows(values: unknown[][] | null | undefined): CellValue[][] {
    return (values ?? []).map(row => row.map(toCellValue));
}

function textFormatOf(style: TextStyle): { textFormat: sheets_v4.Schema$TextFormat; fields: string[] } {
    const textFormat: sheets_v4.Schema$TextFormat = {};
    const fields: string[] = [];
    if (style.fontSize !== undefined) {
        textFormat.fontSize = style.fontSize;
        fields.push('userEnteredFormat.textFormat.fontSize');
    }
    if (style.linkUri !== undefined) {
        textFormat.link = { uri: style.linkUri };
        fields.push('userEnteredFormat.textFormat.link');
    }
    if (style.foregroundColor !== undefined) {
        textFormat.foregroundColor = { ...style.foregroundColor };
        fields.push('userEnteredFormat.textFormat.foregroundColor');
    }
    return { textFormat, fields };
}

/** RepeatCellRequest (1-based, inclusive) → Sheets API repeatCell request */
export function toRepeatCellRequest(request: RepeatCellRequest): sheets_v4.Schema$Request {
    const cell: sheets_v4.Schema$CellData = {};
    const fields: string[] = [];

    if (request.value !== undefined) {
        // Omitting userEnteredValue while naming it in `fields` clears the cell
        if (request.value !== null) cell.userEnteredValue = { stringValue: request.value };
        fields.push('userEnteredValue');
    }
    if (request.note !== undefined) {
        cell.note = request.note;
        fields.push('note');
    }
    if (request.style) {
        const format = textFormatOf(request.style);
        cell.userEnteredFormat = { textFormat: format.textFormat };
        fields.push(...format.fields);
    }

    return {
        repeatCell: {
            range: {
                sheetId: request.sheetId,
                startRowIndex: request.startRow - 1,
                endRowIndex: request.endRow,
                startColumnIndex: request.startColumn - 1,
                endColumnIndex: request.endColumn,
            },
            cell,
            fields: fields.join(','),
        },
    };
}

/** "B5" or "A3:C3" → 1-based inclusive bounds */
function addressBounds(address: string): { startRow: number; endRow: number; startColumn: number; endColumn: number } {
    const [first, last = first] = address.split(':');
    const start = a1ToRowCol(first);
    const end = a1ToRowCol(last);
    return { startRow: start.row, endRow: end.row, startColumn: start.column, endColumn: end.column };
}

function toWorksheetInfo(sheet: sheets_v4.Schema$Sheet): WorksheetInfo {
    const props = sheet.properties;
    if (!props || typeof props.title !== 'string' || typeof props.sheetId !== 'number') {
        throw new MalformedResponseError('Worksheet without title or sheetId in spreadsheet metadata', 'listWorksheets');
    }
    return {
        title: props.title,
        sheetId: props.sheetId,
        columnCount: props.gridProperties?.columnCount ?? 0,
        rowCount: props.gridProperties?.rowCount ?? 0,
    };
}

// ============================================
// DOCUMENT
// ============================================

class GoogleSheetDocument implements SheetDocument {
    private sheetIds = new Map<string, number>();

    constructor(
        private readonly client: sheets_v4.Sheets,
        readonly spreadsheetId: string,
        private pendingListing: WorksheetInfo[] | null
    ) {
        if (pendingListing) this.remember(pendingListing);
    }

    private remember(worksheets: readonly WorksheetInfo[]): void {
        this.sheetIds = new Map(worksheets.map(sheet => [sheet.title, sheet.sheetId]));
    }

    async listWorksheets(): Promise<WorksheetInfo[]> {
        // The listing fetched by open() serves the first call
        if (this.pendingListing) {
            const listing = this.pendingListing;
            this.pendingListing = null;
            return listing;
        }
        const worksheets = await fetchWorksheets(this.client, this.spreadsheetId);
        this.remember(worksheets);
        return worksheets;
    }

    async sheetIdFor(title: string): Promise<number> {
        const known = this.sheetIds.get(title);
        if (known !== undefined) return known;
        await this.listWorksheets();
        const fetched = this.sheetIds.get(title);
        if (fetched === undefined) {
            throw new ExternalServiceError(`Worksheet "${title}" not found`, SERVICE_NAME);
        }
        return fetched;
    }

    worksheet(title: string): Worksheet {
        return new GoogleWorksheet(this, this.client, title);
    }

    async batchApply(requests: readonly RepeatCellRequest[]): Promise<void> {
        if (requests.length === 0) return;
        await withRetry(
            () => this.client.spreadsheets.batchUpdate({
                spreadsheetId: this.spreadsheetId,
                requestBody: { requests: requests.map(toRepeatCellRequest) },
            }),
            `batchApply(${requests.length} requests)`
        );
    }
}

async function fetchWorksheets(client: sheets_v4.Sheets, spreadsheetId: string): Promise<WorksheetInfo[]> {
    const response = await withRetry(
        () => client.spreadsheets.get({
            spreadsheetId,
            includeGridData: false,
            fields: 'sheets.properties',
        }),
        'listWorksheets'
    );
    return (response.data.sheets ?? []).map(toWorksheetInfo);
}

// ============================================
// WORKSHEET
// ============================================

class GoogleWorksheet implements Worksheet {
    constructor(
        private readonly document: GoogleSheetDocument,
        private readonly client: sheets_v4.Sheets,
        readonly title: string
    ) {}

    private range(a1: string): string {
        return `${quoteSheetTitle(this.title)}!${a1}`;
    }

    private async getValues(a1: string, majorDimension: 'ROWS' | 'COLUMNS' = 'ROWS'): Promise<CellValue[][]> {
        const range = this.range(a1);
        const response = await withRetry(
            () => this.client.spreadsheets.values.get({
                spreadsheetId: this.document.spreadsheetId,
                range,
                majorDimension,
                valueRenderOption: 'FORMATTED_VALUE',
            }),
            `read(${range})`
        );
        return toCellRows(response.data.values);
    }

    async readAllValues(): Promise<CellValue[][]> {
        const range = quoteSheetTitle(this.title);
        const response = await withRetry(
            () => this.client.spreadsheets.values.get({
                spreadsheetId: this.document.spreadsheetId,
                range,
                valueRenderOption: 'FORMATTED_VALUE',
            }),
            `readAllValues(${this.title})`
        );
        return toCellRows(response.data.values);
    }

    async readRow(row: number): Promise<CellValue[]> {
        const rows = await this.getValues(`${row}:${row}`);
        return rows[0] ?? [];
    }

    async readColumn(column: number): Promise<CellValue[]> {
        const letter = columnToLetter(column);
        const columns = await this.getValues(`${letter}:${letter}`, 'COLUMNS');
        return columns[0] ?? [];
    }

    async readCell(row: number, column: number): Promise<CellValue> {
        const rows = await this.getValues(rowColToA1(row, column));
        return rows[0]?.[0] ?? null;
    }

    async writeCell(row: number, column: number, value: string | null): Promise<void> {
        const range = this.range(rowColToA1(row, column));
        await withRetry(
            () => this.client.spreadsheets.values.update({
                spreadsheetId: this.document.spreadsheetId,
                range,
                valueInputOption: 'USER_ENTERED',
                requestBody: { values: [[value ?? '']] },
            }),
            `writeCell(${range})`
        );
    }

    async appendRow(values: readonly (string | null)[]): Promise<number> {
        const range = this.range('A1');
        const response = await withRetry(
            () => this.client.spreadsheets.values.append({
                spreadsheetId: this.document.spreadsheetId,
                range,
                valueInputOption: 'USER_ENTERED',
                insertDataOption: 'INSERT_ROWS',
                requestBody: { values: [values.map(value => value ?? '')] },
            }),
            `appendRow(${this.title})`
        );
        return parseAppendedRow(response.data.updates?.updatedRange);
    }

    async applyNote(address: string, text: string): Promise<void> {
        await this.document.batchApply([{
            sheetId: await this.document.sheetIdFor(this.title),
            ...addressBounds(address),
            note: text,
        }]);
    }

    async applyFormat(address: string, style: TextStyle): Promise<void> {
        await this.document.batchApply([{
            sheetId: await this.document.sheetIdFor(this.title),
            ...addressBounds(address),
            style,
        }]);
    }
}

// ============================================
// PUBLIC API
// ============================================

/**
 * Worksheet source backed by the Sheets API.
 * open() authenticates (lazily, once per process) and fetches the worksheet
 * listing, so an unreachable or unshared spreadsheet fails before any work.
 */
export function createGoogleSheetSource(): SheetSource {
    return {
        async open(locator: string): Promise<SheetDocument> {
            const spreadsheetId = extractSpreadsheetId(locator);
            const client = getClient();
            const worksheets = await fetchWorksheets(client, spreadsheetId);
            sheetsLogger.debug({ spreadsheetId, worksheets: worksheets.length }, 'Opened spreadsheet');
            return new GoogleSheetDocument(client, spreadsheetId, worksheets);
        },
    };
}
