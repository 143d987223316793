import type { SheetSyncDeps } from '../../types.js';
import { FakeSheetSource, FakeSpreadsheet } from './fakeSheets.js';
import { InMemoryShipmentRepository } from './memoryRepository.js';

export const TEST_LOCATOR = 'https://docs.google.com/spreadsheets/d/test-sheet-id/edit';

/** 2024-10-15 09:05:09 at UTC+7 */
export const TEST_LINK = 'https://example.com/sync-log';

export const TEST_NOW = new Date('2024-10-15T02:05:09Z');

export const SHIPMENT_HEADERS = [
    'Shipment No',
    'Order Name',
    'Status Delivery',
    'ATA',
    'ATD',
    'PM Location',
    'Insert Time',
    'Remark',
];

export function createTestDeps(
    spreadsheet: FakeSpreadsheet,
    repository: InMemoryShipmentRepository,
    overrides: Partial<Omit<SheetSyncDeps, 'sheetSource'>> = {}
): SheetSyncDeps & { sheetSource: FakeSheetSource } {
    return {
        repository,
        spreadsheetLocator: TEST_LOCATOR,
        now: () => TEST_NOW,
        timezoneOffsetHours: 7,
        annotationLinkUri: TEST_LINK,
        ...overrides,
        sheetSource: new FakeSheetSource(spreadsheet),
    };
}
