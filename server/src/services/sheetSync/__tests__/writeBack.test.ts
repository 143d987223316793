/**
 * Unit tests for targeted write-back and PM location assignment
 */

import { ConfigurationError, ValidationError } from '../../../utils/errors.js';
import { assignPmLocation, writeBackShipment } from '../writeBack.js';
import { FakeSpreadsheet } from './helpers/fakeSheets.js';
import { InMemoryShipmentRepository } from './helpers/memoryRepository.js';
import { SHIPMENT_HEADERS, TEST_NOW, createTestDeps } from './helpers/deps.js';

const STAMP = '10/15/2024 9:05:09';
const INSERT_TIME = '2024-10-15 09:05:09';

function buildSpreadsheet(): FakeSpreadsheet {
    return new FakeSpreadsheet([
        {
            title: 'Jakarta',
            rows: [
                SHIPMENT_HEADERS,
                // SN-0 was inserted above SN-1 after its position was cached
                ['SN-0', 'Order Z'],
                ['SN-1', 'Order A'],
                ['SN-2', ' order a '],
            ],
        },
        { title: 'Unknown', rows: [SHIPMENT_HEADERS] },
    ]);
}

function buildRepository(): InMemoryShipmentRepository {
    return new InMemoryShipmentRepository([
        { shipmentNo: 'SN-1', orderName: 'Order A', sheetTitle: 'Jakarta', sheetRow: 2, sheetCell: 'A2' },
        { shipmentNo: 'SN-2', orderName: ' order a ', sheetTitle: 'Jakarta', sheetRow: 4, sheetCell: 'A4' },
        { shipmentNo: 'SN-8', orderName: 'Order A', isDeleted: true },
    ]);
}

describe('writeBackShipment', () => {
    let spreadsheet: FakeSpreadsheet;
    let repository: InMemoryShipmentRepository;

    beforeEach(() => {
        spreadsheet = buildSpreadsheet();
        repository = buildRepository();
    });

    it('relocates a drifted record, writes the cell and stores the corrected pointer', async () => {
        const result = await writeBackShipment(createTestDeps(spreadsheet, repository), {
            shipmentNo: 'SN-1',
            fields: { remark: 'late truck' },
        });

        expect(result).toMatchObject({
            updatedCount: 1,
            created: false,
            shipmentNo: 'SN-1',
            sheetTitle: 'Jakarta',
            sheetRow: 3,
            sheetCell: 'A3',
            correctedPosition: true,
            remoteSkipped: false,
            errors: [],
        });
        expect(result.fieldResults).toEqual([
            { shipmentNo: 'SN-1', field: 'remark', value: 'late truck', derived: false, status: 'written' },
        ]);
        expect(spreadsheet.cell('Jakarta', 3, 8)).toBe('late truck');
        expect(spreadsheet.cell('Jakarta', 2, 8)).toBeNull();
        expect(repository.get('SN-1')).toMatchObject({
            remark: 'late truck',
            sheetRow: 3,
            sheetCell: 'A3',
            lastWriteAt: TEST_NOW,
        });
    });

    it('writes the derived ATA stamp alongside a delivered status', async () => {
        const result = await writeBackShipment(createTestDeps(spreadsheet, repository), {
            shipmentNo: 'SN-2',
            fields: { statusDelivery: 'POD' },
        });

        expect(result.correctedPosition).toBe(false);
        expect(result.fieldResults.map(field => [field.field, field.status, field.derived])).toEqual([
            ['statusDelivery', 'written', false],
            ['ata', 'written', true],
        ]);
        expect(spreadsheet.cell('Jakarta', 4, 4)).toBe(STAMP);
        expect(repository.get('SN-2')?.ata).toBe(STAMP);
    });

    it('creates an unknown shipment and appends exactly one row for it', async () => {
        const deps = createTestDeps(spreadsheet, repository);

        const result = await writeBackShipment(deps, {
            shipmentNo: 'SN-NEW',
            fields: { orderName: 'Order N', statusDelivery: 'POD' },
        });

        expect(result).toMatchObject({
            created: true,
            updatedCount: 0,
            sheetTitle: 'Unknown',
            sheetRow: 2,
            sheetCell: 'A2',
            errors: [],
        });
        expect(result.fieldResults.every(field => field.status === 'written')).toBe(true);
        expect(spreadsheet.sheet('Unknown').rows[1]).toEqual([
            'SN-NEW', 'Order N', 'POD', STAMP, null, null, INSERT_TIME, null,
        ]);
        expect(repository.get('SN-NEW')).toMatchObject({
            insertTime: INSERT_TIME,
            sheetTitle: 'Unknown',
            sheetRow: 2,
            lastWriteAt: TEST_NOW,
        });

        await writeBackShipment(deps, { shipmentNo: 'SN-NEW', fields: { remark: 'second write' } });

        expect(spreadsheet.callsOf('appendRow')).toEqual(['appendRow:Unknown']);
        expect(spreadsheet.cell('Unknown', 2, 8)).toBe('second write');
    });

    it('reports fields the fallback worksheet has no column for', async () => {
        const narrow = new FakeSpreadsheet([
            { title: 'Jakarta', rows: [SHIPMENT_HEADERS] },
            { title: 'Unknown', rows: [['Shipment No', 'Status Delivery', 'Insert Time']] },
        ]);

        const result = await writeBackShipment(createTestDeps(narrow, repository), {
            shipmentNo: 'SN-NEW',
            fields: { statusDelivery: 'POD', remark: 'late truck' },
        });

        expect(result.fieldResults).toEqual([
            { shipmentNo: 'SN-NEW', field: 'statusDelivery', value: 'POD', derived: false, status: 'written' },
            {
                shipmentNo: 'SN-NEW',
                field: 'remark',
                value: 'late truck',
                derived: false,
                status: 'failed',
                error: 'column for remark not present in "Unknown"',
            },
            {
                shipmentNo: 'SN-NEW',
                field: 'ata',
                value: STAMP,
                derived: true,
                status: 'skipped',
                error: 'column for ata not present in "Unknown"',
            },
        ]);
        expect(result.errors).toEqual(['SN-NEW.remark: column for remark not present in "Unknown"']);
        expect(narrow.sheet('Unknown').rows[1]).toEqual(['SN-NEW', 'POD', INSERT_TIME]);
        expect(repository.get('SN-NEW')).toMatchObject({ remark: 'late truck', ata: STAMP, sheetRow: 2 });
    });

    it('updates a shipment another write-back created first', async () => {
        // Not found on the first lookup: the concurrent insert lands before ours
        vi.spyOn(repository, 'findByShipmentNo').mockResolvedValueOnce(null);

        const result = await writeBackShipment(createTestDeps(spreadsheet, repository), {
            shipmentNo: 'SN-1',
            fields: { remark: 'late truck' },
        });

        expect(result).toMatchObject({ created: false, updatedCount: 1, sheetRow: 3, errors: [] });
        expect(spreadsheet.callsOf('appendRow')).toEqual([]);
        expect(spreadsheet.cell('Jakarta', 3, 8)).toBe('late truck');
        expect(repository.records.filter(record => record.shipmentNo === 'SN-1')).toHaveLength(1);
        expect(repository.get('SN-1')?.remark).toBe('late truck');
    });

    it('updates only the database when remote work is skipped', async () => {
        const deps = createTestDeps(spreadsheet, repository, { spreadsheetLocator: null });

        const result = await writeBackShipment(deps, {
            shipmentNo: 'SN-1',
            fields: { pmLocation: 'PM Jakarta' },
            options: { skipRemote: true },
        });

        expect(result).toMatchObject({ remoteSkipped: true, sheetRow: 2, correctedPosition: false });
        expect(result.fieldResults[0].status).toBe('skipped');
        expect(deps.sheetSource.opened).toEqual([]);
        expect(repository.get('SN-1')?.pmLocation).toBe('PM Jakarta');
    });

    it('reports an unreachable spreadsheet after the database update', async () => {
        const deps = createTestDeps(spreadsheet, repository);
        deps.sheetSource.failOpen = new Error('quota exceeded');

        const result = await writeBackShipment(deps, { shipmentNo: 'SN-1', fields: { remark: 'late' } });

        expect(result.errors).toEqual(['spreadsheet unavailable: quota exceeded']);
        expect(result.fieldResults[0]).toMatchObject({ status: 'failed', error: 'spreadsheet unavailable: quota exceeded' });
        expect(repository.get('SN-1')?.remark).toBe('late');
    });

    it('rejects unknown fields before touching anything', async () => {
        const deps = createTestDeps(spreadsheet, repository);

        await expect(writeBackShipment(deps, { shipmentNo: 'SN-1', fields: { color: 'red' } }))
            .rejects.toBeInstanceOf(ValidationError);
        await expect(writeBackShipment(deps, { shipmentNo: 'SN-1', fields: {} }))
            .rejects.toBeInstanceOf(ValidationError);
        expect(deps.sheetSource.opened).toEqual([]);
    });

    it('requires a spreadsheet location unless remote work is skipped', async () => {
        const deps = createTestDeps(spreadsheet, repository, { spreadsheetLocator: '  ' });

        await expect(writeBackShipment(deps, { shipmentNo: 'SN-1', fields: { remark: 'late' } }))
            .rejects.toBeInstanceOf(ConfigurationError);
        expect(repository.get('SN-1')?.remark).toBeNull();
    });
});

describe('assignPmLocation', () => {
    let spreadsheet: FakeSpreadsheet;
    let repository: InMemoryShipmentRepository;

    beforeEach(() => {
        spreadsheet = buildSpreadsheet();
        repository = buildRepository();
    });

    it('updates every active shipment of the order in one batch', async () => {
        const result = await assignPmLocation(createTestDeps(spreadsheet, repository), {
            orderName: 'ORDER A',
            pmLocation: 'PM Budi',
        });

        expect(result).toMatchObject({
            updatedCount: 2,
            created: false,
            shipmentNos: ['SN-1', 'SN-2'],
            sheetRow: 3,
            correctedPosition: true,
            errors: [],
        });
        expect(result.fieldResults).toHaveLength(4);
        expect(spreadsheet.callsOf('batchApply')).toEqual(['batchApply:4']);
        expect(spreadsheet.cell('Jakarta', 3, 6)).toBe('PM Budi');
        expect(spreadsheet.cell('Jakarta', 4, 6)).toBe('PM Budi');
        expect(spreadsheet.cell('Jakarta', 4, 7)).toBe(INSERT_TIME);
        expect(repository.get('SN-2')).toMatchObject({ pmLocation: 'PM Budi', insertTime: INSERT_TIME });
        expect(repository.get('SN-8')?.pmLocation).toBeNull();
    });

    it('creates a placeholder shipment when the order has none', async () => {
        const result = await assignPmLocation(createTestDeps(spreadsheet, repository), {
            orderName: 'Order #B 7',
            pmLocation: 'PM Sari',
        });

        expect(result.created).toBe(true);
        expect(result.shipmentNo).toMatch(/^UNKNOWN-Order-B-7-[0-9a-f]{6}$/);
        expect(result.shipmentNos).toEqual([result.shipmentNo]);
        expect(spreadsheet.sheet('Unknown').rows[1]).toEqual([
            result.shipmentNo, 'Order #B 7', null, null, null, 'PM Sari', INSERT_TIME, null,
        ]);
        expect(repository.get(result.shipmentNo)).toMatchObject({ orderName: 'Order #B 7', pmLocation: 'PM Sari' });
    });

    it('rejects a blank PM location', async () => {
        await expect(assignPmLocation(createTestDeps(spreadsheet, repository), { orderName: 'Order A', pmLocation: ' ' }))
            .rejects.toBeInstanceOf(ValidationError);
    });
});
