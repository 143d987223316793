/**
 * Unit tests for shipment queries (compiled SQL, no database)
 */

import {
    DummyDriver,
    Kysely,
    PostgresAdapter,
    PostgresIntrospector,
    PostgresQueryCompiler,
} from 'kysely';
import { buildBusinessRecord } from '@shipsync/shared/domain';
import type { DB } from '../../schema.js';
import {
    KyselyShipmentRepository,
    buildShipmentInsert,
    buildShipmentUpsert,
    buildSoftDelete,
    hasTrackedChanges,
    toBusinessColumns,
    type IncomingShipment,
    type ShipmentRecord,
} from '../shipments.js';

const db = new Kysely<DB>({
    dialect: {
        createAdapter: () => new PostgresAdapter(),
        createDriver: () => new DummyDriver(),
        createIntrospector: kysely => new PostgresIntrospector(kysely),
        createQueryCompiler: () => new PostgresQueryCompiler(),
    },
});

function incoming(overrides: Partial<IncomingShipment> = {}): IncomingShipment {
    return {
        shipmentNo: 'SN-1',
        ...buildBusinessRecord((): string | null => null),
        orderName: 'Order A',
        sheetTitle: 'Jakarta',
        sheetRow: 2,
        sheetCell: 'A2',
        ...overrides,
    };
}

function stored(overrides: Partial<ShipmentRecord> = {}): ShipmentRecord {
    return {
        id: 1,
        shipmentNo: 'SN-1',
        ...buildBusinessRecord((): string | null => null),
        orderName: 'Order A',
        isDeleted: false,
        sheetTitle: 'Jakarta',
        sheetRow: 2,
        sheetCell: 'A2',
        lastWriteAt: null,
        ...overrides,
    };
}

describe('buildShipmentUpsert', () => {
    const compiled = buildShipmentUpsert(db, [incoming()]).compile();

    it('inserts keyed on shipment number', () => {
        expect(compiled.sql.startsWith('insert into "shipments" ("shipment_no", "order_name"')).toBe(true);
        expect(compiled.parameters[0]).toBe('SN-1');
        expect(compiled.parameters[1]).toBe('Order A');
    });

    it('updates from the excluded row and stamps updated_at', () => {
        expect(compiled.sql).toContain('on conflict ("shipment_no") do update set "order_name" = "excluded"."order_name"');
        expect(compiled.sql).toContain('"updated_at" = now()');
    });

    it('only updates when a tracked column differs', () => {
        expect(compiled.sql).toContain('"shipments"."remark" is distinct from "excluded"."remark"');
        expect(compiled.sql).toContain('"shipments"."is_deleted" is distinct from "excluded"."is_deleted"');
        expect(compiled.sql).toContain('"shipments"."sheet_cell" is distinct from "excluded"."sheet_cell"');
        expect(compiled.sql).not.toContain('"shipments"."updated_at" is distinct from');
    });
});

describe('buildSoftDelete', () => {
    it('flags active rows of the given keys', () => {
        const compiled = buildSoftDelete(db, ['SN-1', 'SN-2']).compile();

        expect(compiled.sql).toBe(
            'update "shipments" set "is_deleted" = $1, "updated_at" = now() where "is_deleted" = $2 and "shipment_no" in ($3, $4)'
        );
        expect(compiled.parameters).toEqual([true, false, 'SN-1', 'SN-2']);
    });
});

describe('buildShipmentInsert', () => {
    it('leaves an existing shipment number untouched', () => {
        const compiled = buildShipmentInsert(db, { shipmentNo: 'SN-9', fields: { remark: 'late' } }).compile();

        expect(compiled.sql).toBe(
            'insert into "shipments" ("shipment_no", "remark") values ($1, $2) on conflict ("shipment_no") do nothing returning *'
        );
        expect(compiled.parameters).toEqual(['SN-9', 'late']);
    });

    it('resolves to null when the insert returns no row', async () => {
        const repository = new KyselyShipmentRepository(db);

        await expect(repository.create({ shipmentNo: 'SN-9', fields: {} })).resolves.toBeNull();
    });
});

describe('hasTrackedChanges', () => {
    it('is false for an identical row', () => {
        expect(hasTrackedChanges(stored(), incoming())).toBe(false);
    });

    it('detects business field and position changes', () => {
        expect(hasTrackedChanges(stored(), incoming({ remark: 'late' }))).toBe(true);
        expect(hasTrackedChanges(stored(), incoming({ sheetRow: 3, sheetCell: 'A3' }))).toBe(true);
        expect(hasTrackedChanges(stored({ orderName: 'Order A ' }), incoming())).toBe(true);
    });

    it('treats a soft-deleted record as changed', () => {
        expect(hasTrackedChanges(stored({ isDeleted: true }), incoming())).toBe(true);
    });
});

describe('toBusinessColumns', () => {
    it('maps only the fields present', () => {
        expect(toBusinessColumns({ remark: 'late', pmLocation: null })).toEqual({ remark: 'late', pm_location: null });
    });
});
