/**
 * Shipment repository (Kysely)
 *
 * The sync engine talks to the shipments table only through
 * ShipmentRepository, so it can run against an in-memory stand-in in tests.
 */

import { sql, type Kysely } from 'kysely';
import { BUSINESS_FIELDS, type ShipmentBusinessField } from '@shipsync/shared/domain';
import {
    BUSINESS_COLUMNS,
    TRACKED_COLUMNS,
    type BusinessColumn,
    type DB,
    type NewShipmentRow,
    type ShipmentRow,
} from '../schema.js';
import { UPSERT_BATCH_SIZE } from '../../config/sync/sheets.js';

// ============================================
// TYPES
// ============================================

export type ShipmentFieldValues = Record<ShipmentBusinessField, string | null>;

/** Cached location of a record's identity cell. Never a source of truth. */
export interface PositionPointer {
    sheetTitle: string;
    /** 1-based */
    sheetRow: number;
    /** A1 address of the identity cell */
    sheetCell: string;
}

export interface ShipmentRecord extends ShipmentFieldValues {
    id: number;
    shipmentNo: string;
    isDeleted: boolean;
    sheetTitle: string | null;
    sheetRow: number | null;
    sheetCell: string | null;
    lastWriteAt: Date | null;
}

/** A row observed by pull-sync, with its provenance */
export interface IncomingShipment extends ShipmentFieldValues, PositionPointer {
    shipmentNo: string;
}

export interface NewShipment {
    shipmentNo: string;
    fields: Partial<ShipmentFieldValues>;
}

export interface ShipmentRepository {
    /** Every stored row, soft-deleted included */
    listAll(): Promise<ShipmentRecord[]>;
    /** Diff-gated insert-or-update keyed on shipment number; clears soft-delete */
    upsertFromSheet(rows: readonly IncomingShipment[]): Promise<void>;
    /** Soft-delete the given active keys; returns rows changed */
    softDelete(shipmentNos: readonly string[]): Promise<number>;
    findByShipmentNo(shipmentNo: string): Promise<ShipmentRecord | null>;
    /** Active rows whose order name matches case-insensitively after trimming */
    findActiveByOrderName(orderName: string): Promise<ShipmentRecord[]>;
    /** Insert a new record; null when the shipment number already exists */
    create(input: NewShipment): Promise<ShipmentRecord | null>;
    updateFields(id: number, fields: Partial<ShipmentFieldValues>): Promise<void>;
    updatePointer(id: number, pointer: PositionPointer, lastWriteAt: Date | null): Promise<void>;
    /** Run fn in one transaction; nested calls reuse the outer one */
    transaction<T>(fn: (repository: ShipmentRepository) => Promise<T>): Promise<T>;
}

// ============================================
// MAPPING
// ============================================

export function toBusinessColumns(fields: Partial<ShipmentFieldValues>): Partial<Record<BusinessColumn, string | null>> {
    const columns: Partial<Record<BusinessColumn, string | null>> = {};
    for (const field of BUSINESS_FIELDS) {
        const value = fields[field];
        if (value !== undefined) columns[BUSINESS_COLUMNS[field]] = value;
    }
    return columns;
}

function toRecord(row: ShipmentRow): ShipmentRecord {
    return {
        id: row.id,
        shipmentNo: row.shipment_no,
        orderName: row.order_name,
        shipmentStatus: row.shipment_status,
        sourceLocation: row.source_location,
        destinationLocation: row.destination_location,
        serviceProvider: row.service_provider,
        insertTime: row.insert_time,
        planDate: row.plan_date,
        statusDelivery: row.status_delivery,
        statusSite: row.status_site,
        ata: row.ata,
        atd: row.atd,
        globalPodCycleStatistic: row.global_pod_cycle_statistic,
        period: row.period,
        pmLocation: row.pm_location,
        lastStatus: row.last_status,
        driverContactName: row.driver_contact_name,
        driverContactNumber: row.driver_contact_number,
        remark: row.remark,
        isDeleted: row.is_deleted,
        sheetTitle: row.sheet_title,
        sheetRow: row.sheet_row,
        sheetCell: row.sheet_cell,
        lastWriteAt: row.last_write_at,
    };
}

function toInsertRow(row: IncomingShipment): NewShipmentRow {
    return {
        shipment_no: row.shipmentNo,
        ...toBusinessColumns(row),
        is_deleted: false,
        sheet_title: row.sheetTitle,
        sheet_row: row.sheetRow,
        sheet_cell: row.sheetCell,
    };
}

/**
 * True when any column the upsert compares differs between the stored
 * record and the incoming row. Mirrors the upsert's WHERE clause so
 * counts line up with what the database actually touched.
 */
export function hasTrackedChanges(stored: ShipmentRecord, incoming: IncomingShipment): boolean {
    if (stored.isDeleted) return true;
    if (stored.sheetTitle !== incoming.sheetTitle) return true;
    if (stored.sheetRow !== incoming.sheetRow) return true;
    if (stored.sheetCell !== incoming.sheetCell) return true;
    return BUSINESS_FIELDS.some(field => stored[field] !== incoming[field]);
}

// ============================================
// QUERIES
// ============================================

/**
 * INSERT ... ON CONFLICT (shipment_no) DO UPDATE ... WHERE <any tracked
 * column IS DISTINCT FROM excluded>. Unchanged rows are left alone, so
 * updated_at only moves on a real change.
 */
export function buildShipmentUpsert(db: Kysely<DB>, rows: readonly IncomingShipment[]) {
    return db
        .insertInto('shipments')
        .values(rows.map(toInsertRow))
        .onConflict(oc => oc
            .column('shipment_no')
            .doUpdateSet(eb => ({
                order_name: eb.ref('excluded.order_name'),
                shipment_status: eb.ref('excluded.shipment_status'),
                source_location: eb.ref('excluded.source_location'),
                destination_location: eb.ref('excluded.destination_location'),
                service_provider: eb.ref('excluded.service_provider'),
                insert_time: eb.ref('excluded.insert_time'),
                plan_date: eb.ref('excluded.plan_date'),
                status_delivery: eb.ref('excluded.status_delivery'),
                status_site: eb.ref('excluded.status_site'),
                ata: eb.ref('excluded.ata'),
                atd: eb.ref('excluded.atd'),
                global_pod_cycle_statistic: eb.ref('excluded.global_pod_cycle_statistic'),
                period: eb.ref('excluded.period'),
                pm_location: eb.ref('excluded.pm_location'),
                last_status: eb.ref('excluded.last_status'),
                driver_contact_name: eb.ref('excluded.driver_contact_name'),
                driver_contact_number: eb.ref('excluded.driver_contact_number'),
                remark: eb.ref('excluded.remark'),
                is_deleted: eb.ref('excluded.is_deleted'),
                sheet_title: eb.ref('excluded.sheet_title'),
                sheet_row: eb.ref('excluded.sheet_row'),
                sheet_cell: eb.ref('excluded.sheet_cell'),
                updated_at: sql<Date>`now()`,
            }))
            .where(eb => eb.or(
                TRACKED_COLUMNS.map(column =>
                    eb(eb.ref(`shipments.${column}`), 'is distinct from', eb.ref(`excluded.${column}`))
                )
            ))
        );
}

export function buildSoftDelete(db: Kysely<DB>, shipmentNos: readonly string[]) {
    return db
        .updateTable('shipments')
        .set({ is_deleted: true, updated_at: sql<Date>`now()` })
        .where('is_deleted', '=', false)
        .where('shipment_no', 'in', [...shipmentNos]);
}

export function buildShipmentInsert(db: Kysely<DB>, input: NewShipment) {
    return db
        .insertInto('shipments')
        .values({ shipment_no: input.shipmentNo, ...toBusinessColumns(input.fields) })
        .onConflict(oc => oc.column('shipment_no').doNothing())
        .returningAll();
}

function chunk<T>(items: readonly T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
}

// ============================================
// REPOSITORY
// ============================================

export class KyselyShipmentRepository implements ShipmentRepository {
    constructor(private readonly db: Kysely<DB>) {}

    async listAll(): Promise<ShipmentRecord[]> {
        const rows = await this.db.selectFrom('shipments').selectAll().execute();
        return rows.map(toRecord);
    }

    async upsertFromSheet(rows: readonly IncomingShipment[]): Promise<void> {
        for (const batch of chunk(rows, UPSERT_BATCH_SIZE)) {
            await buildShipmentUpsert(this.db, batch).execute();
        }
    }

    async softDelete(shipmentNos: readonly string[]): Promise<number> {
        let changed = 0;
        for (const batch of chunk(shipmentNos, UPSERT_BATCH_SIZE)) {
            const result = await buildSoftDelete(this.db, batch).executeTakeFirst();
            changed += Number(result.numUpdatedRows);
        }
        return changed;
    }

    async findByShipmentNo(shipmentNo: string): Promise<ShipmentRecord | null> {
        const row = await this.db
            .selectFrom('shipments')
            .selectAll()
            .where('shipment_no', '=', shipmentNo)
            .executeTakeFirst();
        return row ? toRecord(row) : null;
    }

    async findActiveByOrderName(orderName: string): Promise<ShipmentRecord[]> {
        const rows = await this.db
            .selectFrom('shipments')
            .selectAll()
            .where('is_deleted', '=', false)
            .where(sql<string>`lower(trim(order_name))`, '=', orderName.trim().toLowerCase())
            .orderBy('id')
            .execute();
        return rows.map(toRecord);
    }

    async create(input: NewShipment): Promise<ShipmentRecord | null> {
        const row = await buildShipmentInsert(this.db, input).executeTakeFirst();
        return row ? toRecord(row) : null;
    }

    async updateFields(id: number, fields: Partial<ShipmentFieldValues>): Promise<void> {
        const columns = toBusinessColumns(fields);
        if (Object.keys(columns).length === 0) return;
        await this.db
            .updateTable('shipments')
            .set({ ...columns, updated_at: sql<Date>`now()` })
            .where('id', '=', id)
            .execute();
    }

    async updatePointer(id: number, pointer: PositionPointer, lastWriteAt: Date | null): Promise<void> {
        await this.db
            .updateTable('shipments')
            .set({
                sheet_title: pointer.sheetTitle,
                sheet_row: pointer.sheetRow,
                sheet_cell: pointer.sheetCell,
                ...(lastWriteAt ? { last_write_at: lastWriteAt } : {}),
            })
            .where('id', '=', id)
            .execute();
    }

    async transaction<T>(fn: (repository: ShipmentRepository) => Promise<T>): Promise<T> {
        if (this.db.isTransaction) return fn(this);
        return this.db.transaction().execute(trx => fn(new KyselyShipmentRepository(trx)));
    }
}
