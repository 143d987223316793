/**
 * Database table types (Kysely)
 *
 * Mirrors the schema created by ./migrations. Keep both in step.
 */

import type { ColumnType, Generated, Insertable, Selectable } from 'kysely';
import type { ShipmentBusinessField } from '@shipsync/shared/domain';

type Timestamp = ColumnType<Date, Date | string | undefined, Date | string>;

/** Mapped business columns of a shipment row */
export interface ShipmentBusinessColumns {
    order_name: string | null;
    shipment_status: string | null;
    source_location: string | null;
    destination_location: string | null;
    service_provider: string | null;
    insert_time: string | null;
    plan_date: string | null;
    status_delivery: string | null;
    status_site: string | null;
    ata: string | null;
    atd: string | null;
    global_pod_cycle_statistic: string | null;
    period: string | null;
    pm_location: string | null;
    last_status: string | null;
    driver_contact_name: string | null;
    driver_contact_number: string | null;
    remark: string | null;
}

export type BusinessColumn = keyof ShipmentBusinessColumns;

export interface ShipmentsTable extends ShipmentBusinessColumns {
    id: Generated<number>;
    /** Identity key, never updated */
    shipment_no: ColumnType<string, string, never>;
    is_deleted: Generated<boolean>;
    // Position pointer (cache only)
    sheet_title: string | null;
    sheet_row: number | null;
    sheet_cell: string | null;
    last_write_at: ColumnType<Date | null, Date | string | null | undefined, Date | string | null>;
    created_at: Timestamp;
    updated_at: Timestamp;
}

export type SyncRunStatus = 'running' | 'completed' | 'failed';
export type SyncRunTrigger = 'scheduled' | 'manual' | 'startup';

export interface SheetSyncRunsTable {
    id: Generated<number>;
    job_name: string;
    status: ColumnType<SyncRunStatus, SyncRunStatus | undefined, SyncRunStatus>;
    triggered_by: SyncRunTrigger;
    started_at: Timestamp;
    completed_at: ColumnType<Date | null, Date | null | undefined, Date | null>;
    duration_ms: number | null;
    /** jsonb; written as a JSON string */
    result: ColumnType<unknown, string | null | undefined, string | null>;
    error: string | null;
}

export interface DB {
    shipments: ShipmentsTable;
    sheet_sync_runs: SheetSyncRunsTable;
}

export type ShipmentRow = Selectable<ShipmentsTable>;
export type NewShipmentRow = Insertable<ShipmentsTable>;

/** Canonical field → column */
export const BUSINESS_COLUMNS: Readonly<Record<ShipmentBusinessField, BusinessColumn>> = {
    orderName: 'order_name',
    shipmentStatus: 'shipment_status',
    sourceLocation: 'source_location',
    destinationLocation: 'destination_location',
    serviceProvider: 'service_provider',
    insertTime: 'insert_time',
    planDate: 'plan_date',
    statusDelivery: 'status_delivery',
    statusSite: 'status_site',
    ata: 'ata',
    atd: 'atd',
    globalPodCycleStatistic: 'global_pod_cycle_statistic',
    period: 'period',
    pmLocation: 'pm_location',
    lastStatus: 'last_status',
    driverContactName: 'driver_contact_name',
    driverContactNumber: 'driver_contact_number',
    remark: 'remark',
};

/**
 * Columns compared by the diff-gated upsert: a stored row is only touched
 * when one of these differs from the incoming value.
 */
export const TRACKED_COLUMNS = [
    'order_name',
    'shipment_status',
    'source_location',
    'destination_location',
    'service_provider',
    'insert_time',
    'plan_date',
    'status_delivery',
    'status_site',
    'ata',
    'atd',
    'global_pod_cycle_statistic',
    'period',
    'pm_location',
    'last_status',
    'driver_contact_name',
    'driver_contact_number',
    'remark',
    'is_deleted',
    'sheet_title',
    'sheet_row',
    'sheet_cell',
] as const satisfies readonly (keyof ShipmentsTable)[];

