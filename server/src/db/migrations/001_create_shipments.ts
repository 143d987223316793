import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
    await db.schema
        .createTable('shipments')
        .addColumn('id', 'serial', col => col.primaryKey())
        .addColumn('shipment_no', 'text', col => col.notNull().unique())
        .addColumn('order_name', 'text')
        .addColumn('shipment_status', 'text')
        .addColumn('source_location', 'text')
        .addColumn('destination_location', 'text')
        .addColumn('service_provider', 'text')
        .addColumn('insert_time', 'text')
        .addColumn('plan_date', 'text')
        .addColumn('status_delivery', 'text')
        .addColumn('status_site', 'text')
        .addColumn('ata', 'text')
        .addColumn('atd', 'text')
        .addColumn('global_pod_cycle_statistic', 'text')
        .addColumn('period', 'text')
        .addColumn('pm_location', 'text')
        .addColumn('last_status', 'text')
        .addColumn('driver_contact_name', 'text')
        .addColumn('driver_contact_number', 'text')
        .addColumn('remark', 'text')
        .addColumn('is_deleted', 'boolean', col => col.notNull().defaultTo(false))
        .addColumn('sheet_title', 'text')
        .addColumn('sheet_row', 'integer')
        .addColumn('sheet_cell', 'text')
        .addColumn('last_write_at', 'timestamptz')
        .addColumn('created_at', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createIndex('shipments_order_name_idx')
        .on('shipments')
        .expression(sql`lower(trim(order_name))`)
        .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
    await db.schema.dropTable('shipments').execute();
}
