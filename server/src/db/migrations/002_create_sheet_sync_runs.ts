import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
    await db.schema
        .createTable('sheet_sync_runs')
        .addColumn('id', 'serial', col => col.primaryKey())
        .addColumn('job_name', 'text', col => col.notNull())
        .addColumn('status', 'text', col => col.notNull().defaultTo('running'))
        .addColumn('triggered_by', 'text', col => col.notNull())
        .addColumn('started_at', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
        .addColumn('completed_at', 'timestamptz')
        .addColumn('duration_ms', 'integer')
        .addColumn('result', 'jsonb')
        .addColumn('error', 'text')
        .execute();

    await db.schema
        .createIndex('sheet_sync_runs_job_started_idx')
        .on('sheet_sync_runs')
        .columns(['job_name', 'started_at'])
        .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
    await db.schema.dropTable('sheet_sync_runs').execute();
}
