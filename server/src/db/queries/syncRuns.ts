/**
 * Sync run log (sheet_sync_runs)
 */

import { sql, type Kysely } from 'kysely';
import type { DB, SyncRunTrigger } from '../schema.js';

export interface SyncRunCompletion {
    status: 'completed' | 'failed';
    completedAt: Date;
    durationMs: number;
    result?: unknown;
    error?: string;
}

export interface SyncRunStore {
    /** Returns the new run id */
    start(jobName: string, triggeredBy: SyncRunTrigger, startedAt: Date): Promise<number>;
    finish(id: number, completion: SyncRunCompletion): Promise<void>;
    /** Mark runs left in 'running' by a restart as failed; returns how many */
    failStaleRuns(reason: string): Promise<number>;
}

export class KyselySyncRunStore implements SyncRunStore {
    constructor(private readonly db: Kysely<DB>) {}

    async start(jobName: string, triggeredBy: SyncRunTrigger, startedAt: Date): Promise<number> {
        const row = await this.db
            .insertInto('sheet_sync_runs')
            .values({ job_name: jobName, triggered_by: triggeredBy, started_at: startedAt })
            .returning('id')
            .executeTakeFirstOrThrow();
        return row.id;
    }

    async finish(id: number, completion: SyncRunCompletion): Promise<void> {
        await this.db
            .updateTable('sheet_sync_runs')
            .set({
                status: completion.status,
                completed_at: completion.completedAt,
                duration_ms: completion.durationMs,
                result: completion.result === undefined ? null : JSON.stringify(completion.result),
                error: completion.error ?? null,
            })
            .where('id', '=', id)
            .execute();
    }

    async failStaleRuns(reason: string): Promise<number> {
        const result = await this.db
            .updateTable('sheet_sync_runs')
            .set({ status: 'failed', error: reason, completed_at: sql<Date>`now()` })
            .where('status', '=', 'running')
            .executeTakeFirst();
        return Number(result.numUpdatedRows);
    }
}
