/**
 * Sync Run Tracker
 *
 * Wraps a sync job to persist its run history in sheet_sync_runs.
 * If the log cannot be written the job still runs.
 */

import type { SyncRunStore } from '../db/queries/syncRuns.js';
import type { SyncRunTrigger } from '../db/schema.js';
import { errorMessage } from './errors.js';
import logger from './logger.js';

const runLogger = logger.child({ module: 'sync-run-tracker' });

/**
 * Track one run of a job.
 * - Creates a "running" record before execution
 * - Updates to "completed" or "failed" after
 * - Re-throws errors so the caller's error handling still applies
 * - Returns the job's result unchanged
 */
export async function trackSyncRun<T>(
    store: SyncRunStore | null,
    jobName: string,
    fn: () => Promise<T>,
    triggeredBy: SyncRunTrigger = 'scheduled'
): Promise<T> {
    const startedAt = new Date();
    let runId: number | null = null;

    if (store) {
        try {
            runId = await store.start(jobName, triggeredBy, startedAt);
        } catch (err: unknown) {
            runLogger.warn({ jobName, error: errorMessage(err) }, 'Failed to create sync run record');
        }
    }

    const finish = async (status: 'completed' | 'failed', extra: { result?: unknown; error?: string }): Promise<void> => {
        if (!store || runId === null) return;
        try {
            await store.finish(runId, {
                status,
                completedAt: new Date(),
                durationMs: Date.now() - startedAt.getTime(),
                ...extra,
            });
        } catch (err: unknown) {
            runLogger.warn({ jobName, error: errorMessage(err) }, 'Failed to update sync run record');
        }
    };

    try {
        const result = await fn();
        await finish('completed', { result });
        return result;
    } catch (error: unknown) {
        await finish('failed', { error: errorMessage(error) });
        throw error;
    }
}

/**
 * Mark runs still "running" as failed.
 * Called once when the scheduler starts: they were interrupted by a restart.
 */
export async function cleanupStaleRuns(store: SyncRunStore): Promise<void> {
    try {
        const count = await store.failStaleRuns('Process restarted before completion');
        if (count > 0) {
            runLogger.info({ count }, 'Marked stale sync runs as failed');
        }
    } catch (err: unknown) {
        runLogger.warn({ error: errorMessage(err) }, 'Failed to cleanup stale runs');
    }
}
