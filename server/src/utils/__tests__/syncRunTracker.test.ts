/**
 * Unit tests for the sync run tracker
 */

import type { SyncRunCompletion, SyncRunStore } from '../../db/queries/syncRuns.js';
import type { SyncRunTrigger } from '../../db/schema.js';
import { cleanupStaleRuns, trackSyncRun } from '../syncRunTracker.js';

class RecordingStore implements SyncRunStore {
    readonly started: Array<{ jobName: string; triggeredBy: SyncRunTrigger }> = [];
    readonly finished: Array<{ id: number; completion: SyncRunCompletion }> = [];
    failStart = false;
    staleReasons: string[] = [];

    async start(jobName: string, triggeredBy: SyncRunTrigger): Promise<number> {
        if (this.failStart) throw new Error('relation "sheet_sync_runs" does not exist');
        this.started.push({ jobName, triggeredBy });
        return this.started.length;
    }

    async finish(id: number, completion: SyncRunCompletion): Promise<void> {
        this.finished.push({ id, completion });
    }

    async failStaleRuns(reason: string): Promise<number> {
        this.staleReasons.push(reason);
        return 2;
    }
}

describe('trackSyncRun', () => {
    it('records a completed run with its result', async () => {
        const store = new RecordingStore();

        const result = await trackSyncRun(store, 'sheet_pull_sync', async () => ({ created: 1 }), 'manual');

        expect(result).toEqual({ created: 1 });
        expect(store.started).toEqual([{ jobName: 'sheet_pull_sync', triggeredBy: 'manual' }]);
        expect(store.finished).toHaveLength(1);
        expect(store.finished[0].id).toBe(1);
        expect(store.finished[0].completion).toMatchObject({ status: 'completed', result: { created: 1 } });
    });

    it('records a failed run and rethrows', async () => {
        const store = new RecordingStore();

        await expect(trackSyncRun(store, 'sheet_pull_sync', async () => {
            throw new Error('sheet unavailable');
        })).rejects.toThrow('sheet unavailable');

        expect(store.started[0].triggeredBy).toBe('scheduled');
        expect(store.finished[0].completion).toMatchObject({ status: 'failed', error: 'sheet unavailable' });
    });

    it('still runs the job when the run log cannot be written', async () => {
        const store = new RecordingStore();
        store.failStart = true;
        const job = vi.fn(async () => 'done');

        await expect(trackSyncRun(store, 'sheet_pull_sync', job)).resolves.toBe('done');
        expect(job).toHaveBeenCalledTimes(1);
        expect(store.finished).toEqual([]);
    });

    it('runs untracked without a store', async () => {
        await expect(trackSyncRun(null, 'sheet_pull_sync', async () => 7)).resolves.toBe(7);
    });
});

describe('cleanupStaleRuns', () => {
    it('fails runs left over from a previous process', async () => {
        const store = new RecordingStore();

        await cleanupStaleRuns(store);

        expect(store.staleReasons).toEqual(['Process restarted before completion']);
    });

    it('does not throw when the store is unavailable', async () => {
        const store = new RecordingStore();
        vi.spyOn(store, 'failStaleRuns').mockRejectedValue(new Error('connection refused'));

        await expect(cleanupStaleRuns(store)).resolves.toBeUndefined();
    });
});
